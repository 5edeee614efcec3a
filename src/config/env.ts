import "dotenv/config";
import type { ChunkBoundary, Config, LogFormat, LogLevel, SttProviderName } from "./types.js";
import { redactConfigSnapshot } from "./redact.js";

function opt(name: string): string | undefined {
  const v = process.env[name];
  return v && v.trim() ? v.trim() : undefined;
}

function optAny(names: string[]): string | undefined {
  for (const name of names) {
    const v = opt(name);
    if (v) return v;
  }
  return undefined;
}

function optInt(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isInteger(n)) throw new Error(`Invalid integer for ${name}: ${v}`);
  return n;
}

function optFloat(name: string, def: number): number {
  const v = opt(name);
  if (!v) return def;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new Error(`Invalid number for ${name}: ${v}`);
  return n;
}

function optList(name: string): string[] {
  return (opt(name) ?? "")
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

function enumOf<T extends string>(name: string, allowed: readonly T[], def: T): T {
  const v = opt(name);
  if (!v) return def;
  const match = allowed.find((a) => a === v);
  if (match) return match;
  throw new Error(`Invalid value for ${name}: ${v}. Allowed: ${allowed.join(", ")}`);
}

// Deprecated keys: keep list, warn once if present
const DEPRECATED: Record<string, string> = {
  OPENROUTER_API_KEY: "Use LLM_API_KEY.",
  OPENROUTER_MODEL: "Use LLM_MODEL.",
  DEEPINFRA_API_KEY: "Use STT_API_KEY.",
  FFMPEG_BIN: "Use FFMPEG_PATH.",
};

let deprecatedEnvWarned = false;

function warnDeprecatedEnv(): void {
  if (deprecatedEnvWarned) return;
  deprecatedEnvWarned = true;
  for (const [key, msg] of Object.entries(DEPRECATED)) {
    if (process.env[key] != null) {
      console.warn(`[config] DEPRECATED env var detected: ${key}. ${msg}`);
    }
  }
}

export function loadConfig(): Config {
  warnDeprecatedEnv();

  const apiIdRaw = opt("TELEGRAM_API_ID");
  const apiId = apiIdRaw ? optInt("TELEGRAM_API_ID", 0) : undefined;

  const chunkChars = optInt("CHUNK_CHARS", 15000);
  if (chunkChars <= 0) throw new Error(`CHUNK_CHARS must be positive, got ${chunkChars}`);

  const windowSeconds = optInt("WINDOW_SECONDS", 600);
  if (windowSeconds <= 0) throw new Error(`WINDOW_SECONDS must be positive, got ${windowSeconds}`);

  const cfg: Config = {
    telegram: {
      botToken: opt("TELEGRAM_BOT_TOKEN"),
      apiId,
      apiHash: opt("TELEGRAM_API_HASH"),
      session: opt("TELEGRAM_SESSION") ?? "",
      relayChatId: opt("RELAY_CHAT_ID"),
      maxMessageLength: optInt("MAX_MESSAGE_LENGTH", 4000),
    },

    relay: {
      directDownloadLimitBytes: optFloat("DIRECT_DOWNLOAD_LIMIT_MB", 19) * 1024 * 1024,
      timeoutMs: optInt("RELAY_TIMEOUT_MS", 15 * 60 * 1000),
      pollIntervalMs: optInt("RELAY_POLL_INTERVAL_MS", 5000),
      pollBatch: optInt("RELAY_POLL_BATCH", 10),
      directFetchAttempts: optInt("RELAY_DIRECT_FETCH_ATTEMPTS", 3),
      directFetchDelayMs: optInt("RELAY_DIRECT_FETCH_DELAY_MS", 2000),
      scanLimit: optInt("RELAY_SCAN_LIMIT", 20),
      maxPending: optInt("RELAY_MAX_PENDING", 500),
      restartBaseMs: optInt("RELAY_RESTART_BASE_MS", 5000),
      restartMaxMs: optInt("RELAY_RESTART_MAX_MS", 300000),
      maxRestarts: optInt("RELAY_MAX_RESTARTS", 10),
      restartWindowMs: optInt("RELAY_RESTART_WINDOW_MS", 30 * 60 * 1000),
    },

    data: {
      root: opt("DATA_ROOT") ?? "./data",
    },

    media: {
      ytdlpPath: opt("YTDLP_PATH") ?? "yt-dlp",
      downloadTimeoutMs: optInt("MEDIA_DOWNLOAD_TIMEOUT_MS", 10 * 60 * 1000),
    },

    audio: {
      ffmpegPath: optAny(["FFMPEG_PATH", "FFMPEG_BIN"]),
      sampleRate: optInt("AUDIO_SAMPLE_RATE", 16000),
      channels: optInt("AUDIO_CHANNELS", 1),
      windowSeconds,
    },

    stt: {
      provider: enumOf<SttProviderName>("STT_PROVIDER", ["openai", "noop"] as const, "openai"),
      apiKey: optAny(["STT_API_KEY", "DEEPINFRA_API_KEY"]),
      baseUrl: opt("STT_BASE_URL") ?? "https://api.deepinfra.com/v1/openai",
      model: opt("STT_MODEL") ?? "openai/whisper-large-v3-turbo",
      language: opt("STT_LANGUAGE"),
      windowAttempts: optInt("STT_WINDOW_ATTEMPTS", 3),
    },

    transcript: {
      wordsPerStep: optInt("WORDS_PER_STEP", 35),
      timeStepSeconds: optInt("TIME_STEP_SECONDS", 30),
    },

    llm: {
      apiKey: optAny(["LLM_API_KEY", "OPENROUTER_API_KEY"]),
      baseUrl: opt("LLM_BASE_URL") ?? "https://openrouter.ai/api/v1",
      model: optAny(["LLM_MODEL", "OPENROUTER_MODEL"]) ?? "openai/gpt-4o-mini",
      fallbackModels: optList("LLM_FALLBACK_MODELS"),
      temperature: optFloat("LLM_TEMPERATURE", 0.3),
      maxTokens: optInt("LLM_MAX_TOKENS", 8000),
      referer: opt("LLM_REFERER"),
      appName: opt("LLM_APP_NAME") ?? "mediascribe",
      timeoutMs: optInt("LLM_TIMEOUT_MS", 120000),
    },

    refine: {
      chunkChars,
      boundary: enumOf<ChunkBoundary>("CHUNK_BOUNDARY", ["hard", "paragraph"] as const, "hard"),
      minLengthRatio: optFloat("FORMAT_MIN_LENGTH_RATIO", 0.7),
    },

    results: {
      ttlMs: optInt("RESULT_TTL_MS", 7 * 24 * 60 * 60 * 1000),
      maxEntries: optInt("RESULT_MAX_ENTRIES", 1000),
    },

    logging: {
      level: enumOf<LogLevel>("LOG_LEVEL", ["error", "warn", "info", "debug", "trace"] as const, "info"),
      scopes: opt("LOG_SCOPES")?.split(",").map((s) => s.trim()).filter(Boolean),
      format: enumOf<LogFormat>("LOG_FORMAT", ["pretty", "json"] as const, "pretty"),
    },
  };

  return cfg;
}

export function printConfigSnapshot(cfg: Config): void {
  const snap = redactConfigSnapshot({
    TELEGRAM_BOT_TOKEN: cfg.telegram.botToken,
    TELEGRAM_API_ID: cfg.telegram.apiId,
    TELEGRAM_API_HASH: cfg.telegram.apiHash,
    TELEGRAM_SESSION: cfg.telegram.session,
    RELAY_CHAT_ID: cfg.telegram.relayChatId,
    MAX_MESSAGE_LENGTH: cfg.telegram.maxMessageLength,
    DIRECT_DOWNLOAD_LIMIT_BYTES: cfg.relay.directDownloadLimitBytes,
    RELAY_TIMEOUT_MS: cfg.relay.timeoutMs,
    RELAY_POLL_INTERVAL_MS: cfg.relay.pollIntervalMs,
    RELAY_MAX_RESTARTS: cfg.relay.maxRestarts,
    DATA_ROOT: cfg.data.root,
    YTDLP_PATH: cfg.media.ytdlpPath,
    FFMPEG_PATH: cfg.audio.ffmpegPath,
    AUDIO_SAMPLE_RATE: cfg.audio.sampleRate,
    AUDIO_CHANNELS: cfg.audio.channels,
    WINDOW_SECONDS: cfg.audio.windowSeconds,
    STT_PROVIDER: cfg.stt.provider,
    STT_API_KEY: cfg.stt.apiKey,
    STT_BASE_URL: cfg.stt.baseUrl,
    STT_MODEL: cfg.stt.model,
    STT_LANGUAGE: cfg.stt.language,
    STT_WINDOW_ATTEMPTS: cfg.stt.windowAttempts,
    WORDS_PER_STEP: cfg.transcript.wordsPerStep,
    TIME_STEP_SECONDS: cfg.transcript.timeStepSeconds,
    LLM_API_KEY: cfg.llm.apiKey,
    LLM_BASE_URL: cfg.llm.baseUrl,
    LLM_MODEL: cfg.llm.model,
    LLM_FALLBACK_MODELS: cfg.llm.fallbackModels.join(","),
    LLM_TEMPERATURE: cfg.llm.temperature,
    LLM_MAX_TOKENS: cfg.llm.maxTokens,
    CHUNK_CHARS: cfg.refine.chunkChars,
    CHUNK_BOUNDARY: cfg.refine.boundary,
    FORMAT_MIN_LENGTH_RATIO: cfg.refine.minLengthRatio,
    RESULT_TTL_MS: cfg.results.ttlMs,
    RESULT_MAX_ENTRIES: cfg.results.maxEntries,
    LOG_LEVEL: cfg.logging.level,
    LOG_SCOPES: cfg.logging.scopes?.join(",") ?? "",
    LOG_FORMAT: cfg.logging.format,
  });

  console.log("=== CONFIG SNAPSHOT ===");
  console.log(JSON.stringify(snap, null, 2));
  console.log("=======================");
}

export const cfg = loadConfig();
