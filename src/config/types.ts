export type LogLevel = "error" | "warn" | "info" | "debug" | "trace";
export type LogFormat = "pretty" | "json";

export type SttProviderName = "openai" | "noop";

/** How the refiner and summarizer cut a transcript into chunks. */
export type ChunkBoundary = "hard" | "paragraph";

export interface Config {
  telegram: {
    botToken?: string;
    apiId?: number;
    apiHash?: string;
    session: string;
    relayChatId?: string;
    maxMessageLength: number;
  };

  relay: {
    directDownloadLimitBytes: number;
    timeoutMs: number;
    pollIntervalMs: number;
    pollBatch: number;
    directFetchAttempts: number;
    directFetchDelayMs: number;
    scanLimit: number;
    maxPending: number;
    restartBaseMs: number;
    restartMaxMs: number;
    maxRestarts: number;
    restartWindowMs: number;
  };

  data: {
    root: string;
  };

  media: {
    ytdlpPath: string;
    downloadTimeoutMs: number;
  };

  audio: {
    ffmpegPath?: string;
    sampleRate: number;
    channels: number;
    windowSeconds: number;
  };

  stt: {
    provider: SttProviderName;
    apiKey?: string;
    baseUrl: string;
    model: string;
    language?: string;
    windowAttempts: number;
  };

  transcript: {
    wordsPerStep: number;
    timeStepSeconds: number;
  };

  llm: {
    apiKey?: string;
    baseUrl: string;
    model: string;
    fallbackModels: string[];
    temperature: number;
    maxTokens: number;
    referer?: string;
    appName: string;
    timeoutMs: number;
  };

  refine: {
    chunkChars: number;
    boundary: ChunkBoundary;
    minLengthRatio: number;
  };

  results: {
    ttlMs: number;
    maxEntries: number;
  };

  logging: {
    level: LogLevel;
    scopes?: string[];
    format: LogFormat;
  };
}
