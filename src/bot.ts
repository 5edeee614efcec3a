import "dotenv/config";
import { cfg, printConfigSnapshot } from "./config/env.js";
import { resolveDataDir } from "./dataPaths.js";
import { describeError } from "./errors.js";
import { MediaResolver } from "./media/resolver.js";
import { UrlDownloader } from "./media/urlSources.js";
import { acquireLock, releaseLock } from "./pidlock.js";
import { JobTracker } from "./pipeline/jobs.js";
import { createConfiguredChat, pipelineSettingsFromConfig } from "./pipeline/settings.js";
import { RelayCorrelator } from "./relay/correlator.js";
import { RelayMonitor } from "./relay/monitor.js";
import { supervise } from "./relay/supervisor.js";
import { ResultCache } from "./results/resultCache.js";
import { getSttProvider, getSttProviderInfo } from "./stt/provider.js";
import { BotChannel, createBot } from "./telegram/botChannel.js";
import { registerHandlers, RequestHandlers } from "./telegram/handlers.js";
import { UserAccount } from "./telegram/userAccount.js";
import { configureLogger, log } from "./utils/logger.js";

const bootLog = log.withScope("boot");

if (!acquireLock()) {
  process.exit(1);
}

configureLogger(cfg.logging);
printConfigSnapshot(cfg);

const botToken = cfg.telegram.botToken;
if (!botToken) {
  bootLog.error("TELEGRAM_BOT_TOKEN is not set. Exiting.");
  process.exit(1);
}

const bot = createBot(botToken);
const primary = new BotChannel(bot.api);
const mediaDir = resolveDataDir("media");

// Secondary identity and relay are optional: without them large files are refused
const { apiId, apiHash, session, relayChatId } = cfg.telegram;
const account = apiId && apiHash && session ? new UserAccount({ apiId, apiHash, session }) : null;
const relay =
  account && relayChatId
    ? {
        account,
        correlator: new RelayCorrelator({
          primary,
          secondary: account,
          relayChatId,
          mediaDir,
          timeoutMs: cfg.relay.timeoutMs,
          directFetchAttempts: cfg.relay.directFetchAttempts,
          directFetchDelayMs: cfg.relay.directFetchDelayMs,
          scanLimit: cfg.relay.scanLimit,
          maxPending: cfg.relay.maxPending,
        }),
      }
    : null;
if (!relay) {
  bootLog.warn("Relay not configured (TELEGRAM_API_ID, TELEGRAM_API_HASH, TELEGRAM_SESSION, RELAY_CHAT_ID); large files will be refused");
}

const stt = await getSttProvider();
bootLog.info(`STT provider: ${getSttProviderInfo().description}`);

const jobs = new JobTracker();
const handlers = new RequestHandlers({
  primary,
  resolver: new MediaResolver({
    primary,
    urls: new UrlDownloader({ ytdlpPath: cfg.media.ytdlpPath, timeoutMs: cfg.media.downloadTimeoutMs }),
    relay: relay?.correlator ?? null,
    secondary: account,
    mediaDir,
    directDownloadLimitBytes: cfg.relay.directDownloadLimitBytes,
    originLookup: {
      attempts: cfg.relay.directFetchAttempts,
      delayMs: cfg.relay.directFetchDelayMs,
      scanLimit: cfg.relay.scanLimit,
    },
  }),
  jobs,
  cache: new ResultCache({ ttlMs: cfg.results.ttlMs, maxEntries: cfg.results.maxEntries }),
  chat: createConfiguredChat(cfg),
  pipeline: {
    stt,
    audioDir: resolveDataDir("audio"),
    transcriptsDir: resolveDataDir("transcripts"),
    settings: pipelineSettingsFromConfig(cfg),
  },
  maxMessageLength: cfg.telegram.maxMessageLength,
  summary: { chunkChars: cfg.refine.chunkChars, boundary: cfg.refine.boundary },
});

registerHandlers(bot, handlers);

const shutdown = new AbortController();
let monitorDone: Promise<void> = Promise.resolve();

if (relay) {
  const monitor = new RelayMonitor({
    secondary: relay.account,
    correlator: relay.correlator,
    pollIntervalMs: cfg.relay.pollIntervalMs,
    batchSize: cfg.relay.pollBatch,
    onUnclaimed: (file) => handlers.onUnclaimed(file),
  });

  monitorDone = supervise(
    (signal) => monitor.run(signal),
    {
      name: "relay monitor",
      baseDelayMs: cfg.relay.restartBaseMs,
      maxDelayMs: cfg.relay.restartMaxMs,
      maxRestarts: cfg.relay.maxRestarts,
      windowMs: cfg.relay.restartWindowMs,
    },
    shutdown.signal
  ).then((exit) => {
    if (exit === "circuit_open") {
      bootLog.error("Relay monitor stopped for good; large files will time out until restart");
    }
  });
}

let stopping = false;
async function stop(reason: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  bootLog.info(`Received ${reason}, shutting down...`);
  shutdown.abort();
  await bot.stop();
  await monitorDone;
  bootLog.info(`Waiting for ${jobs.size} running job(s)`);
  await jobs.drain();
  await account?.disconnect();
  releaseLock();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    stop(signal).catch((err: unknown) => {
      bootLog.error(`Shutdown failed: ${describeError(err)}`);
      process.exit(1);
    });
  });
}

bootLog.info("Starting bot (long polling)");
await bot.start({
  onStart: (me) => bootLog.info(`Bot online as @${me.username}`),
});
