import { describeError } from "../errors.js";
import type { SecondaryAccount } from "../telegram/types.js";
import { log } from "../utils/logger.js";
import { sleepUnlessAborted } from "../utils/sleep.js";
import { parseCorrelationTag, type CorrelationTag } from "./correlationTag.js";
import type { RelayCorrelator } from "./correlator.js";

const monitorLog = log.withScope("monitor");

export type UnclaimedRelayFile = {
  tag: CorrelationTag;
  path: string;
};

export type RelayMonitorOptions = {
  secondary: SecondaryAccount;
  correlator: RelayCorrelator;
  pollIntervalMs: number;
  batchSize: number;
  /** A tagged file arrived with no request waiting for it (expired or evicted token). */
  onUnclaimed: (file: UnclaimedRelayFile) => Promise<void>;
};

/**
 * Polls the relay channel through the secondary identity and hands every
 * tagged media message to the correlator, each exactly once.
 *
 * The high-water mark advances past every message seen, tagged or not, so
 * nothing is looked at twice. It survives restarts of `run()` within the
 * process; a fresh monitor starts from the channel's newest message.
 */
export class RelayMonitor {
  private highWater: number | null = null;

  constructor(private readonly opts: RelayMonitorOptions) {}

  get lastSeenId(): number | null {
    return this.highWater;
  }

  async run(signal: AbortSignal): Promise<void> {
    const { secondary, correlator } = this.opts;
    await secondary.connect();

    if (this.highWater === null) {
      const latest = await secondary.getRecentMessages(correlator.relayChatId, 1);
      this.highWater = latest[0]?.id ?? 0;
      monitorLog.info(`Relay monitor started at message ${this.highWater}`);
    } else {
      monitorLog.info(`Relay monitor resumed after message ${this.highWater}`);
    }

    while (!signal.aborted) {
      await this.pollOnce();
      correlator.sweep();
      await sleepUnlessAborted(this.opts.pollIntervalMs, signal);
    }
    monitorLog.info("Relay monitor stopped");
  }

  /** Drain everything above the high-water mark. Errors listing messages propagate. */
  async pollOnce(): Promise<number> {
    const { secondary, correlator } = this.opts;
    let processed = 0;

    for (;;) {
      const batch = await secondary.getMessagesAfter(correlator.relayChatId, this.highWater ?? 0, this.opts.batchSize);
      const fresh = batch.filter((m) => m.id > (this.highWater ?? 0)).sort((a, b) => a.id - b.id);
      if (fresh.length === 0) break;

      for (const message of fresh) {
        this.highWater = Math.max(this.highWater ?? 0, message.id);
        processed++;

        const tag = message.hasMedia ? parseCorrelationTag(message.caption) : null;
        if (!tag) continue;

        try {
          const delivery = await correlator.handleRelayedMessage(message, tag);
          if (delivery.status === "unclaimed") {
            monitorLog.info("Unclaimed relay file; processing on its own", { copyId: message.id, ...tag });
            await this.opts.onUnclaimed({ tag: delivery.tag, path: delivery.path });
          } else if (delivery.status === "delivered") {
            monitorLog.debug("Relay file delivered to waiting request", { copyId: message.id });
          }
        } catch (err: unknown) {
          monitorLog.error(`Failed to handle relay message ${message.id}: ${describeError(err)}`);
        }
      }

      if (batch.length < this.opts.batchSize) break;
    }

    return processed;
  }
}
