/**
 * Out-of-band acquisition for files above the primary channel's download
 * limit.
 *
 * The primary identity copies the user's message into the relay channel
 * with a correlation tag; the secondary identity, which has no size limit,
 * downloads the copy. A token keyed by the copy's id links the two sides
 * and is consumed exactly once, either by the bounded direct fetch right
 * after copying or by the relay monitor.
 */

import { relayMediaPath } from "../dataPaths.js";
import { AcquisitionFailure, describeError } from "../errors.js";
import { TtlStore } from "../store/ttlStore.js";
import type { PrimaryChannel, RelayMessage, SecondaryAccount } from "../telegram/types.js";
import { log } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import { formatCorrelationTag, type CorrelationTag } from "./correlationTag.js";
import { findMediaMessage } from "./lookup.js";

const relayLog = log.withScope("relay");

export type RelayCorrelationToken = Readonly<{
  originalChatId: string;
  originalMessageId: number;
  progressMessageId?: number;
  copyMessageId: number;
  issuedAt: number;
}>;

export type RelayCorrelatorOptions = {
  primary: PrimaryChannel;
  secondary: SecondaryAccount;
  relayChatId: string;
  mediaDir: string;
  timeoutMs: number;
  directFetchAttempts: number;
  directFetchDelayMs: number;
  scanLimit: number;
  maxPending: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

type Waiter = {
  resolve: (path: string) => void;
  reject: (err: Error) => void;
};

/** What the monitor should do with a tagged relay message. */
export type RelayDelivery =
  | { status: "delivered"; token: RelayCorrelationToken; path: string }
  | { status: "unclaimed"; tag: CorrelationTag; path: string }
  | { status: "already_handled" };

export class RelayCorrelator {
  private readonly tokens: TtlStore<number, RelayCorrelationToken>;
  private readonly waiters = new Map<number, Waiter>();
  // armed only while nothing has claimed the copy; a claimed download may outlast timeoutMs
  private readonly timers = new Map<number, ReturnType<typeof setTimeout>>();
  // copy ids whose token has been consumed, so a late sighting is not processed twice
  private readonly handled: TtlStore<number, true>;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly opts: RelayCorrelatorOptions) {
    this.now = opts.now ?? Date.now;
    this.sleep = opts.sleep ?? sleep;
    this.tokens = new TtlStore({
      ttlMs: opts.timeoutMs,
      maxEntries: opts.maxPending,
      now: this.now,
      onEvict: (copyId, token, reason) => {
        relayLog.warn(`Relay token evicted (${reason})`, { copyId, originalMessageId: token.originalMessageId });
        this.rejectWaiter(copyId, new AcquisitionFailure("relay_timeout", `token ${reason}`));
      },
    });
    this.handled = new TtlStore({ ttlMs: opts.timeoutMs * 2, maxEntries: opts.maxPending * 4, now: this.now });
  }

  get relayChatId(): string {
    return this.opts.relayChatId;
  }

  get pendingCount(): number {
    return this.tokens.size;
  }

  /**
   * Copy the original message into the relay channel and wait for the
   * secondary identity to download it. Resolves with the local path.
   */
  async acquire(original: { chatId: string; messageId: number }, progressMessageId?: number): Promise<string> {
    const { secondary, primary, relayChatId } = this.opts;

    const readable = await secondary.canRead(relayChatId).catch((err: unknown) => {
      relayLog.error(`Secondary identity check failed: ${describeError(err)}`);
      return false;
    });
    if (!readable) {
      throw new AcquisitionFailure("relay_unavailable", "secondary identity cannot read the relay channel");
    }

    const caption = formatCorrelationTag(original.chatId, original.messageId);
    let copyMessageId: number;
    try {
      copyMessageId = await primary.copyMessage(relayChatId, original.chatId, original.messageId, caption);
    } catch (err: unknown) {
      throw new AcquisitionFailure("relay_copy_failed", describeError(err));
    }

    const token: RelayCorrelationToken = {
      originalChatId: original.chatId,
      originalMessageId: original.messageId,
      progressMessageId,
      copyMessageId,
      issuedAt: this.now(),
    };
    const delivered = new Promise<string>((resolve, reject) => {
      this.waiters.set(copyMessageId, { resolve, reject });
    });
    // a timeout or eviction can settle this before anyone awaits it
    void delivered.catch((err: unknown) => relayLog.debug(`Relay wait ended: ${describeError(err)}`));
    this.tokens.set(copyMessageId, token);
    relayLog.info(`Copied to relay channel as ${caption}`, { copyMessageId });

    const direct = await this.tryDirectFetch(copyMessageId);
    if (direct) {
      return direct;
    }

    relayLog.info("Direct fetch found nothing; waiting for the relay monitor", { copyMessageId });
    return this.awaitWithTimeout(copyMessageId, delivered);
  }

  /**
   * Called by the monitor for every tagged media message. Consumes the
   * token if one is registered; otherwise the file is handed back as
   * unclaimed so the caller can still process it.
   */
  async handleRelayedMessage(message: RelayMessage, tag: CorrelationTag): Promise<RelayDelivery> {
    const token = this.takeToken(message.id);

    if (!token) {
      if (this.handled.has(message.id)) {
        return { status: "already_handled" };
      }
      this.handled.set(message.id, true);
      const path = await this.download(message.id, tag.chatId, tag.messageId);
      return { status: "unclaimed", tag, path };
    }

    try {
      const path = await this.download(message.id, token.originalChatId, token.originalMessageId);
      this.resolveWaiter(message.id, path);
      return { status: "delivered", token, path };
    } catch (err: unknown) {
      this.rejectWaiter(message.id, new AcquisitionFailure("download_failed", describeError(err)));
      throw err;
    }
  }

  /** Drop expired tokens; their waiters fail with relay_timeout. */
  sweep(): number {
    this.handled.sweep();
    return this.tokens.sweep();
  }

  private async tryDirectFetch(copyId: number): Promise<string | null> {
    const found = await findMediaMessage(this.opts.secondary, this.opts.relayChatId, copyId, {
      attempts: this.opts.directFetchAttempts,
      delayMs: this.opts.directFetchDelayMs,
      scanLimit: this.opts.scanLimit,
      sleep: this.sleep,
      stillWanted: () => this.tokens.has(copyId),
    });
    return found ? this.consumeAndDownload(copyId) : null;
  }

  private takeToken(copyId: number): RelayCorrelationToken | undefined {
    const token = this.tokens.take(copyId);
    if (token) {
      this.handled.set(copyId, true);
      this.disarm(copyId);
    }
    return token;
  }

  private async consumeAndDownload(copyId: number): Promise<string | null> {
    const token = this.takeToken(copyId);
    if (!token) return null; // the monitor got there first

    try {
      const path = await this.download(copyId, token.originalChatId, token.originalMessageId);
      this.waiters.delete(copyId);
      return path;
    } catch (err: unknown) {
      this.waiters.delete(copyId);
      throw new AcquisitionFailure("download_failed", describeError(err));
    }
  }

  private async download(copyId: number, originalChatId: string, originalMessageId: number): Promise<string> {
    const dest = relayMediaPath(this.opts.mediaDir, originalChatId, originalMessageId);
    const start = this.now();
    const path = await this.opts.secondary.downloadMedia(this.opts.relayChatId, copyId, dest);
    relayLog.info(`Downloaded relayed file in ${this.now() - start}ms`, { copyId, path });
    return path;
  }

  private awaitWithTimeout(copyId: number, delivered: Promise<string>): Promise<string> {
    // the monitor may have claimed the copy while the direct fetch gave up
    if (this.tokens.has(copyId)) {
      const timer = setTimeout(() => {
        this.timers.delete(copyId);
        this.tokens.delete(copyId);
        this.rejectWaiter(copyId, new AcquisitionFailure("relay_timeout", `no delivery within ${this.opts.timeoutMs}ms`));
      }, this.opts.timeoutMs);
      this.timers.set(copyId, timer);
    }

    return delivered.finally(() => this.disarm(copyId));
  }

  private disarm(copyId: number): void {
    clearTimeout(this.timers.get(copyId));
    this.timers.delete(copyId);
  }

  private resolveWaiter(copyId: number, path: string): void {
    const waiter = this.waiters.get(copyId);
    this.waiters.delete(copyId);
    waiter?.resolve(path);
  }

  private rejectWaiter(copyId: number, err: Error): void {
    const waiter = this.waiters.get(copyId);
    this.waiters.delete(copyId);
    waiter?.reject(err);
  }
}
