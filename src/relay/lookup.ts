import { describeError } from "../errors.js";
import type { RelayMessage, SecondaryAccount } from "../telegram/types.js";
import { log } from "../utils/logger.js";

const relayLog = log.withScope("relay");

export type MediaLookupOptions = {
  attempts: number;
  delayMs: number;
  scanLimit: number;
  sleep: (ms: number) => Promise<void>;
  /** Checked before each attempt; returning false abandons the lookup. */
  stillWanted?: () => boolean;
};

/**
 * Bounded id lookup for a media message the secondary identity may not see
 * yet, then one scan of the chat's most recent messages.
 */
export async function findMediaMessage(
  secondary: SecondaryAccount,
  chatId: string,
  messageId: number,
  opts: MediaLookupOptions
): Promise<RelayMessage | null> {
  const wanted = opts.stillWanted ?? (() => true);

  for (let attempt = 1; attempt <= opts.attempts; attempt++) {
    await opts.sleep(opts.delayMs);
    if (!wanted()) return null;

    const message = await secondary.getMessageById(chatId, messageId).catch((err: unknown) => {
      relayLog.warn(`Lookup attempt ${attempt} for ${chatId}/${messageId} failed: ${describeError(err)}`);
      return null;
    });
    if (message?.hasMedia) return message;
    relayLog.debug(`Lookup attempt ${attempt}/${opts.attempts}: ${chatId}/${messageId} not visible yet`);
  }

  if (!wanted()) return null;
  const recent = await secondary.getRecentMessages(chatId, opts.scanLimit).catch((err: unknown) => {
    relayLog.warn(`Recent-message scan of ${chatId} failed: ${describeError(err)}`);
    return [];
  });
  const found = recent.find((m) => m.id === messageId && m.hasMedia) ?? null;
  if (found) relayLog.debug(`Found ${chatId}/${messageId} in recent-message scan`);
  return found;
}
