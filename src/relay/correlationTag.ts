/**
 * Caption tag that ties a relayed copy back to the message it came from.
 * Format: `#user_<chat_id>_<message_id>`; chat ids may be negative.
 */

export type CorrelationTag = {
  chatId: string;
  messageId: number;
};

const TAG_PREFIX = "#user_";
const TAG_RE = /^#user_(-?\d+)_(\d+)(?:\s|$)/;

export function formatCorrelationTag(chatId: string, messageId: number): string {
  return `${TAG_PREFIX}${chatId}_${messageId}`;
}

export function parseCorrelationTag(caption: string): CorrelationTag | null {
  const match = TAG_RE.exec(caption.trim());
  if (!match?.[1] || !match[2]) return null;
  return { chatId: match[1], messageId: Number(match[2]) };
}
