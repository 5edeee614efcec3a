import type { SummaryKind } from "../llm/prompts/summaryPrompts.js";
import type { Transcript } from "../transcript/types.js";
import type { InlineButton, PrimaryChannel } from "./types.js";

export const SUMMARY_CALLBACK_PREFIX = "summary:";

export const SUMMARY_BUTTONS: InlineButton[] = [
  { text: "Brief summary", data: `${SUMMARY_CALLBACK_PREFIX}brief` },
  { text: "Detailed summary", data: `${SUMMARY_CALLBACK_PREFIX}detailed` },
];

export function parseSummaryCallback(data: string): SummaryKind | null {
  if (data === `${SUMMARY_CALLBACK_PREFIX}brief`) return "brief";
  if (data === `${SUMMARY_CALLBACK_PREFIX}detailed`) return "detailed";
  return null;
}

/** Split text into message-sized parts, preferring paragraph then line breaks. */
export function splitForMessages(text: string, maxLength: number): string[] {
  const parts: string[] = [];
  let rest = text.trim();

  while (rest.length > maxLength) {
    const window = rest.slice(0, maxLength);
    let cut = window.lastIndexOf("\n\n");
    if (cut <= 0) cut = window.lastIndexOf("\n");
    if (cut <= 0) cut = window.lastIndexOf(" ");
    if (cut <= 0) cut = maxLength;
    parts.push(rest.slice(0, cut).trimEnd());
    rest = rest.slice(cut).trimStart();
  }
  if (rest) parts.push(rest);
  return parts;
}

/**
 * Send the refined transcript: inline when it fits in one message,
 * otherwise as a text file. Summary buttons ride along either way.
 */
export async function deliverTranscript(
  primary: PrimaryChannel,
  chatId: string,
  transcript: Transcript,
  maxLength: number
): Promise<void> {
  if (transcript.formatted.length <= maxLength || !transcript.formattedPath) {
    const parts = splitForMessages(transcript.formatted, maxLength);
    for (const [i, part] of parts.entries()) {
      await primary.sendMessage(chatId, part, i === parts.length - 1 ? { buttons: SUMMARY_BUTTONS } : {});
    }
    return;
  }
  await primary.sendDocument(chatId, transcript.formattedPath, {
    caption: "Transcript is too long for a message, so here it is as a file.",
    buttons: SUMMARY_BUTTONS,
  });
}

/** Unrefined transcript, for /raw. */
export async function deliverRawTranscript(
  primary: PrimaryChannel,
  chatId: string,
  transcript: Transcript,
  maxLength: number
): Promise<void> {
  if (transcript.raw.length > maxLength && transcript.rawPath) {
    await primary.sendDocument(chatId, transcript.rawPath, { caption: "Raw transcript" });
    return;
  }
  for (const part of splitForMessages(transcript.raw, maxLength)) {
    await primary.sendMessage(chatId, part);
  }
}

export async function deliverLongText(primary: PrimaryChannel, chatId: string, text: string, maxLength: number): Promise<void> {
  for (const part of splitForMessages(text, maxLength)) {
    await primary.sendMessage(chatId, part);
  }
}
