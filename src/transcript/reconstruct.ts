import { formatMarker } from "../utils/timestamps.js";
import type { IndexedTranscription, TranscriptSegment } from "./types.js";

export type ReconstructOptions = {
  windowSeconds: number;
  wordsPerStep: number;
  timeStepSeconds: number;
};

export type ReconstructedTimeline = {
  text: string;
  segments: TranscriptSegment[];
};

function byIndex(a: IndexedTranscription, b: IndexedTranscription): number {
  return a.index - b.index;
}

/** Move window-local segment times onto the global axis (index × windowSeconds). */
export function shiftSegments(windows: IndexedTranscription[], windowSeconds: number): TranscriptSegment[] {
  const out: TranscriptSegment[] = [];
  for (const window of [...windows].sort(byIndex)) {
    const offset = window.index * windowSeconds;
    const local = [...window.segments].sort((a, b) => a.start - b.start);
    for (const seg of local) {
      out.push({ start: seg.start + offset, end: seg.end + offset, text: seg.text });
    }
  }
  return out;
}

function chunkWords(words: string[], size: number): string[][] {
  const groups: string[][] = [];
  for (let i = 0; i < words.length; i += size) {
    groups.push(words.slice(i, i + size));
  }
  return groups;
}

/**
 * Build the continuous `[HH:MM:SS] text` transcript.
 *
 * A synthetic clock stamps every group of `wordsPerStep` words and advances
 * by `timeStepSeconds`. At the start of window i the clock is raised to
 * i × windowSeconds, so each window's first stamp lands on its real offset
 * and stamps never go backwards. A window without timed segments gets a
 * single stamp for its whole text. Empty windows contribute nothing.
 */
export function reconstructTimeline(windows: IndexedTranscription[], opts: ReconstructOptions): ReconstructedTimeline {
  const wordsPerStep = Math.max(1, Math.floor(opts.wordsPerStep));
  const paragraphs: string[] = [];
  let clock = 0;

  for (const window of [...windows].sort(byIndex)) {
    clock = Math.max(clock, window.index * opts.windowSeconds);

    if (window.segments.length > 0) {
      const words = window.segments
        .map((s) => s.text)
        .join(" ")
        .split(/\s+/)
        .filter(Boolean);

      for (const group of chunkWords(words, wordsPerStep)) {
        paragraphs.push(`${formatMarker(clock)} ${group.join(" ")}`);
        clock += opts.timeStepSeconds;
      }
      continue;
    }

    const text = window.text.trim();
    if (text) {
      paragraphs.push(`${formatMarker(clock)} ${text}`);
      clock += opts.timeStepSeconds;
    }
  }

  return {
    text: paragraphs.join("\n\n"),
    segments: shiftSegments(windows, opts.windowSeconds),
  };
}
