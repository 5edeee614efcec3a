import { rm } from "node:fs/promises";
import type { AudioSegment } from "../audio/segmenter.js";
import { describeError } from "../errors.js";
import type { SttProvider } from "../stt/provider.js";
import { log } from "../utils/logger.js";
import type { IndexedTranscription, WindowTranscription } from "./types.js";

const transcriptLog = log.withScope("transcript");

export type TranscribeWindowsOptions = {
  attempts: number;
  onWindowDone?: (done: number, total: number) => Promise<void> | void;
  keepFiles?: boolean;
};

async function transcribeWithRetries(
  provider: SttProvider,
  segment: AudioSegment,
  attempts: number
): Promise<WindowTranscription> {
  let last: WindowTranscription = { text: "", segments: [], failed: true };

  for (let attempt = 1; attempt <= Math.max(1, attempts); attempt++) {
    try {
      last = await provider.transcribeFile(segment.path);
    } catch (err: unknown) {
      transcriptLog.warn(`Window ${segment.index} attempt ${attempt} threw: ${describeError(err)}`);
      last = { text: "", segments: [], failed: true };
    }
    if (!last.failed) return last;
    transcriptLog.warn(`Window ${segment.index} failed (attempt ${attempt}/${attempts})`);
  }

  return last;
}

/**
 * Transcribe windows strictly in index order. A window that still fails
 * after all attempts contributes empty text; the others are kept.
 */
export async function transcribeWindows(
  segments: AudioSegment[],
  provider: SttProvider,
  opts: TranscribeWindowsOptions
): Promise<IndexedTranscription[]> {
  const ordered = [...segments].sort((a, b) => a.index - b.index);
  const results: IndexedTranscription[] = [];

  for (const [i, segment] of ordered.entries()) {
    transcriptLog.info(
      `Transcribing window ${i + 1}/${ordered.length} (${segment.offsetSec}s +${segment.durationSec.toFixed(1)}s)`
    );
    const result = await transcribeWithRetries(provider, segment, opts.attempts);
    results.push({ ...result, index: segment.index });

    if (!opts.keepFiles) {
      await rm(segment.path, { force: true });
    }
    await opts.onWindowDone?.(i + 1, ordered.length);
  }

  const failed = results.filter((r) => r.failed).length;
  if (failed > 0) {
    transcriptLog.warn(`${failed}/${results.length} window(s) produced no transcription`);
  }
  return results;
}
