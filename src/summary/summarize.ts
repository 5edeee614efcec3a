import type { ChunkBoundary } from "../config/types.js";
import type { CascadeChat, CascadeResult } from "../llm/cascade.js";
import {
  buildDirectSummaryPrompt,
  buildFinalSummaryPrompt,
  buildIntermediateSummaryPrompt,
  type SummaryKind,
} from "../llm/prompts/summaryPrompts.js";
import { chunkText } from "../refine/chunker.js";
import { isTooShortForLlm } from "../refine/refiner.js";
import { log } from "../utils/logger.js";

const summaryLog = log.withScope("summary");

export type SummaryResult = {
  kind: SummaryKind;
  text: string;
  model: string;
};

export type SummaryOutcome =
  | { status: "ok"; summary: SummaryResult; calls: number }
  | { status: "too_short"; message: string }
  | { status: "failed"; message: string; calls: number };

export type SummarizeOptions = {
  detailed: boolean;
  chunkChars: number;
  boundary: ChunkBoundary;
};

export const TOO_SHORT_MESSAGE = "The transcript is too short to summarize.";
export const SUMMARY_FAILED_MESSAGE = "Could not generate a summary right now: every model failed. Please try again later.";

/**
 * Summarize a transcript. Transcripts longer than one chunk go map-reduce:
 * one intermediate summary per chunk, then a final merge. Shorter ones get
 * a single direct call. `detailed` only changes verbosity.
 */
export async function summarize(transcript: string, chat: CascadeChat, opts: SummarizeOptions): Promise<SummaryOutcome> {
  const kind: SummaryKind = opts.detailed ? "detailed" : "brief";

  if (isTooShortForLlm(transcript)) {
    return { status: "too_short", message: TOO_SHORT_MESSAGE };
  }

  let calls = 0;
  const call = async (label: string, prompt: Parameters<CascadeChat>[0]): Promise<CascadeResult> => {
    calls++;
    const start = Date.now();
    const result = await chat(prompt);
    summaryLog.debug(`${label} ok=${result.ok} ms=${Date.now() - start}`);
    return result;
  };

  if (transcript.length <= opts.chunkChars) {
    const result = await call(`${kind} direct`, buildDirectSummaryPrompt(transcript, kind));
    if (!result.ok) return { status: "failed", message: SUMMARY_FAILED_MESSAGE, calls };
    return { status: "ok", summary: { kind, text: result.text, model: result.model }, calls };
  }

  const chunks = chunkText(transcript, opts.chunkChars, opts.boundary);
  summaryLog.info(`Summarizing ${transcript.length} chars in ${chunks.length} part(s) (${kind})`);

  const partials: string[] = [];
  for (const [index, chunk] of chunks.entries()) {
    const result = await call(
      `${kind} part ${index + 1}/${chunks.length}`,
      buildIntermediateSummaryPrompt(chunk, { index, total: chunks.length }, kind)
    );
    if (!result.ok) {
      summaryLog.error(`Part ${index + 1}/${chunks.length} failed on every model; abandoning summary`);
      return { status: "failed", message: SUMMARY_FAILED_MESSAGE, calls };
    }
    partials.push(result.text);
  }

  const final = await call(`${kind} final`, buildFinalSummaryPrompt(partials, kind));
  if (!final.ok) return { status: "failed", message: SUMMARY_FAILED_MESSAGE, calls };

  return { status: "ok", summary: { kind, text: final.text, model: final.model }, calls };
}
