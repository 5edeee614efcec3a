import type { ChunkBoundary } from "../config/types.js";
import type { CascadeChat } from "../llm/cascade.js";
import { buildRefinePrompt } from "../llm/prompts/refinePrompt.js";
import { log } from "../utils/logger.js";
import { countMarkers } from "../utils/timestamps.js";
import { chunkText } from "./chunker.js";

const refineLog = log.withScope("refine");

export const MIN_LLM_INPUT_CHARS = 10;

export type RefineOptions = {
  chunkChars: number;
  boundary: ChunkBoundary;
  minLengthRatio: number;
};

export type ChunkOutcome =
  | { index: number; status: "refined"; model: string }
  | { index: number; status: "kept_original"; reason: "cascade_exhausted" | "too_short" | "markers_changed" };

export type RefineResult = {
  text: string;
  chunks: ChunkOutcome[];
};

export function isTooShortForLlm(text: string): boolean {
  return text.replace(/\s+/g, "").length < MIN_LLM_INPUT_CHARS;
}

/**
 * Refine a raw transcript chunk by chunk. Every chunk ends up either
 * refined or unchanged; nothing is dropped, and pieces are joined with a
 * blank line in their original order.
 */
export async function refineTranscript(
  raw: string,
  chat: CascadeChat,
  opts: RefineOptions,
  onChunkDone?: (done: number, total: number) => Promise<void> | void
): Promise<RefineResult> {
  if (isTooShortForLlm(raw)) {
    refineLog.info("Transcript too short to refine, keeping raw text");
    return { text: raw, chunks: [] };
  }

  const pieces = chunkText(raw, opts.chunkChars, opts.boundary);
  const refined: string[] = [];
  const outcomes: ChunkOutcome[] = [];

  for (const [index, piece] of pieces.entries()) {
    const result = await chat(buildRefinePrompt(piece, { index, total: pieces.length }));

    if (!result.ok) {
      refineLog.warn(`Chunk ${index + 1}/${pieces.length}: every model failed, keeping original`);
      refined.push(piece);
      outcomes.push({ index, status: "kept_original", reason: "cascade_exhausted" });
    } else if (result.text.length < piece.length * opts.minLengthRatio) {
      refineLog.warn(
        `Chunk ${index + 1}/${pieces.length}: refined text too short (${result.text.length}/${piece.length}), keeping original`
      );
      refined.push(piece);
      outcomes.push({ index, status: "kept_original", reason: "too_short" });
    } else if (countMarkers(result.text) !== countMarkers(piece)) {
      refineLog.warn(`Chunk ${index + 1}/${pieces.length}: timestamp markers changed, keeping original`);
      refined.push(piece);
      outcomes.push({ index, status: "kept_original", reason: "markers_changed" });
    } else {
      refined.push(result.text);
      outcomes.push({ index, status: "refined", model: result.model });
    }

    await onChunkDone?.(index + 1, pieces.length);
  }

  const kept = outcomes.filter((o) => o.status === "kept_original").length;
  refineLog.info(`Refined ${pieces.length - kept}/${pieces.length} chunk(s)`);

  return { text: refined.join("\n\n"), chunks: outcomes };
}
