import type { PromptBundle } from "../types.js";

export type SummaryKind = "brief" | "detailed";

const STRUCTURE = `Structure the summary as:
1. Main topics
2. Key conclusions
3. Decisions made
4. Action items (who does what, if stated)`;

function verbosity(kind: SummaryKind): string {
  return kind === "brief"
    ? "Be brief: no more than 300 words, only the essentials."
    : "Be thorough: cover each topic, the viewpoints raised, and the reasoning behind decisions.";
}

/** One chunk of a long transcript. Captures points only; conclusions come in the final pass. */
export function buildIntermediateSummaryPrompt(
  chunk: string,
  position: { index: number; total: number },
  kind: SummaryKind
): PromptBundle {
  const systemPrompt = `You summarize one part of a longer timestamped transcript.

Rules:
- Summarize ONLY this part; other parts are summarized separately.
- List the topics discussed, points made, decisions, and tasks mentioned, in order.
- Keep [HH:MM:SS] references where they help locate a point.
- Do not write final conclusions for the whole recording.
- ${kind === "brief" ? "Keep it under 200 words." : "Keep it under 500 words."}`;

  const userPrompt = [
    `PART ${position.index + 1} OF ${position.total}:`,
    chunk,
    "",
    "Return only the summary of this part.",
  ].join("\n");

  return { systemPrompt, userPrompt };
}

/** Merge per-part summaries into the final summary. */
export function buildFinalSummaryPrompt(partSummaries: string[], kind: SummaryKind): PromptBundle {
  const systemPrompt = `You combine partial summaries of one recording into a single summary.

${STRUCTURE}

${verbosity(kind)}
Do not invent anything that is not in the partial summaries.`;

  const userPrompt = [
    "PARTIAL SUMMARIES (in order):",
    "",
    partSummaries.map((s, i) => `--- Part ${i + 1} ---\n${s}`).join("\n\n"),
    "",
    "Write the final summary.",
  ].join("\n");

  return { systemPrompt, userPrompt };
}

/** Single-pass summary for transcripts that fit in one chunk. */
export function buildDirectSummaryPrompt(transcript: string, kind: SummaryKind): PromptBundle {
  const systemPrompt = `You summarize a timestamped transcript.

${STRUCTURE}

${verbosity(kind)}
Do not invent anything that is not in the transcript.`;

  const userPrompt = ["TRANSCRIPT:", transcript, "", "Write the summary."].join("\n");

  return { systemPrompt, userPrompt };
}
