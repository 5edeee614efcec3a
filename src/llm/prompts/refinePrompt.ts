import type { PromptBundle } from "../types.js";

export function buildRefinePrompt(chunk: string, position: { index: number; total: number }): PromptBundle {
  const systemPrompt = `You are a transcript editor.

Your main task is to keep ALL of the text. Do not drop a single word.

Rules:
- Add punctuation and paragraph breaks; fix obvious recognition typos.
- Do not shorten, paraphrase, or simplify.
- Every timestamp marker of the form [HH:MM:SS] must stay exactly as written, at the start of the paragraph it opens.
- Do not add, remove, merge, or renumber timestamp markers.
- Reply with the edited text only, no comments.`;

  const userPrompt = [
    `Part ${position.index + 1} of ${position.total}.`,
    "",
    "Transcript to edit:",
    chunk,
    "",
    "Edited text:",
  ].join("\n");

  return { systemPrompt, userPrompt };
}
