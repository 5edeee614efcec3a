import { expect, test } from "vitest";
import type { PromptBundle } from "../../llm/types.js";
import { summarize, SUMMARY_FAILED_MESSAGE, TOO_SHORT_MESSAGE } from "../../summary/summarize.js";
import { EXHAUSTED, okResult } from "../helpers/fakes.js";

const OPTS = { detailed: false, chunkChars: 15_000, boundary: "hard" as const };

function recordingChat(failOnCall?: number) {
  const prompts: PromptBundle[] = [];
  const chat = async (prompt: PromptBundle) => {
    prompts.push(prompt);
    if (prompts.length === failOnCall) return EXHAUSTED;
    return okResult(`summary ${prompts.length}`);
  };
  return { prompts, chat };
}

test("a long transcript is summarized per chunk and then merged", async () => {
  const { prompts, chat } = recordingChat();

  const outcome = await summarize("a".repeat(40_000), chat, OPTS);

  expect(outcome).toEqual({
    status: "ok",
    summary: { kind: "brief", text: "summary 4", model: "test/model" },
    calls: 4,
  });
  const parts = prompts.slice(0, 3).map((p) => p.userPrompt.split("\n"));
  expect(parts.map((lines) => lines[0])).toEqual(["PART 1 OF 3:", "PART 2 OF 3:", "PART 3 OF 3:"]);
  expect(parts.map((lines) => lines[1]?.length)).toEqual([15_000, 15_000, 10_000]);
  expect(prompts[3]?.userPrompt).toContain("--- Part 3 ---\nsummary 3");
});

test("a short transcript gets a single direct call", async () => {
  const { prompts, chat } = recordingChat();

  const outcome = await summarize("[00:00:00] we agreed to ship on friday", chat, { ...OPTS, detailed: true });

  expect(outcome).toMatchObject({ status: "ok", calls: 1, summary: { kind: "detailed" } });
  expect(prompts[0]?.userPrompt.startsWith("TRANSCRIPT:\n[00:00:00] we agreed")).toBe(true);
  expect(prompts[0]?.systemPrompt).toContain("Be thorough");
});

test("near-empty transcripts are not sent to the model", async () => {
  const { prompts, chat } = recordingChat();

  expect(await summarize("  ok  ", chat, OPTS)).toEqual({ status: "too_short", message: TOO_SHORT_MESSAGE });
  expect(prompts).toHaveLength(0);
});

test("a failed part abandons the summary", async () => {
  const { chat } = recordingChat(2);

  expect(await summarize("b".repeat(40_000), chat, OPTS)).toEqual({
    status: "failed",
    message: SUMMARY_FAILED_MESSAGE,
    calls: 2,
  });
});
