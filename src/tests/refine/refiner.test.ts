import { expect, test } from "vitest";
import { refineTranscript } from "../../refine/refiner.js";
import { countMarkers } from "../../utils/timestamps.js";
import { echoChat, EXHAUSTED, okResult, refineChunkOf } from "../helpers/fakes.js";

const OPTS = { chunkChars: 60, boundary: "hard" as const, minLengthRatio: 0.7 };

const RAW = [
  "[00:00:00] so today we look at the quarterly numbers",
  "[00:00:30] revenue went up in every region we track",
  "[00:01:00] costs stayed flat which is good news",
].join("\n\n");

test("echoed chunks keep every timestamp marker", async () => {
  const chat = echoChat();
  const progress: [number, number][] = [];

  const result = await refineTranscript(RAW, chat, OPTS, (done, total) => {
    progress.push([done, total]);
  });

  expect(countMarkers(result.text)).toBe(3);
  expect(result.chunks.every((c) => c.status === "refined")).toBe(true);
  expect(chat.prompts).toHaveLength(result.chunks.length);
  expect(progress.at(-1)).toEqual([result.chunks.length, result.chunks.length]);
});

test("a reply much shorter than its chunk keeps the original", async () => {
  const result = await refineTranscript(RAW, async () => okResult("too short"), { ...OPTS, chunkChars: 15_000 });

  expect(result.text).toBe(RAW);
  expect(result.chunks).toEqual([{ index: 0, status: "kept_original", reason: "too_short" }]);
});

test("a reply that changes the marker count keeps the original", async () => {
  const dropMarkers = async (prompt: Parameters<typeof refineChunkOf>[0]) =>
    okResult(refineChunkOf(prompt).replace(/\[(\d{2}:\d{2}:\d{2})\]/g, "($1)"));

  const result = await refineTranscript(RAW, dropMarkers, { ...OPTS, chunkChars: 15_000 });

  expect(result.text).toBe(RAW);
  expect(result.chunks).toEqual([{ index: 0, status: "kept_original", reason: "markers_changed" }]);
});

test("an exhausted cascade keeps the original chunk", async () => {
  const result = await refineTranscript(RAW, async () => EXHAUSTED, { ...OPTS, chunkChars: 15_000 });

  expect(result.text).toBe(RAW);
  expect(result.chunks).toEqual([{ index: 0, status: "kept_original", reason: "cascade_exhausted" }]);
});

test("near-empty input is returned without calling the model", async () => {
  const chat = echoChat();
  const result = await refineTranscript("  hi  there ", chat, OPTS);

  expect(result).toEqual({ text: "  hi  there ", chunks: [] });
  expect(chat.prompts).toHaveLength(0);
});
