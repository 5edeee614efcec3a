import { expect, test } from "vitest";
import {
  deliverRawTranscript,
  deliverTranscript,
  parseSummaryCallback,
  splitForMessages,
  SUMMARY_BUTTONS,
} from "../../telegram/delivery.js";
import type { Transcript } from "../../transcript/types.js";
import { FakePrimary } from "../helpers/fakes.js";

function transcript(formatted: string, raw = formatted): Transcript {
  return { raw, formatted, segments: [], rawPath: "/data/t/x_raw.txt", formattedPath: "/data/t/x.txt", createdAt: 0 };
}

test("long text splits at the last paragraph or line break in each window", () => {
  expect(splitForMessages("aaaa\n\nbbbb\ncc dd", 8)).toEqual(["aaaa", "bbbb", "cc dd"]);
  expect(splitForMessages("abcdefghij", 4)).toEqual(["abcd", "efgh", "ij"]);
  expect(splitForMessages("   ", 4)).toEqual([]);
});

test("a transcript that fits is sent inline with summary buttons", async () => {
  const primary = new FakePrimary();

  await deliverTranscript(primary, "111", transcript("[00:00:00] short"), 4_000);

  expect(primary.sent).toEqual([{ chatId: "111", text: "[00:00:00] short", opts: { buttons: SUMMARY_BUTTONS } }]);
  expect(primary.documents).toHaveLength(0);
});

test("a transcript over the limit is sent as its file", async () => {
  const primary = new FakePrimary();

  await deliverTranscript(primary, "111", transcript("x".repeat(50)), 40);

  expect(primary.sent).toHaveLength(0);
  expect(primary.documents).toEqual([
    {
      chatId: "111",
      filePath: "/data/t/x.txt",
      opts: { caption: "Transcript is too long for a message, so here it is as a file.", buttons: SUMMARY_BUTTONS },
    },
  ]);
});

test("the raw transcript follows the same size rule", async () => {
  const primary = new FakePrimary();

  await deliverRawTranscript(primary, "111", transcript("formatted", "raw words"), 4_000);
  await deliverRawTranscript(primary, "111", transcript("formatted", "r".repeat(50)), 40);

  expect(primary.sent.map((m) => m.text)).toEqual(["raw words"]);
  expect(primary.documents.map((d) => d.filePath)).toEqual(["/data/t/x_raw.txt"]);
});

test("summary buttons round-trip through callback data", () => {
  expect(SUMMARY_BUTTONS.map((b) => parseSummaryCallback(b.data))).toEqual(["brief", "detailed"]);
  expect(parseSummaryCallback("summary:other")).toBeNull();
});
