import { readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, expect, test } from "vitest";
import { splitIntoWindows } from "../../audio/segmenter.js";
import { parseWavHeader, pcmToWav } from "../../audio/wav.js";
import { makeTempDir } from "../helpers/fakes.js";

// 100 Hz mono keeps a 25-minute file at 300 kB
const FORMAT = { sampleRate: 100, channels: 1, bitsPerSample: 16 };

let dir = "";
let cleanup: () => Promise<void> = async () => {};

beforeEach(async () => {
  ({ dir, cleanup } = await makeTempDir("segmenter"));
});

afterEach(async () => {
  await cleanup();
});

async function writeWav(seconds: number): Promise<string> {
  const wavPath = path.join(dir, "input.wav");
  await writeFile(wavPath, pcmToWav(Buffer.alloc(seconds * 200, 1), FORMAT));
  return wavPath;
}

test("25 minutes split into 10-minute windows gives 600/600/300 seconds", async () => {
  const wavPath = await writeWav(25 * 60);

  const windows = await splitIntoWindows(wavPath, { windowSeconds: 600, outDir: path.join(dir, "w"), label: "talk" });

  expect(windows.map((w) => [w.index, w.offsetSec, w.durationSec])).toEqual([
    [0, 0, 600],
    [1, 600, 600],
    [2, 1200, 300],
  ]);
  expect(windows.map((w) => path.basename(w.path))).toEqual([
    "talk_window_000.wav",
    "talk_window_001.wav",
    "talk_window_002.wav",
  ]);
});

test("each window is a valid WAV holding its own samples", async () => {
  const wavPath = await writeWav(90);

  const windows = await splitIntoWindows(wavPath, { windowSeconds: 60, outDir: path.join(dir, "w"), label: "clip" });
  const second = await readFile(windows[1]?.path ?? "");

  expect(parseWavHeader(second, second.length)).toEqual({ ...FORMAT, dataOffset: 44, dataBytes: 30 * 200 });
  expect(await readdir(path.join(dir, "w"))).toHaveLength(2);
});

test("audio shorter than a window is a single window", async () => {
  const wavPath = await writeWav(5);

  const windows = await splitIntoWindows(wavPath, { windowSeconds: 600, outDir: path.join(dir, "w"), label: "short" });

  expect(windows).toHaveLength(1);
  expect(windows[0]).toMatchObject({ index: 0, offsetSec: 0, durationSec: 5 });
});
