import { expect, test } from "vitest";
import { DecodeFailure } from "../../errors.js";
import { buildWavHeader, parseWavHeader, pcmToWav } from "../../audio/wav.js";

const MONO_16K = { sampleRate: 16_000, channels: 1, bitsPerSample: 16 };

test("a written header reads back with the data right after it", () => {
  const wav = pcmToWav(Buffer.alloc(3_200), MONO_16K);

  expect(wav.length).toBe(44 + 3_200);
  expect(parseWavHeader(wav, wav.length)).toEqual({ ...MONO_16K, dataOffset: 44, dataBytes: 3_200 });
});

test("a trailing partial frame is dropped", () => {
  const stereo = { sampleRate: 8_000, channels: 2, bitsPerSample: 16 };
  expect(pcmToWav(Buffer.alloc(10), stereo).length).toBe(44 + 8);
});

test("extra chunks before data are skipped", () => {
  const base = buildWavHeader(100, MONO_16K);
  const list = Buffer.alloc(8 + 5);
  list.write("LIST", 0);
  list.writeUInt32LE(5, 4);
  // odd-sized chunks carry one pad byte
  const head = Buffer.concat([base.subarray(0, 36), list, Buffer.alloc(1), base.subarray(36)]);

  expect(parseWavHeader(head, head.length + 100)).toMatchObject({ dataOffset: 36 + 14 + 8, dataBytes: 100 });
});

test("a streamed placeholder size falls back to the file size", () => {
  const head = buildWavHeader(0, MONO_16K);
  head.writeUInt32LE(0xffffffff, 40);

  expect(parseWavHeader(head, 44 + 640).dataBytes).toBe(640);
});

test("non-WAV input is rejected", () => {
  expect(() => parseWavHeader(Buffer.from("not a wav file at all"), 21)).toThrow(DecodeFailure);
});
