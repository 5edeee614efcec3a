import { mkdir, open, writeFile } from "node:fs/promises";
import path from "node:path";
import { log } from "../utils/logger.js";
import { buildWavHeader, bytesPerSecond, parseWavHeader } from "./wav.js";

const audioLog = log.withScope("audio");

// Enough to cover fmt plus the LIST/INFO chunk ffmpeg emits before data
const HEADER_PROBE_BYTES = 4096;

export type AudioSegment = {
  index: number;
  offsetSec: number;
  durationSec: number;
  path: string;
};

export type SegmentOptions = {
  windowSeconds: number;
  outDir: string;
  label: string;
};

/**
 * Split a PCM WAV file into fixed-length windows by sample position.
 * Every window but the last is exactly `windowSeconds` long; the result is
 * ordered by index, and window i starts at i × windowSeconds.
 */
export async function splitIntoWindows(wavPath: string, opts: SegmentOptions): Promise<AudioSegment[]> {
  if (opts.windowSeconds <= 0) {
    throw new Error(`windowSeconds must be positive, got ${opts.windowSeconds}`);
  }

  await mkdir(opts.outDir, { recursive: true });
  const handle = await open(wavPath, "r");

  try {
    const { size: fileBytes } = await handle.stat();
    const probe = Buffer.alloc(Math.min(HEADER_PROBE_BYTES, fileBytes));
    await handle.read(probe, 0, probe.length, 0);
    const layout = parseWavHeader(probe, fileBytes);

    const frameBytes = layout.channels * (layout.bitsPerSample / 8);
    const rate = bytesPerSecond(layout);
    const windowBytes = opts.windowSeconds * rate;
    const totalSec = layout.dataBytes / rate;
    const count = Math.max(1, Math.ceil(layout.dataBytes / windowBytes));

    audioLog.info(`Splitting ${totalSec.toFixed(1)}s into ${count} window(s) of ${opts.windowSeconds}s`);

    const segments: AudioSegment[] = [];
    for (let index = 0; index < count; index++) {
      const start = index * windowBytes;
      const rawLength = Math.min(windowBytes, layout.dataBytes - start);
      const length = rawLength - (rawLength % frameBytes);

      const pcm = Buffer.alloc(length);
      const { bytesRead } = await handle.read(pcm, 0, length, layout.dataOffset + start);
      const data = pcm.subarray(0, bytesRead - (bytesRead % frameBytes));

      const segmentPath = path.join(opts.outDir, `${opts.label}_window_${String(index).padStart(3, "0")}.wav`);
      await writeFile(segmentPath, Buffer.concat([buildWavHeader(data.length, layout), data]));

      segments.push({
        index,
        offsetSec: index * opts.windowSeconds,
        durationSec: data.length / rate,
        path: segmentPath,
      });
      audioLog.debug(`Window ${index + 1}/${count}: ${(data.length / rate).toFixed(1)}s`, { path: segmentPath });
    }

    return segments;
  } finally {
    await handle.close();
  }
}
