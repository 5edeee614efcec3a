import { stat } from "node:fs/promises";
import { DecodeFailure } from "../errors.js";
import { log } from "../utils/logger.js";
import { resolveFfmpegCommand, runProcess, stderrTail, type ProcessRunner } from "./ffmpeg.js";

const audioLog = log.withScope("audio");

export type ExtractOptions = {
  sampleRate: number;
  channels: number;
  ffmpegCommand?: string;
  run?: ProcessRunner;
};

async function fileSize(filePath: string): Promise<number> {
  try {
    return (await stat(filePath)).size;
  } catch (err: unknown) {
    if (err && typeof err === "object" && "code" in err && err.code === "ENOENT") return 0;
    throw err;
  }
}

export function buildExtractArgs(inputPath: string, outputPath: string, sampleRate: number, channels: number): string[] {
  return [
    "-hide_banner",
    "-i", inputPath,
    "-vn",
    "-acodec", "pcm_s16le",
    "-ar", String(sampleRate),
    "-ac", String(channels),
    "-y",
    outputPath,
  ];
}

/**
 * Decode any audio/video container into 16-bit PCM WAV.
 *
 * Exit code 0 alone is not success: the output must also exist and be
 * non-empty. No retry; a decode failure is terminal for the request.
 */
export async function extractAudio(inputPath: string, outputPath: string, opts: ExtractOptions): Promise<string> {
  const inputBytes = await fileSize(inputPath);
  if (inputBytes === 0) {
    throw new DecodeFailure("empty_input", inputPath);
  }

  const run = opts.run ?? runProcess;
  const command = opts.ffmpegCommand ?? resolveFfmpegCommand();
  const args = buildExtractArgs(inputPath, outputPath, opts.sampleRate, opts.channels);

  audioLog.info(`Extracting audio (${(inputBytes / 1024 / 1024).toFixed(1)} MB)`, { inputPath, outputPath });
  const start = Date.now();
  const result = await run(command, args);

  if (result.code !== 0) {
    audioLog.error(`ffmpeg exited with code ${result.code}`, { stderr: stderrTail(result.stderr) });
    throw new DecodeFailure("process_failed", `ffmpeg exit ${result.code}: ${stderrTail(result.stderr, 2)}`);
  }

  const outputBytes = await fileSize(outputPath);
  if (outputBytes === 0) {
    audioLog.error("ffmpeg reported success but produced no audio", { outputPath });
    throw new DecodeFailure("empty_output", outputPath);
  }

  audioLog.info(`Audio extracted in ${Date.now() - start}ms (${outputBytes} bytes)`);
  return outputPath;
}
