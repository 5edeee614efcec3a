import { rm } from "node:fs/promises";
import path from "node:path";
import { extractAudio } from "../audio/extractor.js";
import { splitIntoWindows } from "../audio/segmenter.js";
import type { ChunkBoundary } from "../config/types.js";
import { sanitizeSegment } from "../dataPaths.js";
import { describeError, PipelineError } from "../errors.js";
import type { CascadeChat } from "../llm/cascade.js";
import { refineTranscript, type RefineResult } from "../refine/refiner.js";
import type { ResultCache } from "../results/resultCache.js";
import { writeTranscriptFiles } from "../results/transcriptFiles.js";
import type { SttProvider } from "../stt/provider.js";
import { reconstructTimeline } from "../transcript/reconstruct.js";
import { transcribeWindows } from "../transcript/transcribeWindows.js";
import type { Transcript } from "../transcript/types.js";
import { log } from "../utils/logger.js";
import type { ProgressReporter } from "./progress.js";

const pipelineLog = log.withScope("pipeline");

export type PipelineSettings = {
  sampleRate: number;
  channels: number;
  windowSeconds: number;
  sttAttempts: number;
  wordsPerStep: number;
  timeStepSeconds: number;
  chunkChars: number;
  boundary: ChunkBoundary;
  minLengthRatio: number;
};

export type PipelineDeps = {
  stt: SttProvider;
  chat: CascadeChat;
  cache?: ResultCache;
  audioDir: string;
  transcriptsDir: string;
  settings: PipelineSettings;
  extract?: typeof extractAudio;
};

export type PipelineInput = {
  requesterId: string;
  /** Base name for working and transcript files. */
  label: string;
  acquire: () => Promise<string>;
  /** Delete the acquired source file when done (false for user-owned local files). */
  removeSource: boolean;
};

export type PipelineOutcome =
  | { ok: true; transcript: Transcript; refine: RefineResult; windows: number; failedWindows: number }
  | { ok: false; error: string; userMessage: string };

const GENERIC_FAILURE = "Something went wrong while processing this file. Please try again.";

async function removeQuietly(paths: string[]): Promise<void> {
  for (const p of paths) {
    try {
      await rm(p, { force: true, recursive: true });
    } catch (err: unknown) {
      pipelineLog.warn(`Could not remove ${p}: ${describeError(err)}`);
    }
  }
}

/**
 * acquire → extract → split → transcribe → reconstruct → refine → store.
 *
 * Stages run strictly in order. Terminal failures are reported through
 * `progress` and returned; nothing is thrown past this function.
 */
export async function runPipeline(
  input: PipelineInput,
  progress: ProgressReporter,
  deps: PipelineDeps
): Promise<PipelineOutcome> {
  const { settings } = deps;
  const label = sanitizeSegment(input.label);
  const wavPath = path.join(deps.audioDir, `${label}.wav`);
  const windowDir = path.join(deps.audioDir, `${label}_windows`);
  const cleanup: string[] = [wavPath, windowDir];
  const started = Date.now();

  try {
    const sourcePath = await input.acquire();
    if (input.removeSource) cleanup.push(sourcePath);

    await progress.update("Extracting audio...");
    await (deps.extract ?? extractAudio)(sourcePath, wavPath, {
      sampleRate: settings.sampleRate,
      channels: settings.channels,
    });

    const windows = await splitIntoWindows(wavPath, {
      windowSeconds: settings.windowSeconds,
      outDir: windowDir,
      label,
    });

    await progress.update(`Transcribing (0/${windows.length})...`);
    const transcribed = await transcribeWindows(windows, deps.stt, {
      attempts: settings.sttAttempts,
      onWindowDone: (done, total) => progress.update(`Transcribing (${done}/${total})...`),
    });
    const failedWindows = transcribed.filter((w) => w.failed).length;

    const timeline = reconstructTimeline(transcribed, {
      windowSeconds: settings.windowSeconds,
      wordsPerStep: settings.wordsPerStep,
      timeStepSeconds: settings.timeStepSeconds,
    });

    if (!timeline.text.trim()) {
      const userMessage =
        failedWindows > 0
          ? "Transcription failed. Please try again later."
          : "No speech was recognized in this file.";
      await progress.update(userMessage);
      return { ok: false, error: failedWindows > 0 ? "transcription_failed" : "no_speech", userMessage };
    }

    await progress.update("Formatting transcript...");
    const refine = await refineTranscript(
      timeline.text,
      deps.chat,
      { chunkChars: settings.chunkChars, boundary: settings.boundary, minLengthRatio: settings.minLengthRatio },
      (done, total) => progress.update(`Formatting transcript (${done}/${total})...`)
    );

    const files = await writeTranscriptFiles(deps.transcriptsDir, label, timeline.text, refine.text);
    const transcript: Transcript = {
      raw: timeline.text,
      formatted: refine.text,
      segments: timeline.segments,
      rawPath: files.rawPath,
      formattedPath: files.formattedPath,
      createdAt: Date.now(),
    };
    deps.cache?.storeTranscript(input.requesterId, transcript);

    pipelineLog.info(`Pipeline done in ${Date.now() - started}ms`, {
      label,
      windows: windows.length,
      failedWindows,
      rawChars: transcript.raw.length,
      formattedChars: transcript.formatted.length,
    });

    return { ok: true, transcript, refine, windows: windows.length, failedWindows };
  } catch (err: unknown) {
    if (err instanceof PipelineError) {
      pipelineLog.error(`Pipeline failed: ${err.message}`, { label, kind: err.name });
      await progress.update(err.userMessage);
      return { ok: false, error: err.message, userMessage: err.userMessage };
    }
    pipelineLog.error(`Pipeline crashed: ${describeError(err)}`, { label });
    await progress.update(GENERIC_FAILURE);
    return { ok: false, error: describeError(err), userMessage: GENERIC_FAILURE };
  } finally {
    await removeQuietly(cleanup);
  }
}
