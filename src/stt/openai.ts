/**
 * Transcription over an OpenAI-compatible `/audio/transcriptions` endpoint
 * (DeepInfra's Whisper by default).
 *
 * Asks for `verbose_json` with segment granularity so every window comes back
 * with timed segments. Retries once on transient errors (429/5xx/network);
 * anything else is logged and reported as a failed window.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import OpenAI from "openai";
import { toFile } from "openai/uploads";
import { describeError, isRetryableError, statusOf } from "../errors.js";
import type { TranscriptSegment, WindowTranscription } from "../transcript/types.js";
import { log } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import type { SttProvider } from "./provider.js";

const sttLog = log.withScope("stt");

const TRANSIENT_RETRY_DELAY_MS = 2000;

export type TranscribeRequest = {
  bytes: Buffer;
  filename: string;
  model: string;
  language?: string;
};

/** One HTTP call to the transcription endpoint; resolves with the decoded body. */
export type TranscribeCall = (req: TranscribeRequest) => Promise<unknown>;

export type OpenAiSttOptions = {
  apiKey?: string;
  baseUrl: string;
  model: string;
  language?: string;
  call?: TranscribeCall;
  retryDelayMs?: number;
};

export function createSdkTranscribeCall(apiKey: string, baseUrl: string): TranscribeCall {
  const client = new OpenAI({ apiKey, baseURL: baseUrl });
  return async (req) => {
    const file = await toFile(req.bytes, req.filename, { type: "audio/wav" });
    return client.audio.transcriptions.create({
      file,
      model: req.model,
      response_format: "verbose_json",
      timestamp_granularities: ["segment"],
      ...(req.language ? { language: req.language } : {}),
    });
  };
}

function readSegments(value: unknown): TranscriptSegment[] {
  if (!Array.isArray(value)) return [];
  const out: TranscriptSegment[] = [];
  for (const item of value) {
    if (!item || typeof item !== "object") continue;
    const start = "start" in item ? Number(item.start) : NaN;
    const end = "end" in item ? Number(item.end) : NaN;
    const text = "text" in item && typeof item.text === "string" ? item.text.trim() : "";
    if (!Number.isFinite(start) || !Number.isFinite(end)) continue;
    out.push({ start, end: Math.max(start, end), text });
  }
  return out;
}

/** Narrow a verbose_json body to text plus segments; plain-text bodies are accepted too. */
export function parseVerboseTranscription(body: unknown): { text: string; segments: TranscriptSegment[] } {
  if (typeof body === "string") {
    return { text: body.trim(), segments: [] };
  }
  if (!body || typeof body !== "object") {
    return { text: "", segments: [] };
  }
  const text = "text" in body && typeof body.text === "string" ? body.text.trim() : "";
  const segments = "segments" in body ? readSegments(body.segments) : [];
  return { text, segments };
}

export class OpenAiSttProvider implements SttProvider {
  private readonly call: TranscribeCall;

  constructor(private readonly opts: OpenAiSttOptions) {
    if (opts.call) {
      this.call = opts.call;
    } else {
      if (!opts.apiKey) {
        throw new Error("STT_API_KEY not configured in .env");
      }
      this.call = createSdkTranscribeCall(opts.apiKey, opts.baseUrl);
    }
    sttLog.debug(`Provider initialized: model=${opts.model}, language=${opts.language ?? "auto"}`);
  }

  async transcribeFile(wavPath: string): Promise<WindowTranscription> {
    const bytes = await readFile(wavPath);

    for (let attempt = 0; attempt < 2; attempt++) {
      try {
        const response = await this.call({
          bytes,
          filename: path.basename(wavPath),
          model: this.opts.model,
          language: this.opts.language,
        });

        const parsed = parseVerboseTranscription(response);
        sttLog.debug(`Transcribed ${path.basename(wavPath)}: ${parsed.text.length} chars, ${parsed.segments.length} segments`);
        return { ...parsed, failed: false };
      } catch (err: unknown) {
        const status = statusOf(err) ?? "unknown";

        if (!isRetryableError(err) || attempt === 1) {
          sttLog.error(`Transcription failed (attempt ${attempt + 1}, ${status}): ${describeError(err)}`, {
            file: path.basename(wavPath),
          });
          return { text: "", segments: [], failed: true };
        }

        const backoffMs = this.opts.retryDelayMs ?? TRANSIENT_RETRY_DELAY_MS;
        sttLog.warn(`Transient error (${status}), retrying in ${backoffMs}ms: ${describeError(err)}`);
        await sleep(backoffMs);
      }
    }

    return { text: "", segments: [], failed: true };
  }
}
