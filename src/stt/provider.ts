/**
 * Pluggable speech-to-text for whole audio windows.
 */

import { cfg } from "../config/env.js";
import type { WindowTranscription } from "../transcript/types.js";
import { NoopSttProvider } from "./noop.js";

export interface SttProvider {
  /**
   * Transcribe one WAV window. Never throws for service errors: a failed
   * call comes back as `{ text: "", segments: [], failed: true }`.
   */
  transcribeFile(wavPath: string): Promise<WindowTranscription>;
}

export function getSttProviderInfo(): { name: string; description: string } {
  switch (cfg.stt.provider) {
    case "noop":
      return { name: "noop", description: "returns empty transcripts" };
    case "openai":
      return { name: "openai", description: `OpenAI-compatible transcription (${cfg.stt.model} at ${cfg.stt.baseUrl})` };
  }
}

/**
 * Providers are lazy-loaded and cached (single instance per process).
 */
let providerPromise: Promise<SttProvider> | null = null;

export async function getSttProvider(): Promise<SttProvider> {
  if (providerPromise) return providerPromise;

  const provider = cfg.stt.provider;

  providerPromise = (async (): Promise<SttProvider> => {
    switch (provider) {
      case "noop":
        return new NoopSttProvider();

      case "openai": {
        // Lazy-load so the SDK is only imported when used
        const { OpenAiSttProvider } = await import("./openai.js");
        return new OpenAiSttProvider({
          apiKey: cfg.stt.apiKey,
          baseUrl: cfg.stt.baseUrl,
          model: cfg.stt.model,
          language: cfg.stt.language,
        });
      }
    }
  })();

  return providerPromise;
}
