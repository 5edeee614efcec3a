import type { WindowTranscription } from "../transcript/types.js";
import type { SttProvider } from "./provider.js";

/**
 * Returns empty, successful transcriptions. Lets the rest of the pipeline
 * run without a transcription service.
 */
export class NoopSttProvider implements SttProvider {
  async transcribeFile(_wavPath: string): Promise<WindowTranscription> {
    return { text: "", segments: [], failed: false };
  }
}
