import type { Config } from "../config/types.js";
import { buildModelCascade, createCascadeChat, type CascadeChat } from "../llm/cascade.js";
import { getChatTransport } from "../llm/client.js";
import type { PipelineSettings } from "./runPipeline.js";

export function pipelineSettingsFromConfig(config: Config): PipelineSettings {
  return {
    sampleRate: config.audio.sampleRate,
    channels: config.audio.channels,
    windowSeconds: config.audio.windowSeconds,
    sttAttempts: config.stt.windowAttempts,
    wordsPerStep: config.transcript.wordsPerStep,
    timeStepSeconds: config.transcript.timeStepSeconds,
    chunkChars: config.refine.chunkChars,
    boundary: config.refine.boundary,
    minLengthRatio: config.refine.minLengthRatio,
  };
}

/** Cascade chat over the configured model list and transport. */
export function createConfiguredChat(config: Config): CascadeChat {
  return createCascadeChat(getChatTransport(), {
    models: buildModelCascade(config.llm.model, config.llm.fallbackModels),
    temperature: config.llm.temperature,
    maxTokens: config.llm.maxTokens,
  });
}
