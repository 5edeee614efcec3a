/**
 * Ordered model fallback.
 *
 * Models are tried strictly in order; the first success wins. A 401 gets
 * exactly one more try on the same model with the raw request encoding
 * before moving on. Running out of models is a result, not an exception:
 * callers decide whether that means "keep the original text" or "tell the
 * user".
 */

import { describeError, statusOf } from "../errors.js";
import { log } from "../utils/logger.js";
import type { ChatTransport, PromptBundle, RequestEncoding } from "./types.js";

const llmLog = log.withScope("llm");

export type CascadeAttempt = {
  model: string;
  encoding: RequestEncoding;
  ok: boolean;
  status?: number;
  error?: string;
  durationMs: number;
};

export type CascadeResult =
  | { ok: true; model: string; text: string; attempts: CascadeAttempt[] }
  | { ok: false; attempts: CascadeAttempt[] };

export type ModelCall = (model: string, encoding: RequestEncoding) => Promise<string>;

/** Primary first, then fallbacks in order, without blanks or repeats. */
export function buildModelCascade(primary: string, fallbacks: readonly string[]): string[] {
  const out: string[] = [];
  for (const model of [primary, ...fallbacks]) {
    const trimmed = model.trim();
    if (trimmed && !out.includes(trimmed)) out.push(trimmed);
  }
  if (out.length === 0) {
    throw new Error("Model cascade needs at least one model");
  }
  return out;
}

export async function runCascade(models: readonly string[], call: ModelCall): Promise<CascadeResult> {
  const attempts: CascadeAttempt[] = [];

  const attempt = async (model: string, encoding: RequestEncoding): Promise<string | null> => {
    const start = Date.now();
    try {
      const text = await call(model, encoding);
      attempts.push({ model, encoding, ok: true, durationMs: Date.now() - start });
      return text;
    } catch (err: unknown) {
      const status = statusOf(err);
      attempts.push({ model, encoding, ok: false, status, error: describeError(err), durationMs: Date.now() - start });
      llmLog.warn(`Model ${model} failed (${encoding}, status=${status ?? "n/a"}): ${describeError(err)}`);
      return null;
    }
  };

  for (const model of models) {
    const text = await attempt(model, "sdk");
    if (text !== null) return { ok: true, model, text, attempts };

    if (attempts[attempts.length - 1]?.status === 401) {
      llmLog.info(`Retrying ${model} with raw request encoding after 401`);
      const retried = await attempt(model, "raw");
      if (retried !== null) return { ok: true, model, text: retried, attempts };
    }
  }

  llmLog.error(`All ${models.length} model(s) failed`, { models });
  return { ok: false, attempts };
}

export type CascadeChatSettings = {
  models: readonly string[];
  temperature: number;
  maxTokens: number;
};

/** Bound chat over a transport: one prompt in, a cascade result out. */
export type CascadeChat = (prompt: PromptBundle) => Promise<CascadeResult>;

export function createCascadeChat(transport: ChatTransport, settings: CascadeChatSettings): CascadeChat {
  return (prompt) =>
    runCascade(settings.models, (model, encoding) =>
      transport[encoding]({
        ...prompt,
        model,
        temperature: settings.temperature,
        maxTokens: settings.maxTokens,
      })
    );
}
