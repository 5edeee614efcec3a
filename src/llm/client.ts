import OpenAI from "openai";
import { cfg } from "../config/env.js";
import { HttpStatusError } from "../errors.js";
import type { ChatCall, ChatRequest, ChatTransport } from "./types.js";

export type LlmEndpoint = {
  apiKey: string;
  baseUrl: string;
  referer?: string;
  appName: string;
  timeoutMs: number;
};

function attributionHeaders(endpoint: LlmEndpoint): Record<string, string> {
  return {
    ...(endpoint.referer ? { "HTTP-Referer": endpoint.referer } : {}),
    "X-Title": endpoint.appName,
  };
}

function messagesOf(req: ChatRequest) {
  return [
    { role: "system" as const, content: req.systemPrompt },
    { role: "user" as const, content: req.userPrompt },
  ];
}

/** Pull the assistant text out of a chat-completions body; string or content-part arrays. */
export function extractContent(payload: unknown): string {
  if (!payload || typeof payload !== "object" || !("choices" in payload) || !Array.isArray(payload.choices)) {
    throw new Error("Chat response did not include choices.");
  }
  const first: unknown = payload.choices[0];
  const message = first && typeof first === "object" && "message" in first ? first.message : undefined;
  const content = message && typeof message === "object" && "content" in message ? message.content : undefined;

  if (typeof content === "string" && content.trim()) {
    return content.trim();
  }

  if (Array.isArray(content)) {
    const text = content
      .map((part: unknown) =>
        part && typeof part === "object" && "text" in part && typeof part.text === "string" ? part.text : ""
      )
      .join("")
      .trim();
    if (text) return text;
  }

  throw new Error("Empty response from LLM");
}

export function createSdkChat(endpoint: LlmEndpoint): ChatCall {
  const client = new OpenAI({
    apiKey: endpoint.apiKey,
    baseURL: endpoint.baseUrl,
    timeout: endpoint.timeoutMs,
    maxRetries: 0,
    defaultHeaders: attributionHeaders(endpoint),
  });

  return async (req) => {
    const response = await client.chat.completions.create({
      model: req.model,
      temperature: req.temperature,
      max_tokens: req.maxTokens,
      messages: messagesOf(req),
    });
    return extractContent(response);
  };
}

/**
 * Same request over plain fetch with the body serialized up front. Some
 * gateways reject the SDK's request with 401 but accept this form.
 */
export function createRawChat(endpoint: LlmEndpoint, fetchImpl: typeof fetch = fetch): ChatCall {
  const url = `${endpoint.baseUrl.replace(/\/+$/, "")}/chat/completions`;

  return async (req) => {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), endpoint.timeoutMs);

    try {
      const body = JSON.stringify({
        model: req.model,
        messages: messagesOf(req),
        temperature: req.temperature,
        max_tokens: req.maxTokens,
      });

      const response = await fetchImpl(url, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${endpoint.apiKey}`,
          "Content-Type": "application/json",
          ...attributionHeaders(endpoint),
        },
        body,
        signal: controller.signal,
      });

      if (!response.ok) {
        const detail = await response.text();
        throw new HttpStatusError(
          `Chat request failed (${response.status}): ${detail || response.statusText}`,
          response.status
        );
      }

      const payload: unknown = await response.json();
      return extractContent(payload);
    } catch (error: unknown) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error("Chat request timed out.");
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  };
}

let transport: ChatTransport | null = null;

export function getChatTransport(): ChatTransport {
  if (!transport) {
    const apiKey = cfg.llm.apiKey;
    if (!apiKey) {
      throw new Error("LLM_API_KEY not configured in .env");
    }
    const endpoint: LlmEndpoint = {
      apiKey,
      baseUrl: cfg.llm.baseUrl,
      referer: cfg.llm.referer,
      appName: cfg.llm.appName,
      timeoutMs: cfg.llm.timeoutMs,
    };
    transport = { sdk: createSdkChat(endpoint), raw: createRawChat(endpoint) };
  }
  return transport;
}
