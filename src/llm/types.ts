export type PromptBundle = {
  systemPrompt: string;
  userPrompt: string;
};

/** How the chat body goes over the wire: the SDK's structured body, or a pre-serialized JSON string over plain fetch. */
export type RequestEncoding = "sdk" | "raw";

export type ChatRequest = PromptBundle & {
  model: string;
  temperature: number;
  maxTokens: number;
};

export type ChatCall = (req: ChatRequest) => Promise<string>;

export type ChatTransport = Record<RequestEncoding, ChatCall>;
