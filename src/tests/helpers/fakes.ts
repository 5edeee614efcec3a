import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CascadeChat, CascadeResult } from "../../llm/cascade.js";
import type { PromptBundle } from "../../llm/types.js";
import type { PrimaryChannel, RelayMessage, SecondaryAccount, SendOptions } from "../../telegram/types.js";

export async function makeTempDir(prefix: string): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

export function okResult(text: string, model = "test/model"): CascadeResult {
  return { ok: true, model, text, attempts: [] };
}

export const EXHAUSTED: CascadeResult = { ok: false, attempts: [] };

/** The chunk a refine prompt asks to edit. */
export function refineChunkOf(prompt: PromptBundle): string {
  const start = prompt.userPrompt.indexOf("Transcript to edit:\n") + "Transcript to edit:\n".length;
  const end = prompt.userPrompt.lastIndexOf("\n\nEdited text:");
  return prompt.userPrompt.slice(start, end);
}

/** Chat that answers every refine prompt with the chunk it was given. */
export function echoChat(): CascadeChat & { prompts: PromptBundle[] } {
  const prompts: PromptBundle[] = [];
  const chat = async (prompt: PromptBundle): Promise<CascadeResult> => {
    prompts.push(prompt);
    return okResult(refineChunkOf(prompt));
  };
  return Object.assign(chat, { prompts });
}

export type SentMessage = { chatId: string; text: string; opts?: SendOptions };

export class FakePrimary implements PrimaryChannel {
  readonly sent: SentMessage[] = [];
  readonly edits: { chatId: string; messageId: number; text: string }[] = [];
  readonly documents: { chatId: string; filePath: string; opts?: SendOptions }[] = [];
  readonly copies: { toChatId: string; fromChatId: string; messageId: number; caption: string }[] = [];
  /** Bytes written by downloadFile. */
  fileContent: string = "media-bytes";
  nextCopyId = 9000;
  private nextId = 1;

  async sendMessage(chatId: string, text: string, opts?: SendOptions): Promise<number> {
    this.sent.push({ chatId, text, opts });
    return this.nextId++;
  }

  async editMessage(chatId: string, messageId: number, text: string): Promise<void> {
    this.edits.push({ chatId, messageId, text });
  }

  async sendDocument(chatId: string, filePath: string, opts?: SendOptions): Promise<number> {
    this.documents.push({ chatId, filePath, opts });
    return this.nextId++;
  }

  async downloadFile(_fileId: string, destPath: string): Promise<string> {
    await writeFile(destPath, this.fileContent);
    return destPath;
  }

  async copyMessage(toChatId: string, fromChatId: string, messageId: number, caption: string): Promise<number> {
    this.copies.push({ toChatId, fromChatId, messageId, caption });
    return this.nextCopyId;
  }
}

/** In-memory relay channel as the secondary identity sees it. */
export class FakeSecondary implements SecondaryAccount {
  readonly messages: RelayMessage[] = [];
  readonly downloads: { chatId: string; messageId: number; destPath: string }[] = [];
  readable = true;
  connects = 0;
  /** When false, getMessageById never sees anything (forces the monitor path). */
  visibleById = true;
  failListing: Error | null = null;
  downloadDelayMs = 0;

  async connect(): Promise<void> {
    this.connects++;
  }

  async canRead(_chatId: string): Promise<boolean> {
    return this.readable;
  }

  async getMessageById(_chatId: string, messageId: number): Promise<RelayMessage | null> {
    if (!this.visibleById) return null;
    return this.messages.find((m) => m.id === messageId) ?? null;
  }

  async getRecentMessages(_chatId: string, limit: number): Promise<RelayMessage[]> {
    return [...this.messages].sort((a, b) => b.id - a.id).slice(0, limit);
  }

  async getMessagesAfter(_chatId: string, minId: number, limit: number): Promise<RelayMessage[]> {
    if (this.failListing) throw this.failListing;
    return this.messages
      .filter((m) => m.id > minId)
      .sort((a, b) => a.id - b.id)
      .slice(0, limit);
  }

  async downloadMedia(chatId: string, messageId: number, destPath: string): Promise<string> {
    this.downloads.push({ chatId, messageId, destPath });
    if (this.downloadDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.downloadDelayMs));
    }
    await writeFile(destPath, `relayed-${messageId}`);
    return destPath;
  }
}
