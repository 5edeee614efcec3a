import fs from "node:fs";
import path from "node:path";
import { cfg } from "./config/env.js";

export type DataDir = "media" | "audio" | "transcripts" | "run";

export function resolveDataRoot(): string {
  return path.resolve(cfg.data.root);
}

export function resolveDataDir(dir: DataDir, root: string = resolveDataRoot()): string {
  const full = path.join(root, dir);
  fs.mkdirSync(full, { recursive: true });
  return full;
}

export function resolvePidPath(root: string = resolveDataRoot()): string {
  return path.join(resolveDataDir("run", root), "bot.pid");
}

/** Deterministic download target for a relayed file, keyed by the original message, never the copy. */
export function relayMediaPath(mediaDir: string, originalChatId: string, originalMessageId: number): string {
  return path.join(mediaDir, `relay_${sanitizeSegment(originalChatId)}_${originalMessageId}.media`);
}

export function sanitizeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]/g, "_");
}
