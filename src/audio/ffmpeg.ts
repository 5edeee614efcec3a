import { spawn } from "node:child_process";
import { cfg } from "../config/env.js";

export type ProcessResult = {
  code: number | null;
  stdout: string;
  stderr: string;
};

/** Spawns a child process and collects its output; resolves on exit whatever the code. */
export type ProcessRunner = (command: string, args: string[], opts?: { timeoutMs?: number }) => Promise<ProcessResult>;

let ffmpegCommandCache: string | null = null;

export function resolveFfmpegCommand(): string {
  if (ffmpegCommandCache) {
    return ffmpegCommandCache;
  }

  const envOverride = cfg.audio.ffmpegPath?.trim() || null;
  ffmpegCommandCache = envOverride ?? "ffmpeg";
  return ffmpegCommandCache;
}

export const runProcess: ProcessRunner = (command, args, opts = {}) =>
  new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timer: NodeJS.Timeout | null = null;

    if (opts.timeoutMs && opts.timeoutMs > 0) {
      timer = setTimeout(() => {
        proc.kill("SIGTERM");
      }, opts.timeoutMs);
    }

    proc.stdout.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    proc.on("error", (err) => {
      if (timer) clearTimeout(timer);
      reject(new Error(`Failed to spawn ${command}: ${err.message}`));
    });

    proc.on("close", (code) => {
      if (timer) clearTimeout(timer);
      resolve({
        code,
        stdout: Buffer.concat(stdoutChunks).toString("utf8"),
        stderr: Buffer.concat(stderrChunks).toString("utf8"),
      });
    });
  });

/** Last few stderr lines; ffmpeg prints its banner first and the actual error last. */
export function stderrTail(stderr: string, lines = 5): string {
  return stderr.trim().split(/\r?\n/).slice(-lines).join("\n");
}
