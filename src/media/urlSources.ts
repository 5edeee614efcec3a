import { createWriteStream } from "node:fs";
import { rm, stat } from "node:fs/promises";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { runProcess, stderrTail, type ProcessRunner } from "../audio/ffmpeg.js";
import { AcquisitionFailure, describeError } from "../errors.js";
import { log } from "../utils/logger.js";

const acquireLog = log.withScope("acquire");

export type UrlSource = { kind: "youtube"; url: string } | { kind: "gdrive"; fileId: string };

const YOUTUBE_RE =
  /^(?:https?:\/\/)?(?:www\.|m\.|music\.)?(?:youtube\.com\/(?:watch\?(?:.*&)?v=|shorts\/|live\/|embed\/)|youtu\.be\/)[\w-]{6,}/i;
const GDRIVE_FILE_RE = /^(?:https?:\/\/)?drive\.google\.com\/file\/d\/([\w-]+)/i;
const GDRIVE_ID_RE = /^(?:https?:\/\/)?drive\.google\.com\/(?:open|uc)\?(?:.*&)?id=([\w-]+)/i;

const URL_IN_TEXT_RE = /https?:\/\/\S+/i;

export function findUrl(text: string): string | null {
  return URL_IN_TEXT_RE.exec(text)?.[0] ?? null;
}

export function classifyUrl(url: string): UrlSource | null {
  const trimmed = url.trim();
  if (YOUTUBE_RE.test(trimmed)) return { kind: "youtube", url: trimmed };
  const drive = GDRIVE_FILE_RE.exec(trimmed) ?? GDRIVE_ID_RE.exec(trimmed);
  if (drive?.[1]) return { kind: "gdrive", fileId: drive[1] };
  return null;
}

export type UrlDownloaderOptions = {
  ytdlpPath: string;
  timeoutMs: number;
  run?: ProcessRunner;
  fetchImpl?: typeof fetch;
};

/**
 * Fetches media behind supported links: video-hosting pages through
 * yt-dlp, cloud-drive files over HTTP.
 */
export class UrlDownloader {
  private readonly run: ProcessRunner;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: UrlDownloaderOptions) {
    this.run = opts.run ?? runProcess;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /** Download into `destBase` (extension chosen by the source); returns the final path. */
  async download(url: string, destBase: string): Promise<string> {
    const source = classifyUrl(url);
    if (!source) {
      throw new AcquisitionFailure("unsupported_url", url);
    }
    return source.kind === "youtube"
      ? this.downloadVideoHost(source.url, destBase)
      : this.downloadDrive(source.fileId, `${destBase}.media`);
  }

  private async downloadVideoHost(url: string, destBase: string): Promise<string> {
    const args = [
      "-f", "bestaudio[ext=m4a]/bestaudio/best",
      "--no-playlist",
      "--no-warnings",
      "--output", `${destBase}.%(ext)s`,
      "--print", "after_move:filepath",
      url,
    ];

    acquireLog.info("Downloading with yt-dlp", { url });
    const result = await this.run(this.opts.ytdlpPath, args, { timeoutMs: this.opts.timeoutMs }).catch(
      (err: unknown) => {
        throw new AcquisitionFailure("download_failed", describeError(err));
      }
    );

    if (result.code !== 0) {
      acquireLog.error(`yt-dlp exited with code ${result.code}`, { stderr: stderrTail(result.stderr) });
      throw new AcquisitionFailure("download_failed", `yt-dlp exit ${result.code}`);
    }

    const outputPath = result.stdout.trim().split(/\r?\n/).pop()?.trim() ?? "";
    if (!outputPath) {
      throw new AcquisitionFailure("download_failed", "yt-dlp printed no output path");
    }
    return outputPath;
  }

  private async downloadDrive(fileId: string, destPath: string): Promise<string> {
    const base = `https://drive.google.com/uc?export=download&id=${encodeURIComponent(fileId)}`;
    acquireLog.info("Downloading from Google Drive", { fileId });

    let response = await this.fetchDrive(base);
    // Large files answer with an HTML virus-scan page first; confirm and retry once
    if ((response.headers.get("content-type") ?? "").includes("text/html")) {
      response = await this.fetchDrive(`${base}&confirm=t`);
      if ((response.headers.get("content-type") ?? "").includes("text/html")) {
        throw new AcquisitionFailure("download_failed", "file is not publicly downloadable");
      }
    }

    if (!response.body) {
      throw new AcquisitionFailure("download_failed", "empty response body");
    }
    try {
      await pipeline(Readable.fromWeb(response.body), createWriteStream(destPath));
    } catch (err: unknown) {
      await rm(destPath, { force: true });
      throw new AcquisitionFailure("download_failed", describeError(err));
    }
    const { size } = await stat(destPath);
    acquireLog.info(`Google Drive download complete (${size} bytes)`);
    return destPath;
  }

  private async fetchDrive(url: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { redirect: "follow", signal: AbortSignal.timeout(this.opts.timeoutMs) });
    } catch (err: unknown) {
      throw new AcquisitionFailure("download_failed", describeError(err));
    }
    if (!response.ok) {
      throw new AcquisitionFailure("download_failed", `HTTP ${response.status}`);
    }
    return response;
  }
}
