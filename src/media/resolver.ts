import { stat } from "node:fs/promises";
import path from "node:path";
import { sanitizeSegment } from "../dataPaths.js";
import { AcquisitionFailure, describeError } from "../errors.js";
import type { ProgressReporter } from "../pipeline/progress.js";
import type { RelayCorrelator } from "../relay/correlator.js";
import { findMediaMessage } from "../relay/lookup.js";
import type { PrimaryChannel, SecondaryAccount } from "../telegram/types.js";
import { log } from "../utils/logger.js";
import { sleep } from "../utils/sleep.js";
import type { MediaRequest } from "./types.js";
import type { UrlDownloader } from "./urlSources.js";

const acquireLog = log.withScope("acquire");

export type MediaResolverOptions = {
  primary: PrimaryChannel;
  urls: Pick<UrlDownloader, "download">;
  relay: RelayCorrelator | null;
  secondary: SecondaryAccount | null;
  mediaDir: string;
  directDownloadLimitBytes: number;
  /** Lookup bounds for a forward's origin post; same knobs as the relay direct fetch. */
  originLookup: { attempts: number; delayMs: number; scanLimit: number };
  sleep?: (ms: number) => Promise<void>;
};

async function nonEmpty(filePath: string): Promise<boolean> {
  try {
    return (await stat(filePath)).size > 0;
  } catch (err: unknown) {
    acquireLog.debug(`stat failed for ${filePath}: ${describeError(err)}`);
    return false;
  }
}

/**
 * Turns a media request into a local file, picking the route by request
 * kind and declared size. Every route ends with the same check: the file
 * exists and is non-empty.
 */
export class MediaResolver {
  constructor(private readonly opts: MediaResolverOptions) {}

  async resolve(request: MediaRequest, progress: ProgressReporter): Promise<string> {
    const start = Date.now();
    const filePath = await this.acquire(request, progress);

    if (!(await nonEmpty(filePath))) {
      throw new AcquisitionFailure("empty_source", filePath);
    }
    acquireLog.info(`Acquired via ${request.route} in ${Date.now() - start}ms`, { path: filePath });
    return filePath;
  }

  private baseName(request: MediaRequest): string {
    return path.join(this.opts.mediaDir, `${sanitizeSegment(request.chatId)}_${request.messageId}`);
  }

  private async acquire(request: MediaRequest, progress: ProgressReporter): Promise<string> {
    if (request.route === "url") {
      if (!request.url) throw new AcquisitionFailure("missing_source", "url route without url");
      await progress.update("Downloading from link...");
      return this.opts.urls.download(request.url, this.baseName(request));
    }

    if (request.fileId) {
      if (request.size >= this.opts.directDownloadLimitBytes) {
        return this.viaRelay(request, progress);
      }
      await progress.update("Downloading file...");
      try {
        return await this.opts.primary.downloadFile(request.fileId, `${this.baseName(request)}.media`);
      } catch (err: unknown) {
        throw new AcquisitionFailure("download_failed", describeError(err));
      }
    }

    if (request.route === "forwarded" && request.forwardedFrom) {
      return this.viaOrigin(request.forwardedFrom, request, progress);
    }

    throw new AcquisitionFailure("missing_source", `no file, link or origin on message ${request.messageId}`);
  }

  private async viaRelay(request: MediaRequest, progress: ProgressReporter): Promise<string> {
    if (!this.opts.relay) {
      throw new AcquisitionFailure("relay_disabled", `size ${request.size}`);
    }
    const sizeMb = (request.size / 1024 / 1024).toFixed(1);
    acquireLog.info(`File is ${sizeMb} MB, above the direct limit; using relay`);
    await progress.update(`Large file (${sizeMb} MB), fetching it another way...`);
    return this.opts.relay.acquire({ chatId: request.chatId, messageId: request.messageId }, progress.messageId);
  }

  /** Forwarded message without its own file: read the origin post through the secondary identity. */
  private async viaOrigin(
    origin: { chatId: string; messageId: number },
    request: MediaRequest,
    progress: ProgressReporter
  ): Promise<string> {
    const secondary = this.opts.secondary;
    if (!secondary) {
      throw new AcquisitionFailure("relay_disabled", "forwarded origin needs the secondary identity");
    }
    await progress.update("Fetching the original post...");
    const message = await findMediaMessage(secondary, origin.chatId, origin.messageId, {
      ...this.opts.originLookup,
      sleep: this.opts.sleep ?? sleep,
    });
    if (!message) {
      throw new AcquisitionFailure("missing_source", `origin ${origin.chatId}/${origin.messageId} has no media`);
    }
    try {
      return await secondary.downloadMedia(origin.chatId, origin.messageId, `${this.baseName(request)}.media`);
    } catch (err: unknown) {
      throw new AcquisitionFailure("download_failed", describeError(err));
    }
  }
}
