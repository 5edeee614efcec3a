export type AcquisitionFailureKind =
  | "missing_source"
  | "empty_source"
  | "unsupported_url"
  | "download_failed"
  | "relay_disabled"
  | "relay_copy_failed"
  | "relay_unavailable"
  | "relay_timeout";

export type DecodeFailureKind = "empty_input" | "process_failed" | "empty_output" | "invalid_wav";

/**
 * Terminal pipeline error. `userMessage` is what the requester sees;
 * `message` carries the operator detail.
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    readonly userMessage: string
  ) {
    super(message);
    this.name = "PipelineError";
  }
}

const ACQUISITION_USER_MESSAGES: Record<AcquisitionFailureKind, string> = {
  missing_source: "Could not find the file to process.",
  empty_source: "The downloaded file is empty.",
  unsupported_url: "This link is not supported. Send a YouTube or Google Drive link, or upload the file.",
  download_failed: "Could not download the file. Please try again.",
  relay_disabled: "This file is too large to download directly. Please send a link or a smaller file.",
  relay_copy_failed: "Could not hand the large file over for download. Please try again.",
  relay_unavailable: "Large-file download is unavailable right now. Please upload a smaller file or send a link.",
  relay_timeout: "Timed out waiting for the large file to arrive. Please try again.",
};

export class AcquisitionFailure extends PipelineError {
  constructor(
    readonly kind: AcquisitionFailureKind,
    detail?: string
  ) {
    super(detail ? `${kind}: ${detail}` : kind, ACQUISITION_USER_MESSAGES[kind]);
    this.name = "AcquisitionFailure";
  }
}

export class DecodeFailure extends PipelineError {
  constructor(
    readonly kind: DecodeFailureKind,
    detail?: string
  ) {
    super(
      detail ? `${kind}: ${detail}` : kind,
      "Could not extract audio from this file. Make sure it is a valid audio or video file."
    );
    this.name = "DecodeFailure";
  }
}

/** Non-2xx response from an HTTP API, with the status kept for retry decisions. */
export class HttpStatusError extends Error {
  constructor(
    message: string,
    readonly status: number
  ) {
    super(message);
    this.name = "HttpStatusError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** HTTP status carried by an SDK or fetch error, if any. */
export function statusOf(err: unknown): number | undefined {
  if (err && typeof err === "object" && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

/** 429, 5xx and dropped connections. */
export function isRetryableError(err: unknown): boolean {
  const status = statusOf(err) ?? 0;
  if (status === 429 || (status >= 500 && status < 600)) return true;
  if (err && typeof err === "object" && "code" in err) {
    return err.code === "ECONNRESET" || err.code === "ETIMEDOUT";
  }
  return false;
}
