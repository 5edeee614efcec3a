import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import type { ProcessRunner } from "../../audio/ffmpeg.js";
import { classifyUrl, findUrl, UrlDownloader } from "../../media/urlSources.js";
import { makeTempDir } from "../helpers/fakes.js";

let dir = "";
let cleanup: () => Promise<void> = async () => {};

beforeEach(async () => {
  ({ dir, cleanup } = await makeTempDir("urls"));
});

afterEach(async () => {
  await cleanup();
});

test("video-hosting links are recognized in their common forms", () => {
  for (const url of [
    "https://www.youtube.com/watch?v=abcdefghijk",
    "https://youtube.com/watch?feature=share&v=abcdefghijk",
    "https://youtu.be/abcdefghijk",
    "https://m.youtube.com/shorts/abcdefghijk",
    "youtube.com/live/abcdefghijk",
  ]) {
    expect(classifyUrl(url)).toEqual({ kind: "youtube", url });
  }
});

test("drive links yield the file id", () => {
  expect(classifyUrl("https://drive.google.com/file/d/1AbC-dEf_9/view?usp=sharing")).toEqual({
    kind: "gdrive",
    fileId: "1AbC-dEf_9",
  });
  expect(classifyUrl("https://drive.google.com/open?id=XYZ123")).toEqual({ kind: "gdrive", fileId: "XYZ123" });
  expect(classifyUrl("https://drive.google.com/uc?export=download&id=XYZ123")).toEqual({ kind: "gdrive", fileId: "XYZ123" });
});

test("other links are unsupported", () => {
  expect(classifyUrl("https://vimeo.com/12345")).toBeNull();
  expect(classifyUrl("https://example.test/youtube.com/watch?v=abcdefghijk")).toBeNull();
});

test("the first link in a message is found", () => {
  expect(findUrl("please do this one https://youtu.be/abcdefghijk thanks")).toBe("https://youtu.be/abcdefghijk");
  expect(findUrl("no links here")).toBeNull();
});

test("yt-dlp's printed path is the downloaded file", async () => {
  const run = vi.fn<ProcessRunner>(async () => ({ code: 0, stdout: "[info] done\n/tmp/x/42_7.m4a\n", stderr: "" }));
  const downloader = new UrlDownloader({ ytdlpPath: "yt-dlp", timeoutMs: 1_000, run });

  expect(await downloader.download("https://youtu.be/abcdefghijk", "/tmp/x/42_7")).toBe("/tmp/x/42_7.m4a");
  const [command, args, opts] = run.mock.calls[0] ?? [];
  expect(command).toBe("yt-dlp");
  expect(args).toContain("--no-playlist");
  expect(args?.slice(-3)).toEqual(["--print", "after_move:filepath", "https://youtu.be/abcdefghijk"]);
  expect(opts).toEqual({ timeoutMs: 1_000 });
});

test("a failing yt-dlp run is download_failed", async () => {
  const run: ProcessRunner = async () => ({ code: 1, stdout: "", stderr: "ERROR: Video unavailable" });
  const downloader = new UrlDownloader({ ytdlpPath: "yt-dlp", timeoutMs: 1_000, run });

  await expect(downloader.download("https://youtu.be/abcdefghijk", "/tmp/x/1")).rejects.toMatchObject({
    kind: "download_failed",
  });
});

test("drive downloads confirm past the HTML warning page", async () => {
  const fetchImpl = vi
    .fn<typeof fetch>()
    .mockResolvedValueOnce(new Response("<html>scan warning</html>", { headers: { "content-type": "text/html" } }))
    .mockResolvedValueOnce(new Response("audio-bytes", { headers: { "content-type": "application/octet-stream" } }));
  const downloader = new UrlDownloader({ ytdlpPath: "yt-dlp", timeoutMs: 1_000, fetchImpl });

  const saved = await downloader.download("https://drive.google.com/file/d/FILE1/view", path.join(dir, "9_3"));

  expect(saved).toBe(path.join(dir, "9_3.media"));
  expect(await readFile(saved, "utf8")).toBe("audio-bytes");
  expect(fetchImpl.mock.calls.map((c) => c[0])).toEqual([
    "https://drive.google.com/uc?export=download&id=FILE1",
    "https://drive.google.com/uc?export=download&id=FILE1&confirm=t",
  ]);
});

test("a private drive file is download_failed", async () => {
  const fetchImpl = vi.fn<typeof fetch>(async () => new Response("denied", { status: 403 }));
  const downloader = new UrlDownloader({ ytdlpPath: "yt-dlp", timeoutMs: 1_000, fetchImpl });

  await expect(downloader.download("https://drive.google.com/open?id=FILE2", path.join(dir, "x"))).rejects.toMatchObject({
    kind: "download_failed",
    message: "download_failed: HTTP 403",
  });
});

test("a drive reply without a body is download_failed", async () => {
  const fetchImpl = vi.fn<typeof fetch>(async () => new Response(null, { status: 200 }));
  const downloader = new UrlDownloader({ ytdlpPath: "yt-dlp", timeoutMs: 1_000, fetchImpl });

  await expect(downloader.download("https://drive.google.com/open?id=FILE3", path.join(dir, "y"))).rejects.toMatchObject({
    kind: "download_failed",
    message: "download_failed: empty response body",
  });
});

test("a drive body that breaks off leaves no partial file", async () => {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new TextEncoder().encode("first-part"));
      controller.error(new Error("connection reset"));
    },
  });
  const fetchImpl = vi.fn<typeof fetch>(async () => new Response(body));
  const downloader = new UrlDownloader({ ytdlpPath: "yt-dlp", timeoutMs: 1_000, fetchImpl });

  await expect(downloader.download("https://drive.google.com/open?id=FILE4", path.join(dir, "z"))).rejects.toMatchObject({
    kind: "download_failed",
  });
  expect(existsSync(path.join(dir, "z.media"))).toBe(false);
});

test("unsupported links are rejected before any download", async () => {
  const run = vi.fn<ProcessRunner>();
  const downloader = new UrlDownloader({ ytdlpPath: "yt-dlp", timeoutMs: 1_000, run });

  await expect(downloader.download("https://vimeo.com/1", "/tmp/x")).rejects.toMatchObject({ kind: "unsupported_url" });
  expect(run).not.toHaveBeenCalled();
});
