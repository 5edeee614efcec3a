import { writeFile } from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { MediaResolver, type MediaResolverOptions } from "../../media/resolver.js";
import type { MediaRequest } from "../../media/types.js";
import { NoopProgress } from "../../pipeline/progress.js";
import { RelayCorrelator } from "../../relay/correlator.js";
import { FakePrimary, FakeSecondary, makeTempDir } from "../helpers/fakes.js";

const LIMIT = 19 * 1024 * 1024;
let mediaDir = "";
let cleanup: () => Promise<void> = async () => {};

beforeEach(async () => {
  ({ dir: mediaDir, cleanup } = await makeTempDir("resolver"));
});

afterEach(async () => {
  await cleanup();
});

function request(overrides: Partial<MediaRequest>): MediaRequest {
  return { requesterId: "111", chatId: "111", messageId: 222, route: "direct", size: 1_000, fileId: "file-1", ...overrides };
}

function setup(overrides: Partial<MediaResolverOptions> = {}) {
  const primary = new FakePrimary();
  const secondary = new FakeSecondary();
  const urls = { download: vi.fn(async (_url: string, destBase: string) => {
    await writeFile(`${destBase}.m4a`, "from-link");
    return `${destBase}.m4a`;
  }) };
  const relay = new RelayCorrelator({
    primary,
    secondary,
    relayChatId: "-100500",
    mediaDir,
    timeoutMs: 60_000,
    directFetchAttempts: 1,
    directFetchDelayMs: 0,
    scanLimit: 10,
    maxPending: 10,
    sleep: async () => {},
  });
  const resolver = new MediaResolver({
    primary,
    urls,
    relay,
    secondary,
    mediaDir,
    directDownloadLimitBytes: LIMIT,
    originLookup: { attempts: 2, delayMs: 0, scanLimit: 10 },
    sleep: async () => {},
    ...overrides,
  });
  return { primary, secondary, urls, resolver };
}

test("small files are downloaded directly", async () => {
  const { resolver, secondary } = setup();

  expect(await resolver.resolve(request({}), new NoopProgress())).toBe(path.join(mediaDir, "111_222.media"));
  expect(secondary.downloads).toHaveLength(0);
});

test("files at the limit go through the relay", async () => {
  const { resolver, primary, secondary } = setup();
  secondary.messages.push({ id: 9000, caption: "#user_111_222", hasMedia: true });

  const filePath = await resolver.resolve(request({ size: LIMIT }), new NoopProgress());

  expect(filePath).toBe(path.join(mediaDir, "relay_111_222.media"));
  expect(primary.copies).toHaveLength(1);
});

test("large files without a relay are refused", async () => {
  const { resolver } = setup({ relay: null });

  await expect(resolver.resolve(request({ size: LIMIT + 1 }), new NoopProgress())).rejects.toMatchObject({
    kind: "relay_disabled",
  });
});

test("links go to the link downloader", async () => {
  const { resolver, urls } = setup();

  const filePath = await resolver.resolve(
    request({ route: "url", size: 0, fileId: undefined, url: "https://youtu.be/abcdefghijk" }),
    new NoopProgress()
  );

  expect(filePath).toBe(path.join(mediaDir, "111_222.m4a"));
  expect(urls.download).toHaveBeenCalledWith("https://youtu.be/abcdefghijk", path.join(mediaDir, "111_222"));
});

test("a forward without its own file is read from the origin post", async () => {
  const { resolver, secondary } = setup();
  secondary.messages.push({ id: 77, caption: "", hasMedia: true });

  const filePath = await resolver.resolve(
    request({ route: "forwarded", fileId: undefined, size: 0, forwardedFrom: { chatId: "-100900", messageId: 77 } }),
    new NoopProgress()
  );

  expect(filePath).toBe(path.join(mediaDir, "111_222.media"));
  expect(secondary.downloads).toEqual([{ chatId: "-100900", messageId: 77, destPath: filePath }]);
});

test("an origin post that is not visible at first is found on a later attempt", async () => {
  const { resolver, secondary } = setup();
  secondary.messages.push({ id: 77, caption: "", hasMedia: true });
  let lookups = 0;
  const lookup = secondary.getMessageById.bind(secondary);
  secondary.getMessageById = async (chatId, messageId) => {
    lookups++;
    return lookups === 1 ? null : lookup(chatId, messageId);
  };

  const filePath = await resolver.resolve(
    request({ route: "forwarded", fileId: undefined, size: 0, forwardedFrom: { chatId: "-100900", messageId: 77 } }),
    new NoopProgress()
  );

  expect(filePath).toBe(path.join(mediaDir, "111_222.media"));
  expect(lookups).toBe(2);
});

test("an origin post missed by every id lookup is found by the recent-message scan", async () => {
  const { resolver, secondary } = setup();
  secondary.visibleById = false;
  secondary.messages.push({ id: 77, caption: "", hasMedia: true });

  const filePath = await resolver.resolve(
    request({ route: "forwarded", fileId: undefined, size: 0, forwardedFrom: { chatId: "-100900", messageId: 77 } }),
    new NoopProgress()
  );

  expect(secondary.downloads).toEqual([{ chatId: "-100900", messageId: 77, destPath: filePath }]);
});

test("an origin post without media is missing_source", async () => {
  const { resolver } = setup();

  await expect(
    resolver.resolve(
      request({ route: "forwarded", fileId: undefined, forwardedFrom: { chatId: "-100900", messageId: 78 } }),
      new NoopProgress()
    )
  ).rejects.toMatchObject({ kind: "missing_source" });
});

test("an empty download is empty_source", async () => {
  const { resolver, primary } = setup();
  primary.fileContent = "";

  await expect(resolver.resolve(request({}), new NoopProgress())).rejects.toMatchObject({ kind: "empty_source" });
});

test("a failed direct download is download_failed", async () => {
  const { resolver, primary } = setup();
  primary.downloadFile = async () => {
    throw new Error("Bad Request: file is too big");
  };

  await expect(resolver.resolve(request({}), new NoopProgress())).rejects.toMatchObject({ kind: "download_failed" });
});
