import { afterEach, expect, test, vi } from "vitest";
import { configureLogger, log } from "../../utils/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
  configureLogger({ level: "error", format: "pretty" });
});

test("json lines carry scope, message and error fields", () => {
  const out = vi.spyOn(console, "log").mockImplementation(() => {});
  configureLogger({ level: "info", format: "json" });

  log.withScope("relay").info("copy failed", new Error("boom"));
  log.withScope("relay").debug("hidden");

  expect(out).toHaveBeenCalledTimes(1);
  const entry: unknown = JSON.parse(String(out.mock.calls[0]?.[0]));
  expect(entry).toMatchObject({
    level: "info",
    scope: "relay",
    msg: "copy failed",
    data: { name: "Error", message: "boom" },
  });
});

test("scope filters drop other scopes but keep errors on stderr", () => {
  const out = vi.spyOn(console, "log").mockImplementation(() => {});
  const err = vi.spyOn(console, "error").mockImplementation(() => {});
  configureLogger({ level: "trace", scopes: ["stt"], format: "pretty" });

  log.withScope("llm").info("not shown");
  log.withScope("stt").error("window 3 failed");

  expect(out).not.toHaveBeenCalled();
  expect(err).toHaveBeenCalledTimes(1);
  expect(String(err.mock.calls[0]?.[0])).toMatch(/^\d{2}:\d{2}:\d{2} \[ERR\] stt: window 3 failed$/);
});
