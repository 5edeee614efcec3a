import { expect, test } from "vitest";
import { redactConfigSnapshot } from "../../config/redact.js";

test("secret values are redacted anywhere in the tree", () => {
  expect(
    redactConfigSnapshot({
      TELEGRAM_BOT_TOKEN: "test-secret",
      LLM_MODEL: "m1",
      nested: { LLM_API_KEY: "test-secret", list: [{ STT_API_KEY: "test-secret" }] },
    })
  ).toEqual({
    TELEGRAM_BOT_TOKEN: "<redacted>",
    LLM_MODEL: "m1",
    nested: { LLM_API_KEY: "<redacted>", list: [{ STT_API_KEY: "<redacted>" }] },
  });
});

test("unset secrets stay visibly unset", () => {
  expect(redactConfigSnapshot({ TELEGRAM_SESSION: "", STT_API_KEY: undefined })).toEqual({
    TELEGRAM_SESSION: "",
    STT_API_KEY: undefined,
  });
});
