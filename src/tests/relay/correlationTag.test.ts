import { expect, test } from "vitest";
import { formatCorrelationTag, parseCorrelationTag } from "../../relay/correlationTag.js";

test("tags carry the original chat and message ids", () => {
  expect(formatCorrelationTag("111", 222)).toBe("#user_111_222");
  expect(parseCorrelationTag("#user_111_222")).toEqual({ chatId: "111", messageId: 222 });
});

test("negative chat ids and trailing text are accepted", () => {
  expect(parseCorrelationTag("  #user_-1001234_7 original caption")).toEqual({ chatId: "-1001234", messageId: 7 });
});

test("anything else is not a tag", () => {
  expect(parseCorrelationTag("")).toBeNull();
  expect(parseCorrelationTag("see #user_1_2")).toBeNull();
  expect(parseCorrelationTag("#user_1_2x")).toBeNull();
  expect(parseCorrelationTag("#user_abc_2")).toBeNull();
});
