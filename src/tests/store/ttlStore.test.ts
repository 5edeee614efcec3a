import { expect, test, vi } from "vitest";
import { TtlStore } from "../../store/ttlStore.js";

function clock(start = 1_000) {
  let t = start;
  return { now: () => t, advance: (ms: number) => (t += ms) };
}

test("entries expire after their ttl", () => {
  const c = clock();
  const store = new TtlStore<string, number>({ ttlMs: 100, maxEntries: 10, now: c.now });

  store.set("a", 1);
  c.advance(99);
  expect(store.get("a")).toBe(1);
  c.advance(1);
  expect(store.get("a")).toBeUndefined();
  expect(store.size).toBe(0);
});

test("capacity evicts the least recently used entry", () => {
  const onEvict = vi.fn();
  const store = new TtlStore<string, number>({ ttlMs: 1_000, maxEntries: 2, onEvict });

  store.set("a", 1);
  store.set("b", 2);
  store.get("a");
  store.set("c", 3);

  expect(store.has("a")).toBe(true);
  expect(store.has("b")).toBe(false);
  expect(store.has("c")).toBe(true);
  expect(onEvict).toHaveBeenCalledWith("b", 2, "capacity");
});

test("take consumes an entry exactly once", () => {
  const store = new TtlStore<number, string>({ ttlMs: 1_000, maxEntries: 5 });
  store.set(7, "token");

  expect(store.take(7)).toBe("token");
  expect(store.take(7)).toBeUndefined();
});

test("sweep removes expired entries and reports them", () => {
  const c = clock();
  const onEvict = vi.fn();
  const store = new TtlStore<string, number>({ ttlMs: 50, maxEntries: 10, now: c.now, onEvict });

  store.set("old", 1);
  c.advance(30);
  store.set("new", 2);
  c.advance(20);

  expect(store.sweep()).toBe(1);
  expect(onEvict).toHaveBeenCalledWith("old", 1, "expired");
  expect(store.has("new")).toBe(true);
});

test("rejects a non-positive capacity", () => {
  expect(() => new TtlStore({ ttlMs: 1, maxEntries: 0 })).toThrow("maxEntries must be positive");
});
