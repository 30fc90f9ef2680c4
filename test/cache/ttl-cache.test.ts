import { describe, test, expect } from "vitest";
import { DEFAULT_TTL_MS, TtlCache } from "../../src/cache/ttl-cache";
import { secretValueKey, secretValuePrefix } from "../../src/cache/keys";
import { containerApp, keyVault } from "../helpers/fake-backend";

function clock(start = 1_000) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

describe("TtlCache", () => {
  test("returns what was stored", () => {
    const cache = new TtlCache();
    cache.set("secrets:v1", [{ name: "a" }]);
    expect(cache.get("secrets:v1")).toEqual([{ name: "a" }]);
    expect(cache.has("secrets:v1")).toBe(true);
  });

  test("misses on unknown keys", () => {
    const cache = new TtlCache();
    expect(cache.get("nope")).toBeUndefined();
    expect(cache.has("nope")).toBe(false);
  });

  test("expires an entry once its TTL has elapsed", () => {
    const c = clock();
    const cache = new TtlCache({ now: c.now });
    cache.set("k", "v", 1_000);

    c.advance(999);
    expect(cache.get("k")).toBe("v");

    c.advance(1);
    expect(cache.get("k")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  test("uses the configured default TTL", () => {
    const c = clock();
    const cache = new TtlCache({ now: c.now, defaultTtlMs: 50 });
    cache.set("k", 1);
    c.advance(49);
    expect(cache.has("k")).toBe(true);
    c.advance(1);
    expect(cache.has("k")).toBe(false);
  });

  test("default TTL is a year", () => {
    const c = clock();
    const cache = new TtlCache({ now: c.now });
    cache.set("k", 1);
    c.advance(DEFAULT_TTL_MS - 1);
    expect(cache.has("k")).toBe(true);
  });

  test("set replaces the value and restarts the TTL", () => {
    const c = clock();
    const cache = new TtlCache({ now: c.now });
    cache.set("k", "old", 100);
    c.advance(90);
    cache.set("k", "new", 100);
    c.advance(90);
    expect(cache.get("k")).toBe("new");
  });

  test("invalidate removes one key", () => {
    const cache = new TtlCache();
    cache.set("a", 1);
    cache.set("b", 2);
    cache.invalidate("a");
    expect(cache.has("a")).toBe(false);
    expect(cache.get("b")).toBe(2);
  });

  test("invalidatePrefix removes exactly the value keys of one resource", () => {
    const cache = new TtlCache();
    const v1 = keyVault("v1");
    const v10 = keyVault("v10");
    cache.set(secretValueKey(v1, "a"), "1");
    cache.set(secretValueKey(v1, "b"), "2");
    cache.set(secretValueKey(v10, "a"), "3");
    cache.set("secrets:v1", []);

    cache.invalidatePrefix(secretValuePrefix(v1));

    expect(cache.has("secretvalue:v1:a")).toBe(false);
    expect(cache.has("secretvalue:v1:b")).toBe(false);
    expect(cache.get("secretvalue:v10:a")).toBe("3");
    expect(cache.has("secrets:v1")).toBe(true);
    expect(cache.size).toBe(2);
  });

  test("key vault and container app keys live in separate namespaces", () => {
    expect(secretValueKey(keyVault("shared"), "x")).toBe("secretvalue:shared:x");
    expect(secretValueKey(containerApp("shared"), "x")).toBe("caappsecretvalue:shared:x");
  });

  test("clear empties everything", () => {
    const cache = new TtlCache();
    cache.set("a", 1);
    cache.set("b", 2);
    cache.clear();
    expect(cache.size).toBe(0);
  });
});

describe("setIfCurrent", () => {
  test("stores when nothing was evicted since the mark", () => {
    const cache = new TtlCache();
    const since = cache.mark();
    cache.invalidate("other");
    expect(cache.setIfCurrent("secrets:v1", ["a"], since)).toBe(true);
    expect(cache.get("secrets:v1")).toEqual(["a"]);
  });

  test("refuses a key invalidated after the mark", () => {
    const cache = new TtlCache();
    const since = cache.mark();
    cache.invalidate("secrets:v1");
    expect(cache.setIfCurrent("secrets:v1", ["old"], since)).toBe(false);
    expect(cache.has("secrets:v1")).toBe(false);
  });

  test("refuses keys under a prefix invalidated after the mark", () => {
    const cache = new TtlCache();
    const v1 = keyVault("v1");
    const since = cache.mark();
    cache.invalidatePrefix(secretValuePrefix(v1));
    expect(cache.setIfCurrent(secretValueKey(v1, "a"), "old", since)).toBe(false);
    expect(cache.setIfCurrent(secretValueKey(keyVault("v10"), "a"), "kept", since)).toBe(true);
  });

  test("refuses everything after a clear", () => {
    const cache = new TtlCache();
    const since = cache.mark();
    cache.clear();
    expect(cache.setIfCurrent("accounts", [], since)).toBe(false);
    expect(cache.setIfCurrent("accounts", [], cache.mark())).toBe(true);
  });
});
