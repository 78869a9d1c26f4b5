import { describe, expect, test } from "vitest";
import { SchemaCache } from "../../src/cache/schema-cache";

const schema = (marker: string) => ({ type: "object", title: marker });

function createCache(options: { ttl?: number; maxSize?: number } = {}) {
  let clock = 0;
  const cache = new SchemaCache({
    ttl: options.ttl ?? 1000,
    maxSize: options.maxSize ?? 10,
    now: () => clock,
  });
  return {
    cache,
    advance(ms: number) {
      clock += ms;
    },
  };
}

describe("SchemaCache", () => {
  test("get() returns what put() stored", () => {
    const { cache } = createCache();
    cache.put("weather__get_forecast", schema("forecast"));
    expect(cache.get("weather__get_forecast")).toEqual(schema("forecast"));
  });

  test("entries expire once ttl has elapsed", () => {
    const { cache, advance } = createCache({ ttl: 1000 });
    cache.put("weather__get_forecast", schema("forecast"));

    advance(999);
    expect(cache.get("weather__get_forecast")).toEqual(schema("forecast"));

    advance(1);
    expect(cache.get("weather__get_forecast")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  test("put() refreshes the write time", () => {
    const { cache, advance } = createCache({ ttl: 1000 });
    cache.put("a__x", schema("first"));
    advance(800);
    cache.put("a__x", schema("second"));
    advance(800);

    expect(cache.get("a__x")).toEqual(schema("second"));
  });

  test("evicts the least recently used entry at capacity", () => {
    const { cache } = createCache({ maxSize: 2 });
    cache.put("a__x", schema("a"));
    cache.put("b__x", schema("b"));
    cache.get("a__x");
    cache.put("c__x", schema("c"));

    expect(cache.keys().sort()).toEqual(["a__x", "c__x"]);
    expect(cache.get("b__x")).toBeUndefined();
  });

  test("removeServer() drops only that server's entries", () => {
    const { cache } = createCache();
    cache.put("weather__get_forecast", schema("f"));
    cache.put("weather__get_alerts", schema("a"));
    cache.put("weatherman__get_forecast", schema("w"));

    expect(cache.removeServer("weather")).toBe(2);
    expect(cache.keys()).toEqual(["weatherman__get_forecast"]);
  });

  test("delete() and clear()", () => {
    const { cache } = createCache();
    cache.put("a__x", schema("a"));
    cache.put("b__x", schema("b"));

    expect(cache.delete("a__x")).toBe(true);
    expect(cache.delete("a__x")).toBe(false);

    cache.clear();
    expect(cache.size).toBe(0);
  });

  test("stats() reports hits, misses and hit rate", () => {
    const { cache } = createCache({ maxSize: 3 });
    expect(cache.stats().hitRate).toBe(0);

    cache.put("a__x", schema("a"));
    cache.get("a__x");
    cache.get("missing__x");

    expect(cache.stats()).toEqual({ hits: 1, misses: 1, size: 1, maxSize: 3, hitRate: 50 });
  });
});
