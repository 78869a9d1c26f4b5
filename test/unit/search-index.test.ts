import { describe, expect, test } from "vitest";
import { SearchConfigSchema } from "../../src/config/schema";
import { SearchIndex, clampMaxResults } from "../../src/search/search-index";
import { createMemoryLogger, metadata, thrownCode } from "../helpers";

const bounds = { defaultLimit: 5, minLimit: 1, maxLimit: 10 };

function manyTools(count: number, server = "bulk") {
  return Array.from({ length: count }, (_, i) =>
    metadata(server, `tool_${String(i).padStart(2, "0")}`, "Shared helper tool")
  );
}

describe("clampMaxResults", () => {
  test("uses the default when absent", () => {
    expect(clampMaxResults(undefined, bounds)).toBe(5);
    expect(clampMaxResults(Number.NaN, bounds)).toBe(5);
  });

  test("clamps into bounds", () => {
    expect(clampMaxResults(0, bounds)).toBe(1);
    expect(clampMaxResults(-3, bounds)).toBe(1);
    expect(clampMaxResults(11, bounds)).toBe(10);
    expect(clampMaxResults(7, bounds)).toBe(7);
  });

  test("floors fractional values", () => {
    expect(clampMaxResults(3.7, bounds)).toBe(3);
    expect(clampMaxResults(0.5, bounds)).toBe(1);
  });
});

describe("SearchIndex", () => {
  const config = SearchConfigSchema.parse({});

  test("BM25 results are clamped", () => {
    const index = new SearchIndex(config);
    index.upsertMany(manyTools(12));

    expect(index.searchBm25("helper")).toHaveLength(5);
    expect(index.searchBm25("helper", 50)).toHaveLength(10);
    expect(index.searchBm25("helper", 0)).toHaveLength(1);
  });

  test("regex results are truncated to the clamped count after ordering", () => {
    const index = new SearchIndex(config);
    index.upsertMany(manyTools(12));

    expect(index.searchRegex("bulk__", 3).map(r => r.namespacedName)).toEqual([
      "bulk__tool_00",
      "bulk__tool_01",
      "bulk__tool_02",
    ]);
  });

  test("regex validation uses the configured pattern limit", () => {
    const index = new SearchIndex(SearchConfigSchema.parse({ maxPatternLength: 4 }));
    expect(thrownCode(() => index.searchRegex("abcde"))).toBe("pattern_too_long");
    expect(thrownCode(() => index.searchRegex("abcd"))).toBe("none");
  });

  test("removeServer() drops only that server", () => {
    const index = new SearchIndex(config);
    index.upsertMany([...manyTools(3, "alpha"), ...manyTools(2, "alphabet")]);

    expect(index.removeServer("alpha")).toBe(3);
    expect(index.names()).toEqual(["alphabet__tool_00", "alphabet__tool_01"]);
  });

  test("rebuild() skips malformed entries and reports them", async () => {
    const logger = createMemoryLogger();
    const index = new SearchIndex(config, { logger });
    const good = metadata("weather", "get_forecast", "Forecast");

    const report = await index.rebuild([
      good,
      { foo: 1 },
      { ...good, serverName: "other" },
    ]);

    expect(report.indexed).toBe(1);
    expect(report.skipped.map(s => s.index)).toEqual([1, 2]);
    expect(index.names()).toEqual(["weather__get_forecast"]);
    expect(logger.entries.filter(e => e.level === "warn")).toHaveLength(2);
  });

  test("rebuild() replaces the previous contents", async () => {
    const index = new SearchIndex(config);
    index.upsert(metadata("stale", "old", "Old tool"));

    await index.rebuild(manyTools(2));

    expect(index.has("stale__old")).toBe(false);
    expect(index.size).toBe(2);
  });

  test("queries see the old snapshot until the rebuild swaps", async () => {
    const index = new SearchIndex(config);
    index.upsert(metadata("stale", "old", "Old tool"));

    const pending = index.rebuild(manyTools(6), 1);
    expect(index.has("bulk__tool_00")).toBe(false);
    expect(index.has("stale__old")).toBe(true);

    await pending;
    expect(index.has("bulk__tool_00")).toBe(true);
    expect(index.has("stale__old")).toBe(false);
  });

  test("mutations made during a rebuild survive the swap", async () => {
    const index = new SearchIndex(config);

    const pending = index.rebuild([...manyTools(6), metadata("gone", "tool", "Removed meanwhile")], 1);
    index.upsert(metadata("late", "arrival", "Added during rebuild"));
    index.removeServer("gone");
    await pending;

    expect(index.has("late__arrival")).toBe(true);
    expect(index.has("gone__tool")).toBe(false);
    expect(index.size).toBe(7);
  });
});
