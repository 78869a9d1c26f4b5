import { beforeEach, describe, expect, test } from "vitest";
import { Profiler, calculateStats } from "../../src/profiler";

describe("Profiler", () => {
  let clock: number;
  let profiler: Profiler;

  beforeEach(() => {
    clock = 1000;
    profiler = new Profiler({ now: () => clock });
  });

  describe("calculateStats", () => {
    test("returns null without measurements", () => {
      expect(calculateStats([])).toBeNull();
    });

    test("computes percentiles over sorted values", () => {
      const stats = calculateStats([100, 10, 90, 20, 80, 30, 70, 40, 60, 50]);

      expect(stats).toEqual({
        count: 10,
        min: 10,
        max: 100,
        avg: 55,
        p50: 50,
        p95: 100,
        p99: 100,
        total: 550,
      });
    });

    test("a single value is every percentile", () => {
      expect(calculateStats([7])).toEqual({ count: 1, min: 7, max: 7, avg: 7, p50: 7, p95: 7, p99: 7, total: 7 });
    });
  });

  describe("timers", () => {
    test("startTimer() records elapsed time under its name", () => {
      const done = profiler.startTimer("search.bm25");
      clock += 12;

      expect(done()).toBe(12);
      expect(profiler.getStats("search.bm25")?.count).toBe(1);
      expect(profiler.getStats("search.bm25")?.max).toBe(12);
    });

    test("getStats() returns null for unknown names", () => {
      expect(profiler.getStats("search.regex")).toBeNull();
    });
  });

  describe("export", () => {
    test("reports an empty profile", () => {
      clock += 500;
      const report = profiler.export();

      expect(report.uptime).toBe(500);
      expect(report.restore).toEqual({ duration: null, servers: 0, tools: 0 });
      expect(report.servers).toEqual([]);
      expect(report.indexing).toEqual({ buildTime: null, toolCount: 0, incrementalUpdates: 0 });
      expect(report.searches).toEqual({ bm25: null, regex: null });
      expect(report.executions).toBeNull();
      expect(report.activations).toBe(0);
    });

    test("collects searches, executions and activations", () => {
      profiler.record("search.bm25", 2);
      profiler.record("search.regex", 3);
      profiler.record("tool.execute", 40);
      profiler.recordActivations(2);
      profiler.recordActivations(1);

      const report = profiler.export();

      expect(report.searches.bm25?.total).toBe(2);
      expect(report.searches.regex?.total).toBe(3);
      expect(report.executions?.avg).toBe(40);
      expect(report.activations).toBe(3);
    });

    test("tracks index size through incremental updates", () => {
      profiler.recordIndexBuild(25, 4);
      profiler.recordIncrementalUpdate(3);
      profiler.recordIncrementalUpdate(-10);

      expect(profiler.export().indexing).toEqual({ buildTime: 25, toolCount: 0, incrementalUpdates: 2 });
    });

    test("keeps the latest discovery per server", () => {
      profiler.recordServerDiscovery("weather", 30, 0, "error", "connection refused");
      profiler.recordServerDiscovery("weather", 12, 2, "active");
      profiler.recordServerDiscovery("time", 8, 2, "active");
      profiler.removeServer("time");

      expect(profiler.export().servers).toEqual([
        { name: "weather", discoveryTime: 12, toolCount: 2, status: "active" },
      ]);
    });

    test("records the restore summary", () => {
      profiler.recordRestore(15, 2, 6);
      expect(profiler.export().restore).toEqual({ duration: 15, servers: 2, tools: 6 });
    });
  });

  test("reset() clears everything", () => {
    profiler.record("tool.execute", 5);
    profiler.recordServerDiscovery("weather", 1, 1, "active");
    profiler.recordActivations(4);

    profiler.reset();
    const report = profiler.export();

    expect(report.executions).toBeNull();
    expect(report.servers).toEqual([]);
    expect(report.activations).toBe(0);
  });
});
