/**
 * Latency and discovery metrics for the gateway
 */

export interface PerformanceStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  total: number;
}

export interface ServerMetrics {
  name: string;
  discoveryTime: number;
  toolCount: number;
  status: "active" | "error";
  error?: string;
}

export interface PerformanceReport {
  timestamp: string;
  uptime: number;
  restore: {
    duration: number | null;
    servers: number;
    tools: number;
  };
  servers: ServerMetrics[];
  indexing: {
    buildTime: number | null;
    toolCount: number;
    incrementalUpdates: number;
  };
  searches: {
    bm25: PerformanceStats | null;
    regex: PerformanceStats | null;
  };
  executions: PerformanceStats | null;
  activations: number;
}

/**
 * Calculate percentile from sorted array
 */
function percentile(sorted: number[], p: number): number {
  if (sorted.length === 0) return 0;
  const index = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.max(0, index)] ?? 0;
}

export function calculateStats(measurements: number[]): PerformanceStats | null {
  if (measurements.length === 0) return null;

  const sorted = [...measurements].sort((a, b) => a - b);
  const total = sorted.reduce((sum, v) => sum + v, 0);

  return {
    count: sorted.length,
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: total / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    total,
  };
}

export class Profiler {
  private measures: Map<string, number[]> = new Map();
  private serverMetrics: Map<string, ServerMetrics> = new Map();

  private restoreDuration: number | null = null;
  private restoredServers = 0;
  private restoredTools = 0;

  private indexBuildTime: number | null = null;
  private toolCount = 0;
  private incrementalUpdates = 0;
  private activations = 0;

  private readonly now: () => number;
  private readonly startTime: number;

  constructor(options?: { now?: () => number }) {
    this.now = options?.now ?? (() => performance.now());
    this.startTime = this.now();
  }

  /**
   * Record a duration directly (for pre-calculated values)
   */
  record(name: string, duration: number): void {
    const existing = this.measures.get(name) ?? [];
    existing.push(duration);
    this.measures.set(name, existing);
  }

  getStats(name: string): PerformanceStats | null {
    const measurements = this.measures.get(name);
    if (!measurements) return null;
    return calculateStats(measurements);
  }

  recordServerDiscovery(
    name: string,
    discoveryTime: number,
    toolCount: number,
    status: "active" | "error",
    error?: string
  ): void {
    this.serverMetrics.set(name, error ? { name, discoveryTime, toolCount, status, error } : { name, discoveryTime, toolCount, status });
  }

  removeServer(name: string): void {
    this.serverMetrics.delete(name);
  }

  recordRestore(duration: number, servers: number, tools: number): void {
    this.restoreDuration = duration;
    this.restoredServers = servers;
    this.restoredTools = tools;
  }

  recordIndexBuild(duration: number, toolCount: number): void {
    this.indexBuildTime = duration;
    this.toolCount = toolCount;
  }

  /**
   * Record an incremental index update; delta may be negative on removal
   */
  recordIncrementalUpdate(delta: number): void {
    this.incrementalUpdates++;
    this.toolCount = Math.max(0, this.toolCount + delta);
  }

  recordActivations(count: number): void {
    this.activations += count;
  }

  export(): PerformanceReport {
    return {
      timestamp: new Date().toISOString(),
      uptime: this.now() - this.startTime,
      restore: {
        duration: this.restoreDuration,
        servers: this.restoredServers,
        tools: this.restoredTools,
      },
      servers: Array.from(this.serverMetrics.values()),
      indexing: {
        buildTime: this.indexBuildTime,
        toolCount: this.toolCount,
        incrementalUpdates: this.incrementalUpdates,
      },
      searches: {
        bm25: this.getStats("search.bm25"),
        regex: this.getStats("search.regex"),
      },
      executions: this.getStats("tool.execute"),
      activations: this.activations,
    };
  }

  reset(): void {
    this.measures.clear();
    this.serverMetrics.clear();
    this.restoreDuration = null;
    this.restoredServers = 0;
    this.restoredTools = 0;
    this.indexBuildTime = null;
    this.toolCount = 0;
    this.incrementalUpdates = 0;
    this.activations = 0;
  }

  /**
   * Create a scoped timer that records its duration when called
   * Usage: const done = profiler.startTimer("search.bm25"); ... done();
   */
  startTimer(name: string): () => number {
    const start = this.now();
    return () => {
      const duration = this.now() - start;
      this.record(name, duration);
      return duration;
    };
  }
}
