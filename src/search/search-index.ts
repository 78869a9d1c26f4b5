import type { NamespacedName, SearchResult, ToolMetadata } from "../catalog/types";
import { SEP } from "../catalog/types";
import type { SearchConfig } from "../config/schema";
import type { Logger } from "../logger";
import { noopLogger } from "../logger";
import { ToolMetadataSchema } from "../registry/types";
import { BM25Index } from "./bm25";
import { searchWithRegex } from "./regex";

export type ResultBounds = Pick<SearchConfig, "defaultLimit" | "minLimit" | "maxLimit">;

/**
 * Clamp a requested result count into [minLimit, maxLimit].
 * Missing or non-numeric values use the default.
 */
export function clampMaxResults(value: number | undefined, bounds: ResultBounds): number {
  const requested = value === undefined || Number.isNaN(value) ? bounds.defaultLimit : Math.floor(value);
  return Math.min(bounds.maxLimit, Math.max(bounds.minLimit, requested));
}

export type RebuildReport = {
  indexed: number;
  skipped: Array<{ index: number; reason: string }>;
  durationMs: number;
};

/**
 * Searchable view over tool metadata.
 *
 * Queries run against one snapshot. A rebuild fills a fresh index off to the
 * side and swaps it in at once; mutations made while the rebuild is running
 * are replayed onto the new snapshot before the swap.
 */
export class SearchIndex {
  private snapshot: BM25Index = new BM25Index();
  private pending: Array<(index: BM25Index) => void> | null = null;
  private generation = 0;
  private readonly config: SearchConfig;
  private readonly logger: Logger;

  constructor(search: SearchConfig, options?: { logger?: Logger }) {
    this.config = search;
    this.logger = options?.logger ?? noopLogger;
  }

  private mutate(apply: (index: BM25Index) => void): void {
    apply(this.snapshot);
    this.pending?.push(apply);
  }

  upsert(meta: ToolMetadata): void {
    this.mutate(index => index.upsert(meta));
  }

  upsertMany(entries: ToolMetadata[]): void {
    this.mutate(index => index.addMany(entries));
  }

  /**
   * Remove every document belonging to a server
   */
  removeServer(serverName: string): number {
    let removed = 0;
    this.mutate(index => {
      removed = index.removeByPrefix(`${serverName}${SEP}`).length;
    });
    return removed;
  }

  remove(name: NamespacedName): boolean {
    let removed = false;
    this.mutate(index => {
      removed = index.remove(name);
    });
    return removed;
  }

  /**
   * Replace the whole index from a metadata list.
   * Entries that fail validation are skipped and reported.
   */
  async rebuild(entries: unknown[], chunkSize: number = 50): Promise<RebuildReport> {
    const startTime = performance.now();
    const generation = ++this.generation;
    const valid: ToolMetadata[] = [];
    const skipped: RebuildReport["skipped"] = [];

    entries.forEach((entry, index) => {
      const result = ToolMetadataSchema.safeParse(entry);
      if (result.success) {
        valid.push(result.data);
      } else {
        const reason = result.error.issues.map(issue => issue.message).join(", ");
        skipped.push({ index, reason });
        this.logger.warn(`Skipping malformed metadata entry during rebuild`, { index, reason });
      }
    });

    const next = new BM25Index();
    const journal: Array<(index: BM25Index) => void> = [];
    this.pending = journal;

    try {
      await next.addManyAsync(valid, chunkSize);
    } finally {
      if (this.pending === journal) {
        this.pending = null;
      }
    }

    // A newer rebuild started meanwhile and will swap in its own snapshot
    if (generation === this.generation) {
      for (const apply of journal) {
        apply(next);
      }
      this.snapshot = next;
    }

    return { indexed: valid.length, skipped, durationMs: performance.now() - startTime };
  }

  /**
   * Relevance-ranked search; maxResults is clamped to the configured bounds
   */
  searchBm25(query: string, maxResults?: number): SearchResult[] {
    return this.snapshot.search(query, clampMaxResults(maxResults, this.config));
  }

  /**
   * Pattern search; matches are ordered by name and truncated to the clamped count
   */
  searchRegex(pattern: string, maxResults?: number): SearchResult[] {
    const results = searchWithRegex(this.snapshot, pattern, this.config.maxPatternLength);
    return results.slice(0, clampMaxResults(maxResults, this.config));
  }

  has(name: NamespacedName): boolean {
    return this.snapshot.has(name);
  }

  get(name: NamespacedName): ToolMetadata | undefined {
    return this.snapshot.get(name);
  }

  names(): NamespacedName[] {
    return this.snapshot.names();
  }

  get size(): number {
    return this.snapshot.size;
  }

  getStats(): { docCount: number; termCount: number; avgDocLength: number } {
    return this.snapshot.getStats();
  }
}
