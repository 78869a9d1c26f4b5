import type { NamespacedName, SearchResult, ToolMetadata } from "../catalog/types";
import { buildSearchableText } from "../catalog/catalog";

/**
 * Tokenizer for BM25
 * Splits camelCase, lowercases, and splits on anything that is not a letter or digit
 */
export function tokenize(text: string): string[] {
  return text
    .replace(/([\p{Ll}\p{N}])(\p{Lu})/gu, "$1 $2")
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 0);
}

/**
 * Yield to the event loop - allows other async work to proceed
 */
function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

type IndexedDocument = {
  meta: ToolMetadata;
  text: string;
  termFreqs: Map<string, number>;
  length: number;
};

/**
 * Order used for every result list: score descending, then namespaced name ascending
 */
export function compareResults(
  a: { namespacedName: string; score: number },
  b: { namespacedName: string; score: number }
): number {
  if (Math.abs(a.score - b.score) < 1e-9) {
    return a.namespacedName < b.namespacedName ? -1 : a.namespacedName > b.namespacedName ? 1 : 0;
  }
  return b.score - a.score;
}

/**
 * BM25 search implementation with incremental indexing support
 * Using standard BM25 parameters: k1=1.2, b=0.75
 */
export class BM25Index {
  private documents: Map<NamespacedName, IndexedDocument>;
  private docFreqs: Map<string, number>;  // Document frequency for each term
  private avgDocLength: number = 0;
  private totalTokens: number = 0;

  private readonly k1: number = 1.2;
  private readonly b: number = 0.75;

  constructor() {
    this.documents = new Map();
    this.docFreqs = new Map();
  }

  /**
   * Add or replace many documents
   */
  addMany(entries: ToolMetadata[]): void {
    for (const meta of entries) {
      this.upsertInternal(meta);
    }
    this.recalculateAvgDocLength();
  }

  /**
   * Add documents with async chunking, yielding between chunks
   *
   * @param chunkSize - Number of documents to process before yielding
   */
  async addManyAsync(entries: ToolMetadata[], chunkSize: number = 50): Promise<void> {
    for (let i = 0; i < entries.length; i += chunkSize) {
      for (const meta of entries.slice(i, i + chunkSize)) {
        this.upsertInternal(meta);
      }

      if (i + chunkSize < entries.length) {
        await yieldToEventLoop();
      }
    }
    this.recalculateAvgDocLength();
  }

  /**
   * Add a single document, replacing any previous version
   */
  upsert(meta: ToolMetadata): void {
    this.upsertInternal(meta);
    this.recalculateAvgDocLength();
  }

  private upsertInternal(meta: ToolMetadata): void {
    if (this.documents.has(meta.namespacedName)) {
      this.removeInternal(meta.namespacedName);
    }

    const text = buildSearchableText(meta);
    const tokens = tokenize(text);
    const termFreqs = new Map<string, number>();
    for (const token of tokens) {
      termFreqs.set(token, (termFreqs.get(token) ?? 0) + 1);
    }

    this.documents.set(meta.namespacedName, { meta, text, termFreqs, length: tokens.length });
    this.totalTokens += tokens.length;

    for (const token of termFreqs.keys()) {
      this.docFreqs.set(token, (this.docFreqs.get(token) ?? 0) + 1);
    }
  }

  /**
   * Remove a document from the index
   */
  remove(name: NamespacedName): boolean {
    const removed = this.removeInternal(name);
    if (removed) {
      this.recalculateAvgDocLength();
    }
    return removed;
  }

  /**
   * Remove every document whose name starts with the prefix
   */
  removeByPrefix(prefix: string): NamespacedName[] {
    const removed: NamespacedName[] = [];
    for (const name of Array.from(this.documents.keys())) {
      if (name.startsWith(prefix)) {
        this.removeInternal(name);
        removed.push(name);
      }
    }
    this.recalculateAvgDocLength();
    return removed;
  }

  private removeInternal(name: NamespacedName): boolean {
    const doc = this.documents.get(name);
    if (!doc) return false;

    for (const token of doc.termFreqs.keys()) {
      const freq = this.docFreqs.get(token) ?? 0;
      if (freq <= 1) {
        this.docFreqs.delete(token);
      } else {
        this.docFreqs.set(token, freq - 1);
      }
    }

    this.totalTokens -= doc.length;
    this.documents.delete(name);
    return true;
  }

  private recalculateAvgDocLength(): void {
    this.avgDocLength = this.documents.size === 0 ? 0 : this.totalTokens / this.documents.size;
  }

  /**
   * Search for tools matching a natural language query
   */
  search(query: string, limit: number): SearchResult[] {
    const queryTokens = tokenize(query);
    const totalDocs = this.documents.size;
    if (queryTokens.length === 0 || totalDocs === 0 || limit <= 0) {
      return [];
    }

    const scored: Array<{ namespacedName: NamespacedName; score: number; doc: IndexedDocument }> = [];

    for (const [namespacedName, doc] of this.documents) {
      let score = 0;

      for (const token of queryTokens) {
        const df = this.docFreqs.get(token) ?? 0;
        if (df === 0) continue;

        const tf = doc.termFreqs.get(token) ?? 0;
        if (tf === 0) continue;

        const idf = Math.log((totalDocs - df + 0.5) / (df + 0.5) + 1);
        const numerator = tf * (this.k1 + 1);
        const denominator = tf + this.k1 * (1 - this.b + this.b * (doc.length / this.avgDocLength));
        score += idf * (numerator / denominator);
      }

      if (score > 0) {
        scored.push({ namespacedName, score, doc });
      }
    }

    return scored
      .sort(compareResults)
      .slice(0, limit)
      .map(({ doc, score }) => toSearchResult(doc.meta, score));
  }

  /**
   * Documents whose searchable text satisfies the predicate, ordered by name
   */
  filter(predicate: (text: string) => boolean): ToolMetadata[] {
    const matches: ToolMetadata[] = [];
    for (const doc of this.documents.values()) {
      if (predicate(doc.text)) {
        matches.push(doc.meta);
      }
    }
    return matches.sort((a, b) =>
      a.namespacedName < b.namespacedName ? -1 : a.namespacedName > b.namespacedName ? 1 : 0
    );
  }

  get(name: NamespacedName): ToolMetadata | undefined {
    return this.documents.get(name)?.meta;
  }

  clear(): void {
    this.documents.clear();
    this.docFreqs.clear();
    this.avgDocLength = 0;
    this.totalTokens = 0;
  }

  get size(): number {
    return this.documents.size;
  }

  has(name: NamespacedName): boolean {
    return this.documents.has(name);
  }

  names(): NamespacedName[] {
    return Array.from(this.documents.keys());
  }

  getStats(): { docCount: number; termCount: number; avgDocLength: number } {
    return {
      docCount: this.documents.size,
      termCount: this.docFreqs.size,
      avgDocLength: this.avgDocLength,
    };
  }
}

/**
 * Convert indexed metadata into a search hit
 */
export function toSearchResult(meta: ToolMetadata, score: number): SearchResult {
  return {
    tool: { server: meta.serverName, name: meta.toolName },
    namespacedName: meta.namespacedName,
    score,
    preview: meta.description,
    signature: `${meta.toolName}(${meta.argNames.join(", ")})`,
  };
}
