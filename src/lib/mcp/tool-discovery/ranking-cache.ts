/**
 * Ranking Cache
 *
 * Bounded query → ranking cache for the tool selector. Eviction is FIFO by
 * insertion: a hit does not refresh an entry's position.
 */

import type { ToolSearchResult } from './types';

interface RankingCacheEntry {
  query: string;
  results: ToolSearchResult[];
  insertedAt: number;
  hits: number;
}

export class RankingCache {
  private cache: Map<string, RankingCacheEntry> = new Map();
  private hits = 0;
  private misses = 0;

  constructor(private readonly maxSize: number = 100) {}

  /**
   * Cached ranking for the exact query string
   */
  get(query: string): ToolSearchResult[] | null {
    const entry = this.cache.get(query);
    if (!entry) {
      this.misses++;
      return null;
    }

    entry.hits++;
    this.hits++;
    return entry.results.map((result) => ({ ...result }));
  }

  set(query: string, results: ToolSearchResult[]): void {
    // Re-inserting a query moves it to the back of the insertion order
    this.cache.delete(query);

    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(query, {
      query,
      results: results.map((result) => ({ ...result })),
      insertedAt: Date.now(),
      hits: 0,
    });
  }

  clear(): void {
    this.cache.clear();
  }

  /** Queries in insertion order, oldest first */
  keys(): string[] {
    return [...this.cache.keys()];
  }

  getStats(): { size: number; maxSize: number; hits: number; misses: number } {
    return { size: this.cache.size, maxSize: this.maxSize, hits: this.hits, misses: this.misses };
  }
}
