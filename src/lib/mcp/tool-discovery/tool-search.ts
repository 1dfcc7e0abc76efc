/**
 * MCP Tool Selector
 *
 * Narrows the full tool catalog to the tools most relevant to one utterance.
 * Vector scoring is preferred when configured; a tool without a vector, or a
 * query whose embedding fails, is scored lexically instead. Both paths share
 * the name bonus and the ordering rules, so callers cannot tell them apart.
 */

import type { ToolSelectionConfig } from '@/lib/config';
import type { EmbeddingProvider } from '@/lib/embeddings';
import { errorMessage } from '@/lib/errors';
import type { ToolDescriptor } from '../types';
import { RankingCache } from './ranking-cache';
import { VectorStrategy } from './tool-embeddings';
import { LexicalStrategy, tokenize, toolTokens } from './tool-lexical';
import type {
  IndexedTool,
  ScoringSource,
  ScoringStrategy,
  ToolScorer,
  ToolSearchResult,
  ToolSelectorStats,
} from './types';

const LOG_PREFIX = '[ToolSelector]';

/** Query contains the tool name, or the tool name contains the query */
export const NAME_MATCH_BONUS = 0.3;
/** Some query token occurs in the tool name */
export const PARTIAL_NAME_MATCH_BONUS = 0.1;

export interface ToolSelectorOptions extends ToolSelectionConfig {
  embeddings?: EmbeddingProvider;
  embeddingTimeoutMs?: number;
}

interface SelectorIndex {
  generation: number;
  entries: IndexedTool[];
  builtAt: Date | null;
}

/**
 * Fixed bonus for tools whose raw or qualified name matches the query
 */
export function nameMatchBonus(query: string, tool: ToolDescriptor): number {
  const q = query.toLowerCase().trim();
  if (q.length === 0) return 0;

  const names = [tool.rawName.toLowerCase(), tool.qualifiedName.toLowerCase()];
  if (names.some((name) => q.includes(name) || name.includes(q))) {
    return NAME_MATCH_BONUS;
  }

  const words = tokenize(query);
  if (names.some((name) => words.some((word) => name.includes(word)))) {
    return PARTIAL_NAME_MATCH_BONUS;
  }

  return 0;
}

export class ToolSelector {
  readonly topK: number;
  readonly mode: ScoringSource;

  private readonly primary: ScoringStrategy;
  private readonly lexical = new LexicalStrategy();
  private readonly cache: RankingCache;
  private index: SelectorIndex = { generation: 0, entries: [], builtAt: null };
  private buildGeneration = 0;
  private degradedSearches = 0;

  constructor(options: ToolSelectorOptions) {
    this.topK = options.topK;
    this.cache = new RankingCache(options.cacheSize);

    if (options.mode === 'vector' && options.embeddings) {
      this.mode = 'vector';
      this.primary = new VectorStrategy(options.embeddings, options.embeddingTimeoutMs ?? 10_000);
    } else {
      if (options.mode === 'vector') {
        console.warn(`${LOG_PREFIX} Vector mode requested without an embedding provider, using lexical`);
      }
      this.mode = 'lexical';
      this.primary = this.lexical;
    }
  }

  /**
   * Index the catalog. Tools are embedded concurrently; the finished index
   * replaces the old one in a single assignment and empties the cache. A build
   * overtaken by a newer one is discarded.
   */
  async buildIndex(tools: ToolDescriptor[]): Promise<void> {
    const generation = ++this.buildGeneration;
    const startTime = Date.now();

    const entries = await Promise.all(
      tools.map(async (tool): Promise<IndexedTool> => ({
        tool,
        embedding: await this.primary.indexTool(tool),
        tokens: toolTokens(tool),
      }))
    );

    if (generation !== this.buildGeneration) {
      console.log(`${LOG_PREFIX} Discarding stale index build ${generation}`);
      return;
    }

    this.index = { generation, entries, builtAt: new Date() };
    this.cache.clear();

    const vectors = entries.filter((entry) => entry.embedding !== null).length;
    console.log(
      `${LOG_PREFIX} Indexed ${entries.length} tools in ${Date.now() - startTime}ms ` +
        `(${this.mode}${this.mode === 'vector' ? `, ${vectors} vectors` : ''})`
    );
  }

  /**
   * Top-K tools for a query, most relevant first
   */
  async search(query: string): Promise<ToolDescriptor[]> {
    const results = await this.searchWithScores(query);
    return results.map((result) => result.tool);
  }

  async searchWithScores(query: string): Promise<ToolSearchResult[]> {
    const cached = this.cache.get(query);
    if (cached) {
      return cached;
    }

    // Pin the index for the whole call; a rebuild swaps in a new object
    const index = this.index;
    if (index.entries.length === 0) {
      return [];
    }

    const { scorer, source } = await this.scorerFor(query);
    const lexicalScorer = this.lexical.scorer(query);

    const scored = index.entries.map((entry): ToolSearchResult => {
      const primaryScore = scorer(entry);
      const base = primaryScore ?? lexicalScorer(entry) ?? 0;
      return {
        tool: entry.tool,
        score: base + nameMatchBonus(query, entry.tool),
        source: primaryScore === null ? 'lexical' : source,
      };
    });

    // Array.prototype.sort is stable, so ties keep catalog order
    scored.sort((a, b) => b.score - a.score);
    const results = scored.slice(0, this.topK);

    if (index === this.index) {
      this.cache.set(query, results);
    }

    if (results.length > 0) {
      console.log(
        `${LOG_PREFIX} "${query.substring(0, 50)}" → ${results
          .map((result) => `${result.tool.qualifiedName}(${result.score.toFixed(3)})`)
          .join(', ')}`
      );
    }

    return results;
  }

  clearCache(): void {
    this.cache.clear();
    console.log(`${LOG_PREFIX} Ranking cache cleared`);
  }

  getIndexedTools(): ToolDescriptor[] {
    return this.index.entries.map((entry) => entry.tool);
  }

  getStats(): ToolSelectorStats {
    const cacheStats = this.cache.getStats();
    return {
      mode: this.mode,
      topK: this.topK,
      totalTools: this.index.entries.length,
      vectorIndexedTools: this.index.entries.filter((entry) => entry.embedding !== null).length,
      cachedQueries: cacheStats.size,
      cacheCapacity: cacheStats.maxSize,
      cacheHits: cacheStats.hits,
      cacheMisses: cacheStats.misses,
      degradedSearches: this.degradedSearches,
      lastIndexedAt: this.index.builtAt,
    };
  }

  /**
   * Scorer of the preferred strategy, or the lexical one when it cannot serve
   */
  private async scorerFor(query: string): Promise<{ scorer: ToolScorer; source: ScoringSource }> {
    if (this.primary === this.lexical) {
      return { scorer: this.lexical.scorer(query), source: 'lexical' };
    }

    try {
      return { scorer: await this.primary.forQuery(query), source: this.primary.kind };
    } catch (error) {
      this.degradedSearches++;
      console.warn(`${LOG_PREFIX} Query embedding failed, ranking lexically: ${errorMessage(error)}`);
      return { scorer: this.lexical.scorer(query), source: 'lexical' };
    }
  }
}
