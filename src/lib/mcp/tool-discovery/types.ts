/**
 * MCP Tool Discovery Types
 *
 * Types for relevance-based tool selection.
 */

import type { ToolDescriptor } from '../types';

export type ScoringSource = 'vector' | 'lexical';

/**
 * Search result with relevance score
 */
export interface ToolSearchResult {
  tool: ToolDescriptor;
  /** Strategy score plus name bonus */
  score: number;
  source: ScoringSource;
}

/**
 * One tool in the selector index
 */
export interface IndexedTool {
  tool: ToolDescriptor;
  /** Null when embedding failed or the selector runs lexical only */
  embedding: number[] | null;
  /** Lexical tokens of the readable name and description */
  tokens: Set<string>;
}

/**
 * Scores one indexed tool for the current query.
 * Null means this strategy cannot score the tool and the lexical score applies.
 */
export type ToolScorer = (entry: IndexedTool) => number | null;

/**
 * Scoring strategy. The selector prefers the configured one and degrades to
 * lexical scoring per tool (no vector) or per query (query embedding failed).
 */
export interface ScoringStrategy {
  readonly kind: ScoringSource;
  /** Index data for one tool; resolves null instead of throwing */
  indexTool(tool: ToolDescriptor): Promise<number[] | null>;
  /** Prepare a scorer for one query; rejects when the strategy cannot serve it */
  forQuery(query: string): Promise<ToolScorer>;
}

export interface ToolSelectorStats {
  mode: ScoringSource;
  topK: number;
  totalTools: number;
  vectorIndexedTools: number;
  cachedQueries: number;
  cacheCapacity: number;
  cacheHits: number;
  cacheMisses: number;
  degradedSearches: number;
  lastIndexedAt: Date | null;
}
