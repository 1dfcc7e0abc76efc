/**
 * MCP Tool Lexical Strategy
 *
 * Token-overlap scoring used when vectors are unavailable. Needs no external
 * capability, so it can always serve a query.
 */

import type { ToolDescriptor } from '../types';
import type { ScoringStrategy, ToolScorer } from './types';
import { readableToolName } from './tool-embeddings';

const STOP_WORDS = new Set([
  'the', 'a', 'an', 'and', 'or', 'but', 'in', 'on', 'at', 'to', 'for', 'of', 'with', 'by',
]);

/**
 * Lower-cased words with punctuation removed and stop words dropped
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter((word) => word.length > 0 && !STOP_WORDS.has(word));
}

/**
 * Tokens a tool is matched on: its readable raw name and its description
 */
export function toolTokens(tool: ToolDescriptor): Set<string> {
  return new Set(tokenize(`${readableToolName(tool.rawName)} ${tool.description}`));
}

/**
 * Share of unique query tokens that also occur in the tool's tokens
 */
export function tokenOverlap(queryTokens: ReadonlySet<string>, tokens: ReadonlySet<string>): number {
  if (queryTokens.size === 0) return 0;

  let shared = 0;
  for (const token of queryTokens) {
    if (tokens.has(token)) shared++;
  }
  return shared / queryTokens.size;
}

export class LexicalStrategy implements ScoringStrategy {
  readonly kind = 'lexical' as const;

  async indexTool(): Promise<number[] | null> {
    return null;
  }

  async forQuery(query: string): Promise<ToolScorer> {
    return this.scorer(query);
  }

  /** Synchronous scorer; lexical scoring never fails */
  scorer(query: string): ToolScorer {
    const queryTokens = new Set(tokenize(query));
    return (entry) => tokenOverlap(queryTokens, entry.tokens);
  }
}
