/**
 * MCP Tool Discovery Module
 *
 * Relevance-based tool selection. Reduces context overhead by sending the
 * model only the tools that match the current utterance.
 */

export * from './types';
export { enrichToolDescription, readableToolName, cosineSimilarity, VectorStrategy } from './tool-embeddings';
export { tokenize, toolTokens, tokenOverlap, LexicalStrategy } from './tool-lexical';
export { RankingCache } from './ranking-cache';
export {
  ToolSelector,
  nameMatchBonus,
  NAME_MATCH_BONUS,
  PARTIAL_NAME_MATCH_BONUS,
  type ToolSelectorOptions,
} from './tool-search';
