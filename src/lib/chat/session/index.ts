/**
 * Chat Session Module
 *
 * Bounded conversation history with age expiry, turn eviction and compaction.
 */

export type {
  MessageRole,
  ToolCallRequest,
  ChatMessage,
  NewChatMessage,
  Summarizer,
  ConversationStats,
} from './types';

export {
  SUMMARY_PREFIX,
  FALLBACK_SEPARATOR,
  compressSpan,
  renderTranscript,
  buildSummaryPrompt,
  fallbackSummary,
  stripSummaryPrefix,
  type CompressionOptions,
  type CompressionResult,
} from './compression';

export {
  ConversationWindow,
  segmentMessages,
  type ConversationWindowOptions,
  type Segment,
} from './conversation-window';
