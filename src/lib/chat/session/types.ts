/**
 * Conversation Window Types
 */

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * Tool call requested by the model on an assistant message
 */
export interface ToolCallRequest {
  id: string;
  /** Qualified tool name */
  name: string;
  /** JSON-encoded arguments as produced by the model */
  arguments: string;
}

export interface ChatMessage {
  role: MessageRole;
  content: string;
  /** Set on tool results: the call this message answers */
  toolCallId?: string;
  /** Set on assistant messages that request tool calls */
  toolCalls?: ToolCallRequest[];
  /** Milliseconds since epoch */
  timestamp: number;
  /** Synthetic message standing in for compacted turns */
  summary?: boolean;
}

/**
 * Message as handed to addMessage; timestamp defaults to now
 */
export type NewChatMessage = Omit<ChatMessage, 'timestamp'> & { timestamp?: number };

/**
 * Compaction capability (an LLM call in production)
 */
export interface Summarizer {
  summarize(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<string>;
}

export interface ConversationStats {
  totalMessages: number;
  pinnedMessages: number;
  userMessages: number;
  assistantMessages: number;
  toolMessages: number;
  summaryMessages: number;
  turns: number;
  maxTurns: number;
  maxAgeSeconds: number;
  contextAgeSeconds: number;
  summarizationEnabled: boolean;
  summariesCreated: number;
  summaryFallbacks: number;
  evictedTurns: number;
  expiredTurns: number;
}
