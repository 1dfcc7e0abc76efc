/**
 * Tool Host Agent Types
 */

import type { LanguageModel } from '@/lib/ai/client';
import type { Summarizer } from '@/lib/chat/session/types';
import type { EmbeddingProvider } from '@/lib/embeddings';
import type { AgentError } from '@/lib/errors';
import type { AdapterFactory } from '@/lib/mcp/adapter';

export type AgentState =
  | 'idle'
  | 'selecting'
  | 'composing'
  | 'awaiting_model'
  | 'executing_tool'
  | 'responding';

/**
 * Capabilities the agent is built on. The CLI wires the OpenAI-backed ones;
 * tests pass fakes.
 */
export interface ToolHostAgentDeps {
  model: LanguageModel;
  summarizer?: Summarizer;
  embeddings?: EmbeddingProvider;
  adapterFactory?: AdapterFactory;
}

export type ChatResult =
  | {
      ok: true;
      reply: string;
      /** Tool calls executed for this utterance */
      toolCalls: number;
      rounds: number;
      roundLimitHit: boolean;
    }
  | { ok: false; error: AgentError };

export interface AgentStats {
  state: AgentState;
  started: boolean;
  totalTurns: number;
  totalToolCalls: number;
  totalErrors: number;
  toolRoundLimitHits: number;
  pendingUtterances: number;
}
