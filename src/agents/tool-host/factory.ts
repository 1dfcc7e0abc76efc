/**
 * Wires a ToolHostAgent to the OpenAI-compatible capabilities named in the config
 */

import { AIClient } from '@/lib/ai/client';
import type { AgentConfig } from '@/lib/config';
import { EmbeddingService } from '@/lib/embeddings';
import { ToolHostAgent } from './agent';

export function createToolHostAgent(config: AgentConfig): ToolHostAgent {
  const llm = new AIClient(config.llm);
  const embeddings =
    config.toolSelection.mode === 'vector' ? new EmbeddingService(config.embedding) : undefined;

  return new ToolHostAgent(config, {
    model: llm,
    summarizer: config.context.enableSummarization ? llm : undefined,
    embeddings,
  });
}
