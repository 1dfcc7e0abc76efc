/**
 * Embeddings Service
 *
 * Generates vector embeddings through an OpenAI-compatible embeddings API.
 * Used by the tool selector to rank tools against user utterances.
 */

import OpenAI from 'openai';
import type { EmbeddingConfig } from '@/lib/config';
import { AgentError, toAgentError } from '@/lib/errors';

/**
 * Embedding capability consumed by the tool selector
 */
export interface EmbeddingProvider {
  /** Fixed vector length, when known up front */
  readonly dimensions?: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export class EmbeddingService implements EmbeddingProvider {
  readonly dimensions?: number;
  private openai: OpenAI;
  private model: string;

  constructor(config: EmbeddingConfig, client?: OpenAI) {
    this.model = config.model;
    this.dimensions = config.dimensions;
    this.openai =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });

    if (!config.apiKey && !client) {
      console.warn('[Embeddings] No embedding API key configured; vector tool selection will fall back to lexical');
    }
  }

  /**
   * Generate embedding for a single text
   */
  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      const response = await this.openai.embeddings.create(
        {
          model: this.model,
          input: text,
          dimensions: this.dimensions,
          encoding_format: 'float',
        },
        { signal }
      );

      const embedding = response.data[0]?.embedding;
      if (!embedding || embedding.length === 0) {
        throw new AgentError({ code: 'CAPABILITY_ERROR', message: 'Embedding API returned no vector' });
      }
      return embedding;
    } catch (error) {
      console.error('[Embeddings] Error generating embedding:', error);
      throw toAgentError(error, 'CAPABILITY_ERROR');
    }
  }
}
