/**
 * MCP Tool Embedding Strategy
 *
 * Vector scoring for tool selection: each tool's enriched description is
 * embedded once at index time and compared to the query by cosine similarity.
 */

import type { EmbeddingProvider } from '@/lib/embeddings';
import { withTimeout } from '@/lib/concurrency';
import { errorMessage } from '@/lib/errors';
import type { ToolDescriptor } from '../types';
import type { ScoringStrategy, ToolScorer } from './types';

const LOG_PREFIX = '[ToolEmbeddings]';

/**
 * Tool name with spaces between camelCase / snake_case / kebab-case parts
 */
export function readableToolName(name: string): string {
  return name
    .replace(/([a-z0-9])([A-Z])/g, '$1 $2')
    .replace(/[_\-.]+/g, ' ')
    .toLowerCase()
    .trim();
}

/**
 * Enrich tool description by combining name, description, and input schema
 * Creates a comprehensive text representation for better semantic matching
 */
export function enrichToolDescription(tool: ToolDescriptor): string {
  const parts: string[] = [`Tool: ${readableToolName(tool.rawName)}`];

  if (tool.description) {
    parts.push(`Description: ${tool.description}`);
  }

  const properties = tool.inputSchema.properties;
  if (properties && typeof properties === 'object') {
    const paramParts: string[] = [];
    for (const [paramName, paramDef] of Object.entries(properties)) {
      if (paramDef && typeof paramDef === 'object') {
        const def: Record<string, unknown> = { ...paramDef };
        const desc = typeof def.description === 'string' ? `: ${def.description}` : '';
        const type = typeof def.type === 'string' ? ` (${def.type})` : '';
        paramParts.push(`${paramName}${type}${desc}`);
      }
    }
    if (paramParts.length > 0) {
      parts.push(`Parameters: ${paramParts.join(', ')}`);
    }
  }

  const required = tool.inputSchema.required;
  if (Array.isArray(required) && required.length > 0) {
    parts.push(`Required: ${required.join(', ')}`);
  }

  parts.push(`Server: ${tool.serverName}`);

  return parts.join('. ');
}

/**
 * Cosine similarity; 0 when either vector is all zeros or lengths differ
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class VectorStrategy implements ScoringStrategy {
  readonly kind = 'vector' as const;

  constructor(
    private readonly embeddings: EmbeddingProvider,
    private readonly timeoutMs: number
  ) {}

  async indexTool(tool: ToolDescriptor): Promise<number[] | null> {
    try {
      return await this.embedChecked(enrichToolDescription(tool), `Embedding tool ${tool.qualifiedName}`);
    } catch (error) {
      console.warn(
        `${LOG_PREFIX} No vector for ${tool.qualifiedName}, it will be ranked lexically: ${errorMessage(error)}`
      );
      return null;
    }
  }

  async forQuery(query: string): Promise<ToolScorer> {
    const queryVector = await this.embedChecked(query, 'Embedding query');
    return (entry) => (entry.embedding ? cosineSimilarity(queryVector, entry.embedding) : null);
  }

  private async embedChecked(text: string, label: string): Promise<number[]> {
    const controller = new AbortController();
    try {
      const vector = await withTimeout(this.embeddings.embed(text, controller.signal), this.timeoutMs, label);
      const expected = this.embeddings.dimensions;
      if (expected !== undefined && vector.length !== expected) {
        throw new Error(`expected ${expected} dimensions, got ${vector.length}`);
      }
      return vector;
    } finally {
      controller.abort();
    }
  }
}
