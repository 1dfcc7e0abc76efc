/**
 * Agent Configuration Schema
 *
 * One validated configuration object is built at startup and handed to each
 * component's constructor. Nothing reads configuration from module scope.
 */

import { z } from 'zod';

const headersSchema = z.record(z.string()).default({});

export const stdioServerSchema = z.object({
  transport: z.literal('stdio'),
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  cwd: z.string().optional(),
});

export const sseServerSchema = z.object({
  transport: z.literal('sse'),
  url: z.string().url(),
  headers: headersSchema,
});

export const httpServerSchema = z.object({
  transport: z.literal('http'),
  url: z.string().url(),
  headers: headersSchema,
});

/**
 * Transport configuration, resolved once at registration time.
 * stdio is the pipe variant; sse and http are the stream variants.
 */
export const serverConfigSchema = z.discriminatedUnion('transport', [
  stdioServerSchema,
  sseServerSchema,
  httpServerSchema,
]);

/** Server names are used as qualified-name prefixes, so they may not contain ':' */
export const serverNameSchema = z
  .string()
  .min(1)
  .regex(/^[^:\s]+$/, 'server name must not contain ":" or whitespace');

export const llmConfigSchema = z.object({
  model: z.string().min(1),
  apiKey: z.string().default(''),
  baseURL: z.string().url().optional(),
  temperature: z.number().min(0).max(2).default(0.7),
  maxTokens: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().default(60_000),
});

export const embeddingConfigSchema = z.object({
  model: z.string().default('text-embedding-3-small'),
  apiKey: z.string().default(''),
  baseURL: z.string().url().optional(),
  dimensions: z.number().int().positive().optional(),
  timeoutMs: z.number().int().positive().default(10_000),
});

export const toolSelectionConfigSchema = z.object({
  mode: z.enum(['vector', 'lexical']).default('vector'),
  topK: z.number().int().positive().default(3),
  cacheSize: z.number().int().positive().default(100),
});

export const DEFAULT_SUMMARY_PROMPT =
  'Summarize the following conversation history concisely. Keep names, facts, decisions and open requests. ' +
  'Use at most {max_tokens} tokens.';

export const contextConfigSchema = z.object({
  maxTurns: z.number().int().positive().default(3),
  maxAgeSeconds: z.number().positive().default(1800),
  enableSummarization: z.boolean().default(false),
  summaryRole: z.enum(['user', 'assistant', 'system']).default('user'),
  maxSummaryTokens: z.number().int().positive().default(200),
  summaryPrompt: z.string().min(1).default(DEFAULT_SUMMARY_PROMPT),
  summaryTimeoutMs: z.number().int().positive().default(30_000),
});

export const agentLoopConfigSchema = z.object({
  maxToolRounds: z.number().int().positive().default(5),
  toolRetries: z.number().int().min(0).default(2),
  retryBaseDelayMs: z.number().int().min(0).default(250),
  retryMaxDelayMs: z.number().int().positive().default(4_000),
  callTimeoutMs: z.number().int().positive().default(30_000),
  handshakeTimeoutMs: z.number().int().positive().default(15_000),
  closeTimeoutMs: z.number().int().positive().default(5_000),
});

export const agentConfigSchema = z.object({
  systemPrompt: z.string().default('You are a helpful voice assistant. Keep answers short.'),
  llm: llmConfigSchema,
  embedding: embeddingConfigSchema.default({}),
  toolSelection: toolSelectionConfigSchema.default({}),
  context: contextConfigSchema.default({}),
  agent: agentLoopConfigSchema.default({}),
  servers: z.record(serverNameSchema, serverConfigSchema).default({}),
});

export type StdioServerConfig = z.infer<typeof stdioServerSchema>;
export type SseServerConfig = z.infer<typeof sseServerSchema>;
export type HttpServerConfig = z.infer<typeof httpServerSchema>;
export type ServerConfig = z.infer<typeof serverConfigSchema>;
export type ServerConfigInput = z.input<typeof serverConfigSchema>;
export type LLMConfig = z.infer<typeof llmConfigSchema>;
export type EmbeddingConfig = z.infer<typeof embeddingConfigSchema>;
export type ToolSelectionConfig = z.infer<typeof toolSelectionConfigSchema>;
export type ContextConfig = z.infer<typeof contextConfigSchema>;
export type AgentLoopConfig = z.infer<typeof agentLoopConfigSchema>;
export type AgentConfig = z.infer<typeof agentConfigSchema>;
export type AgentConfigInput = z.input<typeof agentConfigSchema>;
