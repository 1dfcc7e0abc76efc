/**
 * Configuration Loader
 *
 * Validates raw configuration with the zod schema and builds the raw input
 * from environment variables for the CLI host.
 */

import { ZodError } from 'zod';
import { AgentError } from '@/lib/errors';
import {
  agentConfigSchema,
  serverConfigSchema,
  type AgentConfig,
  type ServerConfig,
} from './schema';

type Env = Record<string, string | undefined>;

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate a raw configuration object.
 * @throws AgentError CONFIG_ERROR listing every invalid path
 */
export function parseConfig(input: unknown): AgentConfig {
  const result = agentConfigSchema.safeParse(input);
  if (!result.success) {
    throw new AgentError({
      code: 'CONFIG_ERROR',
      message: `Invalid agent configuration: ${formatZodError(result.error)}`,
      cause: result.error,
    });
  }
  return result.data;
}

/**
 * Validate one server's transport configuration.
 * @throws AgentError CONFIG_ERROR tagged with the server name
 */
export function parseServerConfig(serverName: string, input: unknown): ServerConfig {
  const result = serverConfigSchema.safeParse(input);
  if (!result.success) {
    throw new AgentError({
      code: 'CONFIG_ERROR',
      message: `Invalid configuration for server ${serverName}: ${formatZodError(result.error)}`,
      serverName,
      cause: result.error,
    });
  }
  return result.data;
}

const PLACEHOLDER = /^\$\{([A-Za-z_][A-Za-z0-9_]*)(?::([^}]*))?\}$/;

/**
 * Replace `${VAR}` and `${VAR:default}` string values with environment values,
 * recursively. An unset variable without a default becomes an empty string.
 */
export function resolvePlaceholders(value: unknown, env: Env): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => resolvePlaceholders(item, env));
  }

  if (value !== null && typeof value === 'object') {
    const resolved: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      resolved[key] = resolvePlaceholders(item, env);
    }
    return resolved;
  }

  if (typeof value === 'string') {
    const match = PLACEHOLDER.exec(value);
    if (!match) return value;

    const [, name, fallback] = match;
    const fromEnv = env[name];
    if (fromEnv !== undefined) return fromEnv;
    if (fallback !== undefined) return fallback;

    console.warn(`[Config] Environment variable ${name} is not set and has no default, using ""`);
    return '';
  }

  return value;
}

function numberFrom(env: Env, key: string): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return undefined;
  const parsed = Number(raw);
  if (Number.isNaN(parsed)) {
    throw new AgentError({ code: 'CONFIG_ERROR', message: `${key} must be a number, got "${raw}"` });
  }
  return parsed;
}

function booleanFrom(env: Env, key: string): boolean | undefined {
  const raw = env[key]?.trim().toLowerCase();
  if (raw === undefined || raw === '') return undefined;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function serversFrom(env: Env): unknown {
  const raw = env.MCP_SERVERS;
  if (!raw || raw.trim() === '') return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new AgentError({
      code: 'CONFIG_ERROR',
      message: 'MCP_SERVERS must be a JSON object of server name to server config',
      cause: error,
    });
  }
  return resolvePlaceholders(parsed, env);
}

/** Drop undefined leaves so schema defaults apply */
function compact(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}

/**
 * Build and validate the agent configuration from environment variables.
 */
export function loadConfigFromEnv(env: Env = process.env): AgentConfig {
  const mode = env.TOOL_SELECTION_MODE;

  return parseConfig(
    compact({
      systemPrompt: env.SYSTEM_PROMPT,
      llm: compact({
        model: env.LLM_MODEL ?? 'gpt-4o-mini',
        apiKey: env.LLM_API_KEY,
        baseURL: env.LLM_BASE_URL,
        temperature: numberFrom(env, 'LLM_TEMPERATURE'),
        timeoutMs: numberFrom(env, 'LLM_TIMEOUT_MS'),
      }),
      embedding: compact({
        model: env.EMBEDDING_MODEL,
        apiKey: env.EMBEDDING_API_KEY ?? env.LLM_API_KEY,
        baseURL: env.EMBEDDING_BASE_URL,
        dimensions: numberFrom(env, 'EMBEDDING_DIMENSIONS'),
        timeoutMs: numberFrom(env, 'EMBEDDING_TIMEOUT_MS'),
      }),
      toolSelection: compact({
        mode,
        topK: numberFrom(env, 'TOOL_SELECTION_TOP_K'),
        cacheSize: numberFrom(env, 'TOOL_SELECTION_CACHE_SIZE'),
      }),
      context: compact({
        maxTurns: numberFrom(env, 'CONTEXT_MAX_TURNS'),
        maxAgeSeconds: numberFrom(env, 'CONTEXT_MAX_AGE_SECONDS'),
        enableSummarization: booleanFrom(env, 'CONTEXT_ENABLE_SUMMARIZATION'),
        summaryRole: env.CONTEXT_SUMMARY_ROLE,
        maxSummaryTokens: numberFrom(env, 'CONTEXT_MAX_SUMMARY_TOKENS'),
      }),
      agent: compact({
        maxToolRounds: numberFrom(env, 'AGENT_MAX_TOOL_ROUNDS'),
        toolRetries: numberFrom(env, 'AGENT_TOOL_RETRIES'),
        callTimeoutMs: numberFrom(env, 'AGENT_CALL_TIMEOUT_MS'),
        handshakeTimeoutMs: numberFrom(env, 'AGENT_HANDSHAKE_TIMEOUT_MS'),
      }),
      servers: serversFrom(env),
    })
  );
}
