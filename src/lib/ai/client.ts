/**
 * AI Client
 *
 * Language-model capability over an OpenAI-compatible chat completions API
 * (OpenAI, OpenRouter, SiliconFlow, a local server, ...). Serves the agent
 * loop (complete) and conversation compaction (summarize).
 */

import OpenAI from 'openai';
import type { LLMConfig } from '@/lib/config';
import { AgentError, toAgentError } from '@/lib/errors';
import type { ChatMessage, Summarizer, ToolCallRequest } from '@/lib/chat/session/types';

const LOG_PREFIX = '[AIClient]';

/**
 * Tool definition sent to the model
 */
export interface ToolSchema {
  /** Qualified tool name */
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface CompletionRequest {
  systemPrompt: string;
  messages: ChatMessage[];
  tools: ToolSchema[];
}

export type ModelReply =
  | { type: 'text'; text: string }
  | { type: 'tool_calls'; toolCalls: ToolCallRequest[]; text?: string };

/**
 * Language-model capability consumed by the agent loop
 */
export interface LanguageModel {
  complete(request: CompletionRequest, signal?: AbortSignal): Promise<ModelReply>;
}

type ApiMessage = OpenAI.Chat.ChatCompletionMessageParam;
type ApiTool = OpenAI.Chat.ChatCompletionTool;

const FUNCTION_NAME_MAX_LENGTH = 64;

/**
 * Function names may only hold [a-zA-Z0-9_-], so qualified names such as
 * `weather:forecast` are sent as `weather__forecast`.
 */
export function toFunctionName(qualifiedName: string): string {
  return qualifiedName.replace(/:/g, '__').replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, FUNCTION_NAME_MAX_LENGTH);
}

/**
 * Function names for one request, in both directions. Qualified names that
 * clean up to the same function name get `_2`, `_3`, ... suffixes in order.
 */
export interface FunctionNameTable {
  toFunction: Map<string, string>;
  fromFunction: Map<string, string>;
}

export function assignFunctionNames(qualifiedNames: string[]): FunctionNameTable {
  const table: FunctionNameTable = { toFunction: new Map(), fromFunction: new Map() };

  for (const qualifiedName of qualifiedNames) {
    if (table.toFunction.has(qualifiedName)) continue;

    const base = toFunctionName(qualifiedName);
    let name = base;
    for (let n = 2; table.fromFunction.has(name); n++) {
      const suffix = `_${n}`;
      name = base.slice(0, FUNCTION_NAME_MAX_LENGTH - suffix.length) + suffix;
    }

    table.toFunction.set(qualifiedName, name);
    table.fromFunction.set(name, qualifiedName);
  }

  return table;
}

export function toApiMessages(
  systemPrompt: string,
  messages: ChatMessage[],
  functionNames?: FunctionNameTable
): ApiMessage[] {
  const apiMessages: ApiMessage[] = [];
  if (systemPrompt) {
    apiMessages.push({ role: 'system', content: systemPrompt });
  }

  for (const message of messages) {
    switch (message.role) {
      case 'system':
        apiMessages.push({ role: 'system', content: message.content });
        break;
      case 'user':
        apiMessages.push({ role: 'user', content: message.content });
        break;
      case 'assistant':
        if (message.toolCalls && message.toolCalls.length > 0) {
          apiMessages.push({
            role: 'assistant',
            content: message.content || null,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: {
                name: functionNames?.toFunction.get(call.name) ?? toFunctionName(call.name),
                arguments: call.arguments,
              },
            })),
          });
        } else {
          apiMessages.push({ role: 'assistant', content: message.content });
        }
        break;
      case 'tool':
        if (message.toolCallId) {
          apiMessages.push({ role: 'tool', tool_call_id: message.toolCallId, content: message.content });
        }
        break;
    }
  }

  return apiMessages;
}

export class AIClient implements LanguageModel, Summarizer {
  private openai: OpenAI;

  constructor(
    private readonly config: LLMConfig,
    client?: OpenAI
  ) {
    this.openai =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseURL,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  async complete(request: CompletionRequest, signal?: AbortSignal): Promise<ModelReply> {
    const functionNames = assignFunctionNames(request.tools.map((tool) => tool.name));
    const tools: ApiTool[] = request.tools.map((tool) => ({
      type: 'function',
      function: {
        name: functionNames.toFunction.get(tool.name) ?? toFunctionName(tool.name),
        description: tool.description,
        parameters: tool.parameters,
      },
    }));

    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.config.model,
          messages: toApiMessages(request.systemPrompt, request.messages, functionNames),
          tools: tools.length > 0 ? tools : undefined,
          temperature: this.config.temperature,
          max_tokens: this.config.maxTokens,
        },
        { signal }
      );

      const message = response.choices[0]?.message;
      if (!message) {
        throw new AgentError({ code: 'CAPABILITY_ERROR', message: 'Model returned no choices' });
      }

      const toolCalls = (message.tool_calls ?? []).map((call) => ({
        id: call.id,
        name: functionNames.fromFunction.get(call.function.name) ?? call.function.name,
        arguments: call.function.arguments,
      }));

      if (toolCalls.length > 0) {
        return { type: 'tool_calls', toolCalls, text: message.content ?? undefined };
      }
      return { type: 'text', text: message.content ?? '' };
    } catch (error) {
      console.error(`${LOG_PREFIX} Completion failed:`, error);
      throw toAgentError(error, 'CAPABILITY_ERROR');
    }
  }

  async summarize(prompt: string, maxTokens: number, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.openai.chat.completions.create(
        {
          model: this.config.model,
          messages: [{ role: 'user', content: prompt }],
          temperature: 0.3,
          max_tokens: maxTokens,
        },
        { signal }
      );
      return (response.choices[0]?.message.content ?? '').trim();
    } catch (error) {
      console.error(`${LOG_PREFIX} Summarization failed:`, error);
      throw toAgentError(error, 'CAPABILITY_ERROR');
    }
  }
}
