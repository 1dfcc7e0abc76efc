/**
 * Tool Host Agent
 *
 * Drives one utterance at a time through
 * idle → selecting → composing → awaiting_model → (executing_tool → awaiting_model)* → responding → idle.
 * Tool failures are fed back to the model as tool results; only a failed
 * model call ends the utterance early.
 */

import type { LanguageModel, ModelReply, ToolSchema } from '@/lib/ai/client';
import { ConversationWindow } from '@/lib/chat/session';
import type { ConversationStats, ToolCallRequest } from '@/lib/chat/session';
import { PromptComposer } from '@/lib/chat/prompt-composer';
import type { PromptComposerStats } from '@/lib/chat/prompt-composer';
import type { AgentConfig } from '@/lib/config';
import { SerialQueue, retry, withTimeout } from '@/lib/concurrency';
import { errorMessage, toAgentError } from '@/lib/errors';
import { MCPClientManager } from '@/lib/mcp/client';
import { ToolSelector } from '@/lib/mcp/tool-discovery';
import type { ToolSelectorStats } from '@/lib/mcp/tool-discovery';
import type { MCPClientStats, RegistrationResult, ToolDescriptor } from '@/lib/mcp/types';
import type { AgentState, AgentStats, ChatResult, ToolHostAgentDeps } from './types';

const LOG_PREFIX = '[ToolHostAgent]';

/** Reply used when the tool-round limit hits before the model produced any text */
export const ROUND_LIMIT_REPLY = 'Sorry, I could not finish that request with the available tools.';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Model-produced argument JSON as an object; null when it is not one
 */
export function parseToolArguments(raw: string): Record<string, unknown> | null {
  if (raw.trim() === '') return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

export function toToolSchema(tool: ToolDescriptor): ToolSchema {
  return {
    name: tool.qualifiedName,
    description: tool.description,
    parameters: tool.inputSchema,
  };
}

export class ToolHostAgent {
  readonly router: MCPClientManager;
  readonly selector: ToolSelector;
  readonly context: ConversationWindow;
  readonly prompts: PromptComposer;

  private readonly model: LanguageModel;
  private readonly utterances = new SerialQueue();
  private lifetime = new AbortController();
  private unsubscribeCatalog: (() => void) | null = null;
  private state: AgentState = 'idle';
  private started = false;
  private stats = {
    totalTurns: 0,
    totalToolCalls: 0,
    totalErrors: 0,
    toolRoundLimitHits: 0,
  };

  constructor(
    private readonly config: AgentConfig,
    deps: ToolHostAgentDeps
  ) {
    this.model = deps.model;
    this.router = new MCPClientManager({
      callTimeoutMs: config.agent.callTimeoutMs,
      handshakeTimeoutMs: config.agent.handshakeTimeoutMs,
      closeTimeoutMs: config.agent.closeTimeoutMs,
      adapterFactory: deps.adapterFactory,
    });
    this.selector = new ToolSelector({
      ...config.toolSelection,
      embeddings: deps.embeddings,
      embeddingTimeoutMs: config.embedding.timeoutMs,
    });
    this.context = new ConversationWindow({ ...config.context, summarizer: deps.summarizer });
    this.prompts = new PromptComposer(config.systemPrompt);
  }

  /**
   * Register every configured server in parallel, index their tools and
   * collect their prompts. Failed servers are reported, not thrown.
   */
  async start(): Promise<RegistrationResult[]> {
    if (this.lifetime.signal.aborted) {
      this.lifetime = new AbortController();
    }

    const results = await this.router.registerAll(this.config.servers);
    await this.reindex();

    this.unsubscribeCatalog?.();
    this.unsubscribeCatalog = this.router.onCatalogChange(() => {
      this.reindex().catch((error: unknown) => {
        console.error(`${LOG_PREFIX} Re-index after catalog change failed:`, error);
      });
    });

    this.started = true;
    const connected = results.filter((result) => result.ok).length;
    console.log(
      `${LOG_PREFIX} Started with ${connected}/${results.length} servers, ` +
        `${this.selector.getStats().totalTools} tools, ${this.prompts.getAllPromptNames().length} prompts`
    );
    return results;
  }

  /**
   * Rebuild the tool index and prompt listing from the router's current catalog
   */
  async reindex(): Promise<void> {
    await this.selector.buildIndex(this.router.listAllTools());
    this.prompts.setServerPrompts(this.router.listAllPrompts());
  }

  async shutdown(): Promise<void> {
    console.log(`${LOG_PREFIX} Shutting down`);
    this.lifetime.abort();
    this.unsubscribeCatalog?.();
    this.unsubscribeCatalog = null;
    await this.router.shutdown();
    this.started = false;
  }

  /**
   * Reply text, or a tagged failure string such as "[TIMEOUT] Model call timed out after 60000ms"
   */
  async chat(text: string): Promise<string> {
    const result = await this.chatDetailed(text);
    return result.ok ? result.reply : result.error.toTaggedString();
  }

  chatDetailed(text: string): Promise<ChatResult> {
    return this.utterances.run(() => this.processUtterance(text));
  }

  async loadPrompt(name: string, args: Record<string, string> = {}): Promise<string | null> {
    return this.prompts.loadPrompt(name, args, this.router);
  }

  clearContext(keepSystem = true): void {
    this.context.clear(keepSystem);
  }

  getState(): AgentState {
    return this.state;
  }

  getContextStats(): ConversationStats {
    return this.context.getStats();
  }

  getToolStats(): ToolSelectorStats {
    return this.selector.getStats();
  }

  getServerStats(): MCPClientStats {
    return this.router.getStats();
  }

  getPromptStats(): PromptComposerStats {
    return this.prompts.getStats();
  }

  getAgentStats(): AgentStats {
    return {
      state: this.state,
      started: this.started,
      ...this.stats,
      pendingUtterances: this.utterances.size,
    };
  }

  private setState(next: AgentState): void {
    this.state = next;
  }

  private async processUtterance(text: string): Promise<ChatResult> {
    this.stats.totalTurns++;
    let toolCalls = 0;
    let rounds = 0;
    let lastText = '';

    try {
      this.setState('selecting');
      await this.context.addMessage({ role: 'user', content: text });
      const selected = await this.selector.search(text);

      this.setState('composing');
      const systemPrompt = this.prompts.getEffectivePrompt();
      const tools = selected.slice(0, this.config.toolSelection.topK).map(toToolSchema);

      for (;;) {
        this.setState('awaiting_model');
        const reply = await this.completeWithTimeout(systemPrompt, tools);

        if (reply.type === 'text') {
          return await this.respond(reply.text, toolCalls, rounds, false);
        }

        if (reply.text) {
          lastText = reply.text;
        }

        if (rounds >= this.config.agent.maxToolRounds) {
          this.stats.totalErrors++;
          this.stats.toolRoundLimitHits++;
          console.warn(
            `${LOG_PREFIX} Tool round limit (${this.config.agent.maxToolRounds}) reached, answering with last model text`
          );
          return await this.respond(lastText || ROUND_LIMIT_REPLY, toolCalls, rounds, true);
        }

        rounds++;
        this.setState('executing_tool');
        await this.context.addMessage({ role: 'assistant', content: reply.text ?? '', toolCalls: reply.toolCalls });

        const results = await Promise.all(reply.toolCalls.map((call) => this.executeToolCall(call)));
        for (const [index, call] of reply.toolCalls.entries()) {
          await this.context.addMessage({ role: 'tool', toolCallId: call.id, content: results[index] });
        }
        toolCalls += reply.toolCalls.length;
        this.stats.totalToolCalls += reply.toolCalls.length;
      }
    } catch (error) {
      const agentError = toAgentError(error, 'CAPABILITY_ERROR');
      this.stats.totalErrors++;
      console.error(`${LOG_PREFIX} Utterance failed: ${agentError.toTaggedString()}`);
      return { ok: false, error: agentError };
    } finally {
      this.setState('idle');
    }
  }

  private async completeWithTimeout(systemPrompt: string, tools: ToolSchema[]): Promise<ModelReply> {
    const controller = new AbortController();
    const onShutdown = () => controller.abort();
    this.lifetime.signal.addEventListener('abort', onShutdown, { once: true });

    try {
      return await withTimeout(
        this.model.complete({ systemPrompt, messages: this.context.getMessages(), tools }, controller.signal),
        this.config.llm.timeoutMs,
        'Model call',
        { signal: this.lifetime.signal }
      );
    } finally {
      this.lifetime.signal.removeEventListener('abort', onShutdown);
      controller.abort();
    }
  }

  private async respond(reply: string, toolCalls: number, rounds: number, roundLimitHit: boolean): Promise<ChatResult> {
    this.setState('responding');
    await this.context.addMessage({ role: 'assistant', content: reply });
    return { ok: true, reply, toolCalls, rounds, roundLimitHit };
  }

  /**
   * Tool-result content for one call. Never throws.
   */
  private async executeToolCall(call: ToolCallRequest): Promise<string> {
    const args = parseToolArguments(call.arguments);
    if (!args) {
      console.warn(`${LOG_PREFIX} Malformed arguments for ${call.name}: ${call.arguments}`);
      return `Error calling ${call.name}: arguments must be a JSON object`;
    }

    const { retryBaseDelayMs, retryMaxDelayMs, toolRetries } = this.config.agent;
    try {
      const result = await retry(() => this.router.invoke(call.name, args), {
        retries: toolRetries,
        baseDelayMs: retryBaseDelayMs,
        maxDelayMs: retryMaxDelayMs,
        onRetry: (error, attempt, delayMs) => {
          console.warn(
            `${LOG_PREFIX} Retrying ${call.name} (attempt ${attempt}/${toolRetries}) in ${delayMs}ms: ${errorMessage(error)}`
          );
        },
      });

      if (result.isError) {
        console.warn(`${LOG_PREFIX} Tool ${call.name} reported an error: ${result.content}`);
      }
      return result.content;
    } catch (error) {
      const agentError = toAgentError(error, 'TRANSPORT_ERROR');
      console.error(`${LOG_PREFIX} Tool ${call.name} failed: ${agentError.toTaggedString()}`);
      return `Error calling ${call.name}: ${agentError.toTaggedString()}`;
    }
  }
}
