/**
 * Tool Endpoint Adapter
 *
 * Uniform interface to one MCP server over any transport, and the SDK-backed
 * implementation used in production. Timeouts are applied by the caller;
 * adapters only forward the abort signal.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { ServerConfig } from '@/lib/config';
import type { MCPTransport, PromptArgument, PromptDescriptor, RawTool, ToolCallResult } from './types';

const CLIENT_INFO = { name: 'tool-host-agent', version: '0.1.0' };

export type ServerPrompt = Omit<PromptDescriptor, 'serverName'>;

export interface ToolEndpointAdapter {
  readonly transport: MCPTransport;
  /** Transport allows only one in-flight request; the router serializes calls */
  readonly exclusive: boolean;
  connect(signal?: AbortSignal): Promise<void>;
  listTools(signal?: AbortSignal): Promise<RawTool[]>;
  listPrompts(signal?: AbortSignal): Promise<ServerPrompt[]>;
  callTool(name: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<ToolCallResult>;
  getPrompt(name: string, args: Record<string, string>, signal?: AbortSignal): Promise<string>;
  close(): Promise<void>;
  /** Called once if the transport closes without close() being requested */
  onClose(listener: () => void): void;
}

export type AdapterFactory = (serverName: string, config: ServerConfig) => ToolEndpointAdapter;

export type TransportFactory = (config: ServerConfig) => Transport;

/**
 * Build the SDK transport for a server config
 */
export function createTransport(config: ServerConfig): Transport {
  switch (config.transport) {
    case 'stdio':
      return new StdioClientTransport({
        command: config.command,
        args: config.args,
        env: { ...getDefaultEnvironment(), ...config.env },
        cwd: config.cwd,
      });
    case 'sse':
      return new SSEClientTransport(new URL(config.url), {
        requestInit: { headers: config.headers },
      });
    case 'http':
      return new StreamableHTTPClientTransport(new URL(config.url), {
        requestInit: { headers: config.headers },
      });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function contentItemToText(item: unknown): string {
  if (isRecord(item) && item.type === 'text' && typeof item.text === 'string') {
    return item.text;
  }
  return JSON.stringify(item);
}

/**
 * Flatten an MCP call result into text. Text parts are concatenated; images,
 * resources and structured parts are serialized as JSON.
 */
export function normalizeToolResult(result: unknown): ToolCallResult {
  if (!isRecord(result)) {
    return { content: JSON.stringify(result ?? null), isError: false };
  }

  const isError = result.isError === true;

  if (Array.isArray(result.content)) {
    const text = result.content.map(contentItemToText).join('');
    return { content: text.length > 0 ? text : 'OK', isError };
  }

  // Older servers answer with a bare toolResult
  if ('toolResult' in result) {
    const value = result.toolResult;
    return { content: typeof value === 'string' ? value : JSON.stringify(value), isError };
  }

  return { content: 'OK', isError };
}

function toPromptArguments(value: unknown): PromptArgument[] {
  if (!Array.isArray(value)) return [];
  return value.filter(isRecord).flatMap((arg) =>
    typeof arg.name === 'string'
      ? [
          {
            name: arg.name,
            description: typeof arg.description === 'string' ? arg.description : undefined,
            required: typeof arg.required === 'boolean' ? arg.required : undefined,
          },
        ]
      : []
  );
}

/**
 * Adapter over the official MCP SDK client
 */
export class SdkToolEndpointAdapter implements ToolEndpointAdapter {
  readonly transport: MCPTransport;
  readonly exclusive: boolean;

  private readonly client: Client;
  private closing = false;
  private closeListeners: Array<() => void> = [];

  constructor(
    private readonly serverName: string,
    private readonly config: ServerConfig,
    private readonly transportFactory: TransportFactory = createTransport
  ) {
    this.transport = config.transport;
    this.exclusive = config.transport === 'stdio';
    this.client = new Client(CLIENT_INFO, { capabilities: {} });
  }

  async connect(signal?: AbortSignal): Promise<void> {
    const transport = this.transportFactory(this.config);

    this.client.onclose = () => {
      if (this.closing) return;
      console.warn(`[MCP Adapter] Transport for ${this.serverName} closed unexpectedly`);
      for (const listener of this.closeListeners) listener();
    };

    await this.client.connect(transport, { signal });
  }

  async listTools(signal?: AbortSignal): Promise<RawTool[]> {
    if (!this.client.getServerCapabilities()?.tools) return [];

    const result = await this.client.listTools(undefined, { signal });
    return result.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: { ...tool.inputSchema },
    }));
  }

  async listPrompts(signal?: AbortSignal): Promise<ServerPrompt[]> {
    if (!this.client.getServerCapabilities()?.prompts) return [];

    const result = await this.client.listPrompts(undefined, { signal });
    return result.prompts.map((prompt) => ({
      name: prompt.name,
      description: prompt.description ?? '',
      arguments: toPromptArguments(prompt.arguments),
    }));
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    signal?: AbortSignal
  ): Promise<ToolCallResult> {
    const result: unknown = await this.client.callTool({ name, arguments: args }, undefined, { signal });
    return normalizeToolResult(result);
  }

  async getPrompt(name: string, args: Record<string, string>, signal?: AbortSignal): Promise<string> {
    const result = await this.client.getPrompt({ name, arguments: args }, { signal });
    return result.messages
      .map((message) => contentItemToText(message.content))
      .join('\n');
  }

  async close(): Promise<void> {
    this.closing = true;
    await this.client.close();
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }
}

export const createSdkAdapter: AdapterFactory = (serverName, config) =>
  new SdkToolEndpointAdapter(serverName, config);
