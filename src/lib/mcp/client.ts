/**
 * MCP Client Manager
 *
 * Registry of MCP server connections and router for tool calls.
 * One server's failure is recorded on its own entry and never blocks the
 * others; the tool namespace is rebuilt and swapped in as a whole.
 */

import type { AgentLoopConfig, ServerConfig } from '@/lib/config';
import { parseServerConfig, serverNameSchema } from '@/lib/config';
import { SerialQueue, withTimeout } from '@/lib/concurrency';
import { AgentError, errorMessage, toAgentError } from '@/lib/errors';
import { createSdkAdapter, type AdapterFactory, type ToolEndpointAdapter } from './adapter';
import { buildToolNamespace, parseQualifiedName, type ToolNamespace } from './naming';
import type {
  MCPClientStats,
  MCPServerStatus,
  PromptDescriptor,
  RegistrationResult,
  ToolCallResult,
  ToolDescriptor,
} from './types';

const LOG_PREFIX = '[MCP Client]';

export type MCPClientOptions = Pick<
  AgentLoopConfig,
  'callTimeoutMs' | 'handshakeTimeoutMs' | 'closeTimeoutMs'
> & {
  adapterFactory?: AdapterFactory;
};

interface ServerEntry {
  status: MCPServerStatus;
  adapter: ToolEndpointAdapter | null;
  /** Present for exclusive (pipe) transports */
  queue: SerialQueue | null;
  /** Aborted on removal or shutdown to cancel in-flight calls */
  lifetime: AbortController;
}

export class MCPClientManager {
  private servers: Map<string, ServerEntry> = new Map();
  private namespace: ToolNamespace = { tools: [], byQualifiedName: new Map(), collisions: [] };
  private catalogListeners: Array<(tools: ToolDescriptor[]) => void> = [];
  private readonly adapterFactory: AdapterFactory;

  constructor(private readonly options: MCPClientOptions) {
    this.adapterFactory = options.adapterFactory ?? createSdkAdapter;
  }

  /**
   * Register and connect a server. Never throws: the outcome is returned and
   * a failed server stays in the registry in the failed state.
   */
  async register(serverName: string, config: unknown): Promise<RegistrationResult> {
    if (this.servers.has(serverName)) {
      const error = new AgentError({
        code: 'DUPLICATE_SERVER',
        message: `Server ${serverName} is already registered`,
        serverName,
      });
      console.error(`${LOG_PREFIX} ${error.message}`);
      return { ok: false, serverName, error };
    }

    const entry: ServerEntry = {
      status: { name: serverName, transport: 'unknown', state: 'connecting', tools: [], prompts: [] },
      adapter: null,
      queue: null,
      lifetime: new AbortController(),
    };
    this.servers.set(serverName, entry);

    let parsed: ServerConfig;
    try {
      if (!serverNameSchema.safeParse(serverName).success) {
        throw new AgentError({
          code: 'CONFIG_ERROR',
          message: `Invalid server name "${serverName}": must be non-empty without ":" or whitespace`,
          serverName,
        });
      }
      parsed = parseServerConfig(serverName, config);
    } catch (error) {
      return this.markFailed(entry, toAgentError(error, 'CONFIG_ERROR', serverName));
    }

    entry.status.transport = parsed.transport;
    console.log(`${LOG_PREFIX} Connecting to ${serverName} (${parsed.transport})...`);

    try {
      const adapter = this.adapterFactory(serverName, parsed);
      entry.adapter = adapter;
      entry.queue = adapter.exclusive ? new SerialQueue() : null;

      const signal = entry.lifetime.signal;
      const timeoutMs = this.options.handshakeTimeoutMs;
      await withTimeout(adapter.connect(signal), timeoutMs, `Handshake with ${serverName}`, {
        signal,
        serverName,
      });

      const [tools, prompts] = await Promise.all([
        withTimeout(adapter.listTools(signal), timeoutMs, `Listing tools of ${serverName}`, {
          signal,
          serverName,
        }),
        withTimeout(adapter.listPrompts(signal), timeoutMs, `Listing prompts of ${serverName}`, {
          signal,
          serverName,
        }).catch((error: unknown) => {
          // Prompts are optional metadata; a server that fails to list them still serves tools
          console.warn(`${LOG_PREFIX} Failed to list prompts of ${serverName}: ${errorMessage(error)}`);
          return [];
        }),
      ]);

      if (this.servers.get(serverName) !== entry) {
        // Removed or shut down while connecting
        await this.releaseAdapter(serverName, adapter);
        return {
          ok: false,
          serverName,
          error: new AgentError({ code: 'CANCELLED', message: `Registration of ${serverName} cancelled`, serverName }),
        };
      }

      adapter.onClose(() => this.handleUnexpectedClose(serverName, entry));

      entry.status = {
        ...entry.status,
        state: 'connected',
        connectedAt: new Date(),
        error: undefined,
        tools,
        prompts: prompts.map((prompt) => ({ ...prompt, serverName })),
      };
      this.rebuildNamespace();

      console.log(`${LOG_PREFIX} Connected to ${serverName}: ${tools.length} tools, ${prompts.length} prompts`);
      return { ok: true, serverName, toolCount: tools.length, promptCount: prompts.length };
    } catch (error) {
      const agentError = toAgentError(error, 'TRANSPORT_ERROR', serverName);
      if (entry.adapter) {
        await this.releaseAdapter(serverName, entry.adapter);
      }
      return this.markFailed(entry, agentError);
    }
  }

  /**
   * Register many servers at once. All attempts start together and are joined,
   * so a slow server does not delay the rest.
   */
  async registerAll(configs: Record<string, unknown>): Promise<RegistrationResult[]> {
    const results = await Promise.all(
      Object.entries(configs).map(([serverName, config]) => this.register(serverName, config))
    );

    const connected = results.filter((result) => result.ok).length;
    console.log(`${LOG_PREFIX} Connected ${connected}/${results.length} MCP servers`);
    return results;
  }

  /**
   * Tools of connected servers, with collision-free qualified names
   */
  listAllTools(): ToolDescriptor[] {
    return this.namespace.tools.filter((tool) => this.isConnected(tool.serverName));
  }

  listAllPrompts(): PromptDescriptor[] {
    const prompts: PromptDescriptor[] = [];
    this.servers.forEach((entry) => {
      if (entry.status.state === 'connected') {
        prompts.push(...entry.status.prompts);
      }
    });
    return prompts;
  }

  /**
   * Route a tool call to its owning server.
   * Transport failures are thrown tagged with the server name; no retries here.
   */
  async invoke(qualifiedName: string, args: Record<string, unknown>): Promise<ToolCallResult> {
    const { serverName, rawName } = this.resolve(qualifiedName);
    const entry = this.servers.get(serverName);

    if (!entry) {
      throw new AgentError({
        code: 'UNKNOWN_SERVER',
        message: `No server named ${serverName} is registered`,
        serverName,
      });
    }

    const adapter = entry.adapter;
    if (entry.status.state !== 'connected' || !adapter) {
      throw new AgentError({
        code: 'SERVER_UNAVAILABLE',
        message: `Server ${serverName} is ${entry.status.state}${entry.status.error ? `: ${entry.status.error}` : ''}`,
        serverName,
      });
    }

    if (!entry.status.tools.some((tool) => tool.name === rawName)) {
      throw new AgentError({
        code: 'UNKNOWN_TOOL',
        message: `Server ${serverName} has no tool named ${rawName}`,
        serverName,
      });
    }

    console.log(`${LOG_PREFIX} Executing tool ${rawName} on server ${serverName}`);

    const call = () => this.callWithTimeout(entry, serverName, rawName, args);
    return entry.queue ? entry.queue.run(call) : call();
  }

  /**
   * Fetch a remote prompt's text, from one server or the first that exposes it
   */
  async getPrompt(
    promptName: string,
    args: Record<string, string> = {},
    serverName?: string
  ): Promise<string | null> {
    const candidates = [...this.servers.entries()].filter(
      ([name, entry]) =>
        (serverName === undefined || name === serverName) &&
        entry.status.state === 'connected' &&
        entry.status.prompts.some((prompt) => prompt.name === promptName)
    );

    for (const [name, entry] of candidates) {
      const adapter = entry.adapter;
      if (!adapter) continue;

      try {
        const fetch = () =>
          withTimeout(
            adapter.getPrompt(promptName, args, entry.lifetime.signal),
            this.options.callTimeoutMs,
            `Prompt ${promptName} from ${name}`,
            { signal: entry.lifetime.signal, serverName: name }
          );
        return await (entry.queue ? entry.queue.run(fetch) : fetch());
      } catch (error) {
        console.error(`${LOG_PREFIX} Failed to get prompt ${name}:${promptName}:`, error);
      }
    }

    return null;
  }

  /**
   * Re-list a connected server's tools and prompts and rebuild the namespace
   */
  async refreshServer(serverName: string): Promise<boolean> {
    const entry = this.servers.get(serverName);
    const adapter = entry?.adapter;
    if (!entry || !adapter || entry.status.state !== 'connected') return false;

    const signal = entry.lifetime.signal;
    const timeoutMs = this.options.callTimeoutMs;

    try {
      const [tools, prompts] = await Promise.all([
        withTimeout(adapter.listTools(signal), timeoutMs, `Listing tools of ${serverName}`, { signal, serverName }),
        withTimeout(adapter.listPrompts(signal), timeoutMs, `Listing prompts of ${serverName}`, { signal, serverName }),
      ]);
      entry.status = {
        ...entry.status,
        tools,
        prompts: prompts.map((prompt) => ({ ...prompt, serverName })),
      };
      this.rebuildNamespace();
      return true;
    } catch (error) {
      console.error(`${LOG_PREFIX} Failed to refresh ${serverName}:`, error);
      return false;
    }
  }

  /**
   * Close and forget one server
   */
  async removeServer(serverName: string): Promise<void> {
    const entry = this.servers.get(serverName);
    if (!entry) return;

    this.servers.delete(serverName);
    this.markClosed(entry);
    this.rebuildNamespace();

    if (entry.adapter) {
      await this.releaseAdapter(serverName, entry.adapter);
    }
    console.log(`${LOG_PREFIX} Removed server ${serverName}`);
  }

  /**
   * Cancel in-flight calls and close every connection. A failing or hanging
   * close is logged and does not keep the other servers open.
   */
  async shutdown(): Promise<void> {
    const entries = [...this.servers.entries()];
    console.log(`${LOG_PREFIX} Closing ${entries.length} MCP server connections`);

    this.servers.clear();
    for (const [, entry] of entries) this.markClosed(entry);
    this.rebuildNamespace();

    await Promise.all(
      entries.map(([name, entry]) => (entry.adapter ? this.releaseAdapter(name, entry.adapter) : Promise.resolve()))
    );
  }

  /**
   * Subscribe to namespace swaps (server added, removed, refreshed or lost)
   */
  onCatalogChange(listener: (tools: ToolDescriptor[]) => void): () => void {
    this.catalogListeners.push(listener);
    return () => {
      this.catalogListeners = this.catalogListeners.filter((l) => l !== listener);
    };
  }

  getStatus(serverName: string): MCPServerStatus | undefined {
    return this.servers.get(serverName)?.status;
  }

  getAllStatuses(): MCPServerStatus[] {
    const statuses: MCPServerStatus[] = [];
    this.servers.forEach((entry) => statuses.push(entry.status));
    return statuses;
  }

  isConnected(serverName: string): boolean {
    return this.servers.get(serverName)?.status.state === 'connected';
  }

  getStats(): MCPClientStats {
    const statuses = this.getAllStatuses();
    const connected = statuses.filter((status) => status.state === 'connected');

    return {
      totalServers: statuses.length,
      connectedServers: connected.length,
      failedServers: statuses.filter((status) => status.state === 'failed').map((status) => status.name),
      totalTools: connected.reduce((sum, status) => sum + status.tools.length, 0),
      totalPrompts: connected.reduce((sum, status) => sum + status.prompts.length, 0),
      nameCollisions: [...this.namespace.collisions],
      servers: statuses.map((status) => ({
        name: status.name,
        state: status.state,
        tools: status.tools.length,
        prompts: status.prompts.length,
      })),
    };
  }

  /**
   * Map a qualified name to its owner. Exact namespace entries win; otherwise a
   * `server:tool` prefix is honoured even for tools that need no prefix.
   */
  private resolve(qualifiedName: string): { serverName: string; rawName: string } {
    const known = this.namespace.byQualifiedName.get(qualifiedName);
    if (known) {
      return { serverName: known.serverName, rawName: known.rawName };
    }

    const parsed = parseQualifiedName(qualifiedName);
    if (parsed) {
      return parsed;
    }

    throw new AgentError({ code: 'UNKNOWN_TOOL', message: `Unknown tool: ${qualifiedName}` });
  }

  private async callWithTimeout(
    entry: ServerEntry,
    serverName: string,
    rawName: string,
    args: Record<string, unknown>
  ): Promise<ToolCallResult> {
    // A pipe call queued before shutdown or removal must not reach the closed adapter
    if (entry.lifetime.signal.aborted) {
      throw new AgentError({
        code: 'CANCELLED',
        message: `Tool ${serverName}:${rawName} cancelled`,
        serverName,
      });
    }

    const adapter = entry.adapter;
    if (!adapter || entry.status.state !== 'connected') {
      throw new AgentError({
        code: 'SERVER_UNAVAILABLE',
        message: `Server ${serverName} became unavailable`,
        serverName,
      });
    }

    // Per-call controller so a timed-out request is also cancelled inside the SDK
    const call = new AbortController();
    const abortCall = () => call.abort();
    entry.lifetime.signal.addEventListener('abort', abortCall, { once: true });

    try {
      return await withTimeout(
        adapter.callTool(rawName, args, call.signal),
        this.options.callTimeoutMs,
        `Tool ${serverName}:${rawName}`,
        { signal: entry.lifetime.signal, serverName }
      );
    } catch (error) {
      const agentError = toAgentError(error, 'TRANSPORT_ERROR', serverName);
      console.error(`${LOG_PREFIX} Tool call failed ${serverName}:${rawName}: ${agentError.message}`);
      throw agentError;
    } finally {
      entry.lifetime.signal.removeEventListener('abort', abortCall);
      call.abort();
    }
  }

  private markFailed(entry: ServerEntry, error: AgentError): RegistrationResult {
    entry.status = { ...entry.status, state: 'failed', error: error.message, tools: [], prompts: [] };
    console.error(`${LOG_PREFIX} Failed to connect to ${entry.status.name}: ${error.toTaggedString()}`);
    return { ok: false, serverName: entry.status.name, error };
  }

  private markClosed(entry: ServerEntry): void {
    entry.status = { ...entry.status, state: 'closed' };
    entry.lifetime.abort();
  }

  private handleUnexpectedClose(serverName: string, entry: ServerEntry): void {
    if (this.servers.get(serverName) !== entry || entry.status.state !== 'connected') return;

    // Tools keep their names; calls now fail fast with SERVER_UNAVAILABLE
    entry.status = { ...entry.status, state: 'failed', error: 'Transport closed unexpectedly' };
    console.error(`${LOG_PREFIX} Lost connection to ${serverName}`);
    this.notifyCatalogChange();
  }

  /**
   * Close an adapter with a bounded wait. Errors are logged, never thrown.
   */
  private async releaseAdapter(serverName: string, adapter: ToolEndpointAdapter): Promise<void> {
    try {
      await withTimeout(adapter.close(), this.options.closeTimeoutMs, `Closing ${serverName}`, { serverName });
    } catch (error) {
      console.error(`${LOG_PREFIX} Error closing ${serverName}: ${errorMessage(error)}`);
    }
  }

  /**
   * Rebuild the namespace from connected servers and swap it in one step
   */
  private rebuildNamespace(): void {
    const connected: Array<{ serverName: string; tools: MCPServerStatus['tools'] }> = [];
    this.servers.forEach((entry, serverName) => {
      if (entry.status.state === 'connected') {
        connected.push({ serverName, tools: entry.status.tools });
      }
    });

    this.namespace = buildToolNamespace(connected);

    if (this.namespace.collisions.length > 0) {
      console.log(`${LOG_PREFIX} Tool name collisions resolved with server prefix: ${this.namespace.collisions.join(', ')}`);
    }
    this.notifyCatalogChange();
  }

  private notifyCatalogChange(): void {
    const tools = this.listAllTools();
    for (const listener of this.catalogListeners) {
      try {
        listener(tools);
      } catch (error) {
        console.error(`${LOG_PREFIX} Catalog listener failed:`, error);
      }
    }
  }
}
