/**
 * MCP Client Manager Tests
 * Registration isolation, namespacing, routing and shutdown
 */

import { describe, it, expect } from 'vitest';
import { MCPClientManager } from '@/lib/mcp/client';
import type { AdapterFactory } from '@/lib/mcp/adapter';
import { AgentError } from '@/lib/errors';
import { fakeServers, rawTool, type FakeServerSetup } from '../../helpers/fake-adapter';

function createManager(factory: AdapterFactory, overrides: { callTimeoutMs?: number } = {}) {
  return new MCPClientManager({
    callTimeoutMs: overrides.callTimeoutMs ?? 1_000,
    handshakeTimeoutMs: 50,
    closeTimeoutMs: 50,
    adapterFactory: factory,
  });
}

async function setup(setups: Record<string, FakeServerSetup>, overrides: { callTimeoutMs?: number } = {}) {
  const servers = fakeServers(setups);
  const manager = createManager(servers.factory, overrides);
  const results = await manager.registerAll(servers.configs);
  return { manager, results, adapters: servers.adapters };
}

async function captureError(promise: Promise<unknown>): Promise<AgentError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AgentError) return error;
    throw error;
  }
  throw new Error('expected the call to fail');
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('MCPClientManager', () => {
  describe('registerAll', () => {
    it('should isolate failing servers and keep them in the registry', async () => {
      const { manager, results } = await setup({
        weather: { tools: [rawTool('forecast', 'Get the weather forecast')] },
        broken: { connectError: new Error('connection refused') },
        slow: { hangOnConnect: true },
      });

      expect(results.map((result) => [result.serverName, result.ok])).toEqual([
        ['weather', true],
        ['broken', false],
        ['slow', false],
      ]);

      const codes = results.flatMap((result) => (result.ok ? [] : [result.error.code]));
      expect(codes).toEqual(['TRANSPORT_ERROR', 'TIMEOUT']);

      const stats = manager.getStats();
      expect(stats.totalServers).toBe(3);
      expect(stats.connectedServers).toBe(1);
      expect(stats.failedServers).toEqual(['broken', 'slow']);
      expect(manager.getStatus('broken')?.error).toBe('connection refused');
      expect(manager.listAllTools().map((tool) => tool.qualifiedName)).toEqual(['forecast']);
    });

    it('should report tool and prompt counts of connected servers', async () => {
      const { results } = await setup({
        notes: {
          tools: [rawTool('add_note'), rawTool('list_notes')],
          prompts: [{ name: 'daily', description: 'Daily digest', arguments: [] }],
        },
      });

      expect(results[0]).toEqual({ ok: true, serverName: 'notes', toolCount: 2, promptCount: 1 });
    });
  });

  describe('register', () => {
    it('should reject a duplicate name without touching the existing server', async () => {
      const { manager, adapters } = await setup({ a: { tools: [rawTool('ping')] } });

      const result = await manager.register('a', { transport: 'sse', url: 'http://localhost/other' });

      expect(result.ok).toBe(false);
      expect(result.ok ? undefined : result.error.code).toBe('DUPLICATE_SERVER');
      expect(manager.getStatus('a')?.state).toBe('connected');
      expect(adapters.get('a')?.closed).toBe(false);
    });

    it('should record an invalid transport config as a failed server', async () => {
      const manager = createManager(fakeServers({}).factory);

      const result = await manager.register('bad', { transport: 'carrier-pigeon' });

      expect(result.ok ? undefined : result.error.code).toBe('CONFIG_ERROR');
      expect(manager.getStatus('bad')?.state).toBe('failed');
    });

    it('should reject server names containing the qualified-name separator', async () => {
      const manager = createManager(fakeServers({}).factory);

      const result = await manager.register('a:b', { transport: 'sse', url: 'http://localhost/x' });

      expect(result.ok ? undefined : result.error.code).toBe('CONFIG_ERROR');
    });
  });

  describe('namespacing', () => {
    it('should prefix every tool whose raw name collides and keep unique names bare', async () => {
      const { manager } = await setup({
        a: { tools: [rawTool('ping'), rawTool('forecast')] },
        b: { tools: [rawTool('ping')] },
      });

      expect(manager.listAllTools().map((tool) => tool.qualifiedName)).toEqual(['a:ping', 'forecast', 'b:ping']);
      expect(manager.getStats().nameCollisions).toEqual(['ping']);
    });

    it('should prefix both pings and keep a unique tool bare across three servers', async () => {
      const { manager } = await setup({
        a: { tools: [rawTool('ping')] },
        b: { tools: [rawTool('ping')] },
        c: { tools: [rawTool('weather')] },
      });

      const names = manager.listAllTools().map((tool) => tool.qualifiedName);
      expect(names).toEqual(['a:ping', 'b:ping', 'weather']);
      expect(names).not.toContain('ping');
    });

    it('should drop the prefix again once the collision is gone', async () => {
      const { manager } = await setup({
        a: { tools: [rawTool('ping')] },
        b: { tools: [rawTool('ping')] },
      });

      await manager.removeServer('b');

      expect(manager.listAllTools().map((tool) => tool.qualifiedName)).toEqual(['ping']);
    });
  });

  describe('invoke', () => {
    it('should route prefixed and bare names to their owners', async () => {
      const { manager, adapters } = await setup({
        a: { tools: [rawTool('ping'), rawTool('forecast')] },
        b: { tools: [rawTool('ping')] },
      });

      const fromB = await manager.invoke('b:ping', { host: 'example' });
      const fromA = await manager.invoke('forecast', {});

      expect(fromB).toEqual({ content: 'b:ping ok', isError: false });
      expect(fromA).toEqual({ content: 'a:forecast ok', isError: false });
      expect(adapters.get('b')?.calls).toEqual([{ name: 'ping', args: { host: 'example' } }]);
    });

    it('should fail with UNKNOWN_TOOL for an ambiguous bare name', async () => {
      const { manager } = await setup({
        a: { tools: [rawTool('ping')] },
        b: { tools: [rawTool('ping')] },
      });

      const error = await captureError(manager.invoke('ping', {}));
      expect(error.code).toBe('UNKNOWN_TOOL');
    });

    it('should fail with UNKNOWN_TOOL when the server lacks the tool', async () => {
      const { manager } = await setup({ a: { tools: [rawTool('ping')] } });

      const error = await captureError(manager.invoke('a:forecast', {}));
      expect(error.code).toBe('UNKNOWN_TOOL');
      expect(error.serverName).toBe('a');
    });

    it('should fail with UNKNOWN_SERVER for an unregistered prefix', async () => {
      const { manager } = await setup({ a: { tools: [rawTool('ping')] } });

      const error = await captureError(manager.invoke('zzz:ping', {}));
      expect(error.code).toBe('UNKNOWN_SERVER');
    });

    it('should fail fast with SERVER_UNAVAILABLE for a failed server', async () => {
      const { manager, adapters } = await setup({ broken: { connectError: new Error('refused') } });

      const error = await captureError(manager.invoke('broken:anything', {}));

      expect(error.code).toBe('SERVER_UNAVAILABLE');
      expect(error.serverName).toBe('broken');
      expect(adapters.get('broken')?.calls).toHaveLength(0);
    });

    it('should mark a server failed when its transport drops', async () => {
      const { manager, adapters } = await setup({ weather: { tools: [rawTool('forecast')] } });
      const catalogs: string[][] = [];
      manager.onCatalogChange((tools) => catalogs.push(tools.map((tool) => tool.qualifiedName)));

      adapters.get('weather')?.disconnect();
      const error = await captureError(manager.invoke('forecast', {}));

      expect(error.code).toBe('SERVER_UNAVAILABLE');
      expect(adapters.get('weather')?.calls).toHaveLength(0);
      expect(manager.getStatus('weather')?.state).toBe('failed');
      expect(manager.listAllTools()).toEqual([]);
      expect(catalogs).toEqual([[]]);
    });

    it('should tag transport errors with the server name', async () => {
      const { manager } = await setup({
        a: {
          tools: [rawTool('ping')],
          call: async () => {
            throw new Error('socket hang up');
          },
        },
      });

      const error = await captureError(manager.invoke('ping', {}));

      expect(error.code).toBe('TRANSPORT_ERROR');
      expect(error.serverName).toBe('a');
      expect(error.message).toBe('socket hang up');
      expect(error.retryable).toBe(true);
    });

    it('should time out a hanging call', async () => {
      const { manager } = await setup(
        { a: { tools: [rawTool('ping')], call: () => new Promise(() => undefined) } },
        { callTimeoutMs: 30 }
      );

      const error = await captureError(manager.invoke('ping', {}));

      expect(error.code).toBe('TIMEOUT');
      expect(error.message).toBe('Tool a:ping timed out after 30ms');
    });

    it('should serialize calls to a pipe server and overlap calls to a stream server', async () => {
      const slowCall = async (name: string) => {
        await delay(10);
        return { content: name, isError: false };
      };
      const { manager, adapters } = await setup({
        pipe: { exclusive: true, tools: [rawTool('p1')], call: slowCall },
        stream: { tools: [rawTool('s1')], call: slowCall },
      });

      await Promise.all([
        manager.invoke('p1', {}),
        manager.invoke('p1', {}),
        manager.invoke('p1', {}),
        manager.invoke('s1', {}),
        manager.invoke('s1', {}),
        manager.invoke('s1', {}),
      ]);

      expect(adapters.get('pipe')?.maxInFlight).toBe(1);
      expect(adapters.get('stream')?.maxInFlight).toBe(3);
    });
  });

  describe('refreshServer', () => {
    it('should pick up a changed tool list and announce the new catalog', async () => {
      const weatherTools = [rawTool('forecast')];
      const { manager } = await setup({
        weather: { tools: weatherTools },
        net: { tools: [rawTool('ping')] },
      });
      const catalogs: string[][] = [];
      manager.onCatalogChange((tools) => catalogs.push(tools.map((tool) => tool.qualifiedName)));

      weatherTools.push(rawTool('ping'));
      const refreshed = await manager.refreshServer('weather');

      expect(refreshed).toBe(true);
      expect(manager.listAllTools().map((tool) => tool.qualifiedName)).toEqual([
        'forecast',
        'weather:ping',
        'net:ping',
      ]);
      expect(catalogs).toEqual([['forecast', 'weather:ping', 'net:ping']]);
      expect(manager.getStatus('weather')?.tools).toHaveLength(2);
    });

    it('should refuse to refresh a server that is not connected', async () => {
      const { manager } = await setup({ broken: { connectError: new Error('refused') } });

      expect(await manager.refreshServer('broken')).toBe(false);
      expect(await manager.refreshServer('missing')).toBe(false);
    });
  });

  describe('getPrompt', () => {
    it('should fetch a prompt body from the server that exposes it', async () => {
      const { manager } = await setup({
        notes: {
          prompts: [{ name: 'daily', description: 'Daily digest', arguments: [] }],
          promptBodies: { daily: 'Summarize my notes.' },
        },
      });

      expect(await manager.getPrompt('daily')).toBe('Summarize my notes.');
      expect(await manager.getPrompt('missing')).toBeNull();
    });
  });

  describe('shutdown', () => {
    it('should close every server even when one close fails', async () => {
      const { manager, adapters } = await setup({
        a: { tools: [rawTool('ping')], closeError: new Error('already gone') },
        b: { tools: [rawTool('pong')] },
      });

      await manager.shutdown();

      expect(adapters.get('a')?.closed).toBe(true);
      expect(adapters.get('b')?.closed).toBe(true);
      expect(manager.getStats().totalServers).toBe(0);
      expect(manager.listAllTools()).toEqual([]);
    });

    it('should return when a server never answers the close', async () => {
      const { manager, adapters } = await setup({
        stuck: { exclusive: true, tools: [rawTool('ping')], hangOnClose: true },
        b: { tools: [rawTool('pong')] },
      });

      await manager.shutdown();

      expect(adapters.get('stuck')?.closed).toBe(true);
      expect(adapters.get('b')?.closed).toBe(true);
      expect(manager.getStats().totalServers).toBe(0);
    });

    it('should cancel an in-flight call', async () => {
      const { manager, adapters } = await setup({
        a: { tools: [rawTool('slow')], call: () => new Promise(() => undefined) },
      });

      const pending = captureError(manager.invoke('slow', {}));
      await manager.shutdown();
      const error = await pending;

      expect(error.code).toBe('CANCELLED');
      expect(error.serverName).toBe('a');
      expect(adapters.get('a')?.calls).toHaveLength(1);
    });

    it('should not send a queued pipe call to a closed server', async () => {
      const { manager, adapters } = await setup({
        pipe: {
          exclusive: true,
          tools: [rawTool('slow')],
          call: () => new Promise(() => undefined),
          hangOnClose: true,
        },
      });

      const first = captureError(manager.invoke('slow', {}));
      const second = captureError(manager.invoke('slow', {}));
      await delay(0);
      await manager.shutdown();

      expect((await first).code).toBe('CANCELLED');
      expect((await second).code).toBe('CANCELLED');
      expect(adapters.get('pipe')?.calls).toHaveLength(1);
    });
  });

  describe('removeServer', () => {
    it('should let a failed server be registered again after removal', async () => {
      const broken: FakeServerSetup = { tools: [rawTool('ping')], connectError: new Error('refused') };
      const { manager } = await setup({ broken });

      broken.connectError = undefined;
      await manager.removeServer('broken');
      const result = await manager.register('broken', { transport: 'sse', url: 'http://localhost/broken/sse' });

      expect(result.ok).toBe(true);
      expect(manager.listAllTools().map((tool) => tool.qualifiedName)).toEqual(['ping']);
    });

    it('should cancel a queued pipe call of the removed server', async () => {
      const { manager, adapters } = await setup({
        pipe: { exclusive: true, tools: [rawTool('slow')], call: () => new Promise(() => undefined) },
      });

      const first = captureError(manager.invoke('slow', {}));
      const second = captureError(manager.invoke('slow', {}));
      await delay(0);
      await manager.removeServer('pipe');

      expect((await first).code).toBe('CANCELLED');
      expect((await second).code).toBe('CANCELLED');
      expect(adapters.get('pipe')?.calls).toHaveLength(1);
      expect(manager.getStatus('pipe')).toBeUndefined();
    });
  });
});
