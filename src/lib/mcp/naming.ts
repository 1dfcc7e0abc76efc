/**
 * Tool Namespace
 *
 * Builds globally unique tool names across servers. A raw name exposed by a
 * single server keeps its bare form; once two servers expose the same raw name,
 * every one of them gets the `server:tool` form, the first-seen one included.
 */

import type { RawTool, ToolDescriptor } from './types';

export const QUALIFIED_NAME_SEPARATOR = ':';

export interface ToolNamespace {
  /** Catalog order: server registration order, then each server's tool order */
  tools: ToolDescriptor[];
  byQualifiedName: Map<string, ToolDescriptor>;
  collisions: string[];
}

export function createQualifiedName(serverName: string, rawName: string): string {
  return `${serverName}${QUALIFIED_NAME_SEPARATOR}${rawName}`;
}

/**
 * Split `server:tool` at the first separator. Returns null for bare names.
 */
export function parseQualifiedName(
  qualifiedName: string
): { serverName: string; rawName: string } | null {
  const index = qualifiedName.indexOf(QUALIFIED_NAME_SEPARATOR);
  if (index <= 0 || index === qualifiedName.length - 1) return null;

  return {
    serverName: qualifiedName.slice(0, index),
    rawName: qualifiedName.slice(index + 1),
  };
}

export function buildToolNamespace(
  servers: ReadonlyArray<{ serverName: string; tools: readonly RawTool[] }>
): ToolNamespace {
  const owners = new Map<string, Set<string>>();
  for (const { serverName, tools } of servers) {
    for (const tool of tools) {
      const set = owners.get(tool.name) ?? new Set<string>();
      set.add(serverName);
      owners.set(tool.name, set);
    }
  }

  const collisions = [...owners.entries()]
    .filter(([, serverNames]) => serverNames.size > 1)
    .map(([rawName]) => rawName);
  const colliding = new Set(collisions);

  const tools: ToolDescriptor[] = [];
  const byQualifiedName = new Map<string, ToolDescriptor>();

  for (const { serverName, tools: serverTools } of servers) {
    for (const tool of serverTools) {
      const qualifiedName = colliding.has(tool.name)
        ? createQualifiedName(serverName, tool.name)
        : tool.name;

      // A server listing the same tool twice keeps the first entry
      if (byQualifiedName.has(qualifiedName)) continue;

      const descriptor: ToolDescriptor = {
        qualifiedName,
        rawName: tool.name,
        serverName,
        description: tool.description ?? '',
        inputSchema: tool.inputSchema,
      };
      tools.push(descriptor);
      byQualifiedName.set(qualifiedName, descriptor);
    }
  }

  return { tools, byQualifiedName, collisions };
}
