/**
 * MCP (Model Context Protocol) Types
 *
 * Runtime types for server connections, discovered tools and prompts.
 */

import type { ServerConfig } from '@/lib/config';
import type { AgentError } from '@/lib/errors';

/**
 * Transport types
 * stdio is a long-lived subprocess pipe; sse and http are streaming channels.
 */
export type MCPTransport = ServerConfig['transport'];

export type ServerState = 'connecting' | 'connected' | 'failed' | 'closed';

/**
 * Tool as reported by one server, before namespacing
 */
export interface RawTool {
  name: string;
  description?: string;
  inputSchema: Record<string, unknown>;
}

/**
 * Tool in the global catalog
 */
export interface ToolDescriptor {
  /** Unique across all servers: rawName, or serverName:rawName when rawName collides */
  qualifiedName: string;
  rawName: string;
  serverName: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

export interface PromptArgument {
  name: string;
  description?: string;
  required?: boolean;
}

export interface PromptDescriptor {
  name: string;
  serverName: string;
  description: string;
  arguments: PromptArgument[];
}

/**
 * Normalized result of one tool call
 */
export interface ToolCallResult {
  /** Text content of the result, non-text parts serialized as JSON */
  content: string;
  /** The tool itself reported a failure (the call reached the server) */
  isError: boolean;
}

export interface MCPServerStatus {
  name: string;
  transport: MCPTransport | 'unknown';
  state: ServerState;
  connectedAt?: Date;
  error?: string;
  tools: RawTool[];
  prompts: PromptDescriptor[];
}

export type RegistrationResult =
  | { ok: true; serverName: string; toolCount: number; promptCount: number }
  | { ok: false; serverName: string; error: AgentError };

export interface MCPClientStats {
  totalServers: number;
  connectedServers: number;
  failedServers: string[];
  totalTools: number;
  totalPrompts: number;
  /** Raw tool names exposed by more than one connected server */
  nameCollisions: string[];
  servers: Array<{ name: string; state: ServerState; tools: number; prompts: number }>;
}
