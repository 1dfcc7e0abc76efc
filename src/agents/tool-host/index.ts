/**
 * Tool Host Agent - Barrel Export
 */

export { ToolHostAgent, ROUND_LIMIT_REPLY, parseToolArguments, toToolSchema } from './agent';
export { createToolHostAgent } from './factory';

export type { AgentState, AgentStats, ChatResult, ToolHostAgentDeps } from './types';
