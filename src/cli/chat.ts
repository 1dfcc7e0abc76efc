/**
 * Interactive chat host
 *
 * Reads utterances from stdin and prints the agent's replies.
 * Commands: /clear, /stats, /exit (or EOF).
 *
 * Usage: npm start
 */

import './env';

import * as readline from 'readline';
import { createToolHostAgent } from '@/agents/tool-host';
import type { ToolHostAgent } from '@/agents/tool-host';
import { loadConfigFromEnv } from '@/lib/config';
import { errorMessage, isAgentError } from '@/lib/errors';

const LOG_PREFIX = '[cli]';
const STATS_EVERY = 5;

function printStats(agent: ToolHostAgent): void {
  console.log(`${LOG_PREFIX} Agent stats:`, JSON.stringify(agent.getAgentStats()));
  console.log(`${LOG_PREFIX} Context stats:`, JSON.stringify(agent.getContextStats()));
  console.log(`${LOG_PREFIX} Tool stats:`, JSON.stringify(agent.getToolStats()));
  const servers = agent.getServerStats();
  console.log(
    `${LOG_PREFIX} Servers: ${servers.connectedServers}/${servers.totalServers} connected, ${servers.totalTools} tools`
  );
}

async function main(): Promise<void> {
  const config = loadConfigFromEnv();
  const agent = createToolHostAgent(config);

  const results = await agent.start();
  for (const result of results) {
    if (!result.ok) {
      console.warn(`${LOG_PREFIX} ${result.error.toTaggedString()}`);
    }
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, terminal: false });
  let utterances = 0;

  console.log(`${LOG_PREFIX} Ready. Type a message, /clear, /stats or /exit.`);

  for await (const line of rl) {
    const text = line.trim();
    if (!text) continue;

    if (text === '/exit') break;
    if (text === '/clear') {
      agent.clearContext();
      continue;
    }
    if (text === '/stats') {
      printStats(agent);
      continue;
    }

    const reply = await agent.chat(text);
    console.log(`assistant> ${reply}`);

    utterances++;
    if (utterances % STATS_EVERY === 0) {
      printStats(agent);
    }
  }

  rl.close();
  await agent.shutdown();
}

main().catch((error: unknown) => {
  console.error(`${LOG_PREFIX} Fatal: ${isAgentError(error) ? error.toTaggedString() : errorMessage(error)}`);
  process.exit(1);
});
