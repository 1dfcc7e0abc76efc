/**
 * Prompt Composer
 *
 * Builds the effective system prompt: the static system prompt, a listing of
 * the prompts the tool servers advertise, and the bodies of prompts loaded so far.
 */

import type { PromptDescriptor } from '@/lib/mcp/types';

const LOG_PREFIX = '[PromptComposer]';

/** Loaded prompt bodies are cut to this many characters in the effective prompt */
export const LOADED_PROMPT_PREVIEW_CHARS = 500;

/** Server name recorded for prompts added through addCustomPrompt */
export const CUSTOM_PROMPT_SERVER = 'custom';

/**
 * Anything that can fetch a remote prompt's text (the router in production)
 */
export interface PromptSource {
  getPrompt(name: string, args?: Record<string, string>, serverName?: string): Promise<string | null>;
}

export interface PromptComposerStats {
  systemPromptLength: number;
  serverPrompts: number;
  loadedPrompts: number;
  promptNames: string[];
}

export function formatPromptLine(prompt: PromptDescriptor): string {
  let line = `- ${prompt.name}`;
  if (prompt.description) {
    line += `: ${prompt.description}`;
  }
  if (prompt.arguments.length > 0) {
    const args = prompt.arguments.map((arg) => (arg.required ? arg.name : `${arg.name}?`));
    line += ` (arguments: ${args.join(', ')})`;
  }
  return `${line} [server: ${prompt.serverName}]`;
}

export class PromptComposer {
  private prompts: PromptDescriptor[] = [];
  private loaded = new Map<string, string>();

  constructor(private systemPrompt: string = '') {}

  addServerPrompts(prompts: PromptDescriptor[]): void {
    this.prompts.push(...prompts);
  }

  /**
   * Replace the advertised server prompts, keeping custom ones
   */
  setServerPrompts(prompts: PromptDescriptor[]): void {
    const custom = this.prompts.filter((prompt) => prompt.serverName === CUSTOM_PROMPT_SERVER);
    this.prompts = [...prompts, ...custom];
  }

  /**
   * Fetch a prompt body once and keep it for the effective prompt
   */
  async loadPrompt(
    name: string,
    args: Record<string, string>,
    source: PromptSource
  ): Promise<string | null> {
    const cached = this.loaded.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const serverName = this.getPromptInfo(name)?.serverName;
    const content = await source.getPrompt(name, args, serverName);
    if (content) {
      this.loaded.set(name, content);
      console.log(`${LOG_PREFIX} Loaded prompt ${name} (${content.length} chars)`);
    } else {
      console.warn(`${LOG_PREFIX} Prompt ${name} not available`);
    }
    return content;
  }

  addCustomPrompt(name: string, content: string, description = ''): void {
    this.prompts.push({ name, serverName: CUSTOM_PROMPT_SERVER, description, arguments: [] });
    this.loaded.set(name, content);
  }

  updateSystemPrompt(text: string): void {
    this.systemPrompt = text;
  }

  getEffectivePrompt(includeServerContext = true): string {
    if (!includeServerContext || this.prompts.length === 0) {
      return this.systemPrompt;
    }

    let context = '\n\n## Available prompts:\n';
    context += this.prompts.map(formatPromptLine).join('\n');
    context += '\n';

    if (this.loaded.size > 0) {
      context += '\n## Loaded prompt content:\n';
      for (const [name, content] of this.loaded) {
        const body =
          content.length > LOADED_PROMPT_PREVIEW_CHARS
            ? `${content.slice(0, LOADED_PROMPT_PREVIEW_CHARS)}...`
            : content;
        context += `### ${name}:\n${body}\n\n`;
      }
    }

    return this.systemPrompt + context;
  }

  getPromptInfo(name: string): PromptDescriptor | undefined {
    return this.prompts.find((prompt) => prompt.name === name);
  }

  getAllPromptNames(): string[] {
    return this.prompts.map((prompt) => prompt.name);
  }

  clearLoadedPrompts(): void {
    this.loaded.clear();
  }

  getStats(): PromptComposerStats {
    return {
      systemPromptLength: this.systemPrompt.length,
      serverPrompts: this.prompts.length,
      loadedPrompts: this.loaded.size,
      promptNames: this.getAllPromptNames(),
    };
  }
}
