/**
 * Prompt Composer Tests
 */

import { describe, it, expect } from 'vitest';
import { PromptComposer, formatPromptLine, type PromptSource } from '@/lib/chat/prompt-composer';
import type { PromptDescriptor } from '@/lib/mcp/types';

const DAILY: PromptDescriptor = {
  name: 'daily',
  serverName: 'notes',
  description: 'Daily digest',
  arguments: [{ name: 'date', required: true }, { name: 'tone' }],
};

function source(bodies: Record<string, string>) {
  const requests: Array<{ name: string; args?: Record<string, string>; serverName?: string }> = [];
  const promptSource: PromptSource = {
    getPrompt: async (name, args, serverName) => {
      requests.push({ name, args, serverName });
      return bodies[name] ?? null;
    },
  };
  return { promptSource, requests };
}

describe('formatPromptLine', () => {
  it('should list description, arguments and server', () => {
    expect(formatPromptLine(DAILY)).toBe('- daily: Daily digest (arguments: date, tone?) [server: notes]');
  });

  it('should omit empty parts', () => {
    expect(formatPromptLine({ name: 'ping', serverName: 'a', description: '', arguments: [] })).toBe(
      '- ping [server: a]'
    );
  });
});

describe('PromptComposer', () => {
  it('should return the bare system prompt without server prompts', () => {
    const composer = new PromptComposer('You are helpful.');

    expect(composer.getEffectivePrompt()).toBe('You are helpful.');
  });

  it('should append the server prompt listing', () => {
    const composer = new PromptComposer('You are helpful.');
    composer.addServerPrompts([DAILY]);

    expect(composer.getEffectivePrompt()).toBe(
      'You are helpful.\n\n## Available prompts:\n- daily: Daily digest (arguments: date, tone?) [server: notes]\n'
    );
    expect(composer.getEffectivePrompt(false)).toBe('You are helpful.');
  });

  it('should load a prompt once from its server and include its body', async () => {
    const composer = new PromptComposer('Sys');
    composer.addServerPrompts([DAILY]);
    const { promptSource, requests } = source({ daily: 'Summarize the day.' });

    expect(await composer.loadPrompt('daily', { date: 'today' }, promptSource)).toBe('Summarize the day.');
    expect(await composer.loadPrompt('daily', { date: 'today' }, promptSource)).toBe('Summarize the day.');

    expect(requests).toEqual([{ name: 'daily', args: { date: 'today' }, serverName: 'notes' }]);
    expect(composer.getEffectivePrompt()).toBe(
      'Sys\n\n## Available prompts:\n- daily: Daily digest (arguments: date, tone?) [server: notes]\n' +
        '\n## Loaded prompt content:\n### daily:\nSummarize the day.\n\n'
    );
  });

  it('should truncate long loaded bodies', async () => {
    const composer = new PromptComposer('Sys');
    composer.addCustomPrompt('long', 'x'.repeat(600));

    expect(composer.getEffectivePrompt().endsWith(`### long:\n${'x'.repeat(500)}...\n\n`)).toBe(true);
  });

  it('should return null and cache nothing for an unknown prompt', async () => {
    const composer = new PromptComposer('Sys');
    const { promptSource } = source({});

    expect(await composer.loadPrompt('missing', {}, promptSource)).toBeNull();
    expect(composer.getStats().loadedPrompts).toBe(0);
  });

  it('should keep custom prompts when server prompts are replaced', () => {
    const composer = new PromptComposer('Sys');
    composer.addServerPrompts([DAILY]);
    composer.addCustomPrompt('style', 'Answer in one sentence.', 'House style');

    composer.setServerPrompts([]);

    expect(composer.getAllPromptNames()).toEqual(['style']);
    expect(composer.getPromptInfo('style')).toEqual({
      name: 'style',
      serverName: 'custom',
      description: 'House style',
      arguments: [],
    });
  });

  it('should report stats and clear loaded bodies', () => {
    const composer = new PromptComposer('Sys');
    composer.addServerPrompts([DAILY]);
    composer.addCustomPrompt('style', 'Be short.');
    composer.updateSystemPrompt('New system prompt');

    expect(composer.getStats()).toEqual({
      systemPromptLength: 17,
      serverPrompts: 2,
      loadedPrompts: 1,
      promptNames: ['daily', 'style'],
    });

    composer.clearLoadedPrompts();
    expect(composer.getStats().loadedPrompts).toBe(0);
  });
});
