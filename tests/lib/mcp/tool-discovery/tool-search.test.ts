/**
 * Tool Selector Tests
 */

import { describe, it, expect } from 'vitest';
import { ToolSelector, nameMatchBonus } from '@/lib/mcp/tool-discovery';
import { HOME_TOOLS, KeywordEmbeddings, descriptor } from '../../../helpers/fixtures';

function lexicalSelector(topK = 2, cacheSize = 100): ToolSelector {
  return new ToolSelector({ mode: 'lexical', topK, cacheSize });
}

describe('ToolSelector', () => {
  describe('lexical mode', () => {
    it('should rank the light tools first for "turn on the light"', async () => {
      const selector = lexicalSelector();
      await selector.buildIndex(HOME_TOOLS);

      const results = await selector.searchWithScores('turn on the light');

      expect(results.map((result) => result.tool.rawName)).toEqual(['turn_on_light', 'set_brightness']);
      expect(results[0].score).toBeCloseTo(1.1);
      expect(results[1].score).toBeCloseTo(0.5);
      expect(results.every((result) => result.source === 'lexical')).toBe(true);
    });

    it('should never return more than topK tools', async () => {
      const selector = lexicalSelector(3);
      await selector.buildIndex(HOME_TOOLS);

      expect(await selector.search('something unrelated')).toHaveLength(3);
    });

    it('should break ties by catalog order', async () => {
      const selector = lexicalSelector(5);
      await selector.buildIndex(HOME_TOOLS);

      const results = await selector.search('xyz');

      expect(results.map((tool) => tool.rawName)).toEqual(HOME_TOOLS.map((tool) => tool.rawName));
    });

    it('should return nothing from an empty index', async () => {
      const selector = lexicalSelector();
      await selector.buildIndex([]);

      expect(await selector.search('turn on the light')).toEqual([]);
    });
  });

  describe('vector mode', () => {
    it('should rank by cosine similarity plus name bonus', async () => {
      const embeddings = new KeywordEmbeddings();
      const selector = new ToolSelector({ mode: 'vector', topK: 2, cacheSize: 10, embeddings });
      await selector.buildIndex(HOME_TOOLS);

      const results = await selector.searchWithScores('turn on the light');

      expect(results.map((result) => result.tool.rawName)).toEqual(['turn_on_light', 'set_brightness']);
      expect(results[0].score).toBeCloseTo(1.1);
      expect(results[1].score).toBeCloseTo(1.0);
      expect(results.every((result) => result.source === 'vector')).toBe(true);
      expect(selector.getStats().vectorIndexedTools).toBe(5);
    });

    it('should score a tool without a vector lexically', async () => {
      const embeddings = new KeywordEmbeddings((text) => text.includes('set brightness'));
      const selector = new ToolSelector({ mode: 'vector', topK: 2, cacheSize: 10, embeddings });
      await selector.buildIndex(HOME_TOOLS);

      const results = await selector.searchWithScores('turn on the light');

      expect(selector.getStats().vectorIndexedTools).toBe(4);
      expect(results.map((result) => [result.tool.rawName, result.source])).toEqual([
        ['turn_on_light', 'vector'],
        ['set_brightness', 'lexical'],
      ]);
      expect(results[1].score).toBeCloseTo(0.5);
    });

    it('should degrade the whole query to lexical when the query embedding fails', async () => {
      const embeddings = new KeywordEmbeddings((text) => !text.startsWith('Tool:'));
      const selector = new ToolSelector({ mode: 'vector', topK: 2, cacheSize: 10, embeddings });
      await selector.buildIndex(HOME_TOOLS);

      const results = await selector.searchWithScores('turn on the light');

      expect(results.map((result) => [result.tool.rawName, result.source])).toEqual([
        ['turn_on_light', 'lexical'],
        ['set_brightness', 'lexical'],
      ]);
      expect(selector.getStats().degradedSearches).toBe(1);
    });

    it('should fall back to lexical mode without an embedding provider', () => {
      const selector = new ToolSelector({ mode: 'vector', topK: 2, cacheSize: 10 });

      expect(selector.mode).toBe('lexical');
    });
  });

  describe('ranking cache', () => {
    it('should serve a repeated query from the cache', async () => {
      const embeddings = new KeywordEmbeddings();
      const selector = new ToolSelector({ mode: 'vector', topK: 2, cacheSize: 10, embeddings });
      await selector.buildIndex(HOME_TOOLS);
      const embedCallsAfterIndex = embeddings.calls.length;

      const first = await selector.search('turn on the light');
      const second = await selector.search('turn on the light');

      expect(second).toEqual(first);
      expect(embeddings.calls.length).toBe(embedCallsAfterIndex + 1);
      expect(selector.getStats().cacheHits).toBe(1);
    });

    it('should return the same order after clearCache', async () => {
      const selector = lexicalSelector(3);
      await selector.buildIndex(HOME_TOOLS);

      const before = await selector.search('set the light brightness');
      selector.clearCache();
      selector.clearCache();
      const after = await selector.search('set the light brightness');

      expect(after.map((tool) => tool.qualifiedName)).toEqual(before.map((tool) => tool.qualifiedName));
      expect(selector.getStats().cacheHits).toBe(0);
    });

    it('should invalidate cached rankings when the index is rebuilt', async () => {
      const selector = lexicalSelector(1);
      await selector.buildIndex(HOME_TOOLS);
      expect((await selector.search('play a song'))[0].rawName).toBe('play_music');

      await selector.buildIndex([descriptor('stream_radio', 'Play a radio station')]);

      expect(selector.getStats().cachedQueries).toBe(0);
      expect((await selector.search('play a song'))[0].rawName).toBe('stream_radio');
    });
  });

  describe('buildIndex', () => {
    it('should keep the newest of two overlapping builds', async () => {
      const selector = lexicalSelector(5);

      await Promise.all([
        selector.buildIndex(HOME_TOOLS),
        selector.buildIndex([descriptor('stream_radio', 'Play a radio station')]),
      ]);

      expect(selector.getIndexedTools().map((tool) => tool.rawName)).toEqual(['stream_radio']);
    });
  });
});

describe('nameMatchBonus', () => {
  const weather = descriptor('get_weather', 'Get the weather forecast');

  it('should give the full bonus when the query contains the tool name', () => {
    expect(nameMatchBonus('please run get_weather now', weather)).toBe(0.3);
  });

  it('should give the full bonus when the tool name contains the query', () => {
    expect(nameMatchBonus('Weather', weather)).toBe(0.3);
  });

  it('should give the partial bonus when a query word occurs in the name', () => {
    expect(nameMatchBonus('get the forecast', weather)).toBe(0.1);
  });

  it('should give nothing otherwise', () => {
    expect(nameMatchBonus('play a song', weather)).toBe(0);
  });
});
