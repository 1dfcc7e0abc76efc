/**
 * Shared descriptors and capability fakes
 */

import type { EmbeddingProvider } from '@/lib/embeddings';
import type { ToolDescriptor } from '@/lib/mcp/types';

export function descriptor(rawName: string, description: string, serverName = 'home'): ToolDescriptor {
  return {
    qualifiedName: rawName,
    rawName,
    serverName,
    description,
    inputSchema: { type: 'object', properties: {} },
  };
}

export const HOME_TOOLS: ToolDescriptor[] = [
  descriptor('play_music', 'Play a song'),
  descriptor('turn_on_light', 'Turn on the light in a room'),
  descriptor('get_weather', 'Get the weather forecast'),
  descriptor('set_brightness', 'Set brightness of the living room light'),
  descriptor('set_timer', 'Start a countdown timer'),
];

const KEYWORDS = ['light', 'music', 'weather', 'timer'];

/**
 * Counts keyword occurrences; one dimension per keyword
 */
export class KeywordEmbeddings implements EmbeddingProvider {
  calls: string[] = [];

  constructor(private readonly fail: (text: string) => boolean = () => false) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    if (this.fail(text)) {
      throw new Error('embedding service unavailable');
    }
    const lower = text.toLowerCase();
    return KEYWORDS.map((keyword) => lower.split(keyword).length - 1);
  }
}
