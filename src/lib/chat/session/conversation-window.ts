/**
 * Conversation Window
 *
 * Pinned system messages plus a rolling window of turns. A turn starts at a
 * user message and runs up to the next one. Each addMessage runs a cleanup
 * pass: expired turns are dropped, then the oldest turns beyond maxTurns are
 * evicted (and summarized when enabled). The newest turn always stays.
 */

import type { ContextConfig } from '@/lib/config';
import { SerialQueue } from '@/lib/concurrency';
import { SUMMARY_PREFIX, compressSpan } from './compression';
import type { ChatMessage, ConversationStats, NewChatMessage, Summarizer } from './types';

const LOG_PREFIX = '[ConversationWindow]';

export interface ConversationWindowOptions extends ContextConfig {
  /** Required for summarization; without it evicted turns are discarded */
  summarizer?: Summarizer;
}

/**
 * Consecutive rolling messages that are evicted together
 */
export interface Segment {
  kind: 'turn' | 'summary';
  messages: ChatMessage[];
}

/**
 * Split rolling messages into turns and standalone summary messages
 */
export function segmentMessages(messages: ChatMessage[]): Segment[] {
  const segments: Segment[] = [];
  let current: Segment | null = null;

  for (const message of messages) {
    if (message.summary) {
      current = null;
      segments.push({ kind: 'summary', messages: [message] });
      continue;
    }
    if (message.role === 'user' || current === null) {
      current = { kind: 'turn', messages: [message] };
      segments.push(current);
      continue;
    }
    current.messages.push(message);
  }

  return segments;
}

function newestTimestamp(segment: Segment): number {
  return Math.max(...segment.messages.map((message) => message.timestamp));
}

export class ConversationWindow {
  private pinned: ChatMessage[] = [];
  private rolling: ChatMessage[] = [];
  private readonly queue = new SerialQueue();
  private summariesCreated = 0;
  private summaryFallbacks = 0;
  private evictedTurns = 0;
  private expiredTurns = 0;

  constructor(private readonly options: ConversationWindowOptions) {
    if (options.enableSummarization && !options.summarizer) {
      console.warn(`${LOG_PREFIX} Summarization enabled without a summarizer; evicted turns will be discarded`);
    }
  }

  /**
   * Record a message and run the cleanup pass. System messages (or any
   * message added with isSystem) are pinned.
   */
  addMessage(message: NewChatMessage, isSystem = false): Promise<void> {
    const stored: ChatMessage = { ...message, timestamp: message.timestamp ?? Date.now() };

    return this.queue.run(async () => {
      if (isSystem || (stored.role === 'system' && !stored.summary)) {
        this.pinned.push(stored);
      } else {
        this.rolling.push(stored);
      }
      await this.cleanup();
    });
  }

  /**
   * Pinned messages first, then the rolling window in order
   */
  getMessages(): ChatMessage[] {
    return [...this.pinned, ...this.rolling];
  }

  clear(keepSystem = true): void {
    this.rolling = [];
    if (!keepSystem) {
      this.pinned = [];
    }
    console.log(`${LOG_PREFIX} Cleared context${keepSystem ? ' (system messages kept)' : ''}`);
  }

  getStats(): ConversationStats {
    const regular = this.rolling.filter((message) => !message.summary);
    const oldest = this.rolling.length > 0 ? Math.min(...this.rolling.map((m) => m.timestamp)) : null;

    return {
      totalMessages: this.pinned.length + this.rolling.length,
      pinnedMessages: this.pinned.length,
      userMessages: regular.filter((message) => message.role === 'user').length,
      assistantMessages: regular.filter((message) => message.role === 'assistant').length,
      toolMessages: regular.filter((message) => message.role === 'tool').length,
      summaryMessages: this.rolling.length - regular.length,
      turns: segmentMessages(this.rolling).filter((segment) => segment.kind === 'turn').length,
      maxTurns: this.options.maxTurns,
      maxAgeSeconds: this.options.maxAgeSeconds,
      contextAgeSeconds: oldest === null ? 0 : Math.max(0, Math.floor((Date.now() - oldest) / 1000)),
      summarizationEnabled: this.options.enableSummarization && this.options.summarizer !== undefined,
      summariesCreated: this.summariesCreated,
      summaryFallbacks: this.summaryFallbacks,
      evictedTurns: this.evictedTurns,
      expiredTurns: this.expiredTurns,
    };
  }

  private async cleanup(): Promise<void> {
    this.dropExpired();
    await this.evictOverflow();
  }

  private dropExpired(): void {
    const cutoff = Date.now() - this.options.maxAgeSeconds * 1000;
    const segments = segmentMessages(this.rolling);
    const newestTurn = segments.map((segment) => segment.kind).lastIndexOf('turn');

    const kept: ChatMessage[] = [];
    let expired = 0;
    segments.forEach((segment, index) => {
      if (index !== newestTurn && newestTimestamp(segment) < cutoff) {
        if (segment.kind === 'turn') expired++;
        return;
      }
      kept.push(...segment.messages);
    });

    if (kept.length !== this.rolling.length) {
      this.rolling = kept;
      this.expiredTurns += expired;
      console.log(`${LOG_PREFIX} Dropped ${expired} expired turns (older than ${this.options.maxAgeSeconds}s)`);
    }
  }

  private async evictOverflow(): Promise<void> {
    const segments = segmentMessages(this.rolling);
    const turnIndexes = segments.flatMap((segment, index) => (segment.kind === 'turn' ? [index] : []));
    const overflow = turnIndexes.length - this.options.maxTurns;
    if (overflow <= 0) return;

    // Everything up to the last evicted turn; only summaries can precede the oldest turn
    const lastEvicted = turnIndexes[overflow - 1];
    const span = segments.slice(0, lastEvicted + 1).flatMap((segment) => segment.messages);
    this.evictedTurns += overflow;

    const summarizer = this.options.enableSummarization ? this.options.summarizer : undefined;
    if (!summarizer) {
      this.rolling = this.rolling.filter((message) => message.summary || !span.includes(message));
      console.log(`${LOG_PREFIX} Evicted ${overflow} oldest turns (max ${this.options.maxTurns})`);
      return;
    }

    const result = await compressSpan(span, {
      summarizer,
      summaryPrompt: this.options.summaryPrompt,
      maxSummaryTokens: this.options.maxSummaryTokens,
      timeoutMs: this.options.summaryTimeoutMs,
    });

    // The window may have been cleared while the summarizer ran
    const start = this.rolling.indexOf(span[0]);
    if (start === -1 || span.some((message, offset) => this.rolling[start + offset] !== message)) {
      console.warn(`${LOG_PREFIX} Context changed during summarization, discarding summary`);
      return;
    }

    const summary: ChatMessage = {
      role: this.options.summaryRole,
      content: `${SUMMARY_PREFIX}${result.text}`,
      timestamp: Math.max(...span.map((message) => message.timestamp)),
      summary: true,
    };
    this.rolling.splice(start, span.length, summary);

    if (result.fallback) {
      this.summaryFallbacks++;
    } else {
      this.summariesCreated++;
    }
    console.log(`${LOG_PREFIX} Summarized ${overflow} evicted turns into one message (${summary.role})`);
  }
}
