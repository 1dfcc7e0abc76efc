/**
 * Conversation Compression
 *
 * Folds evicted turns into a single summary. An existing summary at the head
 * of the evicted span is rendered with it, so the new summary merges the old
 * one instead of stacking another message on top.
 */

import { withTimeout } from '@/lib/concurrency';
import { errorMessage } from '@/lib/errors';
import type { ChatMessage, Summarizer } from './types';

const LOG_PREFIX = '[SessionCompression]';

/** Prefix carried by every summary message's content */
export const SUMMARY_PREFIX = 'Conversation summary: ';

/** Joins the span's contents when the summarizer cannot produce a summary */
export const FALLBACK_SEPARATOR = '\n';

export interface CompressionOptions {
  summarizer: Summarizer;
  summaryPrompt: string;
  maxSummaryTokens: number;
  timeoutMs: number;
}

export interface CompressionResult {
  text: string;
  fallback: boolean;
}

/**
 * Message content without the summary prefix
 */
export function stripSummaryPrefix(message: ChatMessage): string {
  if (message.summary && message.content.startsWith(SUMMARY_PREFIX)) {
    return message.content.slice(SUMMARY_PREFIX.length);
  }
  return message.content;
}

function renderMessage(message: ChatMessage): string {
  if (message.summary) {
    return `Earlier summary: ${stripSummaryPrefix(message)}`;
  }

  switch (message.role) {
    case 'user':
      return `User: ${message.content}`;
    case 'assistant': {
      const calls = (message.toolCalls ?? []).map((call) => `${call.name}(${call.arguments})`);
      if (calls.length === 0) return `Assistant: ${message.content}`;
      const text = message.content ? `${message.content} ` : '';
      return `Assistant: ${text}[called ${calls.join(', ')}]`;
    }
    case 'tool':
      return `Tool result: ${message.content}`;
    case 'system':
      return `System: ${message.content}`;
  }
}

/**
 * Role-prefixed transcript, one message per line
 */
export function renderTranscript(messages: ChatMessage[]): string {
  return messages.map(renderMessage).join('\n');
}

export function buildSummaryPrompt(template: string, maxTokens: number, transcript: string): string {
  return `${template.replace(/\{max_tokens\}/g, String(maxTokens))}\n\n${transcript}`;
}

/**
 * Contents of the span joined as-is, used when summarization fails
 */
export function fallbackSummary(messages: ChatMessage[]): string {
  return messages
    .map(stripSummaryPrefix)
    .filter((content) => content.length > 0)
    .join(FALLBACK_SEPARATOR);
}

/**
 * Summarize an evicted span. Never throws: a failed, timed-out or empty
 * summarization yields the fallback text.
 */
export async function compressSpan(
  messages: ChatMessage[],
  options: CompressionOptions
): Promise<CompressionResult> {
  const startTime = Date.now();
  const prompt = buildSummaryPrompt(
    options.summaryPrompt,
    options.maxSummaryTokens,
    renderTranscript(messages)
  );

  console.log(`${LOG_PREFIX} Compressing ${messages.length} messages...`);

  const controller = new AbortController();
  try {
    const summary = await withTimeout(
      options.summarizer.summarize(prompt, options.maxSummaryTokens, controller.signal),
      options.timeoutMs,
      'Summarization'
    );

    const text = summary.trim();
    if (text.length > 0) {
      console.log(`${LOG_PREFIX} Compression complete (${Date.now() - startTime}ms, ${text.length} chars)`);
      return { text, fallback: false };
    }
    console.warn(`${LOG_PREFIX} Summarizer returned an empty summary`);
  } catch (error) {
    console.error(`${LOG_PREFIX} Compression failed: ${errorMessage(error)}`);
  } finally {
    controller.abort();
  }

  const text = fallbackSummary(messages);
  console.warn(`${LOG_PREFIX} Using fallback summary (${text.length} chars)`);
  return { text, fallback: true };
}
