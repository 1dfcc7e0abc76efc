/**
 * Timeout and cancellation helpers for external calls.
 */

import { AgentError } from '@/lib/errors';

/**
 * Race a promise against a timer and an optional abort signal.
 *
 * A timeout rejects with TIMEOUT, an abort with CANCELLED, so callers can tell
 * a slow server apart from one that failed outright.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
  options?: { signal?: AbortSignal; serverName?: string }
): Promise<T> {
  const signal = options?.signal;
  const serverName = options?.serverName;

  if (signal?.aborted) {
    // The original promise may still settle; keep its rejection from going unhandled
    promise.catch(() => undefined);
    return Promise.reject(
      new AgentError({ code: 'CANCELLED', message: `${label} cancelled`, serverName })
    );
  }

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      cleanup();
      reject(
        new AgentError({
          code: 'TIMEOUT',
          message: `${label} timed out after ${timeoutMs}ms`,
          serverName,
        })
      );
    }, timeoutMs);

    const onAbort = () => {
      cleanup();
      reject(new AgentError({ code: 'CANCELLED', message: `${label} cancelled`, serverName }));
    };

    function cleanup(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }

    signal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        cleanup();
        reject(error);
      }
    );
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
