/**
 * Agent Errors
 *
 * Structured error type shared by the router, selector, conversation window
 * and agent loop. Codes are stable; callers branch on `code`, never on message text.
 */

export type AgentErrorCode =
  | 'CONFIG_ERROR'
  | 'TRANSPORT_ERROR'
  | 'TIMEOUT'
  | 'CANCELLED'
  | 'UNKNOWN_TOOL'
  | 'UNKNOWN_SERVER'
  | 'DUPLICATE_SERVER'
  | 'SERVER_UNAVAILABLE'
  | 'CAPABILITY_ERROR';

/**
 * Codes worth another attempt: the same call may succeed once the server
 * recovers. Caller misuse (unknown names, duplicates) never is.
 */
const RETRYABLE_CODES: ReadonlySet<AgentErrorCode> = new Set([
  'TRANSPORT_ERROR',
  'TIMEOUT',
  'SERVER_UNAVAILABLE',
]);

export interface AgentErrorOptions {
  code: AgentErrorCode;
  message: string;
  /** Server the failure belongs to, when there is one */
  serverName?: string;
  cause?: unknown;
}

export class AgentError extends Error {
  readonly code: AgentErrorCode;
  readonly serverName: string | undefined;
  readonly retryable: boolean;
  readonly cause: unknown;

  constructor(opts: AgentErrorOptions) {
    super(opts.message);
    this.name = 'AgentError';
    this.code = opts.code;
    this.serverName = opts.serverName;
    this.retryable = RETRYABLE_CODES.has(opts.code);
    this.cause = opts.cause;

    Object.setPrototypeOf(this, AgentError.prototype);
  }

  /**
   * Short form used in tool-result messages and tagged chat failures
   */
  toTaggedString(): string {
    const server = this.serverName ? ` (server: ${this.serverName})` : '';
    return `[${this.code}]${server} ${this.message}`;
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Wrap any thrown value as an AgentError, keeping an existing code.
 */
export function toAgentError(
  error: unknown,
  fallbackCode: AgentErrorCode,
  serverName?: string
): AgentError {
  if (isAgentError(error)) {
    if (error.serverName || !serverName) return error;
    return new AgentError({
      code: error.code,
      message: error.message,
      serverName,
      cause: error.cause,
    });
  }

  return new AgentError({
    code: fallbackCode,
    message: errorMessage(error),
    serverName,
    cause: error,
  });
}

export function isRetryable(error: unknown): boolean {
  return isAgentError(error) && error.retryable;
}
