/**
 * RetryPolicy - bounded retry with exponential backoff and jitter
 *
 * One instance per external call site (transcription, moment analysis,
 * document generation) so each can be tuned independently. Cancellation
 * through an AbortSignal stops both the waiting and further attempts.
 */

import { setTimeout as delay } from 'timers/promises';

// ============================================================================
// Types
// ============================================================================

export interface RetryPolicyOptions {
  /** Total attempts including the first one */
  maxAttempts: number;
  /** Delay before the second attempt in milliseconds */
  baseDelayMs: number;
  /** Upper bound for any single delay */
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Spread delays between 50% and 100% of the computed value */
  jitter: boolean;
  /** Decides whether a failure is worth another attempt */
  isRetryable: (error: unknown) => boolean;
}

export interface RetryAttemptInfo {
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: unknown;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  onRetry?: (info: RetryAttemptInfo) => void;
}

export interface RetryPolicyDeps {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

export const DEFAULT_RETRY_OPTIONS: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  isRetryable: isTransientError,
};

// ============================================================================
// Transient error classification
// ============================================================================

const RETRYABLE_STATUS_CODES = new Set([408, 429, 500, 502, 503, 504, 529]);

const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);

const RETRYABLE_ERROR_NAMES = new Set([
  'APIConnectionError',
  'APIConnectionTimeoutError',
  'RateLimitError',
  'InternalServerError',
  'TimeoutError',
]);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  const found: unknown = Reflect.get(value, key);
  return found;
}

/**
 * HTTP status carried by an SDK error (`status`, `statusCode` or
 * `response.status`), if any.
 */
export function errorStatus(error: unknown): number | undefined {
  const status =
    readProperty(error, 'status') ??
    readProperty(error, 'statusCode') ??
    readProperty(readProperty(error, 'response'), 'status');
  return typeof status === 'number' ? status : undefined;
}

/**
 * Network failures, timeouts, rate limits and 5xx responses are transient.
 * Aborts, auth failures and malformed responses are not.
 */
export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === 'AbortError' || error.name === 'APIUserAbortError') return false;

  const status = errorStatus(error);
  if (status !== undefined) {
    return RETRYABLE_STATUS_CODES.has(status);
  }

  const code = readProperty(error, 'code');
  if (typeof code === 'string' && RETRYABLE_ERROR_CODES.has(code)) return true;

  if (RETRYABLE_ERROR_NAMES.has(error.name)) return true;

  return /rate limit|timed out|socket hang up|network|overloaded/i.test(error.message);
}

/**
 * Error to throw when an AbortSignal fires
 */
export function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const error = new Error(typeof signal.reason === 'string' ? signal.reason : 'Operation aborted');
  error.name = 'AbortError';
  return error;
}

async function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) throw abortReason(signal);
    throw error;
  }
}

// ============================================================================
// RetryPolicy Class
// ============================================================================

export class RetryPolicy {
  readonly options: RetryPolicyOptions;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private random: () => number;

  constructor(options: Partial<RetryPolicyOptions> = {}, deps: RetryPolicyDeps = {}) {
    this.options = { ...DEFAULT_RETRY_OPTIONS, ...options };
    if (this.options.maxAttempts < 1) {
      throw new RangeError('maxAttempts must be at least 1');
    }
    this.sleep = deps.sleep ?? abortableSleep;
    this.random = deps.random ?? Math.random;
  }

  /**
   * Delay to wait after the given failed attempt (1-based).
   */
  delayFor(attempt: number): number {
    const { baseDelayMs, backoffMultiplier, maxDelayMs, jitter } = this.options;
    const raw = Math.min(baseDelayMs * Math.pow(backoffMultiplier, attempt - 1), maxDelayMs);
    return jitter ? raw * (0.5 + this.random() * 0.5) : raw;
  }

  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    options: ExecuteOptions = {}
  ): Promise<T> {
    const { signal, onRetry } = options;
    const { maxAttempts, isRetryable } = this.options;

    for (let attempt = 1; ; attempt++) {
      if (signal?.aborted) throw abortReason(signal);

      try {
        return await operation(attempt);
      } catch (error) {
        if (signal?.aborted) throw abortReason(signal);
        if (attempt >= maxAttempts || !isRetryable(error)) {
          throw error;
        }

        const delayMs = this.delayFor(attempt);
        onRetry?.({ attempt, maxAttempts, delayMs, error });
        await this.sleep(delayMs, signal);
      }
    }
  }
}
