/**
 * Retry policy for middleware reads
 *
 * A read that fails transiently (rate limiting, 5xx, a dropped connection,
 * a timeout) is repeated with exponential backoff and jitter. Job-starting
 * writes never go through here: repeating one could start a second job.
 */

import type { RetryConfig, RetryResult } from './types.js';
import { logger, type ApiLogger } from './logger.js';

export type RetryPolicy = Required<RetryConfig>;

export const DEFAULT_RETRY_CONFIG: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

/** Socket-level failures worth another attempt */
const TRANSIENT_NETWORK_CODES = ['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE'];

export interface RetryOptions extends RetryConfig {
  logger?: ApiLogger;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Called when the last permitted attempt failed */
  onExhausted?: (error: Error, attempts: number) => void;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * A middleware response with a non-2xx status, or one whose body had the
 * wrong shape
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  /** Seconds, from the Retry-After header */
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options: { code?: string; details?: Record<string, unknown>; retryAfter?: number } = {}
  ) {
    super(message);
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = options.code;
    this.details = options.details;
    this.retryAfter = options.retryAfter;
  }

  isAuthError(): boolean {
    return this.status === 401 || this.status === 403;
  }
}

// =============================================================================
// Policy
// =============================================================================

export function resolveRetryPolicy(config: RetryConfig = {}): RetryPolicy {
  return {
    maxRetries: config.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: config.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: config.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: config.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: config.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };
}

/**
 * Delay before retry number `attempt` (1-based)
 *
 * A server-supplied Retry-After wins over the exponential schedule. The
 * result never exceeds `maxDelayMs`.
 */
export function calculateDelay(attempt: number, policy: RetryPolicy, retryAfter?: number): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * policy.baseDelayMs * policy.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, policy.maxDelayMs);
  }

  const delay = policy.baseDelayMs * 2 ** (attempt - 1);
  const spread = delay * policy.jitterFactor;
  const jittered = delay - spread + Math.random() * spread * 2;
  return Math.min(Math.max(jittered, 0), policy.maxDelayMs);
}

function causeCode(error: Error): string | undefined {
  const cause = error.cause;
  if (cause instanceof Error && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return undefined;
}

export function isRetryableError(error: Error, policy: RetryPolicy): boolean {
  if (error instanceof ApiRequestError) {
    return policy.retryableStatuses.includes(error.status);
  }
  // our own request timeout
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  const code = causeCode(error);
  if (code !== undefined && TRANSIENT_NETWORK_CODES.includes(code)) {
    return true;
  }
  // undici: TypeError('fetch failed')
  if (error.message === 'fetch failed' || error.message.includes('socket hang up')) {
    return true;
  }
  return TRANSIENT_NETWORK_CODES.some((transient) => error.message.includes(transient));
}

/**
 * Parse a Retry-After header (delta-seconds or HTTP-date) into seconds
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = Number.parseInt(value, 10);
  if (Number.isFinite(seconds) && seconds > 0) {
    return seconds;
  }

  const untilMs = new Date(value).getTime() - Date.now();
  return Number.isFinite(untilMs) && untilMs > 0 ? Math.ceil(untilMs / 1000) : undefined;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Run `fn`, retrying transient failures under the given policy
 *
 * Never rejects; the outcome and attempt count are in the result.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<RetryResult<T>> {
  const policy = resolveRetryPolicy(options);
  const log = options.logger ?? logger;
  const startedAt = Date.now();

  for (let attempt = 1; ; attempt++) {
    try {
      const data = await fn();
      if (attempt > 1) {
        log.info(`Request succeeded on attempt ${attempt}`);
      }
      return { success: true, data, attempts: attempt, totalTimeMs: Date.now() - startedAt };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const exhausted = attempt > policy.maxRetries;

      if (exhausted || !isRetryableError(error, policy)) {
        if (exhausted && policy.maxRetries > 0) {
          log.warn(`Giving up after ${attempt} attempts`, { error: error.message });
          options.onExhausted?.(error, attempt);
        }
        return { success: false, error, attempts: attempt, totalTimeMs: Date.now() - startedAt };
      }

      const delayMs = calculateDelay(
        attempt,
        policy,
        error instanceof ApiRequestError ? error.retryAfter : undefined
      );
      log.info(`Attempt ${attempt} failed; retrying in ${Math.round(delayMs)}ms`, {
        error: error.message,
        status: error instanceof ApiRequestError ? error.status : undefined,
      });
      options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs);
    }
  }
}
