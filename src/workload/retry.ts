/**
 * Retry logic with exponential backoff for managed-service operations
 *
 * Features:
 * - Exponential backoff with configurable base delay
 * - Jitter so that units of one deployment do not retry in lockstep
 * - Per-attempt time bound; exceeding it counts as a transient failure
 * - Only transient failures are retried
 */

import { TimeoutError, isTransient, toError } from '../errors.js';
import { logger, type OperatorLogger } from './logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Retry policy for workload operations
 */
export interface RetryPolicy {
  /** Maximum number of retry attempts after the first try (default: 3) */
  maxRetries?: number;
  /** Base delay in milliseconds (default: 1000) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Jitter factor (0-1) to add randomness (default: 0.1) */
  jitterFactor?: number;
  /** Time bound for a single attempt in milliseconds (default: 60000) */
  timeoutMs?: number;
}

/**
 * Result of a retry operation
 */
export interface RetryResult<T> {
  /** Whether the operation succeeded */
  success: boolean;
  /** The result data (if successful) */
  data?: T;
  /** The error (if failed) */
  error?: Error;
  /** Number of attempts made */
  attempts: number;
  /** Total time spent including backoff (ms) */
  totalTimeMs: number;
}

/**
 * Options for a retry operation
 */
export interface RetryOptions extends RetryPolicy {
  /** Operation name used in logs and timeout errors */
  operation?: string;
  /** Custom logger instance */
  logger?: OperatorLogger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Custom function to determine if an error is retryable */
  isRetryable?: (error: Error) => boolean;
}

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry policy
 */
export const DEFAULT_RETRY_POLICY: Required<RetryPolicy> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  timeoutMs: 60000,
};

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The current attempt number (1-indexed)
 */
export function calculateDelay(attempt: number, policy: Required<RetryPolicy>): number {
  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = policy.baseDelayMs * Math.pow(2, attempt - 1);

  const jitter =
    Math.random() * exponentialDelay * policy.jitterFactor * 2 -
    exponentialDelay * policy.jitterFactor;

  // Clamp to max delay
  return Math.min(Math.max(exponentialDelay + jitter, 0), policy.maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) {
    return Promise.resolve();
  }
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race an operation against a time bound
 *
 * The operation receives a signal that is aborted when the bound passes, so
 * that child processes and pending I/O are cancelled with it.
 */
export async function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  operation = 'operation'
): Promise<T> {
  const controller = new AbortController();
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return fn(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TimeoutError(operation, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([fn(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Fill a partial policy with defaults
 */
export function resolvePolicy(policy: RetryPolicy = {}): Required<RetryPolicy> {
  return {
    maxRetries: policy.maxRetries ?? DEFAULT_RETRY_POLICY.maxRetries,
    baseDelayMs: policy.baseDelayMs ?? DEFAULT_RETRY_POLICY.baseDelayMs,
    maxDelayMs: policy.maxDelayMs ?? DEFAULT_RETRY_POLICY.maxDelayMs,
    jitterFactor: policy.jitterFactor ?? DEFAULT_RETRY_POLICY.jitterFactor,
    timeoutMs: policy.timeoutMs ?? DEFAULT_RETRY_POLICY.timeoutMs,
  };
}

/**
 * Execute a function with retry logic
 *
 * Each attempt gets its own abort signal, see {@link withTimeout}.
 *
 * @returns RetryResult with success/failure and metadata
 */
export async function withRetry<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const policy = resolvePolicy(options);
  const operation = options.operation ?? 'operation';
  const log = options.logger ?? logger;
  const startTime = Date.now();
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 1; attempt <= policy.maxRetries + 1; attempt++) {
    try {
      const result = await withTimeout(fn, policy.timeoutMs, operation);

      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`${operation} succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }

      return { success: true, data: result, attempts: attempt, totalTimeMs };
    } catch (error) {
      lastError = toError(error);

      const retryable = options.isRetryable
        ? options.isRetryable(lastError)
        : isTransient(lastError);
      const isLastAttempt = attempt > policy.maxRetries;

      if (!retryable || isLastAttempt) {
        if (isLastAttempt && policy.maxRetries > 0) {
          log.warn(`All ${policy.maxRetries} retry attempts exhausted for ${operation}`, {
            error: lastError.message,
            attempts: attempt,
          });
        } else if (!retryable) {
          log.debug(`${operation} failed with a non-retryable error`, {
            error: lastError.message,
            attempts: attempt,
          });
        }

        return {
          success: false,
          error: lastError,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      }

      const delayMs = calculateDelay(attempt, policy);

      log.info(`Retry attempt ${attempt}/${policy.maxRetries} for ${operation} in ${Math.round(delayMs)}ms`, {
        error: lastError.message,
        delayMs: Math.round(delayMs),
      });

      options.onRetry?.(attempt, lastError, delayMs);

      await sleep(delayMs);
    }
  }

  // Unreachable: the loop returns on its last attempt
  return {
    success: false,
    error: lastError,
    attempts: policy.maxRetries + 1,
    totalTimeMs: Date.now() - startTime,
  };
}
