/**
 * Retry wrappers with exponential backoff for network-bound calls.
 *
 * Both wrappers swallow the final failure: they log it and resolve to null, so
 * callers treat null as "the operation failed" instead of catching.
 */

import { isNetworkError } from "./errors.js"
import { logger } from "./logger.js"

export interface RetryOptions {
  /** Total attempts, including the first. */
  retries?: number
  initialDelayMs?: number
  maxDelayMs?: number
  /** Label used in log lines; defaults to the wrapped function's name. */
  name?: string
  isRetryable?: (err: unknown) => boolean
}

interface ResolvedRetryOptions {
  retries: number
  initialDelayMs: number
  maxDelayMs: number
  name: string
  isRetryable: (err: unknown) => boolean
}

function resolveOptions(fnName: string, options: RetryOptions): ResolvedRetryOptions {
  return {
    retries: Math.max(1, options.retries ?? 5),
    initialDelayMs: options.initialDelayMs ?? 1000,
    maxDelayMs: options.maxDelayMs ?? 30_000,
    name: options.name ?? (fnName || "anonymous"),
    isRetryable: options.isRetryable ?? isNetworkError,
  }
}

/**
 * Delay before the next attempt after attempt `attempt` (1-based) failed.
 * 1000ms initial: 2000, 4000, 8000, ... capped at maxDelayMs.
 */
export function computeBackoffDelay(attempt: number, initialDelayMs: number, maxDelayMs: number): number {
  return Math.min(initialDelayMs * Math.pow(2, attempt), maxDelayMs)
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

type Decision = { retry: true; delayMs: number } | { retry: false }

function handleFailure(err: unknown, attempt: number, opts: ResolvedRetryOptions): Decision {
  if (!opts.isRetryable(err)) {
    logger.error(
      { function: opts.name, attempt, err },
      `Unexpected error in ${opts.name}: ${errorMessage(err)}`
    )
    return { retry: false }
  }

  if (attempt >= opts.retries) {
    logger.error(
      { function: opts.name, attempt, retries: opts.retries, err },
      `${opts.name} failed after ${opts.retries} attempts`
    )
    return { retry: false }
  }

  const delayMs = computeBackoffDelay(attempt, opts.initialDelayMs, opts.maxDelayMs)
  logger.warn(
    { function: opts.name, attempt, retries: opts.retries, nextDelayMs: delayMs, error: errorMessage(err) },
    `Network error in ${opts.name} (attempt ${attempt}/${opts.retries}), retrying in ${delayMs}ms`
  )
  return { retry: true, delayMs }
}

export function retryWithBackoff<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => Promise<TResult>,
  options: RetryOptions = {}
): (...args: TArgs) => Promise<TResult | null> {
  const opts = resolveOptions(fn.name, options)

  return async (...args: TArgs): Promise<TResult | null> => {
    for (let attempt = 1; attempt <= opts.retries; attempt++) {
      try {
        return await fn(...args)
      } catch (err) {
        const decision = handleFailure(err, attempt, opts)
        if (!decision.retry) {
          return null
        }
        await new Promise((resolve) => setTimeout(resolve, decision.delayMs))
      }
    }
    return null
  }
}

function sleepSync(ms: number): void {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms)
}

/**
 * Synchronous counterpart of retryWithBackoff. Blocks the thread between
 * attempts, so only use it from scripts, never from request handlers.
 */
export function retryWithBackoffSync<TArgs extends unknown[], TResult>(
  fn: (...args: TArgs) => TResult,
  options: RetryOptions = {}
): (...args: TArgs) => TResult | null {
  const opts = resolveOptions(fn.name, options)

  return (...args: TArgs): TResult | null => {
    for (let attempt = 1; attempt <= opts.retries; attempt++) {
      try {
        return fn(...args)
      } catch (err) {
        const decision = handleFailure(err, attempt, opts)
        if (!decision.retry) {
          return null
        }
        sleepSync(decision.delayMs)
      }
    }
    return null
  }
}
