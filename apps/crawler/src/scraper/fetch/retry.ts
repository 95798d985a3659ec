import type { ILogger } from '@adsift/logger'
import { isTransientResult } from '../errors.js'
import type { FetchOptions, FetchResult, PageFetcher, RetryPolicy } from '../types.js'
import { DEFAULT_RETRY_POLICY } from '../types.js'

export interface RetryingFetcherOptions {
  retryPolicy?: Partial<RetryPolicy>
  logger?: ILogger
  /** Cuts backoff sleeps short; the pending retry is then abandoned */
  stopSignal?: AbortSignal
}

export function calculateBackoffMs(attempt: number, policy: RetryPolicy): number {
  return Math.min(
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, Math.max(0, attempt - 1)),
    policy.maxDelayMs
  )
}

/**
 * Resolves after `ms`, or early when the signal aborts. Never rejects.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) return

  await new Promise<void>(resolve => {
    const timeout = setTimeout(done, ms)

    function done(): void {
      clearTimeout(timeout)
      signal?.removeEventListener('abort', done)
      resolve()
    }

    signal?.addEventListener('abort', done, { once: true })
  })
}

/**
 * Wraps a single-attempt PageFetcher with a per-fetch retry budget.
 * A fetch makes at most `retries + 1` attempts; permanent failures are
 * returned after the first attempt.
 */
export class RetryingFetcher implements PageFetcher {
  private readonly inner: PageFetcher
  private readonly policy: RetryPolicy
  private readonly logger?: ILogger
  private readonly stopSignal?: AbortSignal

  constructor(inner: PageFetcher, options: RetryingFetcherOptions = {}) {
    this.inner = inner
    this.policy = { ...DEFAULT_RETRY_POLICY, ...options.retryPolicy }
    this.logger = options.logger
    this.stopSignal = options.stopSignal
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    const maxAttempts = this.policy.retries + 1
    let attempt = 1

    while (true) {
      const result = await this.inner.fetch(url, options)

      const canRetry =
        result.status !== 'ok' &&
        attempt < maxAttempts &&
        isTransientResult(result, this.policy.retryableStatusCodes) &&
        !this.stopSignal?.aborted &&
        !options?.signal?.aborted

      if (!canRetry) {
        return { ...result, attempts: attempt }
      }

      const delayMs = calculateBackoffMs(attempt, this.policy)
      this.logger?.debug('Retrying fetch', {
        attempt,
        maxAttempts,
        delayMs,
        status: result.status,
        statusCode: result.statusCode,
      })
      await sleep(delayMs, this.stopSignal)
      if (this.stopSignal?.aborted) {
        return { ...result, attempts: attempt }
      }
      attempt++
    }
  }

  async close(): Promise<void> {
    await this.inner.close?.()
  }
}
