/**
 * Plumbing shared by the commands: fetcher construction, run cancellation,
 * the run logger and the final summary.
 */

import { randomUUID } from 'node:crypto'
import type { Readable, Writable } from 'node:stream'
import type { ILogger } from '@adsift/logger'
import { logger as rootLogger } from '../config/logger.js'
import { createRunLogger, describeProxy } from '../config/structured-log.js'
import { FatalConfigError, toFatalConfigError } from '../scraper/errors.js'
import { Cancellation } from '../scraper/fetch/cancellation.js'
import { HttpFetcher } from '../scraper/fetch/http-fetcher.js'
import { RetryingFetcher } from '../scraper/fetch/retry.js'
import { createRunSummary, exitCodeFor, type CrawlCommand, type RunSummary } from '../scraper/summary.js'
import type { CrawlContext, PageFetcher, RenderMode } from '../scraper/types.js'
import type { CommonOptions } from './options.js'
import { ProgressReporter } from './progress.js'

export interface FetcherSettings {
  proxy?: string
  renderMode: RenderMode
}

export type FetcherFactory = (settings: FetcherSettings) => PageFetcher

export interface CommandIO {
  stdin: Readable & { isTTY?: boolean }
  stdout: Writable
  stderr: Writable & { isTTY?: boolean }
  /** Aborted on SIGINT / SIGTERM */
  interrupt?: AbortSignal
  /** Single-attempt fetcher; HttpFetcher when omitted */
  createFetcher?: FetcherFactory
  logger?: ILogger
}

const defaultFetcherFactory: FetcherFactory = settings => new HttpFetcher({ proxy: settings.proxy })

/**
 * @throws FatalConfigError when the fetcher cannot serve the requested mode
 */
export function createPageFetcher(options: CommonOptions, io: CommandIO): PageFetcher {
  if (!options.headless) {
    throw new FatalConfigError('--headless=false needs a visible browser session, which the HTTP fetcher cannot open')
  }
  const factory = io.createFetcher ?? defaultFetcherFactory
  try {
    return factory({ proxy: options.proxy, renderMode: 'headless' })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new FatalConfigError(`Cannot set up the page fetcher: ${reason}`, error)
  }
}

/**
 * Print a startup failure and return its exit code.
 */
export function reportFatal(error: unknown, io: CommandIO): number {
  const fatal = toFatalConfigError(error)
  io.stderr.write(`error: ${fatal.message}\n`)
  return fatal.exitCode
}

export interface CrawlRun {
  ctx: CrawlContext
  cancellation: Cancellation
  summary: RunSummary
  progress: ProgressReporter
  log: ILogger
}

export function startRun(
  command: CrawlCommand,
  options: CommonOptions,
  io: CommandIO,
  pageFetcher: PageFetcher
): CrawlRun {
  const cancellation = new Cancellation(options.graceMs)
  const log = createRunLogger(io.logger ?? rootLogger, { command, runId: randomUUID().slice(0, 8) })

  const fetcher = new RetryingFetcher(pageFetcher, {
    retryPolicy: { retries: options.retries },
    logger: log.child('fetch'),
    stopSignal: cancellation.stopSignal,
  })

  log.info('Run started', {
    fields: [...options.selection].join(','),
    retries: options.retries,
    timeoutMs: options.timeoutMs,
    proxy: describeProxy(options.proxy),
    keywords: options.keywords,
  })

  return {
    ctx: {
      fetcher,
      logger: log,
      renderMode: 'headless',
      timeoutMs: options.timeoutMs,
      stopSignal: cancellation.stopSignal,
      abortSignal: cancellation.abortSignal,
    },
    cancellation,
    summary: createRunSummary(command),
    progress: new ProgressReporter(io.stderr, options.progress),
    log,
  }
}

/**
 * Stop the run when the caller is interrupted. Returns the unsubscribe.
 */
export function watchInterrupt(run: CrawlRun, io: CommandIO): () => void {
  const signal = io.interrupt
  if (!signal) return () => undefined

  const onInterrupt = (): void => {
    run.log.warn('Interrupted, finishing in-flight work')
    run.cancellation.stop('interrupted')
  }
  if (signal.aborted) {
    onInterrupt()
    return () => undefined
  }
  signal.addEventListener('abort', onInterrupt, { once: true })
  return () => signal.removeEventListener('abort', onInterrupt)
}

/**
 * Release the run's resources, log the summary and return the exit code.
 */
export async function finishRun(run: CrawlRun, startedAt: number): Promise<number> {
  const { summary, cancellation } = run
  cancellation.dispose()
  await run.ctx.fetcher.close?.()

  summary.stopped = cancellation.stopped
  summary.durationMs = Date.now() - startedAt
  run.progress.finish(summary)

  const exitCode = exitCodeFor(summary)
  run.log.info('Run finished', {
    ...summary,
    stopReason: cancellation.stopReason ?? undefined,
    exitCode,
  })
  return exitCode
}
