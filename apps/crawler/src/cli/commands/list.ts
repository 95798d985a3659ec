import type { ParsedArgs } from '../parse-flags.js'
import { FatalConfigError } from '../../scraper/errors.js'
import { loadKeywordMatcher } from '../../scraper/match/keywords.js'
import type { KeywordMatcher } from '../../scraper/match/keyword-matcher.js'
import { openRecordSource } from '../../scraper/stream/reader.js'
import { RecordWriter } from '../../scraper/stream/writer.js'
import { orderedFields, type PageFetcher } from '../../scraper/types.js'
import { isValidUrl } from '../../scraper/utils/url.js'
import { ListingWalker } from '../../scraper/walker.js'
import { parseListOptions, type ListOptions } from '../options.js'
import { createPageFetcher, finishRun, reportFatal, startRun, watchInterrupt, type CommandIO } from '../runtime.js'

interface StartUrls {
  urls: string[]
  invalid: number
}

/**
 * Start URLs from the command line, or one per line from standard input.
 * A malformed URL on the command line is fatal; on standard input it is
 * skipped and counted.
 */
async function collectStartUrls(args: ParsedArgs, io: CommandIO): Promise<StartUrls> {
  if (args.positionals.length > 0) {
    const invalid = args.positionals.find(url => !isValidUrl(url))
    if (invalid !== undefined) {
      throw new FatalConfigError(`Invalid start URL: ${invalid}`)
    }
    return { urls: args.positionals, invalid: 0 }
  }

  if (io.stdin.isTTY) {
    throw new FatalConfigError('No start URL given')
  }

  const source = await openRecordSource(io.stdin, { logger: io.logger })
  const urls: string[] = []
  for await (const item of source.items) {
    urls.push(item.link)
  }
  if (urls.length === 0) {
    throw new FatalConfigError('No start URL given')
  }
  return { urls, invalid: source.stats.invalid }
}

export async function runListCommand(args: ParsedArgs, io: CommandIO): Promise<number> {
  let options: ListOptions
  let matcher: KeywordMatcher | undefined
  let startUrls: StartUrls
  let pageFetcher: PageFetcher

  try {
    options = parseListOptions(args.flags)
    matcher = options.keywords ? await loadKeywordMatcher(options.keywords) : undefined
    startUrls = await collectStartUrls(args, io)
    pageFetcher = createPageFetcher(options, io)
  } catch (error) {
    return reportFatal(error, io)
  }

  const startedAt = Date.now()
  const run = startRun('list', options, io, pageFetcher)
  const unwatch = watchInterrupt(run, io)
  const { summary } = run
  summary.invalidInputs = startUrls.invalid

  const writer = new RecordWriter(io.stdout, orderedFields(options.selection), error => {
    run.log.warn('Output closed, stopping', { error_message: error.message })
    run.cancellation.stop('output closed')
  })

  const walker = new ListingWalker(run.ctx, {
    selection: options.selection,
    matcher,
    includeRegular: options.includeRegular,
    includePromoted: options.includePromoted,
    maxRecords: options.limit,
    maxPages: options.maxPages,
  })

  try {
    await writer.writeHeader()
    for (const url of startUrls.urls) {
      if (run.cancellation.stopped || walker.recordLimitReached) break
      summary.inputs++

      const result = await walker.walk(url, async record => {
        await writer.write(record)
        summary.emitted = walker.emitted
        run.progress.update(summary)
      })

      summary.pagesVisited += result.pagesVisited
      summary.filteredOut += result.filteredOut
      summary.duplicates += result.duplicates
      summary.degraded += result.degraded
      if (result.state === 'Failed') {
        summary.failed++
      }
    }
  } finally {
    unwatch()
    summary.emitted = walker.emitted
    summary.dropped = writer.dropped
  }

  return finishRun(run, startedAt)
}
