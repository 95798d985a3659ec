import type { ParsedArgs } from '../parse-flags.js'
import { FatalConfigError } from '../../scraper/errors.js'
import { runPool } from '../../scraper/fetch/pool.js'
import { loadKeywordMatcher } from '../../scraper/match/keywords.js'
import type { KeywordMatcher } from '../../scraper/match/keyword-matcher.js'
import { AdResolver, type ResolveOutcome } from '../../scraper/resolver.js'
import { openRecordSource, urlSource, type RecordSource } from '../../scraper/stream/reader.js'
import { RecordWriter } from '../../scraper/stream/writer.js'
import { orderedFields, type FieldName, type PageFetcher } from '../../scraper/types.js'
import { isValidUrl } from '../../scraper/utils/url.js'
import { parseDetailOptions, type DetailOptions } from '../options.js'
import {
  createPageFetcher,
  finishRun,
  reportFatal,
  startRun,
  watchInterrupt,
  type CommandIO,
  type CrawlRun,
} from '../runtime.js'

/**
 * Output columns: the selection plus every column the upstream stage
 * gathered, so chained fields pass through. `link` follows the selection.
 */
export function outputFields(selection: ReadonlySet<FieldName>, gathered: ReadonlySet<FieldName>): FieldName[] {
  const fields = new Set(selection)
  for (const field of gathered) {
    if (field !== 'link') fields.add(field)
  }
  return orderedFields(fields)
}

async function openSource(args: ParsedArgs, io: CommandIO, signal: AbortSignal): Promise<RecordSource> {
  if (args.positionals.length > 0) {
    const invalid = args.positionals.find(url => !isValidUrl(url))
    if (invalid !== undefined) {
      throw new FatalConfigError(`Invalid ad URL: ${invalid}`)
    }
    return urlSource(args.positionals)
  }
  if (io.stdin.isTTY) {
    throw new FatalConfigError('No ad URL given')
  }
  return openRecordSource(io.stdin, { logger: io.logger, signal })
}

function record(run: CrawlRun, outcome: ResolveOutcome): void {
  const { summary } = run
  summary.inputs++
  switch (outcome.status) {
    case 'resolved':
      summary.degraded += outcome.degraded.length
      break
    case 'filtered_out':
      summary.filteredOut++
      break
    case 'fetch_failed':
      summary.failed++
      break
  }
}

export async function runDetailCommand(args: ParsedArgs, io: CommandIO): Promise<number> {
  let options: DetailOptions
  let matcher: KeywordMatcher | undefined
  let pageFetcher: PageFetcher

  try {
    options = parseDetailOptions(args.flags)
    matcher = options.keywords ? await loadKeywordMatcher(options.keywords) : undefined
    pageFetcher = createPageFetcher(options, io)
  } catch (error) {
    return reportFatal(error, io)
  }

  const startedAt = Date.now()
  const run = startRun('detail', options, io, pageFetcher)
  const unwatch = watchInterrupt(run, io)
  const { summary } = run

  let source: RecordSource
  try {
    source = await openSource(args, io, run.cancellation.stopSignal)
  } catch (error) {
    unwatch()
    run.cancellation.dispose()
    await pageFetcher.close?.()
    return reportFatal(error, io)
  }

  const writer = new RecordWriter(io.stdout, outputFields(options.selection, source.gathered), error => {
    run.log.warn('Output closed, stopping', { error_message: error.message })
    run.cancellation.stop('output closed')
  })
  const resolver = new AdResolver(run.ctx, { selection: options.selection, matcher })

  try {
    await writer.writeHeader()
    await runPool(source.items, item => resolver.resolve(item), {
      concurrency: options.concurrency,
      stopSignal: run.cancellation.stopSignal,
      onResult: async outcome => {
        record(run, outcome)
        if (outcome.status === 'resolved') {
          await writer.write(outcome.record)
          summary.emitted++
        }
        run.progress.update(summary)
      },
    })
  } finally {
    unwatch()
    source.close()
    summary.invalidInputs = source.stats.invalid
    summary.duplicates = source.stats.duplicates
    summary.dropped = writer.dropped
  }

  return finishRun(run, startedAt)
}
