/**
 * Record Reader
 *
 * Reads the input of a `detail` run. Two shapes are accepted:
 * - a record stream written by `list` (header line first), whose rows carry
 *   fields already gathered upstream
 * - a plain list of ad URLs, one per line
 *
 * Blank lines are skipped. Lines without a valid http(s) link, and rows that
 * do not parse as CSV, are skipped with a warning. Repeated links are read
 * once. A byte order mark before the first line is ignored.
 */

import { createInterface } from 'node:readline'
import type { Readable } from 'node:stream'
import type { ILogger } from '@adsift/logger'
import { CsvError } from 'csv-parse'
import { FatalConfigError } from '../errors.js'
import type { ResolveInput } from '../resolver.js'
import type { AdDetail, FieldName } from '../types.js'
import { canonicalizeUrl, isValidUrl } from '../utils/url.js'
import { parseHeader, parseLine, rowToRecord } from './codec.js'

export interface ReaderStats {
  lines: number
  invalid: number
  duplicates: number
}

export interface RecordSource {
  /** Columns of the upstream header; empty for a plain URL list */
  gathered: ReadonlySet<FieldName>
  items: AsyncIterable<ResolveInput>
  stats: ReaderStats
  /** Stop reading and release the input */
  close(): void
}

export interface RecordReaderOptions {
  logger?: ILogger
  /** Stops reading once aborted */
  signal?: AbortSignal
}

const NOTHING_GATHERED: ReadonlySet<FieldName> = new Set()

/** A first line csv-parse rejects is data, not a header */
function readHeader(line: string): FieldName[] | undefined {
  try {
    return parseHeader(line)
  } catch (error) {
    if (error instanceof CsvError) return undefined
    throw error
  }
}

/** Undefined for rows csv-parse rejects (an unclosed quote, for one) */
function readRow(line: string, header: readonly FieldName[]): AdDetail | undefined {
  try {
    return rowToRecord(parseLine(line), header)
  } catch (error) {
    if (error instanceof CsvError) return undefined
    throw error
  }
}

/**
 * Read up to the first non-blank line to learn the input shape, then hand
 * back a lazy source over the rest.
 *
 * @throws FatalConfigError when the header has no `link` column
 */
export async function openRecordSource(input: Readable, options: RecordReaderOptions = {}): Promise<RecordSource> {
  const rl = createInterface({ input, crlfDelay: Infinity })
  const lines = rl[Symbol.asyncIterator]()
  const stats: ReaderStats = { lines: 0, invalid: 0, duplicates: 0 }

  const close = (): void => rl.close()
  options.signal?.addEventListener('abort', close, { once: true })
  if (options.signal?.aborted) close()

  let first: string | undefined
  while (first === undefined) {
    const next = await lines.next()
    if (next.done) break
    if (next.value.trim() !== '') first = next.value
  }

  if (first !== undefined) first = first.replace(/^\uFEFF/, '')
  const header = first === undefined ? undefined : readHeader(first)
  if (header && !header.includes('link')) {
    close()
    throw new FatalConfigError(`Input header has no link column: ${header.join(',')}`)
  }
  const gathered: ReadonlySet<FieldName> = header ? new Set(header) : NOTHING_GATHERED
  const seen = new Set<string>()

  const toInput = (line: string): ResolveInput | undefined => {
    stats.lines++
    const record = header ? readRow(line, header) : undefined
    const raw = header ? record?.link : line.trim()

    if (!raw || !isValidUrl(raw)) {
      stats.invalid++
      options.logger?.warn('Skipping input line without a valid link', { line: stats.lines })
      return undefined
    }

    const link = canonicalizeUrl(raw)
    if (seen.has(link)) {
      stats.duplicates++
      return undefined
    }
    seen.add(link)
    return { link, record: record ? { ...record, link } : undefined, gathered }
  }

  async function* items(): AsyncGenerator<ResolveInput> {
    try {
      if (first !== undefined && !header) {
        const item = toInput(first)
        if (item) yield item
      }
      while (true) {
        const next = await lines.next()
        if (next.done) return
        if (next.value.trim() === '') continue
        const item = toInput(next.value)
        if (item) yield item
      }
    } finally {
      options.signal?.removeEventListener('abort', close)
      close()
    }
  }

  return { gathered, items: items(), stats, close }
}

/**
 * Source over URLs given on the command line. They were validated at startup.
 */
export function urlSource(urls: readonly string[]): RecordSource {
  const stats: ReaderStats = { lines: 0, invalid: 0, duplicates: 0 }
  const seen = new Set<string>()

  async function* items(): AsyncGenerator<ResolveInput> {
    for (const url of urls) {
      stats.lines++
      const link = canonicalizeUrl(url)
      if (seen.has(link)) {
        stats.duplicates++
        continue
      }
      seen.add(link)
      yield { link, gathered: NOTHING_GATHERED }
    }
  }

  return { gathered: NOTHING_GATHERED, items: items(), stats, close: () => undefined }
}
