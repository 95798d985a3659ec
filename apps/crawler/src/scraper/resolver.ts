/**
 * Ad Resolver
 *
 * Turns one ad link (bare, or an upstream record that already carries some
 * fields) into an AdDetail. Only the selected fields the upstream stage did
 * not gather are read from the detail page; when an upstream record leaves
 * nothing to read the page is not fetched at all. Every failure is returned as an outcome so one
 * bad ad never ends the run.
 */

import type { ILogger } from '@adsift/logger'
import { sanitizeUrl } from '../config/structured-log.js'
import { CrawlerError, StructuralParseError, formatErrorForLog } from './errors.js'
import { extractAdDetail } from './extract/detail.js'
import { compactRecord } from './extract/listing.js'
import { fetchDocument } from './fetch/document.js'
import type { KeywordMatcher } from './match/keyword-matcher.js'
import type { AdDetail, CrawlContext, FieldName, FieldSelection } from './types.js'

/** Fields only a listing page carries */
const LISTING_ONLY_FIELDS: ReadonlySet<FieldName> = new Set<FieldName>(['link', 'promoted'])

export interface ResolveInput {
  link: string
  /** Upstream record, when the input came from a record stream */
  record?: AdDetail
  /** Fields the upstream stage already gathered (its header) */
  gathered: ReadonlySet<FieldName>
}

export type ResolveOutcome =
  | { status: 'resolved'; record: AdDetail; fetched: boolean; degraded: FieldName[] }
  | { status: 'filtered_out'; link: string }
  | { status: 'fetch_failed'; link: string; reason: 'fetch' | 'structural'; error: CrawlerError }

export interface AdResolverOptions {
  selection: FieldSelection
  /** Applied to title and description */
  matcher?: KeywordMatcher
}

export class AdResolver {
  private readonly ctx: CrawlContext
  private readonly options: AdResolverOptions
  private readonly log: ILogger

  constructor(ctx: CrawlContext, options: AdResolverOptions) {
    this.ctx = ctx
    this.options = options
    this.log = ctx.logger.child('resolver')
  }

  /**
   * Selected fields that still have to come from the detail page.
   */
  missingFields(gathered: ReadonlySet<FieldName>): Set<FieldName> {
    const missing = new Set<FieldName>()
    for (const field of this.options.selection) {
      if (!gathered.has(field) && !LISTING_ONLY_FIELDS.has(field)) {
        missing.add(field)
      }
    }
    return missing
  }

  async resolve(input: ResolveInput): Promise<ResolveOutcome> {
    const missing = this.missingFields(input.gathered)
    const record: AdDetail = { ...input.record, link: input.link }
    let degraded: FieldName[] = []
    let fetched = false

    // A bare link is always fetched so a dead or non-ad page still fails
    if (missing.size > 0 || input.record === undefined) {
      try {
        const doc = await fetchDocument(this.ctx, input.link)
        const extraction = extractAdDetail(doc, missing, this.log)
        Object.assign(record, extraction.fields)
        degraded = extraction.degraded
        fetched = true
      } catch (error) {
        if (!(error instanceof CrawlerError)) throw error
        this.log.warn('Ad resolve failed', { ...sanitizeUrl(input.link), ...formatErrorForLog(error) })
        const reason = error instanceof StructuralParseError ? 'structural' : 'fetch'
        return { status: 'fetch_failed', link: input.link, reason, error }
      }
    }

    if (!this.accepts(record)) {
      this.log.debug('Ad filtered out', sanitizeUrl(input.link))
      return { status: 'filtered_out', link: input.link }
    }

    return { status: 'resolved', record: compactRecord(record), fetched, degraded }
  }

  private accepts(record: AdDetail): boolean {
    const { matcher } = this.options
    if (!matcher || matcher.size === 0) {
      return true
    }
    const text = [record.title, record.description].filter(Boolean).join(' ')
    return matcher.matches(text)
  }
}
