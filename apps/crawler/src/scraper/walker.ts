/**
 * Listing Walker
 *
 * Walks a paginated listing from one start URL as a small state machine:
 *
 *   Fetching -> Extracting -> Advancing -> Fetching ...
 *                                       -> Exhausted
 *   Fetching (fetch failed)             -> Failed
 *
 * Pages are visited strictly one after another. Records are emitted as each
 * page is extracted, so a Failed walk still keeps everything emitted before
 * the failure. One walker instance is shared by every start URL of a run:
 * the emitted-link set and the record limit are run-wide.
 */

import type { ILogger } from '@adsift/logger'
import { sanitizeUrl } from '../config/structured-log.js'
import { CrawlerError, formatErrorForLog } from './errors.js'
import type { PageDocument } from './extract/html.js'
import { extractListingPage, type ListingPage } from './extract/listing.js'
import { fetchDocument } from './fetch/document.js'
import type { KeywordMatcher } from './match/keyword-matcher.js'
import type { AdSummary, CrawlContext, FieldSelection } from './types.js'
import { canonicalizeUrl } from './utils/url.js'

export type WalkState = 'Fetching' | 'Extracting' | 'Advancing' | 'Exhausted' | 'Failed'

export type WalkEndReason =
  | 'no-next-page'
  | 'page-limit'
  | 'record-limit'
  | 'pagination-loop'
  | 'stopped'
  | 'fetch-failed'

export interface ListingWalkerOptions {
  selection: FieldSelection
  /** Applied to the card title when the selection carries it */
  matcher?: KeywordMatcher
  includeRegular: boolean
  includePromoted: boolean
  /** Max records emitted across every walk of this instance */
  maxRecords?: number
  /** Max pages fetched per walk */
  maxPages?: number
}

/**
 * Position of one walk through a paginated listing.
 */
export interface PaginationCursor {
  url: string
  pageIndex: number
  pagesVisited: number
  emitted: number
  state: WalkState
}

export interface WalkResult {
  startUrl: string
  state: 'Exhausted' | 'Failed'
  reason: WalkEndReason
  pagesVisited: number
  emitted: number
  filteredOut: number
  duplicates: number
  degraded: number
  error?: CrawlerError
}

export type RecordSink = (record: AdSummary) => Promise<void>

export class ListingWalker {
  private readonly ctx: CrawlContext
  private readonly options: ListingWalkerOptions
  private readonly log: ILogger
  private readonly emittedLinks = new Set<string>()
  private emittedTotal = 0

  constructor(ctx: CrawlContext, options: ListingWalkerOptions) {
    this.ctx = ctx
    this.options = options
    this.log = ctx.logger.child('walker')
  }

  /** Records emitted by every walk so far */
  get emitted(): number {
    return this.emittedTotal
  }

  get recordLimitReached(): boolean {
    return this.options.maxRecords !== undefined && this.emittedTotal >= this.options.maxRecords
  }

  async walk(startUrl: string, emit: RecordSink): Promise<WalkResult> {
    const cursor: PaginationCursor = {
      url: startUrl,
      pageIndex: 0,
      pagesVisited: 0,
      emitted: 0,
      state: 'Fetching',
    }
    const result: WalkResult = {
      startUrl,
      state: 'Exhausted',
      reason: 'no-next-page',
      pagesVisited: 0,
      emitted: 0,
      filteredOut: 0,
      duplicates: 0,
      degraded: 0,
    }
    const visited = new Set<string>([canonicalizeUrl(startUrl)])
    let doc: PageDocument | undefined
    let page: ListingPage | undefined

    const finish = (state: 'Exhausted' | 'Failed', reason: WalkEndReason): WalkResult => {
      cursor.state = state
      result.state = state
      result.reason = reason
      result.pagesVisited = cursor.pagesVisited
      result.emitted = cursor.emitted
      this.log.info('Walk finished', {
        state,
        reason,
        pagesVisited: result.pagesVisited,
        emitted: result.emitted,
        ...sanitizeUrl(startUrl),
      })
      return result
    }

    while (true) {
      switch (cursor.state) {
        case 'Fetching': {
          if (this.ctx.stopSignal.aborted) {
            return finish('Exhausted', 'stopped')
          }
          try {
            doc = await fetchDocument(this.ctx, cursor.url)
          } catch (error) {
            if (!(error instanceof CrawlerError)) throw error
            result.error = error
            this.log.warn('Listing page fetch failed', {
              pageIndex: cursor.pageIndex,
              ...sanitizeUrl(cursor.url),
              ...formatErrorForLog(error),
            })
            return finish('Failed', 'fetch-failed')
          }
          cursor.pagesVisited++
          cursor.state = 'Extracting'
          break
        }

        case 'Extracting': {
          if (!doc) throw new Error('Extracting without a fetched page')
          page = extractListingPage(doc, this.options.selection, {
            includeRegular: this.options.includeRegular,
            includePromoted: this.options.includePromoted,
            logger: this.log,
          })
          result.degraded += page.degradedCount
          this.log.debug('Listing page extracted', {
            pageIndex: cursor.pageIndex,
            cards: page.cardCount,
            kept: page.cards.length,
            unlinked: page.unlinkedCount,
            hasNext: page.nextPageUrl !== undefined,
          })

          for (const card of page.cards) {
            if (this.recordLimitReached) break
            if (this.emittedLinks.has(card.link)) {
              result.duplicates++
              continue
            }
            if (!this.accepts(card)) {
              result.filteredOut++
              continue
            }
            this.emittedLinks.add(card.link)
            this.emittedTotal++
            cursor.emitted++
            await emit(card)
          }

          doc = undefined
          cursor.state = 'Advancing'
          break
        }

        case 'Advancing': {
          const next = page?.nextPageUrl
          if (!next) {
            return finish('Exhausted', 'no-next-page')
          }
          if (this.recordLimitReached) {
            return finish('Exhausted', 'record-limit')
          }
          if (this.options.maxPages !== undefined && cursor.pagesVisited >= this.options.maxPages) {
            return finish('Exhausted', 'page-limit')
          }
          const key = canonicalizeUrl(next)
          if (visited.has(key)) {
            this.log.warn('Pagination loops back to a visited page', sanitizeUrl(next))
            return finish('Exhausted', 'pagination-loop')
          }
          visited.add(key)
          cursor.url = next
          cursor.pageIndex++
          cursor.state = 'Fetching'
          break
        }

        case 'Exhausted':
        case 'Failed':
          return result
      }
    }
  }

  private accepts(card: AdSummary): boolean {
    const { matcher, selection } = this.options
    if (!matcher || matcher.size === 0 || !selection.has('title')) {
      return true
    }
    return matcher.matches(card.title ?? '')
  }
}
