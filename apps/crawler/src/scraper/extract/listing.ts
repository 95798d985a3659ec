/**
 * Listing Page Extraction
 *
 * Turns one listing page into AdSummary records (document order) and the
 * next page URL. Card fields are optional: a missing element leaves the field
 * absent. A card without a usable link is skipped, since the link is the
 * record key.
 */

import type { ILogger } from '@adsift/logger'
import type { AnyNode } from 'domhandler'
import type { Cheerio } from 'cheerio'
import type { AdSummary, FieldSelection } from '../types.js'
import { resolveLink } from '../utils/url.js'
import { collapseWhitespace, firstAttr, firstText, type PageDocument } from './html.js'
import { classifyKind } from './kind.js'
import { parsePrice } from './price.js'
import { LISTING_SELECTORS } from './selectors.js'

export interface ListingExtractOptions {
  /** Keep regular (non-promoted) cards */
  includeRegular: boolean
  /** Keep promoted cards */
  includePromoted: boolean
  logger?: ILogger
}

export interface ListingPage {
  /** Cards kept on this page, in document order */
  cards: AdSummary[]
  nextPageUrl?: string
  /** Cards found on the page, before any skipping */
  cardCount: number
  /** Cards without a resolvable link */
  unlinkedCount: number
  /** Fields that were present but could not be parsed */
  degradedCount: number
}

function extractLocation(card: Cheerio<AnyNode>): string | undefined {
  const value = collapseWhitespace(card.find(LISTING_SELECTORS.locationIcon).first().parent().text())
  return value || undefined
}

/**
 * Next page link: first span following the current page marker's parent.
 */
export function findNextPageUrl(doc: PageDocument): string | undefined {
  const href = doc
    .$(LISTING_SELECTORS.currentPage)
    .first()
    .parent()
    .nextAll('span')
    .first()
    .children('a')
    .first()
    .attr('href')
  return resolveLink(href, doc.url)
}

export function extractListingPage(
  doc: PageDocument,
  selection: FieldSelection,
  options: ListingExtractOptions
): ListingPage {
  const { $ } = doc
  const page: ListingPage = { cards: [], cardCount: 0, unlinkedCount: 0, degradedCount: 0 }

  $(LISTING_SELECTORS.card).each((_, element) => {
    page.cardCount++
    const card = $(element)
    const promoted = card.hasClass(LISTING_SELECTORS.promotedClass)

    if ((promoted && !options.includePromoted) || (!promoted && !options.includeRegular)) {
      return
    }

    const link = resolveLink(firstAttr(card, LISTING_SELECTORS.link, 'href'), doc.url)
    if (!link) {
      page.unlinkedCount++
      return
    }

    const record: AdSummary = { link }

    if (selection.has('promoted')) {
      record.promoted = promoted
    }

    if (selection.has('title')) {
      record.title = firstText(card, LISTING_SELECTORS.title)
    }

    let priceText: string | undefined
    if (selection.has('price') || selection.has('kind')) {
      priceText = firstText(card, LISTING_SELECTORS.price)
    }

    if (selection.has('price')) {
      const parsed = parsePrice(priceText)
      if (parsed.ok) {
        record.price = parsed.price
      } else if (parsed.reason === 'UNPARSEABLE') {
        page.degradedCount++
        options.logger?.debug('Degraded field', { field: 'price', raw: parsed.raw, link })
      }
    }

    if (selection.has('location')) {
      record.location = extractLocation(card)
    }

    if (selection.has('kind')) {
      // An "exchange" price label is the only kind signal some cards carry
      record.kind = classifyKind(firstText(card, LISTING_SELECTORS.kind), priceText)
    }

    page.cards.push(compactRecord(record))
  })

  page.nextPageUrl = findNextPageUrl(doc)
  return page
}

/**
 * Drop keys whose value is undefined so records compare and serialize
 * the same way whether a field was never requested or came back empty.
 */
export function compactRecord<T extends object>(record: T): T {
  for (const key of Object.keys(record)) {
    if (Reflect.get(record, key) === undefined) {
      Reflect.deleteProperty(record, key)
    }
  }
  return record
}
