/**
 * Ad Detail Extraction
 *
 * Reads the requested fields from an ad detail page. Only a page without the
 * ad content block is an error (StructuralParseError); every other missing
 * element just leaves its field absent.
 */

import type { ILogger } from '@adsift/logger'
import { StructuralParseError } from '../errors.js'
import type { AdDetail, FieldName, FieldSelection } from '../types.js'
import { resolveLink } from '../utils/url.js'
import { blockText, firstAttr, firstText, type PageDocument } from './html.js'
import { classifyKind } from './kind.js'
import { compactRecord } from './listing.js'
import { parsePrice } from './price.js'
import { DETAIL_SELECTORS } from './selectors.js'

export interface DetailExtraction {
  /** Extracted fields; `link` is left to the caller */
  fields: Omit<AdDetail, 'link'>
  /** Fields present on the page but not parseable */
  degraded: FieldName[]
}

export function extractAdDetail(
  doc: PageDocument,
  selection: FieldSelection,
  logger?: ILogger
): DetailExtraction {
  const { $ } = doc
  if ($(DETAIL_SELECTORS.content).length === 0) {
    throw new StructuralParseError('Ad content block not found', doc.url)
  }

  const root = $.root()
  const fields: Omit<AdDetail, 'link'> = {}
  const degraded: FieldName[] = []

  if (selection.has('title')) {
    fields.title = firstText(root, DETAIL_SELECTORS.title)
  }

  if (selection.has('description')) {
    const block = $(DETAIL_SELECTORS.description).first()
    fields.description = block.length > 0 ? blockText($, block) : undefined
  }

  if (selection.has('price')) {
    const parsed = parsePrice(firstText(root, DETAIL_SELECTORS.price))
    if (parsed.ok) {
      fields.price = parsed.price
    } else if (parsed.reason === 'UNPARSEABLE') {
      degraded.push('price')
      logger?.debug('Degraded field', { field: 'price', raw: parsed.raw, url: doc.url })
    }
  }

  if (selection.has('author')) {
    fields.author = firstText(root, DETAIL_SELECTORS.author)
  }

  if (selection.has('profile')) {
    fields.profile = resolveLink(firstAttr(root, DETAIL_SELECTORS.profile, 'href'), doc.url)
  }

  if (selection.has('location')) {
    fields.location = firstAttr(root, DETAIL_SELECTORS.location, 'alt')
  }

  if (selection.has('kind')) {
    fields.kind = classifyKind(firstText(root, DETAIL_SELECTORS.kind))
  }

  return { fields: compactRecord(fields), degraded }
}
