import * as cheerio from 'cheerio'
import type { AnyNode } from 'domhandler'

/**
 * A fetched page: its (final) URL and the parsed DOM.
 */
export interface PageDocument {
  url: string
  $: cheerio.CheerioAPI
}

const BREAK = '\uE000'

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

export function loadDocument(url: string, payload: string): PageDocument {
  return { url, $: loadHtml(payload) }
}

/**
 * Trimmed text of the first match inside `scope`, undefined when the element
 * is missing or empty.
 */
export function firstText(scope: cheerio.Cheerio<AnyNode>, selector: string): string | undefined {
  const value = collapseWhitespace(scope.find(selector).first().text())
  return value || undefined
}

export function firstAttr(
  scope: cheerio.Cheerio<AnyNode>,
  selector: string,
  attr: string
): string | undefined {
  const value = scope.find(selector).first().attr(attr)?.trim()
  return value || undefined
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

/**
 * Rendered-looking text of a block: `<br>` and block elements end a line,
 * whitespace inside a line is collapsed. Lines are joined with `<br>` so the
 * value never contains a line terminator.
 */
export function blockText($: cheerio.CheerioAPI, scope: cheerio.Cheerio<AnyNode>): string | undefined {
  const copy = scope.clone()
  copy.find('br').replaceWith(BREAK)
  copy.find('p, div, li').each((_, element) => {
    $(element).append(BREAK)
  })

  const lines = copy
    .text()
    .split(BREAK)
    .map(collapseWhitespace)
    .filter(line => line.length > 0)

  return lines.length > 0 ? lines.join('<br>') : undefined
}
