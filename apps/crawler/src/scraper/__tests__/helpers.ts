import { readFileSync } from 'node:fs'
import { createLogger } from '@adsift/logger'
import type { CrawlContext, FetchOptions, FetchResult, PageFetcher } from '../types.js'

export function readFixture(name: string): string {
  return readFileSync(new URL(`./fixtures/${name}`, import.meta.url), 'utf8')
}

type FakePage = string | FetchResult | ((attempt: number) => FetchResult)

/**
 * In-process PageFetcher serving canned pages by exact URL.
 * Unknown URLs answer 404.
 */
export class FakeFetcher implements PageFetcher {
  readonly calls: string[] = []
  private readonly pages: Map<string, FakePage>

  constructor(pages: Record<string, FakePage> = {}) {
    this.pages = new Map(Object.entries(pages))
  }

  set(url: string, page: FakePage): void {
    this.pages.set(url, page)
  }

  async fetch(url: string, _options?: FetchOptions): Promise<FetchResult> {
    this.calls.push(url)
    const page = this.pages.get(url)
    if (page === undefined) {
      return { status: 'error', statusCode: 404, durationMs: 0, error: 'HTTP 404: Not Found' }
    }
    if (typeof page === 'string') {
      return { status: 'ok', statusCode: 200, html: page, durationMs: 0 }
    }
    if (typeof page === 'function') {
      return page(this.calls.filter(called => called === url).length)
    }
    return page
  }
}

export function createTestContext(fetcher: PageFetcher, overrides: Partial<CrawlContext> = {}): CrawlContext {
  return {
    fetcher,
    logger: createLogger('crawler-test'),
    renderMode: 'headless',
    timeoutMs: 1000,
    stopSignal: new AbortController().signal,
    abortSignal: new AbortController().signal,
    ...overrides,
  }
}

interface TestCard {
  id: string
  title: string
  promoted?: boolean
  price?: string
}

/**
 * Minimal listing page in the marketplace layout.
 */
export function listingHtml(cards: TestCard[], nextHref?: string): string {
  const offers = cards
    .map(
      card => `
    <div class="offer${card.promoted ? ' promoted' : ''}">
      <a href="/d/${card.id}.html"><div class="title-cell"><strong>${card.title}</strong></div></a>
      <p class="price"><strong>${card.price ?? '100 грн.'}</strong></p>
    </div>`
    )
    .join('')
  const next = nextHref ? `<span><a href="${nextHref}">next</a></span>` : ''
  return `<html><body>${offers}
    <div class="pager"><span><span data-cy="page-link-current">1</span></span>${next}</div>
  </body></html>`
}

/**
 * Minimal ad page in the marketplace layout.
 */
export function adHtml(fields: { title?: string; description?: string; price?: string; author?: string }): string {
  return `<html><body><header></header><div>
    ${fields.title ? `<h1 data-cy="ad_title">${fields.title}</h1>` : ''}
    ${fields.price ? `<div data-testid="ad-price-container"><h3>${fields.price}</h3></div>` : ''}
    ${fields.description ? `<div data-cy="ad_description"><div>${fields.description}</div></div>` : ''}
    ${fields.author ? `<a name="user_ads" href="/user/1"><div><div><h2>${fields.author}</h2></div></div></a>` : ''}
  </div></body></html>`
}

export async function* fromArray<T>(items: readonly T[]): AsyncGenerator<T> {
  for (const item of items) {
    yield item
  }
}
