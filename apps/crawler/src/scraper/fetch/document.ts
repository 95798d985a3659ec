import { fetchResultError } from '../errors.js'
import { loadDocument, type PageDocument } from '../extract/html.js'
import type { CrawlContext } from '../types.js'

/**
 * Fetch a page through the run's fetcher and parse it.
 *
 * @throws TransientFetchError | PermanentFetchError when the fetch did not succeed
 */
export async function fetchDocument(ctx: CrawlContext, url: string): Promise<PageDocument> {
  const result = await ctx.fetcher.fetch(url, {
    renderMode: ctx.renderMode,
    signal: ctx.abortSignal,
    timeoutMs: ctx.timeoutMs,
  })

  if (result.status !== 'ok' || result.html === undefined) {
    throw fetchResultError(url, result)
  }

  return loadDocument(result.finalUrl ?? url, result.html)
}
