/**
 * Crawler Core Types
 *
 * Records, field selection, fetcher contracts and retry policy shared by the
 * listing walker, the ad resolver and the record stream.
 */

import type { ILogger } from '@adsift/logger'

// ═══════════════════════════════════════════════════════════════════════════════
// Record Types
// ═══════════════════════════════════════════════════════════════════════════════

export const AD_KINDS = ['sale', 'rent', 'exchange', 'unknown'] as const

export type AdKind = (typeof AD_KINDS)[number]

/**
 * Asking price as shown on the page.
 *
 * A free ad is `{ amount: 0, negotiable: false, free: true }` with no currency.
 * An ad without any price element has no Price at all.
 */
export interface Price {
  amount: number
  /** ISO code where the page token is known (UAH, USD, ...), raw token otherwise */
  currency?: string
  negotiable: boolean
  free: boolean
}

/**
 * Minimal record produced from a listing page card.
 */
export interface AdSummary {
  /** Canonical ad URL. Unique within one run's emitted set. */
  link: string
  kind?: AdKind
  /** Paid placement on the listing page */
  promoted?: boolean
  title?: string
  price?: Price
  location?: string
}

/**
 * Enriched record produced from an ad detail page.
 */
export interface AdDetail extends AdSummary {
  /** Free text; line breaks are kept as `<br>` separators */
  description?: string
  author?: string
  /** Author profile link */
  profile?: string
}

// ═══════════════════════════════════════════════════════════════════════════════
// Field Selection
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Every field a record can carry, in canonical column order.
 */
export const FIELD_NAMES = [
  'link',
  'kind',
  'promoted',
  'title',
  'price',
  'location',
  'description',
  'author',
  'profile',
] as const

export type FieldName = (typeof FIELD_NAMES)[number]

export const LISTING_FIELDS: readonly FieldName[] = ['link', 'kind', 'promoted', 'title', 'price', 'location']

export const DETAIL_FIELDS: readonly FieldName[] = [
  'link',
  'kind',
  'title',
  'price',
  'location',
  'description',
  'author',
  'profile',
]

/**
 * Fields the caller wants populated. Fields outside the selection are never
 * extracted and never written.
 */
export type FieldSelection = ReadonlySet<FieldName>

export function isFieldName(value: string): value is FieldName {
  return (FIELD_NAMES as readonly string[]).includes(value)
}

/**
 * Selected fields in canonical column order.
 */
export function orderedFields(selection: Iterable<FieldName>): FieldName[] {
  const wanted = new Set(selection)
  return FIELD_NAMES.filter(field => wanted.has(field))
}

// ═══════════════════════════════════════════════════════════════════════════════
// Fetcher Contract
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Document rendering mode requested from the fetch collaborator.
 * `headless` is the only mode a non-interactive run needs.
 */
export type RenderMode = 'headless' | 'headed'

/**
 * Fetch status codes.
 */
export type FetchStatus =
  | 'ok'
  | 'error' // HTTP error (4xx, 5xx)
  | 'timeout' // Attempt exceeded its timeout
  | 'network' // Connection-level failure
  | 'blocked' // Captcha, access denied
  | 'too_large' // Body exceeded the size limit
  | 'aborted' // Run cancellation aborted the attempt

export interface FetchResult {
  status: FetchStatus
  statusCode?: number
  html?: string
  /** Final URL after redirects */
  finalUrl?: string
  durationMs: number
  error?: string
  /** Attempts made, including the first one (set by RetryingFetcher) */
  attempts?: number
}

export interface FetchOptions {
  renderMode?: RenderMode
  /** Aborts the in-flight attempt */
  signal?: AbortSignal
  /** Per-attempt timeout (default: 30000ms) */
  timeoutMs?: number
}

/**
 * Page fetcher capability. One call is one attempt; retries are layered on
 * top by RetryingFetcher.
 */
export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
  /** Release transport resources (proxy agents, sockets) */
  close?(): Promise<void>
}

/**
 * Retry policy for transient fetch failures.
 */
export interface RetryPolicy {
  /** Retries after the first attempt */
  retries: number
  initialDelayMs: number
  maxDelayMs: number
  backoffMultiplier: number
  retryableStatusCodes: number[]
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retries: 2,
  initialDelayMs: 1000,
  maxDelayMs: 10000,
  backoffMultiplier: 2,
  retryableStatusCodes: [408, 425, 429, 500, 502, 503, 504],
}

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 30000,
  maxSizeBytes: 10 * 1024 * 1024, // 10MB
} as const

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  'User-Agent': 'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'uk,ru;q=0.9,en;q=0.8',
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run Context
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Per-run collaborators handed to the walker and the resolver.
 */
export interface CrawlContext {
  fetcher: PageFetcher
  logger: ILogger
  renderMode: RenderMode
  timeoutMs: number
  /** Stops new fetches once aborted */
  stopSignal: AbortSignal
  /** Aborts in-flight fetches once the grace period has passed */
  abortSignal: AbortSignal
}
