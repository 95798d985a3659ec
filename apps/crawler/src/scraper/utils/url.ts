/**
 * URL Canonicalization Utilities
 *
 * Ad links are the deduplication key of a run, so every link is reduced to
 * one canonical spelling:
 * 1. Lowercase hostname
 * 2. Remove tracking parameters: utm_*, fbclid, gclid, ref, reason, search_reason
 * 3. Remove empty query parameters
 * 4. Sort query parameters alphabetically
 * 5. Remove fragment identifiers (#...)
 * 6. Remove trailing slash (except root path)
 */

const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'ref',
  'reason',
  'search_reason',
])

/**
 * Canonicalize a URL for deduplication.
 *
 * @throws TypeError if the URL is invalid
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url)

  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  // An emptied query leaves no bare '?'
  parsed.search = parsed.searchParams.toString()
  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.slice(0, -1)
  }

  return parsed.toString()
}

/**
 * Validate that a URL is absolute and uses http(s).
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Resolve an href found on a page against the page URL and canonicalize it.
 * Returns undefined for empty, javascript: or otherwise unusable hrefs.
 */
export function resolveLink(href: string | undefined, baseUrl: string): string | undefined {
  if (!href) {
    return undefined
  }
  let resolved: string
  try {
    resolved = new URL(href, baseUrl).toString()
  } catch {
    return undefined
  }
  return isValidUrl(resolved) ? canonicalizeUrl(resolved) : undefined
}
