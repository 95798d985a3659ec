/**
 * Structured logging helpers for crawl runs.
 *
 * Enforces the common envelope fields of a run and keeps credentials and
 * query strings out of log lines.
 */

import type { ILogger } from '@adsift/logger'

export type RunLogContext = {
  command: 'list' | 'detail'
  runId: string
  [key: string]: unknown
}

export function createRunLogger(base: ILogger, context: RunLogContext): ILogger {
  return base.child(compact(context))
}

/**
 * Host and path of a URL, without credentials, query or fragment.
 */
export function sanitizeUrl(url?: string | null): { urlHost?: string; urlPath?: string } {
  if (!url) return {}
  try {
    const parsed = new URL(url)
    return { urlHost: parsed.host, urlPath: parsed.pathname }
  } catch {
    return {}
  }
}

/**
 * Proxy URI reduced to scheme and host for logging.
 */
export function describeProxy(proxy?: string): string | undefined {
  if (!proxy) return undefined
  try {
    const parsed = new URL(proxy)
    return `${parsed.protocol}//${parsed.host}`
  } catch {
    return 'invalid'
  }
}

function compact<T extends Record<string, unknown>>(value: T): Record<string, unknown> {
  const next: Record<string, unknown> = {}
  for (const [key, val] of Object.entries(value)) {
    if (val === undefined || val === null) continue
    next[key] = val
  }
  return next
}
