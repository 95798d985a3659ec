import { describe, it, expect } from 'vitest'
import { FatalConfigError } from '../../scraper/errors.js'
import { buildSelection, normalizeProxy, parseDetailOptions, parseListOptions } from '../options.js'

describe('parseListOptions', () => {
  it('applies the run defaults', () => {
    const options = parseListOptions({})
    expect(options).toMatchObject({
      headless: true,
      retries: 2,
      timeoutMs: 30000,
      graceMs: 5000,
      progress: false,
      includeRegular: true,
      includePromoted: true,
    })
    expect(options.limit).toBeUndefined()
    expect([...options.selection]).toEqual(['link'])
  })

  it('converts numeric flags', () => {
    const options = parseListOptions({ limit: '10', 'max-pages': '3', retries: '0', timeout: '500' })
    expect(options.limit).toBe(10)
    expect(options.maxPages).toBe(3)
    expect(options.retries).toBe(0)
    expect(options.timeoutMs).toBe(500)
  })

  it('selects every listing field with --all', () => {
    const options = parseListOptions({ all: true })
    expect([...options.selection]).toEqual(['link', 'kind', 'promoted', 'title', 'price', 'location'])
  })

  it('lets a field flag override --all', () => {
    const options = parseListOptions({ all: true, location: false, link: 'false' })
    expect([...options.selection]).toEqual(['kind', 'promoted', 'title', 'price'])
  })

  it('adds the title when a keyword file is given', () => {
    const options = parseListOptions({ keywords: 'words.txt', price: true })
    expect([...options.selection]).toEqual(['link', 'price', 'title'])
  })

  it('rejects unknown flags', () => {
    expect(() => parseListOptions({ bogus: true })).toThrow("Invalid options: Unrecognized key(s) in object: 'bogus'")
  })

  it('rejects a malformed number', () => {
    expect(() => parseListOptions({ limit: 'abc' })).toThrow('Invalid options: --limit: must be a whole number')
  })

  it('rejects a zero limit', () => {
    expect(() => parseListOptions({ limit: '0' })).toThrow('Invalid options: --limit: must be at least 1')
  })

  it('rejects a numeric flag without a value', () => {
    expect(() => parseListOptions({ limit: true })).toThrow('Invalid options: --limit: expects a number')
  })

  it('rejects --no-free together with --no-paid', () => {
    expect(() => parseListOptions({ free: false, paid: false })).toThrow(FatalConfigError)
  })

  it('rejects an empty selection', () => {
    expect(() => parseListOptions({ link: false })).toThrow('No fields selected')
  })

  it('reads boolean words', () => {
    expect(parseListOptions({ headless: 'no' }).headless).toBe(false)
    expect(() => parseListOptions({ headless: 'maybe' })).toThrow(
      'Invalid options: --headless: expected true or false, got "maybe"'
    )
  })

  it('prefixes a bare host:port proxy', () => {
    expect(parseListOptions({ proxy: '10.0.0.2:3128' }).proxy).toBe('http://10.0.0.2:3128')
    expect(() => parseListOptions({ proxy: 'socks5://10.0.0.2:1080' })).toThrow(
      'Invalid options: --proxy: must be an http(s) proxy URI'
    )
  })
})

describe('parseDetailOptions', () => {
  it('defaults the concurrency', () => {
    expect(parseDetailOptions({}).concurrency).toBe(4)
    expect(parseDetailOptions({ concurrency: '8' }).concurrency).toBe(8)
  })

  it('adds title and description when a keyword file is given', () => {
    const options = parseDetailOptions({ keywords: 'words.txt', link: false })
    expect([...options.selection]).toEqual(['title', 'description'])
  })

  it('rejects listing-only flags', () => {
    expect(() => parseDetailOptions({ promoted: true })).toThrow(
      "Invalid options: Unrecognized key(s) in object: 'promoted'"
    )
  })
})

describe('buildSelection', () => {
  it('keeps only available fields', () => {
    const selection = buildSelection(['link', 'title'], { title: true, author: true }, false, [])
    expect([...selection]).toEqual(['link', 'title'])
  })
})

describe('normalizeProxy', () => {
  it('keeps a proxy with a scheme', () => {
    expect(normalizeProxy('https://proxy.test:443')).toBe('https://proxy.test:443')
  })
})
