import { describe, expect, it } from 'vitest'
import { canonicalizeUrl, isValidUrl, resolveLink } from '../utils/url.js'

describe('canonicalizeUrl', () => {
  it('drops tracking parameters, the fragment and a trailing slash', () => {
    expect(
      canonicalizeUrl('https://Market.TEST/d/uk/obyavlenie/bike-ID1.html?reason=extended_search&utm_source=x#photos')
    ).toBe('https://market.test/d/uk/obyavlenie/bike-ID1.html')
    expect(canonicalizeUrl('https://market.test/uk/list/')).toBe('https://market.test/uk/list')
  })

  it('sorts the remaining parameters and drops empty ones', () => {
    expect(canonicalizeUrl('https://market.test/list?page=2&q=bike&empty=')).toBe(
      'https://market.test/list?page=2&q=bike'
    )
    expect(canonicalizeUrl('https://market.test/list?z=1&a=2')).toBe('https://market.test/list?a=2&z=1')
  })

  it('keeps the root path', () => {
    expect(canonicalizeUrl('https://market.test/')).toBe('https://market.test/')
  })
})

describe('isValidUrl', () => {
  it('accepts only absolute http(s) URLs', () => {
    expect(isValidUrl('https://market.test/list')).toBe(true)
    expect(isValidUrl('http://market.test')).toBe(true)
    expect(isValidUrl('ftp://market.test/file')).toBe(false)
    expect(isValidUrl('/d/ad.html')).toBe(false)
    expect(isValidUrl('not a url')).toBe(false)
  })
})

describe('resolveLink', () => {
  it('resolves relative hrefs against the page and canonicalizes them', () => {
    expect(resolveLink('/d/ad-ID9.html?reason=promoted', 'https://market.test/uk/list?page=2')).toBe(
      'https://market.test/d/ad-ID9.html'
    )
  })

  it('rejects empty and script hrefs', () => {
    expect(resolveLink(undefined, 'https://market.test/')).toBeUndefined()
    expect(resolveLink('', 'https://market.test/')).toBeUndefined()
    expect(resolveLink('javascript:void(0)', 'https://market.test/')).toBeUndefined()
  })
})
