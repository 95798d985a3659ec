import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { FatalConfigError } from '../errors.js'
import { buildKeywordMatcher, normalizeKeywords } from '../match/keyword-matcher.js'
import { loadKeywordMatcher, parseKeywordFile } from '../match/keywords.js'

describe('normalizeKeywords', () => {
  it('trims, lowercases and drops blanks and repeats', () => {
    expect(normalizeKeywords(['  Cat ', '', 'cat', 'DOG', '   '])).toEqual(['cat', 'dog'])
  })
})

describe('buildKeywordMatcher', () => {
  it('matches any keyword as a case-insensitive substring', () => {
    const matcher = buildKeywordMatcher(['cat', 'Bike'])

    expect(matcher.matches('Scratching post for a CAT')).toBe(true)
    expect(matcher.matches('Mountain bikes, two of them')).toBe(true)
    expect(matcher.matches('Dog bed')).toBe(false)
  })

  it('finds keywords that end inside a longer partial match', () => {
    const matcher = buildKeywordMatcher(['she', 'he', 'hers'])

    expect(matcher.matches('ushe')).toBe(true)
    expect(matcher.matches('ahx')).toBe(false)
    expect(matcher.matches('xhe')).toBe(true)
  })

  it('recovers through fail links after a mismatch', () => {
    const matcher = buildKeywordMatcher(['abcd', 'bce'])

    expect(matcher.matches('xabcex')).toBe(true)
    expect(matcher.matches('abcabd')).toBe(false)
  })

  it('matches Cyrillic keywords regardless of case', () => {
    const matcher = buildKeywordMatcher(['велосипед'])

    expect(matcher.matches('Дитячий ВЕЛОСИПЕД, 16"')).toBe(true)
    expect(matcher.matches('Самокат')).toBe(false)
  })

  it('accepts every text when the keyword set is empty', () => {
    const matcher = buildKeywordMatcher([])

    expect(matcher.size).toBe(0)
    expect(matcher.matches('')).toBe(true)
    expect(matcher.matches('anything')).toBe(true)
  })

  it('never matches empty text against a non-empty set', () => {
    expect(buildKeywordMatcher(['cat']).matches('')).toBe(false)
  })

  it('agrees with a plain substring scan', () => {
    const keywords = ['ab', 'bab', 'bc', 'cab', 'aaa']
    const matcher = buildKeywordMatcher(keywords)
    const texts = ['', 'a', 'aa', 'aaa', 'xbabx', 'cbc', 'acab', 'bbbb', 'cacb', 'aabaa']

    for (const text of texts) {
      const expected = keywords.some(keyword => text.includes(keyword))
      expect(matcher.matches(text), text).toBe(expected)
    }
  })
})

describe('keyword files', () => {
  it('parses one keyword per line with a BOM and CRLF endings', () => {
    expect(parseKeywordFile('\uFEFFcat\r\n\r\nKitten \r\ncat\n')).toEqual(['cat', 'kitten'])
  })

  it('loads a matcher from disk', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'adsift-keywords-'))
    const path = join(dir, 'keywords.txt')
    writeFileSync(path, 'bike\nhelmet\n')

    const matcher = await loadKeywordMatcher(path)

    expect(matcher.size).toBe(2)
    expect(matcher.matches('Kids helmet')).toBe(true)
  })

  it('treats an empty file as no filter', async () => {
    const dir = mkdtempSync(join(tmpdir(), 'adsift-keywords-'))
    const path = join(dir, 'empty.txt')
    writeFileSync(path, '')

    const matcher = await loadKeywordMatcher(path)

    expect(matcher.size).toBe(0)
    expect(matcher.matches('whatever')).toBe(true)
  })

  it('fails with a config error when the file cannot be read', async () => {
    await expect(loadKeywordMatcher('/nonexistent/adsift/keywords.txt')).rejects.toBeInstanceOf(FatalConfigError)
  })
})
