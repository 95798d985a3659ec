import { readFile } from 'node:fs/promises'
import { FatalConfigError } from '../errors.js'
import { buildKeywordMatcher, normalizeKeywords, type KeywordMatcher } from './keyword-matcher.js'

/**
 * Parse a newline-delimited keyword file body into a KeywordSet.
 */
export function parseKeywordFile(content: string): string[] {
  return normalizeKeywords(content.replace(/^\uFEFF/, '').split(/\r?\n/))
}

/**
 * Load the keyword file and build the run's matcher.
 *
 * @throws FatalConfigError when the file cannot be read
 */
export async function loadKeywordMatcher(path: string): Promise<KeywordMatcher> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    throw new FatalConfigError(`Cannot read keyword file: ${path}`, error)
  }
  return buildKeywordMatcher(parseKeywordFile(content))
}
