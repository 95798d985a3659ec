import type { AdKind } from '../types.js'

const KIND_WORDS: Array<[Exclude<AdKind, 'unknown'>, string[]]> = [
  ['exchange', ['exchange', 'обмін', 'обмен', 'zamiana']],
  ['rent', ['rent', 'оренда', 'аренда', 'здам', 'сдам', 'wynajem']],
  ['sale', ['sale', 'sell', 'продаж', 'продажа', 'продам', 'sprzedaż']],
]

/**
 * Map a kind label (or any text that may carry one) to an AdKind.
 */
export function classifyKind(...texts: Array<string | undefined>): AdKind {
  for (const text of texts) {
    if (!text) continue
    const lower = text.toLowerCase()
    for (const [kind, words] of KIND_WORDS) {
      if (words.some(word => lower.includes(word))) {
        return kind
      }
    }
  }
  return 'unknown'
}
