import type { Price } from '../types.js'

export type PriceParseResult =
  | { ok: true; price: Price }
  | { ok: false; reason: 'EMPTY' | 'UNPARSEABLE'; raw?: string }

const FREE_WORDS = ['free', 'безкоштовно', 'бесплатно', 'даром', 'віддам', 'отдам', 'za darmo', 'gratis']

const NEGOTIABLE_WORDS = ['договірна', 'договорная', 'negotiable', 'do negocjacji', 'до торгу', 'торг']

/**
 * Currency tokens as printed on the site, matched on the token prefix.
 */
const CURRENCY_CODES: Array<[string, string]> = [
  ['грн', 'UAH'],
  ['₴', 'UAH'],
  ['uah', 'UAH'],
  ['$', 'USD'],
  ['usd', 'USD'],
  ['€', 'EUR'],
  ['eur', 'EUR'],
  ['zł', 'PLN'],
  ['pln', 'PLN'],
  ['₸', 'KZT'],
  ['тг', 'KZT'],
  ['лв', 'BGN'],
  ['lei', 'RON'],
  ['сум', 'UZS'],
]

const NUMBER_PATTERN = /\d[\d\s.,']*/

function normalizeCurrency(token: string): string | undefined {
  const cleaned = token.replace(/\s+/g, '').replace(/^[.,;:()\-]+|[.,;:()\-]+$/g, '')
  if (!cleaned) {
    return undefined
  }
  const known = CURRENCY_CODES.find(([prefix]) => cleaned.startsWith(prefix))
  if (known) {
    return known[1]
  }
  return /^[a-z]{3}$/.test(cleaned) ? cleaned.toUpperCase() : cleaned
}

/**
 * Parse a number printed with thousands separators (space, no-break space,
 * comma, dot, apostrophe). A final comma or dot followed by one or two
 * digits is the decimal separator.
 */
export function parseAmount(raw: string): number | null {
  const compact = raw.replace(/[\s']/g, '').replace(/[.,]+$/, '')
  if (!/^\d[\d.,]*$/.test(compact)) {
    return null
  }

  const lastSeparator = Math.max(compact.lastIndexOf('.'), compact.lastIndexOf(','))
  const fractionDigits = lastSeparator === -1 ? 0 : compact.length - lastSeparator - 1

  let normalized: string
  if (lastSeparator !== -1 && fractionDigits >= 1 && fractionDigits <= 2) {
    const integerPart = compact.slice(0, lastSeparator).replace(/[.,]/g, '')
    normalized = `${integerPart}.${compact.slice(lastSeparator + 1)}`
  } else {
    normalized = compact.replace(/[.,]/g, '')
  }

  const value = Number(normalized)
  return Number.isFinite(value) ? value : null
}

/**
 * Parse the price text of a card or detail page.
 *
 * "Free" words give a free price. Otherwise the first number is the amount,
 * the remaining text is the currency token and negotiable markers set the
 * negotiable flag.
 */
export function parsePrice(raw: string | undefined): PriceParseResult {
  let text = (raw ?? '').replace(/\s+/g, ' ').trim().toLowerCase()
  if (!text) {
    return { ok: false, reason: 'EMPTY' }
  }

  if (FREE_WORDS.some(word => text.includes(word))) {
    return { ok: true, price: { amount: 0, negotiable: false, free: true } }
  }

  const negotiable = NEGOTIABLE_WORDS.some(word => text.includes(word))
  for (const word of NEGOTIABLE_WORDS) {
    text = text.split(word).join(' ')
  }

  const match = NUMBER_PATTERN.exec(text)
  if (!match) {
    return { ok: false, reason: 'UNPARSEABLE', raw }
  }

  const amount = parseAmount(match[0])
  if (amount === null) {
    return { ok: false, reason: 'UNPARSEABLE', raw }
  }

  const rest = `${text.slice(0, match.index)} ${text.slice(match.index + match[0].length)}`
  const currency = normalizeCurrency(rest)

  const price: Price = { amount, negotiable, free: false }
  if (currency) {
    price.currency = currency
  }
  return { ok: true, price }
}
