/**
 * Record Codec
 *
 * One record per line, comma separated, with a header line naming the
 * columns in canonical field order. Cell encodings:
 *
 *   price     `free` | `<amount>[ <currency>][ negotiable]`
 *   promoted  `true` | `false`
 *   absent    empty cell
 *
 * Line terminators inside values are written as a single space so a record
 * never spans lines.
 */

import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import { AD_KINDS, isFieldName, orderedFields, type AdDetail, type AdKind, type FieldName, type Price } from '../types.js'

const LINE_TERMINATORS = /\r\n|[\r\n]/g

const NEGOTIABLE_TOKEN = 'negotiable'
const FREE_TOKEN = 'free'

export function formatPrice(price: Price): string {
  if (price.free) {
    return FREE_TOKEN
  }
  const parts = [String(price.amount)]
  if (price.currency) parts.push(price.currency)
  if (price.negotiable) parts.push(NEGOTIABLE_TOKEN)
  return parts.join(' ')
}

export function parsePriceCell(cell: string): Price | undefined {
  const tokens = cell.trim().split(/\s+/).filter(Boolean)
  if (tokens.length === 0) {
    return undefined
  }
  if (tokens.length === 1 && tokens[0] === FREE_TOKEN) {
    return { amount: 0, negotiable: false, free: true }
  }

  const amount = Number(tokens[0])
  if (!Number.isFinite(amount)) {
    return undefined
  }

  const rest = tokens.slice(1)
  const negotiable = rest[rest.length - 1] === NEGOTIABLE_TOKEN
  if (negotiable) rest.pop()

  const price: Price = { amount, negotiable, free: false }
  if (rest.length > 0) price.currency = rest.join('')
  return price
}

function isAdKind(value: string): value is AdKind {
  return (AD_KINDS as readonly string[]).includes(value)
}

/**
 * Cell text for one field of a record.
 */
export function formatCell(record: AdDetail, field: FieldName): string {
  switch (field) {
    case 'price':
      return record.price ? formatPrice(record.price) : ''
    case 'promoted':
      return record.promoted === undefined ? '' : String(record.promoted)
    default:
      return (record[field] ?? '').replace(LINE_TERMINATORS, ' ')
  }
}

export function recordToRow(record: AdDetail, fields: readonly FieldName[]): string[] {
  return fields.map(field => formatCell(record, field))
}

/**
 * Build a record from a row laid out by `fields`. Rows without a link yield
 * undefined; unparseable cells leave their field absent.
 */
export function rowToRecord(row: readonly string[], fields: readonly FieldName[]): AdDetail | undefined {
  const linkIndex = fields.indexOf('link')
  const link = linkIndex >= 0 ? row[linkIndex]?.trim() : undefined
  if (!link) {
    return undefined
  }

  const record: AdDetail = { link }
  fields.forEach((field, index) => {
    const cell = row[index] ?? ''
    if (cell === '' || field === 'link') return

    switch (field) {
      case 'price': {
        const price = parsePriceCell(cell)
        if (price) record.price = price
        break
      }
      case 'promoted':
        if (cell === 'true' || cell === 'false') record.promoted = cell === 'true'
        break
      case 'kind':
        if (isAdKind(cell)) record.kind = cell
        break
      default:
        record[field] = cell
    }
  })
  return record
}

/**
 * One CSV line, terminator included.
 */
export function formatLine(cells: readonly string[]): string {
  return stringify([cells])
}

/**
 * Cells of one CSV line.
 */
export function parseLine(line: string): string[] {
  const rows: unknown = parse(line, { relax_column_count: true, relax_quotes: true })
  if (!Array.isArray(rows) || rows.length === 0) {
    return []
  }
  const first: unknown = rows[0]
  return Array.isArray(first) ? first.map(cell => String(cell)) : []
}

/**
 * Header line check: every cell is a known field name. Returns the columns,
 * or undefined when the line is not a header.
 */
export function parseHeader(line: string): FieldName[] | undefined {
  const cells = parseLine(line).map(cell => cell.trim())
  if (cells.length === 0 || !cells.every(isFieldName)) {
    return undefined
  }
  return cells.filter(isFieldName)
}

export function serializeRecords(records: readonly AdDetail[], fields: Iterable<FieldName>): string {
  const columns = orderedFields(fields)
  return [formatLine(columns), ...records.map(record => formatLine(recordToRow(record, columns)))].join('')
}

export function deserializeRecords(text: string): { fields: FieldName[]; records: AdDetail[] } {
  const lines = text.split(/\r?\n/).filter(line => line.trim() !== '')
  const header = lines.length > 0 ? parseHeader(lines[0]) : undefined
  if (!header) {
    return { fields: [], records: [] }
  }
  const records: AdDetail[] = []
  for (const line of lines.slice(1)) {
    const record = rowToRecord(parseLine(line), header)
    if (record) records.push(record)
  }
  return { fields: header, records }
}
