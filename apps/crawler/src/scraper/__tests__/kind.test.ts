import { describe, expect, it } from 'vitest'
import { classifyKind } from '../extract/kind.js'

describe('classifyKind', () => {
  it('maps kind labels in several languages', () => {
    expect(classifyKind('Продаж')).toBe('sale')
    expect(classifyKind('Оренда')).toBe('rent')
    expect(classifyKind('Обмін')).toBe('exchange')
    expect(classifyKind('For sale')).toBe('sale')
  })

  it('falls through to later texts when the first carries no kind', () => {
    expect(classifyKind(undefined, 'Обмін')).toBe('exchange')
    expect(classifyKind('Kyiv', 'Здам на літо')).toBe('rent')
  })

  it('returns unknown when nothing matches', () => {
    expect(classifyKind()).toBe('unknown')
    expect(classifyKind('1 200 грн.')).toBe('unknown')
  })
})
