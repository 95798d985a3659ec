import { describe, it, expect } from 'vitest'
import { parseFlags } from '../parse-flags.js'

const booleans = new Set(['title', 'free'])

describe('parseFlags', () => {
  it('reads values from the next token or after =', () => {
    const args = parseFlags(['--limit', '5', '--proxy=127.0.0.1:8080'])
    expect(args.flags).toEqual({ limit: '5', proxy: '127.0.0.1:8080' })
    expect(args.positionals).toEqual([])
  })

  it('does not let a boolean flag swallow the following positional', () => {
    const args = parseFlags(['--title', 'https://market.test/list'], { booleans })
    expect(args.flags).toEqual({ title: true })
    expect(args.positionals).toEqual(['https://market.test/list'])
  })

  it('negates known boolean flags with --no-', () => {
    expect(parseFlags(['--no-free'], { booleans }).flags).toEqual({ free: false })
  })

  it('keeps --no- on flags that are not boolean', () => {
    expect(parseFlags(['--no-limit', '3']).flags).toEqual({ 'no-limit': '3' })
  })

  it('sets a flag to true when the next token is another flag', () => {
    expect(parseFlags(['--limit', '--title'], { booleans }).flags).toEqual({ limit: true, title: true })
  })

  it('treats everything after -- as positional', () => {
    const args = parseFlags(['--title', '--', '--not-a-flag'], { booleans })
    expect(args.flags).toEqual({ title: true })
    expect(args.positionals).toEqual(['--not-a-flag'])
  })

  it('maps -h to help', () => {
    expect(parseFlags(['-h']).flags).toEqual({ help: true })
  })
})
