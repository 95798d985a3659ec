import type { Writable } from 'node:stream'
import type { RunSummary } from '../scraper/summary.js'

/**
 * Single status line on standard error, redrawn in place on a terminal and
 * printed once at the end otherwise.
 */
export class ProgressReporter {
  private readonly output: Writable
  private readonly enabled: boolean
  private readonly interactive: boolean
  private readonly minIntervalMs: number
  private lastDrawAt = 0

  constructor(output: Writable & { isTTY?: boolean }, enabled: boolean, minIntervalMs = 100) {
    this.output = output
    this.enabled = enabled
    this.interactive = output.isTTY === true
    this.minIntervalMs = minIntervalMs
  }

  update(summary: RunSummary): void {
    if (!this.enabled || !this.interactive) return
    const now = Date.now()
    if (now - this.lastDrawAt < this.minIntervalMs) return
    this.lastDrawAt = now
    this.output.write(`\r${formatProgress(summary)}`)
  }

  finish(summary: RunSummary): void {
    if (!this.enabled) return
    this.output.write(`${this.interactive ? '\r' : ''}${formatProgress(summary)}\n`)
  }
}

export function formatProgress(summary: RunSummary): string {
  const parts = [
    summary.command === 'list' ? `pages ${summary.pagesVisited}` : `processed ${summary.inputs}`,
    `emitted ${summary.emitted}`,
    `filtered ${summary.filteredOut}`,
    `failed ${summary.failed + summary.invalidInputs}`,
  ]
  if (summary.duplicates > 0) parts.push(`duplicates ${summary.duplicates}`)
  return parts.join(' | ')
}
