/**
 * Run Summary
 *
 * Counters of one run and the exit code they map to:
 *   0  every item succeeded (filtered items count as success)
 *   1  some items failed, a walk ended Failed, or the run was interrupted
 *   2  nothing could be processed (fatal config, or every detail input failed)
 */

export type CrawlCommand = 'list' | 'detail'

export interface RunSummary {
  command: CrawlCommand
  /** Start URLs walked (list) or links read (detail) */
  inputs: number
  emitted: number
  filteredOut: number
  failed: number
  duplicates: number
  degraded: number
  invalidInputs: number
  pagesVisited: number
  /** Records the output refused (closed pipe) */
  dropped: number
  stopped: boolean
  durationMs: number
}

export const EXIT_OK = 0
export const EXIT_PARTIAL = 1
export const EXIT_FATAL = 2

export function createRunSummary(command: CrawlCommand): RunSummary {
  return {
    command,
    inputs: 0,
    emitted: 0,
    filteredOut: 0,
    failed: 0,
    duplicates: 0,
    degraded: 0,
    invalidInputs: 0,
    pagesVisited: 0,
    dropped: 0,
    stopped: false,
    durationMs: 0,
  }
}

/**
 * Invalid input lines count as failed inputs.
 */
export function exitCodeFor(summary: RunSummary): number {
  const failed = summary.failed + summary.invalidInputs
  const total = summary.inputs + summary.invalidInputs
  if (summary.command === 'detail' && total > 0 && failed === total) {
    return EXIT_FATAL
  }
  if (failed > 0 || summary.stopped) {
    return EXIT_PARTIAL
  }
  return EXIT_OK
}
