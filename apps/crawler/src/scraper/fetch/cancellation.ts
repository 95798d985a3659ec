/**
 * Run-level cancellation in two steps: stop issuing new fetches at once,
 * abort in-flight fetches only after a grace period.
 */
export class Cancellation {
  private readonly stopController = new AbortController()
  private readonly abortController = new AbortController()
  private graceTimer: NodeJS.Timeout | null = null
  private reason: string | null = null

  constructor(private readonly graceMs: number) {}

  get stopSignal(): AbortSignal {
    return this.stopController.signal
  }

  get abortSignal(): AbortSignal {
    return this.abortController.signal
  }

  get stopped(): boolean {
    return this.stopController.signal.aborted
  }

  get stopReason(): string | null {
    return this.reason
  }

  /**
   * Idempotent; the first reason wins.
   */
  stop(reason: string): void {
    if (this.stopped) return
    this.reason = reason
    this.stopController.abort(reason)

    if (this.graceMs <= 0) {
      this.abortController.abort(reason)
      return
    }
    this.graceTimer = setTimeout(() => {
      this.abortController.abort(reason)
    }, this.graceMs)
    this.graceTimer.unref()
  }

  dispose(): void {
    if (this.graceTimer) {
      clearTimeout(this.graceTimer)
      this.graceTimer = null
    }
  }
}
