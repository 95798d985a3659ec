export interface PoolOptions<R> {
  concurrency: number
  /** No new item is taken from the source once aborted */
  stopSignal?: AbortSignal
  /** Called once per finished item, in completion order, never concurrently */
  onResult: (result: R) => Promise<void> | void
}

export interface PoolStats {
  submitted: number
  completed: number
}

const STOPPED = Symbol('stopped')

function whenAborted(signal: AbortSignal | undefined): Promise<typeof STOPPED> | null {
  if (!signal) return null
  return new Promise(resolve => {
    if (signal.aborted) {
      resolve(STOPPED)
      return
    }
    signal.addEventListener('abort', () => resolve(STOPPED), { once: true })
  })
}

/**
 * Bounded worker pool over an async source.
 *
 * At most `concurrency` workers run at once. Results are handed to `onResult`
 * as soon as each worker finishes, so one slow item never holds back the
 * others. Items still in flight when the pool stops are awaited, never dropped.
 * A worker or `onResult` failure stops intake and is rethrown once the
 * remaining items have settled.
 */
export async function runPool<T, R>(
  source: AsyncIterable<T>,
  worker: (item: T) => Promise<R>,
  options: PoolOptions<R>
): Promise<PoolStats> {
  const concurrency = Math.max(1, Math.floor(options.concurrency))
  const iterator = source[Symbol.asyncIterator]()
  const stopped = whenAborted(options.stopSignal)
  const inFlight = new Set<Promise<void>>()
  const stats: PoolStats = { submitted: 0, completed: 0 }
  let emitting: Promise<void> = Promise.resolve()
  const failures: unknown[] = []

  const emit = (result: R): Promise<void> => {
    emitting = emitting.then(() => options.onResult(result))
    return emitting
  }

  try {
    while (!options.stopSignal?.aborted && failures.length === 0) {
      if (inFlight.size >= concurrency) {
        await Promise.race(inFlight)
        continue
      }

      const next = stopped ? await Promise.race([iterator.next(), stopped]) : await iterator.next()
      if (next === STOPPED || next.done) {
        break
      }

      stats.submitted++
      const task: Promise<void> = worker(next.value)
        .then(emit)
        .then(
          () => {
            stats.completed++
          },
          (error: unknown) => {
            failures.push(error)
          }
        )
        .finally(() => {
          inFlight.delete(task)
        })
      inFlight.add(task)
    }

    await Promise.all(inFlight)
    if (failures.length > 0) {
      throw failures[0]
    }
  } catch (error) {
    await Promise.allSettled(inFlight)
    throw error
  } finally {
    await iterator.return?.()
  }

  return stats
}
