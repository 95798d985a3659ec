#!/usr/bin/env node
import { logger } from '../config/logger.js'
import { main } from './index.js'

const EXIT_INTERRUPTED = 130

/**
 * First SIGINT/SIGTERM stops the run gracefully; a second one exits at once.
 */
function watchSignals(): AbortController {
  const controller = new AbortController()
  const onSignal = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      process.exit(EXIT_INTERRUPTED)
    }
    controller.abort(signal)
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)
  return controller
}

const interrupt = watchSignals()

main(process.argv.slice(2), {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  interrupt: interrupt.signal,
})
  .then(code => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    logger.fatal('Unexpected failure', {}, error)
    process.exitCode = 1
  })
