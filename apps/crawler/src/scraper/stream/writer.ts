import { once } from 'node:events'
import type { Writable } from 'node:stream'
import type { AdDetail, FieldName } from '../types.js'
import { formatLine, recordToRow } from './codec.js'

/**
 * Writes the header line and then one line per record, waiting for the
 * output to drain when it pushes back. Once the output fails (a closed pipe,
 * typically) further records are dropped and counted.
 */
export class RecordWriter {
  readonly fields: readonly FieldName[]
  private readonly output: Writable
  private headerWritten = false
  private written = 0
  private droppedCount = 0
  private failure?: Error

  constructor(output: Writable, fields: readonly FieldName[], onError?: (error: Error) => void) {
    this.output = output
    this.fields = fields
    output.on('error', (error: Error) => {
      if (this.failure) return
      this.failure = error
      onError?.(error)
    })
  }

  get recordsWritten(): number {
    return this.written
  }

  get dropped(): number {
    return this.droppedCount
  }

  get failed(): boolean {
    return this.failure !== undefined
  }

  async writeHeader(): Promise<void> {
    if (this.headerWritten) return
    this.headerWritten = true
    await this.push(formatLine(this.fields))
  }

  async write(record: AdDetail): Promise<void> {
    await this.writeHeader()
    if (await this.push(formatLine(recordToRow(record, this.fields)))) {
      this.written++
    } else {
      this.droppedCount++
    }
  }

  private async push(line: string): Promise<boolean> {
    if (this.failure || this.output.destroyed) {
      return false
    }
    if (this.output.write(line)) {
      return true
    }
    try {
      await once(this.output, 'drain')
    } catch (error) {
      this.failure ??= error instanceof Error ? error : new Error(String(error))
    }
    // The line was queued by write(); it is only lost if the output failed meanwhile
    return this.failure === undefined
  }
}
