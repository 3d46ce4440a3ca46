import { appendFile } from 'node:fs/promises'
import { join } from 'node:path'
import { LogSinkError } from '../../../core/errors'
import { pad2 } from '../../../utils/time'
import type { AttackLogRecord, AttackLogSink, FileLogSinkOptions, LogRotation } from '../types'

/**
 * Name of the log file holding records written at `date` (local time).
 *
 * @example
 * ```typescript
 * getLogFileName(new Date(2026, 2, 5))           // '03-2026.log'
 * getLogFileName(new Date(2026, 2, 5), 'daily')  // '05-03-2026.log'
 * ```
 */
export function getLogFileName(date: Date, rotation: LogRotation = 'monthly'): string {
  const month = `${pad2(date.getMonth() + 1)}-${date.getFullYear()}`
  if (rotation === 'daily') {
    return `${pad2(date.getDate())}-${month}.log`
  }
  return `${month}.log`
}

/**
 * Newline-delimited JSON files, one per rotation period.
 *
 * Each record is appended with a single write. Writes to the same file are
 * chained so records from concurrent requests never interleave.
 */
export class FileLogSink implements AttackLogSink {
  private readonly directory: string
  private readonly rotation: LogRotation
  private readonly pending = new Map<string, Promise<void>>()

  constructor(options: FileLogSinkOptions) {
    this.directory = options.directory
    this.rotation = options.rotation ?? 'monthly'
  }

  /**
   * Path of the file a record written now would go to
   */
  currentFile(): string {
    return join(this.directory, getLogFileName(new Date(), this.rotation))
  }

  async write(record: AttackLogRecord): Promise<void> {
    const file = this.currentFile()
    const line = JSON.stringify(record) + '\n'

    const previous = this.pending.get(file) ?? Promise.resolve()
    const next = previous.then(() => appendFile(file, line, { flag: 'a' }))

    // The chain only orders writes; each caller sees its own failure below
    const settled = next.then(
      () => undefined,
      () => undefined
    )
    this.pending.set(file, settled)

    try {
      await next
    } catch (error) {
      throw new LogSinkError('Unable to write to the log file', {
        details: { file },
        cause: error,
      })
    } finally {
      if (this.pending.get(file) === settled) this.pending.delete(file)
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.pending.values())
  }
}

/**
 * Create a file sink
 */
export function createFileLogSink(options: FileLogSinkOptions): FileLogSink {
  return new FileLogSink(options)
}
