import type { AttackLogRecord, AttackLogSink, MemoryLogSinkOptions } from '../types'

/**
 * In-memory sink keeping the most recent records.
 * Useful for development and testing
 */
export class MemoryLogSink implements AttackLogSink {
  private records: AttackLogRecord[] = []
  private readonly maxRecords: number

  constructor(options: MemoryLogSinkOptions = {}) {
    this.maxRecords = options.maxRecords || 1000
  }

  async write(record: AttackLogRecord): Promise<void> {
    this.records.push(record)

    if (this.records.length > this.maxRecords) {
      this.records = this.records.slice(-this.maxRecords)
    }
  }

  async close(): Promise<void> {
    this.records = []
  }

  /**
   * Get all records (for testing)
   */
  getRecords(): AttackLogRecord[] {
    return [...this.records]
  }

  clear(): void {
    this.records = []
  }

  size(): number {
    return this.records.length
  }
}

/**
 * Create a memory sink
 */
export function createMemoryLogSink(options?: MemoryLogSinkOptions): MemoryLogSink {
  return new MemoryLogSink(options)
}
