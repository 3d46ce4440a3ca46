import type { AttackLogRecord, AttackLogSink } from '../types'

/**
 * Sink that writes to multiple sinks
 */
export class MultiLogSink implements AttackLogSink {
  private sinks: AttackLogSink[]

  constructor(sinks: AttackLogSink[]) {
    this.sinks = sinks
  }

  async write(record: AttackLogRecord): Promise<void> {
    await Promise.all(this.sinks.map(sink => sink.write(record)))
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map(sink => sink.close?.()))
  }
}

/**
 * Create a multi-sink
 */
export function createMultiLogSink(sinks: AttackLogSink[]): MultiLogSink {
  return new MultiLogSink(sinks)
}
