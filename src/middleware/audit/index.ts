// Types
export type {
  AttackLogRecord,
  AttackLogSink,
  LogRotation,
  FileLogSinkOptions,
  MemoryLogSinkOptions,
  ConsoleLogSinkOptions,
} from './types'

// Sinks
export {
  FileLogSink,
  createFileLogSink,
  getLogFileName,
  MemoryLogSink,
  createMemoryLogSink,
  ConsoleLogSink,
  createConsoleLogSink,
  MultiLogSink,
  createMultiLogSink,
} from './stores'
