export { FileLogSink, createFileLogSink, getLogFileName } from './file'
export { MemoryLogSink, createMemoryLogSink } from './memory'
export { ConsoleLogSink, createConsoleLogSink } from './console'
export { MultiLogSink, createMultiLogSink } from './multi'
