import type { RequestType } from '../../core/types'

/**
 * One logged CSRF attempt. Field names are part of the log file format.
 */
export interface AttackLogRecord {
  /** Unix timestamp in seconds */
  timestamp: number
  host: string
  request_uri: string
  request_type: RequestType
  /** Query parameters (GET) or body parameters (POST) */
  query: Record<string, unknown>
  cookie: Record<string, string>
}

/**
 * Append-only destination for attack records
 */
export interface AttackLogSink {
  write(record: AttackLogRecord): Promise<void>
  close?(): Promise<void>
}

/**
 * Log file rotation period
 */
export type LogRotation = 'daily' | 'monthly'

/**
 * File sink options
 */
export interface FileLogSinkOptions {
  directory: string
  rotation?: LogRotation
}

/**
 * Memory sink options
 */
export interface MemoryLogSinkOptions {
  maxRecords?: number
}

/**
 * Console sink options
 */
export interface ConsoleLogSinkOptions {
  colorize?: boolean
  pretty?: boolean
}
