import type { AttackLogRecord, AttackLogSink, ConsoleLogSinkOptions } from '../types'

/**
 * ANSI color codes
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  alert: '\x1b[31m',     // Red
  timestamp: '\x1b[90m', // Gray
  method: '\x1b[34m',    // Blue
}

/**
 * Console sink
 * Prints attack records with console.warn
 */
export class ConsoleLogSink implements AttackLogSink {
  private readonly colorize: boolean
  private readonly pretty: boolean

  constructor(options: ConsoleLogSinkOptions = {}) {
    this.colorize = options.colorize ?? (process.env.NODE_ENV !== 'production')
    this.pretty = options.pretty ?? false
  }

  async write(record: AttackLogRecord): Promise<void> {
    const output = this.pretty
      ? this.formatPretty(record)
      : this.formatCompact(record)

    console.warn(output)
  }

  /**
   * Single-line format
   */
  formatCompact(record: AttackLogRecord): string {
    return [
      this.color(new Date(record.timestamp * 1000).toISOString(), 'timestamp'),
      this.color('[CSRF]', 'alert'),
      this.color(record.request_type, 'method'),
      `${record.host}${record.request_uri}`,
    ].join(' ')
  }

  /**
   * Multi-line format with parameters and cookies
   */
  formatPretty(record: AttackLogRecord): string {
    const lines = [this.formatCompact(record)]

    if (Object.keys(record.query).length > 0) {
      lines.push(`  Params: ${JSON.stringify(record.query)}`)
    }
    if (Object.keys(record.cookie).length > 0) {
      lines.push(`  Cookies: ${JSON.stringify(record.cookie)}`)
    }

    return lines.join('\n')
  }

  private color(text: string, colorName: keyof typeof COLORS): string {
    if (!this.colorize) return text
    return `${COLORS[colorName]}${text}${COLORS.reset}`
  }
}

/**
 * Create a console sink
 */
export function createConsoleLogSink(options?: ConsoleLogSinkOptions): ConsoleLogSink {
  return new ConsoleLogSink(options)
}
