/**
 * Leveled console logging for the CLI.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVEL_NAMES: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export interface LoggerOptions {
  /** Minimum level written, default `info` */
  level?: LogLevel
  /** Prepended to every line, e.g. `[schema]` */
  prefix?: string
  stdout?: (...args: unknown[]) => void
  stderr?: (...args: unknown[]) => void
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVEL_NAMES.some((level) => level === value)
}

export class Logger {
  private level: LogLevel
  private prefix: string
  private stdout: (...args: unknown[]) => void
  private stderr: (...args: unknown[]) => void

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info'
    this.prefix = options.prefix ? `${options.prefix} ` : ''
    this.stdout = options.stdout ?? console.log
    this.stderr = options.stderr ?? console.error
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  /**
   * Logger sharing this one's level and outputs, with its own prefix.
   */
  child(prefix: string): Logger {
    return new Logger({ level: this.level, prefix, stdout: this.stdout, stderr: this.stderr })
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level]
  }

  debug(message: string): void {
    if (this.shouldLog('debug')) {
      this.stdout(`[DEBUG] ${this.prefix}${message}`)
    }
  }

  info(message: string): void {
    if (this.shouldLog('info')) {
      this.stdout(`${this.prefix}${message}`)
    }
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      this.stderr(`Warning: ${this.prefix}${message}`)
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      this.stderr(`Error: ${this.prefix}${message}`)
    }
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options)
}
