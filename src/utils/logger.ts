/**
 * Levelled logger for the crawler
 *
 * Created once by the CLI and handed to the crawl core, which never reaches
 * for a process-wide instance.
 */

import { appendFileSync } from 'fs'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
  /**
   * Log with a context tag, e.g. the host being crawled
   */
  crawl(tag: string, level: LogLevel, message: string, ...args: unknown[]): void
}

export interface LoggerOptions {
  level?: LogLevel
  /** Every line is also appended here */
  filePath?: string
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value)
}

function formatTimestamp(): string {
  return new Date().toISOString()
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.message
  }
  return typeof arg === 'object' ? JSON.stringify(arg, null, 2) : String(arg)
}

export function formatMessage(level: LogLevel, message: string, ...args: unknown[]): string {
  const timestamp = formatTimestamp()
  const levelStr = level.toUpperCase().padEnd(5)
  const argsStr = args.length > 0 ? ' ' + args.map(formatArg).join(' ') : ''
  return `[${timestamp}] ${levelStr} ${message}${argsStr}`
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const currentLevel = options.level ?? 'info'
  const filePath = options.filePath

  const shouldLog = (level: LogLevel): boolean => LOG_LEVELS[level] >= LOG_LEVELS[currentLevel]

  const write = (level: LogLevel, message: string, args: unknown[]): void => {
    if (!shouldLog(level)) return

    const line = formatMessage(level, message, ...args)
    if (level === 'error') {
      console.error(line)
    } else if (level === 'warn') {
      console.warn(line)
    } else {
      console.log(line)
    }

    if (filePath) {
      appendFileSync(filePath, line + '\n', 'utf-8')
    }
  }

  return {
    debug(message: string, ...args: unknown[]): void {
      write('debug', message, args)
    },

    info(message: string, ...args: unknown[]): void {
      write('info', message, args)
    },

    warn(message: string, ...args: unknown[]): void {
      write('warn', message, args)
    },

    error(message: string, ...args: unknown[]): void {
      write('error', message, args)
    },

    crawl(tag: string, level: LogLevel, message: string, ...args: unknown[]): void {
      write(level, `[Crawl:${tag}] ${message}`, args)
    },
  }
}

const noop = (): void => {}

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  crawl: noop,
}
