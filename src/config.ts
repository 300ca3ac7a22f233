/**
 * Crawl configuration
 *
 * CLI options take precedence over environment variables, which take
 * precedence over the defaults below.
 */

import { existsSync, statSync } from 'fs'
import { CrawlError } from './utils/errors.js'
import type { LogLevel } from './utils/logger.js'
import { isLogLevel } from './utils/logger.js'
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_USER_AGENT } from './crawler/page-fetcher.js'
import { DEFAULT_MAX_DEPTH, DEFAULT_MAX_PAGES } from './crawler/crawl-manager.js'
import type { ReportFormat } from './reporters/report-writer.js'
import { REPORT_FORMATS } from './reporters/report-writer.js'

export const MIN_MAX_PAGES = 10
export const MIN_MAX_DEPTH = 1

export interface CliOptions {
  depth?: string
  maxPages?: string
  timeout?: string
  verbose?: boolean
  format?: string
  outputDir?: string
  logFile?: string
}

export interface CrawlConfig {
  target: string
  maxDepth: number
  maxPages: number
  timeoutMs: number
  userAgent: string
  logLevel: LogLevel
  logFile?: string
  format?: ReportFormat
  outputDir: string
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback
  }

  const value = Number(raw)
  if (!Number.isInteger(value)) {
    throw CrawlError.invalidConfig(`${name} must be an integer (got "${raw}")`)
  }
  if (value < min) {
    throw CrawlError.invalidConfig(`${name} must be at least ${min}`)
  }
  return value
}

function isReportFormat(value: string): value is ReportFormat {
  return (REPORT_FORMATS as readonly string[]).includes(value)
}

export function resolveConfig(
  target: string | undefined,
  options: CliOptions,
  env: NodeJS.ProcessEnv = process.env
): CrawlConfig {
  if (!target || !target.trim()) {
    throw CrawlError.invalidConfig('A domain to crawl is required')
  }

  const maxDepth = parseInteger('Depth', options.depth ?? env.SEO_CRAWL_MAX_DEPTH, DEFAULT_MAX_DEPTH, MIN_MAX_DEPTH)
  const maxPages = parseInteger('Maximum pages', options.maxPages ?? env.SEO_CRAWL_MAX_PAGES, DEFAULT_MAX_PAGES, MIN_MAX_PAGES)
  const timeoutMs = parseInteger('Timeout', options.timeout ?? env.SEO_CRAWL_TIMEOUT_MS, DEFAULT_FETCH_TIMEOUT_MS, 1)

  const userAgent = env.SEO_CRAWL_USER_AGENT?.trim() || DEFAULT_USER_AGENT

  let logLevel: LogLevel = 'info'
  if (options.verbose) {
    logLevel = 'debug'
  } else if (env.LOG_LEVEL) {
    const fromEnv = env.LOG_LEVEL.toLowerCase()
    if (!isLogLevel(fromEnv)) {
      throw CrawlError.invalidConfig(`LOG_LEVEL must be one of debug, info, warn, error (got "${env.LOG_LEVEL}")`)
    }
    logLevel = fromEnv
  }

  let format: ReportFormat | undefined
  if (options.format !== undefined) {
    const normalized = options.format.toLowerCase()
    if (!isReportFormat(normalized)) {
      throw CrawlError.invalidConfig(`Format must be one of ${REPORT_FORMATS.join(', ')} (got "${options.format}")`)
    }
    format = normalized
  }

  const outputDir = options.outputDir ?? '.'
  if (format && !(existsSync(outputDir) && statSync(outputDir).isDirectory())) {
    throw CrawlError.invalidConfig(`Output directory does not exist: ${outputDir}`)
  }

  return {
    target: target.trim(),
    maxDepth,
    maxPages,
    timeoutMs,
    userAgent,
    logLevel,
    logFile: options.logFile ?? (env.SEO_CRAWL_LOG_FILE || undefined),
    format,
    outputDir,
  }
}
