export type CrawlErrorCode =
  | 'INVALID_TARGET'
  | 'INVALID_CONFIG'
  | 'NETWORK_ERROR'
  | 'TIMEOUT'
  | 'HTTP_ERROR'
  | 'EXPORT_FAILED'
  | 'ALREADY_RUN'
  | 'UNKNOWN'

export class CrawlError extends Error {
  code: CrawlErrorCode
  details?: string

  constructor(code: CrawlErrorCode, message: string, details?: string) {
    super(message)
    this.name = 'CrawlError'
    this.code = code
    this.details = details
  }

  /**
   * Whether this error came from fetching a single page
   */
  get isTransient(): boolean {
    return this.code === 'NETWORK_ERROR' || this.code === 'TIMEOUT' || this.code === 'HTTP_ERROR'
  }

  static fromFetchError(error: unknown, url: string): CrawlError {
    if (error instanceof CrawlError) {
      return error
    }
    if (error instanceof Error) {
      if (error.name === 'AbortError' || error.name === 'TimeoutError') {
        return new CrawlError('TIMEOUT', `Request timed out for ${url}`, error.message)
      }
      return new CrawlError('NETWORK_ERROR', `Network error fetching ${url}`, errorMessage(error.cause ?? error))
    }
    return new CrawlError('NETWORK_ERROR', `Failed to fetch ${url}`, String(error))
  }

  static httpStatus(url: string, status: number): CrawlError {
    return new CrawlError('HTTP_ERROR', `HTTP ${status} for ${url}`)
  }

  static invalidTarget(input: string): CrawlError {
    return new CrawlError('INVALID_TARGET', `Invalid target: ${input}`, 'Target must be a domain or an HTTP(S) URL')
  }

  static invalidConfig(message: string): CrawlError {
    return new CrawlError('INVALID_CONFIG', message)
  }

  static exportFailed(path: string, cause: unknown): CrawlError {
    return new CrawlError('EXPORT_FAILED', `Error saving file ${path}`, errorMessage(cause))
  }

  static alreadyRun(): CrawlError {
    return new CrawlError('ALREADY_RUN', 'This crawl has already been run')
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
