/**
 * Page Fetcher
 *
 * Retrieves a single URL over HTTP with a fixed timeout.
 * Failures are raised as CrawlError so the crawl loop can tell
 * a transient fetch problem from anything else.
 */

import { CrawlError } from '../utils/errors.js'
import type { FetchedPage } from '../types/page-data.js'

export const DEFAULT_USER_AGENT = 'SEOAuditTool/1.0'
export const DEFAULT_FETCH_TIMEOUT_MS = 10000

const ACCEPT_HEADER = 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8'

export interface PageFetcher {
  fetchPage(url: string): Promise<FetchedPage>
}

export interface HttpPageFetcherOptions {
  userAgent?: string
  timeoutMs?: number
}

export class HttpPageFetcher implements PageFetcher {
  private userAgent: string
  private timeout: number

  constructor(options: HttpPageFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.timeout = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS
  }

  async fetchPage(url: string): Promise<FetchedPage> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeout)

    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          Accept: ACCEPT_HEADER,
        },
        redirect: 'follow',
        signal: controller.signal,
      })

      if (!response.ok) {
        // Release the connection
        await response.body?.cancel()
        throw CrawlError.httpStatus(url, response.status)
      }

      const contentType = response.headers.get('content-type') ?? ''

      // Non-HTML bodies are never parsed
      if (!contentType.toLowerCase().includes('text/html')) {
        await response.body?.cancel()
        return { url, status: response.status, contentType, body: '' }
      }

      return {
        url,
        status: response.status,
        contentType,
        body: await response.text(),
      }
    } catch (error) {
      throw CrawlError.fromFetchError(error, url)
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
