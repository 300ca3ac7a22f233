/**
 * Crawl Manager
 *
 * Orchestrates the crawling process:
 * - Seeds the frontier from the target
 * - Fetches one page at a time
 * - Runs the issue detector on each HTML page
 * - Feeds discovered links back into the frontier
 * - Reports progress after every page
 *
 * Per-page failures are logged and skipped; only a failure outside the
 * per-page work ends the crawl as failed.
 */

import { Frontier } from './frontier.js'
import type { PageFetcher } from './page-fetcher.js'
import { HttpPageFetcher } from './page-fetcher.js'
import { parsePage } from './page-parser.js'
import { IssueDetector, hasIssues } from '../analyzers/issue-detector.js'
import { CrawlError, errorMessage } from '../utils/errors.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'
import { normalizeTarget, resolveLink } from '../utils/url.js'
import type {
  CrawlOutcome,
  CrawlProgress,
  CrawlState,
  CrawlStats,
  FrontierEntry,
  PageIssueRecord,
} from '../types/page-data.js'

export const DEFAULT_MAX_PAGES = 50
export const DEFAULT_MAX_DEPTH = 3

export interface CrawlManagerOptions {
  /** Domain or URL; a missing scheme becomes http:// */
  target: string
  maxPages?: number
  maxDepth?: number
  fetcher?: PageFetcher
  detector?: IssueDetector
  logger?: Logger
  onProgress?: (progress: CrawlProgress) => void
}

export class CrawlManager {
  private target: string
  private maxPages: number
  private fetcher: PageFetcher
  private detector: IssueDetector
  private logger: Logger
  private onProgress?: (progress: CrawlProgress) => void

  private frontier: Frontier
  private records: PageIssueRecord[] = []
  private currentState: CrawlState = 'idle'
  private tag = ''

  // Counters
  private pagesAnalyzed = 0
  private pagesSkipped = 0
  private pagesFailed = 0

  constructor(options: CrawlManagerOptions) {
    this.target = options.target
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES
    this.fetcher = options.fetcher ?? new HttpPageFetcher()
    this.detector = options.detector ?? new IssueDetector()
    this.logger = options.logger ?? silentLogger
    this.onProgress = options.onProgress
    this.frontier = new Frontier({
      maxPages: this.maxPages,
      maxDepth: options.maxDepth ?? DEFAULT_MAX_DEPTH,
      logger: this.logger,
    })
  }

  get state(): CrawlState {
    return this.currentState
  }

  /**
   * Run the crawl to completion. Never rejects for crawl failures;
   * a fatal error is returned as a failed outcome.
   */
  async run(): Promise<CrawlOutcome> {
    if (this.currentState !== 'idle') {
      throw CrawlError.alreadyRun()
    }

    this.currentState = 'running'
    const startTime = Date.now()

    try {
      const seedUrl = normalizeTarget(this.target)
      this.frontier.seed(seedUrl)
      this.tag = this.frontier.host ?? seedUrl
      this.logger.crawl(this.tag, 'info', `Starting crawl at ${seedUrl} (max ${this.maxPages} pages)`)

      await this.processFrontier()

      this.currentState = 'complete'
      const stats = this.buildStats(startTime)
      this.logger.crawl(
        this.tag,
        'info',
        `Crawl complete. Visited: ${stats.pagesVisited}, Analyzed: ${stats.pagesAnalyzed}, Failed: ${stats.pagesFailed}`
      )
      return { status: 'complete', records: [...this.records], stats }
    } catch (error) {
      this.currentState = 'failed'
      const failure = error instanceof Error ? error : new Error(errorMessage(error))
      this.logger.error(`Crawl failed: ${failure.message}`)
      return { status: 'failed', error: failure, records: [...this.records], stats: this.buildStats(startTime) }
    }
  }

  /**
   * Sequentially work through the frontier until it empties or the page cap is hit
   */
  private async processFrontier(): Promise<void> {
    while (this.frontier.shouldContinue()) {
      const entry = this.frontier.nextCandidate()
      if (!entry) break

      // Counted against the cap whether or not the fetch succeeds
      this.frontier.markVisited(entry.url)

      await this.processPage(entry)

      this.onProgress?.({
        url: entry.url,
        visited: this.frontier.visitedCount,
        maxPages: this.maxPages,
        pending: this.frontier.pendingCount,
        recordsFound: this.records.length,
      })
    }
  }

  private async processPage(entry: FrontierEntry): Promise<void> {
    try {
      const page = await this.fetcher.fetchPage(entry.url)

      if (!page.contentType.toLowerCase().includes('text/html')) {
        this.logger.crawl(this.tag, 'debug', `Skipping non-HTML content at ${entry.url} (${page.contentType || 'no content type'})`)
        this.pagesSkipped++
        return
      }

      const parsed = parsePage(page.body)
      const record = this.detector.analyze(entry.url, parsed)
      this.pagesAnalyzed++

      if (hasIssues(record.issues)) {
        this.records.push(record)
      }

      let added = 0
      for (const href of parsed.links) {
        const resolved = resolveLink(href, entry.url)
        if (resolved && this.frontier.offer(resolved, entry.depth + 1)) {
          added++
        }
      }

      this.logger.crawl(this.tag, 'debug', `Analyzed ${entry.url}, queued ${added} new links`)
    } catch (error) {
      this.pagesFailed++
      if (error instanceof CrawlError && error.isTransient) {
        const details = error.details ? ` (${error.details})` : ''
        this.logger.crawl(this.tag, 'warn', `Error crawling ${entry.url}: ${error.message}${details}`)
      } else {
        this.logger.crawl(this.tag, 'error', `Unexpected error crawling ${entry.url}: ${errorMessage(error)}`)
      }
    }
  }

  private buildStats(startTime: number): CrawlStats {
    return {
      pagesVisited: this.frontier.visitedCount,
      pagesAnalyzed: this.pagesAnalyzed,
      pagesSkipped: this.pagesSkipped,
      pagesFailed: this.pagesFailed,
      durationMs: Date.now() - startTime,
    }
  }
}
