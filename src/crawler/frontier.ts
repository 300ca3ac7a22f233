/**
 * Frontier
 *
 * Tracks discovered-but-unvisited URLs and the URLs already visited.
 * Visit order is unspecified: the frontier is a set, not a queue.
 */

import { isInScopeUrl } from '../utils/scope-filter.js'
import { CrawlError } from '../utils/errors.js'
import { hostOf } from '../utils/url.js'
import type { Logger } from '../utils/logger.js'
import { silentLogger } from '../utils/logger.js'
import type { FrontierEntry } from '../types/page-data.js'

export interface FrontierOptions {
  maxPages: number
  maxDepth: number
  logger?: Logger
}

export class Frontier {
  private pending = new Map<string, FrontierEntry>()
  private visited = new Set<string>()
  private seedHost: string | null = null

  private maxPages: number
  private maxDepth: number
  private logger: Logger

  constructor(options: FrontierOptions) {
    this.maxPages = options.maxPages
    this.maxDepth = options.maxDepth
    this.logger = options.logger ?? silentLogger
  }

  get visitedCount(): number {
    return this.visited.size
  }

  get pendingCount(): number {
    return this.pending.size
  }

  get host(): string | null {
    return this.seedHost
  }

  /**
   * Reset state and start from a single normalized URL at depth 0
   */
  seed(url: string): void {
    this.pending.clear()
    this.visited.clear()
    const host = hostOf(url)
    if (!host) {
      throw CrawlError.invalidTarget(url)
    }
    this.seedHost = host
    this.pending.set(url, { url, depth: 0 })
  }

  /**
   * Remove and return some pending entry, or null when none remain
   */
  nextCandidate(): FrontierEntry | null {
    for (const [url, entry] of this.pending) {
      this.pending.delete(url)
      return entry
    }
    return null
  }

  markVisited(url: string): void {
    this.pending.delete(url)
    this.visited.add(url)
  }

  isVisited(url: string): boolean {
    return this.visited.has(url)
  }

  isPending(url: string): boolean {
    return this.pending.has(url)
  }

  /**
   * Add a discovered URL if it is in scope and not yet seen.
   * Returns true when the URL was added.
   */
  offer(url: string, depth: number): boolean {
    if (this.seedHost === null) return false

    if (this.isVisited(url) || this.isPending(url)) {
      return false
    }

    if (depth > this.maxDepth) {
      return false
    }

    const scope = isInScopeUrl(url, this.seedHost)
    if (!scope.inScope) {
      this.logger.debug(`Skipping ${url}: ${scope.reason}`)
      return false
    }

    this.pending.set(url, { url, depth })
    return true
  }

  shouldContinue(): boolean {
    return this.pending.size > 0 && this.visited.size < this.maxPages
  }
}
