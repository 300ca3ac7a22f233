/**
 * Crawl Scope Filter
 *
 * Decides whether a discovered link belongs to the crawl:
 * same host as the seed, http(s), and not an obvious non-HTML resource.
 */

import { isHttpUrl } from './url.js'

// Non-HTML file extensions to exclude
const NON_HTML_EXTENSIONS = ['.pdf', '.jpg', '.png', '.gif', '.css', '.js']

export interface ScopeResult {
  inScope: boolean
  reason?: string
}

export function isInScopeUrl(url: string, seedHost: string): ScopeResult {
  try {
    const parsed = new URL(url)

    if (!isHttpUrl(parsed)) {
      return { inScope: false, reason: `Unsupported scheme: ${parsed.protocol}` }
    }

    if (parsed.host !== seedHost) {
      return { inScope: false, reason: `Different host: ${parsed.host}` }
    }

    const pathname = parsed.pathname.toLowerCase()
    for (const ext of NON_HTML_EXTENSIONS) {
      if (pathname.endsWith(ext)) {
        return { inScope: false, reason: `Non-HTML file extension: ${ext}` }
      }
    }

    return { inScope: true }
  } catch {
    return { inScope: false, reason: 'Invalid URL' }
  }
}

// Export constants for testing
export const SCOPE_FILTER_CONFIG = {
  nonHtmlExtensions: NON_HTML_EXTENSIONS,
}
