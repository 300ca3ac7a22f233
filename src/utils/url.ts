/**
 * URL helpers shared by the frontier, the analyzer and the crawl loop
 */

import { CrawlError } from './errors.js'

const SCHEME_PATTERN = /^https?:\/\//i

/**
 * Coerce a caller-supplied domain into a crawlable URL.
 * `example.com` becomes `http://example.com/`.
 */
export function normalizeTarget(input: string): string {
  const trimmed = input.trim()
  if (!trimmed) {
    throw CrawlError.invalidTarget(input)
  }

  const withScheme = SCHEME_PATTERN.test(trimmed) ? trimmed : `http://${trimmed}`

  try {
    const parsed = new URL(withScheme)
    if (!parsed.hostname) {
      throw CrawlError.invalidTarget(input)
    }
    parsed.hash = ''
    return parsed.toString()
  } catch (error) {
    if (error instanceof CrawlError) throw error
    throw CrawlError.invalidTarget(input)
  }
}

/**
 * Resolve an href against the page it was found on, dropping the fragment.
 * Returns null when the href cannot be resolved.
 */
export function resolveLink(href: string, baseUrl: string): string | null {
  try {
    const parsed = new URL(href.trim(), baseUrl)
    parsed.hash = ''
    return parsed.toString()
  } catch {
    return null
  }
}

/**
 * Host (with port) of a URL, or null if it does not parse
 */
export function hostOf(url: string): string | null {
  try {
    return new URL(url).host
  } catch {
    return null
  }
}

export function isHttpUrl(url: URL): boolean {
  return url.protocol === 'http:' || url.protocol === 'https:'
}
