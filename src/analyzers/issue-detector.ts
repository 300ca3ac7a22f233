/**
 * Issue Detector
 *
 * Checks a parsed page against the on-page SEO rules and returns the
 * issues it finds, grouped by category. Holds no state between pages.
 */

import type { IssueCategory, PageIssueRecord, PageIssues, ParsedPage } from '../types/page-data.js'
import { ISSUE_CATEGORIES } from '../types/page-data.js'
import { hostOf, isHttpUrl, resolveLink } from '../utils/url.js'

export interface IssueThresholds {
  titleMinLength: number
  titleMaxLength: number
  metaDescriptionMinLength: number
  metaDescriptionMaxLength: number
  maxExternalLinks: number
}

export const DEFAULT_THRESHOLDS: IssueThresholds = {
  titleMinLength: 10,
  titleMaxLength: 60,
  metaDescriptionMinLength: 50,
  metaDescriptionMaxLength: 160,
  maxExternalLinks: 10,
}

export class IssueDetector {
  private thresholds: IssueThresholds

  constructor(thresholds: Partial<IssueThresholds> = {}) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...thresholds }
  }

  /**
   * Analyze a page and return its issue record
   */
  analyze(url: string, page: ParsedPage): PageIssueRecord {
    const found: Record<IssueCategory, string[]> = {
      Title: this.analyzeTitle(page),
      'Meta Description': this.analyzeMetaDescription(page),
      'Heading Structure': this.analyzeHeadings(page),
      Link: this.analyzeLinks(url, page),
      Image: this.analyzeImages(page),
    }

    const issues: Partial<Record<IssueCategory, readonly string[]>> = {}
    for (const category of ISSUE_CATEGORIES) {
      if (found[category].length > 0) {
        issues[category] = Object.freeze(found[category])
      }
    }

    return Object.freeze({ url, issues: Object.freeze(issues) })
  }

  // ============================================================================
  // TITLE
  // ============================================================================

  private analyzeTitle(page: ParsedPage): string[] {
    const { title } = page
    if (title === null || title.trim() === '') {
      return ['Missing Title Tag']
    }

    const { titleMinLength, titleMaxLength } = this.thresholds
    if (title.length < titleMinLength || title.length > titleMaxLength) {
      return [`Title Tag Length Issue (Current: ${title.length} chars)`]
    }

    return []
  }

  // ============================================================================
  // META DESCRIPTION
  // ============================================================================

  private analyzeMetaDescription(page: ParsedPage): string[] {
    const { metaDescription } = page
    if (metaDescription === null || metaDescription.trim() === '') {
      return ['Missing Meta Description']
    }

    const { metaDescriptionMinLength, metaDescriptionMaxLength } = this.thresholds
    if (metaDescription.length < metaDescriptionMinLength || metaDescription.length > metaDescriptionMaxLength) {
      return [`Meta Description Length Issue (Current: ${metaDescription.length} chars)`]
    }

    return []
  }

  // ============================================================================
  // HEADINGS
  // ============================================================================

  private analyzeHeadings(page: ParsedPage): string[] {
    const issues: string[] = []
    const counts = page.headingCounts

    if (counts[0] === 0) {
      issues.push('No H1 Tag Found')
    } else if (counts[0] > 1) {
      issues.push('Multiple H1 Tags')
    }

    // A used level whose next level is absent while a deeper one is present
    for (let level = 1; level <= 5; level++) {
      const deeperUsed = counts.slice(level + 1).some((count) => count > 0)
      if (counts[level - 1] > 0 && counts[level] === 0 && deeperUsed) {
        issues.push(`Potential Heading Hierarchy Issue (Missing H${level + 1})`)
      }
    }

    return issues
  }

  // ============================================================================
  // LINKS
  // ============================================================================

  private analyzeLinks(url: string, page: ParsedPage): string[] {
    const externalCount = countExternalLinks(url, page.links)
    if (externalCount > this.thresholds.maxExternalLinks) {
      return [`High Number of External Links (${externalCount})`]
    }
    return []
  }

  // ============================================================================
  // IMAGES
  // ============================================================================

  private analyzeImages(page: ParsedPage): string[] {
    const withoutAlt = page.images.filter((image) => !image.alt).length
    if (withoutAlt > 0) {
      return [`${withoutAlt} Images Missing Alt Text`]
    }
    return []
  }
}

/**
 * Count hrefs that resolve to an http(s) URL on another host than the page.
 * Unresolvable hrefs and other schemes (mailto:, tel:) are not counted.
 */
export function countExternalLinks(pageUrl: string, hrefs: string[]): number {
  const pageHost = hostOf(pageUrl)
  let count = 0

  for (const href of hrefs) {
    const resolved = resolveLink(href, pageUrl)
    if (resolved === null) continue

    const target = new URL(resolved)
    if (isHttpUrl(target) && target.host !== pageHost) {
      count++
    }
  }

  return count
}

const defaultDetector = new IssueDetector()

export function analyzePage(url: string, page: ParsedPage): PageIssueRecord {
  return defaultDetector.analyze(url, page)
}

export function hasIssues(issues: PageIssues): boolean {
  return ISSUE_CATEGORIES.some((category) => (issues[category]?.length ?? 0) > 0)
}
