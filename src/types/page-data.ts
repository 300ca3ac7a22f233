/**
 * Page Data Types
 *
 * Shapes passed between the fetcher, parser, analyzer and crawl loop
 */

export interface FetchedPage {
  url: string
  status: number
  contentType: string
  body: string
}

export interface ImageData {
  src?: string
  alt?: string
}

/**
 * Counts of h1..h6 elements, index 0 is h1
 */
export type HeadingCounts = readonly [number, number, number, number, number, number]

export interface ParsedPage {
  /** Raw text of the first <title>, null when the page has none */
  title: string | null
  /** content of meta[name=description], '' when the tag has no content, null when absent */
  metaDescription: string | null
  headingCounts: HeadingCounts
  /** href attribute of every anchor, unresolved */
  links: string[]
  images: ImageData[]
}

export const ISSUE_CATEGORIES = [
  'Title',
  'Meta Description',
  'Heading Structure',
  'Link',
  'Image',
] as const

export type IssueCategory = (typeof ISSUE_CATEGORIES)[number]

export const CATEGORY_LABELS: Record<IssueCategory, string> = {
  Title: 'Title Issues',
  'Meta Description': 'Meta Description Issues',
  'Heading Structure': 'Heading Structure Issues',
  Link: 'Link Issues',
  Image: 'Image SEO Issues',
}

export type PageIssues = Readonly<Partial<Record<IssueCategory, readonly string[]>>>

export interface PageIssueRecord {
  readonly url: string
  /** Only categories with at least one issue are present */
  readonly issues: PageIssues
}

export interface FrontierEntry {
  url: string
  depth: number
}

export type CrawlState = 'idle' | 'running' | 'complete' | 'failed'

export interface CrawlStats {
  pagesVisited: number
  pagesAnalyzed: number
  pagesSkipped: number
  pagesFailed: number
  durationMs: number
}

export type CrawlOutcome =
  | { status: 'complete'; records: PageIssueRecord[]; stats: CrawlStats }
  | { status: 'failed'; error: Error; records: PageIssueRecord[]; stats: CrawlStats }

export interface CrawlProgress {
  url: string
  visited: number
  maxPages: number
  pending: number
  recordsFound: number
}
