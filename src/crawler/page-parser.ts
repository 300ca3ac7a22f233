/**
 * Page Parser
 *
 * Extracts the parts of an HTML document the issue detector looks at.
 */

import * as cheerio from 'cheerio'
import type { HeadingCounts, ImageData, ParsedPage } from '../types/page-data.js'

export function parsePage(html: string): ParsedPage {
  const $ = cheerio.load(html)

  // Title
  const titleEl = $('title').first()
  const title = titleEl.length > 0 ? titleEl.text() : null

  // Meta description
  const metaEl = $('meta[name="description"]').first()
  const metaDescription = metaEl.length > 0 ? metaEl.attr('content') ?? '' : null

  return {
    title,
    metaDescription,
    headingCounts: countHeadings($),
    links: extractLinks($),
    images: extractImages($),
  }
}

function countHeadings($: cheerio.CheerioAPI): HeadingCounts {
  return [
    $('h1').length,
    $('h2').length,
    $('h3').length,
    $('h4').length,
    $('h5').length,
    $('h6').length,
  ]
}

function extractLinks($: cheerio.CheerioAPI): string[] {
  const links: string[] = []

  $('a[href]').each((_, el) => {
    const href = $(el).attr('href')
    if (href !== undefined) {
      links.push(href)
    }
  })

  return links
}

function extractImages($: cheerio.CheerioAPI): ImageData[] {
  const images: ImageData[] = []

  $('img').each((_, el) => {
    images.push({
      src: $(el).attr('src'),
      alt: $(el).attr('alt'),
    })
  })

  return images
}
