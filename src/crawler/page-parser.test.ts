import { describe, it, expect } from 'vitest'
import { parsePage } from './page-parser.js'

describe('parsePage', () => {
  it('should extract title, meta description, headings, links and images', () => {
    const html = `<!doctype html>
<html>
  <head>
    <title>About our team</title>
    <meta name="description" content="Who we are">
  </head>
  <body>
    <h1>About</h1>
    <h2>Team</h2><h2>History</h2>
    <h4>Founders</h4>
    <a href="/contact">Contact</a>
    <a href="https://other.com/">Partner</a>
    <a name="anchor-only">No href</a>
    <img src="/a.png" alt="Logo">
    <img src="/b.png">
  </body>
</html>`

    expect(parsePage(html)).toEqual({
      title: 'About our team',
      metaDescription: 'Who we are',
      headingCounts: [1, 2, 0, 1, 0, 0],
      links: ['/contact', 'https://other.com/'],
      images: [
        { src: '/a.png', alt: 'Logo' },
        { src: '/b.png', alt: undefined },
      ],
    })
  })

  it('should report a missing title and meta description as null', () => {
    const page = parsePage('<html><body><p>Hi</p></body></html>')
    expect(page.title).toBeNull()
    expect(page.metaDescription).toBeNull()
  })

  it('should keep title whitespace as written', () => {
    expect(parsePage('<title>  Padded title  </title>').title).toBe('  Padded title  ')
  })

  it('should return an empty string for a description without content', () => {
    expect(parsePage('<meta name="description">').metaDescription).toBe('')
  })

  it('should use the first title element', () => {
    expect(parsePage('<title>First one here</title><title>Second</title>').title).toBe('First one here')
  })

  it('should keep empty hrefs and alt attributes', () => {
    const page = parsePage('<a href="">Self</a><img src="/c.png" alt="">')
    expect(page.links).toEqual([''])
    expect(page.images).toEqual([{ src: '/c.png', alt: '' }])
  })
})
