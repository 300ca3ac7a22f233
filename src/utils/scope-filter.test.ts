import { describe, it, expect } from 'vitest'
import { isInScopeUrl, SCOPE_FILTER_CONFIG } from './scope-filter.js'

const HOST = 'example.com'

describe('Crawl Scope Filter', () => {
  describe('isInScopeUrl', () => {
    // ============================================
    // Same-host pages (should pass)
    // ============================================
    describe('Same-host pages', () => {
      const inScopeUrls = [
        'http://example.com/',
        'https://example.com/',
        'https://example.com/about/',
        'https://example.com/blog/my-first-post',
        'https://example.com/page.html',
        'https://example.com/index.php?id=3',
        'https://example.com/services/#pricing',
      ]

      it.each(inScopeUrls)('should mark %s as in scope', (url) => {
        const result = isInScopeUrl(url, HOST)
        expect(result.inScope).toBe(true)
        expect(result.reason).toBeUndefined()
      })
    })

    // ============================================
    // Host Tests
    // ============================================
    describe('Hosts', () => {
      const otherHosts = [
        'https://other.com/',
        'https://www.example.com/',
        'https://blog.example.com/post',
        'https://example.com.evil.test/',
        'https://example.com:8080/',
      ]

      it.each(otherHosts)('should filter %s', (url) => {
        const result = isInScopeUrl(url, HOST)
        expect(result.inScope).toBe(false)
        expect(result.reason).toContain('Different host')
      })

      it('should compare host including port', () => {
        expect(isInScopeUrl('http://localhost:3000/a', 'localhost:3000').inScope).toBe(true)
        expect(isInScopeUrl('http://localhost:4000/a', 'localhost:3000').inScope).toBe(false)
      })
    })

    // ============================================
    // Scheme Tests
    // ============================================
    describe('Schemes', () => {
      const otherSchemes = [
        'mailto:hello@example.com',
        'ftp://example.com/file',
        'javascript:void(0)',
        'tel:+10000000000',
      ]

      it.each(otherSchemes)('should filter %s', (url) => {
        const result = isInScopeUrl(url, HOST)
        expect(result.inScope).toBe(false)
        expect(result.reason).toContain('Unsupported scheme')
      })
    })

    // ============================================
    // File Extension Tests
    // ============================================
    describe('File Extensions', () => {
      it.each(SCOPE_FILTER_CONFIG.nonHtmlExtensions)('should filter %s files', (ext) => {
        const result = isInScopeUrl(`https://example.com/assets/file${ext}`, HOST)
        expect(result.inScope).toBe(false)
        expect(result.reason).toBe(`Non-HTML file extension: ${ext}`)
      })

      it('should be case-insensitive for extensions', () => {
        expect(isInScopeUrl('https://example.com/image.PNG', HOST).inScope).toBe(false)
        expect(isInScopeUrl('https://example.com/doc.Pdf', HOST).inScope).toBe(false)
      })

      it('should only look at the end of the path', () => {
        expect(isInScopeUrl('https://example.com/docs.pdf/overview', HOST).inScope).toBe(true)
        expect(isInScopeUrl('https://example.com/download?file=report.pdf', HOST).inScope).toBe(true)
      })

      it('should allow extensions outside the denylist', () => {
        expect(isInScopeUrl('https://example.com/photo.jpeg', HOST).inScope).toBe(true)
        expect(isInScopeUrl('https://example.com/data.json', HOST).inScope).toBe(true)
      })
    })

    // ============================================
    // Edge Cases
    // ============================================
    describe('Edge Cases', () => {
      it('should treat invalid URLs as out of scope', () => {
        const result = isInScopeUrl('not-a-valid-url', HOST)
        expect(result.inScope).toBe(false)
        expect(result.reason).toBe('Invalid URL')
      })

      it('should handle empty string', () => {
        expect(isInScopeUrl('', HOST)).toEqual({ inScope: false, reason: 'Invalid URL' })
      })

      it('should handle protocol-relative URLs as invalid', () => {
        expect(isInScopeUrl('//example.com/page/', HOST).inScope).toBe(false)
      })
    })
  })

  describe('SCOPE_FILTER_CONFIG', () => {
    it('should export the denylisted extensions', () => {
      expect(SCOPE_FILTER_CONFIG.nonHtmlExtensions).toEqual(['.pdf', '.jpg', '.png', '.gif', '.css', '.js'])
    })
  })
})
