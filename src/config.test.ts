import { describe, it, expect } from 'vitest'
import { resolveConfig } from './config.js'
import { CrawlError } from './utils/errors.js'

describe('resolveConfig', () => {
  it('should apply defaults', () => {
    expect(resolveConfig('example.com', {}, {})).toEqual({
      target: 'example.com',
      maxDepth: 3,
      maxPages: 50,
      timeoutMs: 10000,
      userAgent: 'SEOAuditTool/1.0',
      logLevel: 'info',
      logFile: undefined,
      format: undefined,
      outputDir: '.',
    })
  })

  it('should prefer CLI options over environment variables', () => {
    const config = resolveConfig(
      'example.com',
      { depth: '5', maxPages: '100' },
      { SEO_CRAWL_MAX_DEPTH: '2', SEO_CRAWL_MAX_PAGES: '20', SEO_CRAWL_TIMEOUT_MS: '2500' }
    )
    expect(config.maxDepth).toBe(5)
    expect(config.maxPages).toBe(100)
    expect(config.timeoutMs).toBe(2500)
  })

  it('should read the user agent and log file from the environment', () => {
    const config = resolveConfig('example.com', {}, { SEO_CRAWL_USER_AGENT: 'test-agent/1.0', SEO_CRAWL_LOG_FILE: 'crawl.log' })
    expect(config.userAgent).toBe('test-agent/1.0')
    expect(config.logFile).toBe('crawl.log')
  })

  describe('log level', () => {
    it('should use debug when verbose', () => {
      expect(resolveConfig('example.com', { verbose: true }, { LOG_LEVEL: 'warn' }).logLevel).toBe('debug')
    })

    it('should take LOG_LEVEL from the environment', () => {
      expect(resolveConfig('example.com', {}, { LOG_LEVEL: 'WARN' }).logLevel).toBe('warn')
    })

    it('should reject an unknown LOG_LEVEL', () => {
      expect(() => resolveConfig('example.com', {}, { LOG_LEVEL: 'loud' })).toThrow(
        'LOG_LEVEL must be one of debug, info, warn, error (got "loud")'
      )
    })
  })

  describe('validation', () => {
    it('should require a target', () => {
      expect(() => resolveConfig(undefined, {}, {})).toThrow('A domain to crawl is required')
      expect(() => resolveConfig('  ', {}, {})).toThrow(CrawlError)
    })

    it('should enforce the minimum page count', () => {
      expect(() => resolveConfig('example.com', { maxPages: '9' }, {})).toThrow('Maximum pages must be at least 10')
      expect(resolveConfig('example.com', { maxPages: '10' }, {}).maxPages).toBe(10)
    })

    it('should enforce the minimum depth', () => {
      expect(() => resolveConfig('example.com', { depth: '0' }, {})).toThrow('Depth must be at least 1')
    })

    it('should reject non-integers', () => {
      expect(() => resolveConfig('example.com', { maxPages: 'lots' }, {})).toThrow(
        'Maximum pages must be an integer (got "lots")'
      )
      expect(() => resolveConfig('example.com', { depth: '2.5' }, {})).toThrow('Depth must be an integer (got "2.5")')
    })

    it('should raise INVALID_CONFIG errors', () => {
      let caught: unknown
      try {
        resolveConfig('example.com', { timeout: '0' }, {})
      } catch (error) {
        caught = error
      }
      expect(caught).toMatchObject({ code: 'INVALID_CONFIG', message: 'Timeout must be at least 1' })
    })
  })

  describe('export options', () => {
    it('should accept a known format in any case', () => {
      expect(resolveConfig('example.com', { format: 'CSV' }, {}).format).toBe('csv')
    })

    it('should reject an unknown format', () => {
      expect(() => resolveConfig('example.com', { format: 'pdf' }, {})).toThrow(
        'Format must be one of txt, csv, md, json, xlsx (got "pdf")'
      )
    })

    it('should require an existing output directory when exporting', () => {
      expect(() => resolveConfig('example.com', { format: 'md', outputDir: '/definitely/not/here' }, {})).toThrow(
        'Output directory does not exist: /definitely/not/here'
      )
    })

    it('should not check the output directory without a format', () => {
      expect(resolveConfig('example.com', { outputDir: '/definitely/not/here' }, {}).outputDir).toBe('/definitely/not/here')
    })
  })
})
