#!/usr/bin/env node

/**
 * SEO Audit Crawler CLI
 *
 * Crawls a single site and reports on-page SEO issues:
 * 1. Resolves options from the command line and environment
 * 2. Crawls same-host pages up to the page limit, showing progress
 * 3. Prints the issues found per page
 * 4. Optionally exports them as txt, csv, md, json or xlsx
 */

import 'dotenv/config'
import ora from 'ora'
import { basename } from 'path'
import { createProgram } from './cli.js'
import { CrawlManager } from './crawler/crawl-manager.js'
import { HttpPageFetcher } from './crawler/page-fetcher.js'
import type { CrawlConfig } from './config.js'
import { formatResults, writeReport } from './reporters/report-writer.js'
import { createLogger } from './utils/logger.js'
import { CrawlError, errorMessage } from './utils/errors.js'

/**
 * Main crawl execution
 */
async function main(config: CrawlConfig): Promise<void> {
  const logger = createLogger({ level: config.logLevel, filePath: config.logFile })
  logger.debug('Configuration', config)

  const spinner = ora(`Crawling 0/${config.maxPages} pages`).start()

  const manager = new CrawlManager({
    target: config.target,
    maxPages: config.maxPages,
    maxDepth: config.maxDepth,
    fetcher: new HttpPageFetcher({ userAgent: config.userAgent, timeoutMs: config.timeoutMs }),
    logger,
    onProgress: (progress) => {
      spinner.text = `Crawling ${progress.visited}/${progress.maxPages} pages`
    },
  })

  const outcome = await manager.run()

  if (outcome.status === 'failed') {
    spinner.fail(`Crawling error: ${outcome.error.message}`)
    process.exitCode = 1
    return
  }

  const { records, stats } = outcome
  spinner.succeed(`Crawled ${stats.pagesVisited} pages in ${(stats.durationMs / 1000).toFixed(1)}s`)

  if (stats.pagesAnalyzed === 0) {
    console.log('\nNo pages could be analyzed. Check the domain and try again.')
    process.exitCode = 1
    return
  }

  if (records.length === 0) {
    console.log(`\nNo SEO issues found across ${stats.pagesAnalyzed} analyzed pages.`)
    return
  }

  console.log('\n' + formatResults(records))

  if (config.format) {
    try {
      const fullPath = await writeReport(records, { format: config.format, directory: config.outputDir })
      console.log(`\n${basename(fullPath)} saved in ${config.outputDir}`)
    } catch (error) {
      const details = error instanceof CrawlError && error.details ? `: ${error.details}` : ''
      logger.error(`${errorMessage(error)}${details}`)
      process.exitCode = 1
    }
  }
}

createProgram(main).parseAsync().catch((error: unknown) => {
  console.error('Fatal error:', errorMessage(error))
  process.exit(1)
})
