/**
 * Command-line definition
 *
 * Parses the arguments, resolves them into a CrawlConfig and hands that to
 * the crawl runner. Invalid options end the program through commander.
 */

import { Command } from 'commander'
import { resolveConfig } from './config.js'
import type { CliOptions, CrawlConfig } from './config.js'
import { REPORT_FORMATS } from './reporters/report-writer.js'
import { errorMessage } from './utils/errors.js'

export type CrawlRunner = (config: CrawlConfig) => Promise<void>

export function createProgram(run: CrawlRunner, env: NodeJS.ProcessEnv = process.env): Command {
  const program: Command = new Command()

  program
    .name('seo-crawler')
    .description('SEO Website Crawler - on-page SEO analysis for a single site')
    .version('1.0.0')
    .argument('<domain>', 'Domain to crawl (e.g., example.com)')
    .option('-d, --depth <number>', 'Maximum crawl depth (default: 3, min: 1)')
    .option('-p, --max-pages <number>', 'Maximum pages to crawl (default: 50, min: 10)')
    .option('-t, --timeout <ms>', 'Per-page request timeout in milliseconds (default: 10000)')
    .option('-f, --format <format>', `Save results as ${REPORT_FORMATS.join(', ')}`)
    .option('-o, --output-dir <dir>', 'Directory for the saved results (default: current directory)')
    .option('--log-file <path>', 'Also append log lines to this file')
    .option('-v, --verbose', 'Enable verbose logging')
    .addHelpText(
      'after',
      `
Examples:
  $ seo-crawler example.com                      # Basic crawl
  $ seo-crawler example.com -d 5 -p 100          # Crawl with 5 depth and 100 max pages
  $ seo-crawler example.com -p 75 -f xlsx -o out # Save a spreadsheet to ./out`
    )
    .action(async (domain: string, options: CliOptions) => {
      let config: CrawlConfig
      try {
        config = resolveConfig(domain, options, env)
      } catch (error) {
        return program.error(errorMessage(error))
      }
      await run(config)
    })

  return program
}
