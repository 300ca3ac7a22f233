/**
 * Report Writer
 *
 * Renders the per-page issue records for the console and for export files.
 */

import { writeFileSync } from 'fs'
import { join } from 'path'
import ExcelJS from 'exceljs'
import { CrawlError } from '../utils/errors.js'
import { CATEGORY_LABELS, ISSUE_CATEGORIES } from '../types/page-data.js'
import type { IssueCategory, PageIssueRecord } from '../types/page-data.js'

export const REPORT_FORMATS = ['txt', 'csv', 'md', 'json', 'xlsx'] as const

export type ReportFormat = (typeof REPORT_FORMATS)[number]

/** Formats rendered as a string; xlsx is written as a workbook */
export type TextReportFormat = Exclude<ReportFormat, 'xlsx'>

export const WORKSHEET_NAME = 'SEO Audit'

export const REPORT_BASENAME = 'audit-results'

/**
 * Categories of a record that carry issues, in display order
 */
function presentCategories(record: PageIssueRecord): Array<[IssueCategory, readonly string[]]> {
  const present: Array<[IssueCategory, readonly string[]]> = []
  for (const category of ISSUE_CATEGORIES) {
    const issues = record.issues[category]
    if (issues && issues.length > 0) {
      present.push([category, issues])
    }
  }
  return present
}

/**
 * Console rendering of the results
 */
export function formatResults(records: PageIssueRecord[]): string {
  const lines: string[] = ['--- SEO AUDIT RESULTS ---']

  for (const record of records) {
    lines.push('', `URL: ${record.url}`)
    for (const [category, issues] of presentCategories(record)) {
      lines.push(`${CATEGORY_LABELS[category]}:`)
      for (const issue of issues) {
        lines.push(`  - ${issue}`)
      }
    }
  }

  return lines.join('\n')
}

function renderText(records: PageIssueRecord[]): string {
  let out = ''
  for (const record of records) {
    out += `URL: ${record.url}\n`
    for (const [category, issues] of presentCategories(record)) {
      out += `${CATEGORY_LABELS[category]}:\n`
      for (const issue of issues) {
        out += `  - ${issue}\n`
      }
    }
    out += '\n'
  }
  return out
}

function renderMarkdown(records: PageIssueRecord[]): string {
  let out = '# SEO Audit Results\n\n'
  for (const record of records) {
    out += `## ${record.url}\n\n`
    for (const [category, issues] of presentCategories(record)) {
      out += `### ${CATEGORY_LABELS[category]}\n`
      for (const issue of issues) {
        out += `- ${issue}\n`
      }
    }
    out += '\n'
  }
  return out
}

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

/**
 * Header plus one row per record: the URL, then each category's issues joined by "; "
 */
function tableRows(records: PageIssueRecord[]): string[][] {
  const header = ['URL', ...ISSUE_CATEGORIES.map((category) => CATEGORY_LABELS[category])]
  const rows = records.map((record) => [
    record.url,
    ...ISSUE_CATEGORIES.map((category) => (record.issues[category] ?? []).join('; ')),
  ])
  return [header, ...rows]
}

function renderCsv(records: PageIssueRecord[]): string {
  const rows = tableRows(records).map((cells) => cells.map(escapeCsvField).join(','))
  return rows.join('\r\n') + '\r\n'
}

export function buildWorkbook(records: PageIssueRecord[]): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook()
  const sheet = workbook.addWorksheet(WORKSHEET_NAME)

  for (const cells of tableRows(records)) {
    sheet.addRow(cells.map((cell) => (cell === '' ? null : cell)))
  }

  sheet.getRow(1).font = { bold: true }
  sheet.columns.forEach((column, index) => {
    column.width = index === 0 ? 60 : 40
  })

  return workbook
}

function renderJson(records: PageIssueRecord[]): string {
  return JSON.stringify({ records }, null, 2) + '\n'
}

export function renderReport(records: PageIssueRecord[], format: TextReportFormat): string {
  switch (format) {
    case 'txt':
      return renderText(records)
    case 'csv':
      return renderCsv(records)
    case 'md':
      return renderMarkdown(records)
    case 'json':
      return renderJson(records)
  }
}

export interface WriteReportOptions {
  format: ReportFormat
  directory: string
}

/**
 * Write `audit-results.<format>` into the directory and return its path
 */
export async function writeReport(records: PageIssueRecord[], options: WriteReportOptions): Promise<string> {
  const filename = `${REPORT_BASENAME}.${options.format}`
  const fullPath = join(options.directory, filename)

  try {
    if (options.format === 'xlsx') {
      await buildWorkbook(records).xlsx.writeFile(fullPath)
    } else {
      writeFileSync(fullPath, renderReport(records, options.format), 'utf-8')
    }
  } catch (error) {
    throw CrawlError.exportFailed(fullPath, error)
  }

  return fullPath
}
