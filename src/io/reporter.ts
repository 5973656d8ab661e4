/**
 * Renders validation results for output.
 * @module io/reporter
 */

import type { RecordId } from '../types/record.js'
import type { ValidationReport } from '../types/report.js'

export const REPORT_FORMATS = ['text', 'json'] as const
export type ReportFormat = (typeof REPORT_FORMATS)[number]

export function isReportFormat(value: unknown): value is ReportFormat {
  return typeof value === 'string' && REPORT_FORMATS.some((format) => format === value)
}

/**
 * One identifier per line, newline terminated. Empty for an empty set.
 * Lines follow the set's iteration order; callers must not rely on it.
 */
export function formatBadRecords(badRecords: Iterable<RecordId>): string {
  let output = ''
  for (const id of badRecords) {
    output += `${String(id)}\n`
  }
  return output
}

/**
 * JSON rendering of a full report, with the bad set as an array.
 */
export function formatReport(report: ValidationReport): string {
  return `${JSON.stringify(
    {
      badRecords: Array.from(report.badRecords),
      entries: report.entries,
      stats: report.stats,
    },
    null,
    2
  )}\n`
}

export function renderReport(report: ValidationReport, format: ReportFormat): string {
  return format === 'json' ? formatReport(report) : formatBadRecords(report.badRecords)
}
