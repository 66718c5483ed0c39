/**
 * Human-readable batch summaries
 */

import type { AddReport, RemoveReport } from '../../types.js'
import { describeReason } from '../../lib/validator.js'

/**
 * Share of stored entries that were already present, 0-100
 */
export function duplicatePercentage(report: Pick<AddReport, 'added' | 'duplicate'>): number {
  const stored = report.added + report.duplicate
  return stored > 0 ? (report.duplicate / stored) * 100 : 0
}

export function formatAddSummary(report: AddReport): string {
  const stored = report.added + report.duplicate
  return `Processed ${stored} domains: ${report.added} new, ${report.duplicate} duplicates (${duplicatePercentage(report).toFixed(2)}%)`
}

export function formatRemoveSummary(report: RemoveReport): string {
  const attempted = report.removed + report.notFound
  return `Processed ${attempted} domains: ${report.removed} removed, ${report.notFound} not found`
}

/**
 * One line per rejected input, for verbose output
 */
export function formatInvalidEntries(report: AddReport): string[] {
  return report.invalidEntries.map(
    entry => `line ${entry.line}: '${entry.input}' (${describeReason(entry.reason)})`
  )
}
