/**
 * Export formats
 *
 * text: sorted domains, one per line, trailing newline (empty string when empty)
 * json: { domain_count, exported_at, domains } with 2-space indentation
 */

import type { ExportArtifact, ExportDocument, ExportFormat } from '../types.js'
import { EXPORT_FORMATS } from '../types.js'
import { InvalidOptionError } from './errors.js'

/**
 * Code-unit order, the same order `sort` in a shell gives under LC_ALL=C
 */
export function sortDomains(domains: Iterable<string>): string[] {
  return [...domains].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value)
}

/**
 * Parse a user-supplied format name (case-insensitive)
 */
export function parseExportFormat(value: string | undefined): ExportFormat {
  const normalized = (value ?? 'text').trim().toLowerCase()
  if (!isExportFormat(normalized)) {
    throw new InvalidOptionError('--format', value ?? '', EXPORT_FORMATS)
  }
  return normalized
}

export function formatText(domains: string[]): string {
  const sorted = sortDomains(domains)
  return sorted.length > 0 ? sorted.join('\n') + '\n' : ''
}

export function buildExportDocument(domains: string[], now: Date = new Date()): ExportDocument {
  const sorted = sortDomains(domains)
  return {
    domain_count: sorted.length,
    exported_at: now.toISOString(),
    domains: sorted
  }
}

export function formatJson(domains: string[], now: Date = new Date()): string {
  return JSON.stringify(buildExportDocument(domains, now), null, 2) + '\n'
}

/**
 * Render an export artifact in the requested format
 */
export function renderExport(domains: string[], format: ExportFormat, now: Date = new Date()): ExportArtifact {
  const content = format === 'json' ? formatJson(domains, now) : formatText(domains)
  return { format, count: domains.length, content }
}
