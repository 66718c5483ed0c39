/**
 * CLI UI utilities - TTY-aware output
 *
 * - stdout carries data only (domain lists, counts, JSON reports)
 * - everything meant for a human goes to stderr
 * - TTY: tables with borders; pipe: tab-separated rows
 */

import Table from 'cli-table3'
import type { LogLevel, Logger } from '../types.js'
import { LOG_LEVELS } from '../types.js'
import { c, symbols } from './lib/colors.js'

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Output raw data without newline
 */
export function outputRaw(data: string): void {
  process.stdout.write(data)
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  console.error(message)
}

/**
 * Log verbose message (only with the verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled) {
    console.error(c.muted(`[domainset] ${message}`))
  }
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string): void {
  console.error(`${symbols.warning} ${c.warning(message)}`)
}

function levelRank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level)
}

/**
 * Logger for the client, writing to stderr at or above `level`
 */
export function createLogger(level: LogLevel): Logger {
  const threshold = levelRank(level)
  const at = (messageLevel: LogLevel, write: (message: string) => void) =>
    (message: string): void => {
      if (levelRank(messageLevel) <= threshold) write(message)
    }

  return {
    debug: at('debug', message => console.error(c.muted(`[domainset] ${message}`))),
    info: at('info', message => console.error(`${symbols.info} ${message}`)),
    warn: at('warn', message => console.error(`${symbols.warning} ${c.warning(message)}`)),
    error: at('error', message => console.error(`${symbols.error} ${c.error(message)}`))
  }
}

export interface TableColumn {
  key: string
  header: string
  align?: 'left' | 'center' | 'right'
}

/**
 * Format data as a table using cli-table3
 */
export function formatTable(
  columns: TableColumn[],
  data: Array<Record<string, string | number>>,
  options: { tty?: boolean } = {}
): string {
  const tty = options.tty ?? isTTY

  if (!tty) {
    // Simple tab-separated output for pipes
    const headers = columns.map(col => col.header).join('\t')
    const rows = data.map(row => columns.map(col => String(row[col.key] ?? '')).join('\t'))
    return [headers, ...rows].join('\n')
  }

  const table = new Table({
    head: columns.map(col => c.header(col.header)),
    colAligns: columns.map(col => col.align ?? 'left'),
    style: { head: [], border: [] }
  })

  for (const row of data) {
    table.push(columns.map(col => String(row[col.key] ?? '')))
  }

  return table.toString()
}
