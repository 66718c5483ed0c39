/**
 * domainset CLI - Add Command
 *
 * Add domains from a file (or stdin with `-f -`) to the collection
 */

import type { AddReport } from '../../types.js'
import { readDomainSource } from '../../lib/domain-file.js'
import { BatchInterruptedError } from '../../lib/errors.js'
import { withClient, type CliContext } from '../lib/create-client.js'
import { formatAddSummary, formatInvalidEntries } from '../lib/report.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface AddCommandOptions {
  file: string
  /** false with --no-validate */
  validate: boolean
}

function printAddReport(context: CliContext, report: AddReport): void {
  if (context.jsonOutput) {
    ui.output(JSON.stringify(report, null, 2))
    return
  }

  print.info(formatAddSummary(report))

  if (report.invalid > 0) {
    print.warning(`Skipped ${report.invalid} invalid domains`)
    for (const line of formatInvalidEntries(report)) {
      ui.verbose(line, context.verbose)
    }
  }

  if (report.failures.length > 0) {
    print.warning(`Failed to add ${report.failures.length} domains`)
    for (const failure of report.failures) {
      print.item(`${c.domain(failure.domain)} ${c.muted(`(line ${failure.line})`)}: ${failure.error}`)
    }
  }
}

/**
 * Run the add command
 */
export async function runAdd(context: CliContext, options: AddCommandOptions): Promise<AddReport> {
  const lines = await readDomainSource(options.file)
  ui.verbose(`Read ${lines.length} lines from ${options.file}`, context.verbose)

  return withClient(context, async (client) => {
    try {
      const report = await client.add(lines, { validate: options.validate })
      printAddReport(context, report)
      return report
    } catch (err) {
      // Entries written before the drop stay written, so still show them
      if (err instanceof BatchInterruptedError && 'added' in err.report) {
        printAddReport(context, err.report)
      }
      throw err
    }
  })
}
