/**
 * domainset CLI - Remove Command
 *
 * Remove domains listed in a file, or a single domain with -d.
 * Removal does not validate: anything stored can be removed.
 */

import type { RemoveReport } from '../../types.js'
import { readDomainSource } from '../../lib/domain-file.js'
import { BatchInterruptedError, MissingInputError } from '../../lib/errors.js'
import { withClient, type CliContext } from '../lib/create-client.js'
import { formatRemoveSummary } from '../lib/report.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface RemoveCommandOptions {
  file?: string
  domain?: string
}

function printRemoveReport(context: CliContext, report: RemoveReport): void {
  if (context.jsonOutput) {
    ui.output(JSON.stringify(report, null, 2))
    return
  }

  print.info(formatRemoveSummary(report))

  for (const domain of report.notFoundEntries) {
    ui.verbose(`Domain '${domain}' not found in ${report.collection}`, context.verbose)
  }

  if (report.failures.length > 0) {
    print.warning(`Failed to remove ${report.failures.length} domains`)
    for (const failure of report.failures) {
      print.item(`${c.domain(failure.domain)} ${c.muted(`(line ${failure.line})`)}: ${failure.error}`)
    }
  }
}

async function removeSingle(context: CliContext, domain: string): Promise<void> {
  await withClient(context, async (client) => {
    const removed = await client.removeOne(domain)
    const collection = client.getCollection()

    if (context.jsonOutput) {
      ui.output(JSON.stringify({ collection, domain, removed }))
    } else if (removed) {
      print.success(`Domain '${domain}' removed from ${collection}`)
    } else {
      print.warning(`Domain '${domain}' not found in ${collection}`)
    }

    if (!removed) {
      process.exitCode = 1
    }
  })
}

async function removeFromFile(context: CliContext, file: string): Promise<void> {
  const lines = await readDomainSource(file)

  await withClient(context, async (client) => {
    try {
      printRemoveReport(context, await client.remove(lines))
    } catch (err) {
      if (err instanceof BatchInterruptedError && 'removed' in err.report) {
        printRemoveReport(context, err.report)
      }
      throw err
    }
  })
}

/**
 * Run the remove command
 */
export async function runRemove(context: CliContext, options: RemoveCommandOptions): Promise<void> {
  if (options.domain !== undefined) {
    await removeSingle(context, options.domain)
    return
  }
  if (options.file !== undefined) {
    await removeFromFile(context, options.file)
    return
  }
  throw new MissingInputError('--file or --domain')
}
