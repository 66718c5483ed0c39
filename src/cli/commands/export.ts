/**
 * domainset CLI - Export Command
 *
 * Write a sorted snapshot of the collection as text or JSON.
 * `-f -` writes the artifact to stdout.
 */

import type { ExportArtifact } from '../../types.js'
import { STDIN_PATH, writeOutputFile } from '../../lib/domain-file.js'
import { parseExportFormat } from '../../lib/export-format.js'
import { withClient, type CliContext } from '../lib/create-client.js'
import { c, print } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface ExportCommandOptions {
  file: string
  format?: string
}

/**
 * Run the export command
 */
export async function runExport(context: CliContext, options: ExportCommandOptions): Promise<ExportArtifact> {
  const format = parseExportFormat(options.format)

  return withClient(context, async (client) => {
    const artifact = await client.export(format)

    if (artifact.count === 0) {
      print.warning(`No domains found in ${client.getCollection()}`)
    }

    if (options.file === STDIN_PATH) {
      ui.outputRaw(artifact.content)
      return artifact
    }

    const written = writeOutputFile(options.file, artifact.content)

    if (context.jsonOutput) {
      ui.output(JSON.stringify({ file: written, format: artifact.format, count: artifact.count }))
    } else {
      print.success(`Exported ${artifact.count} domains to ${c.value(written)} (${artifact.format} format)`)
    }

    return artifact
  })
}
