/**
 * domainset CLI - Print, Count and Projects Commands
 *
 * Read-only commands; data goes to stdout, one item per line.
 */

import type { ProjectSummary } from '../../types.js'
import { withClient, type CliContext } from '../lib/create-client.js'
import { print } from '../lib/colors.js'
import * as ui from '../ui.js'

/**
 * Print every domain, sorted
 */
export async function runPrint(context: CliContext): Promise<string[]> {
  return withClient(context, async (client) => {
    const domains = await client.list()

    if (context.jsonOutput) {
      ui.output(JSON.stringify(domains, null, 2))
    } else if (domains.length === 0) {
      print.warning(`No domains found in ${client.getCollection()}`)
    } else {
      ui.output(domains.join('\n'))
    }

    return domains
  })
}

/**
 * Print the number of domains (0 for a collection that does not exist)
 */
export async function runCount(context: CliContext): Promise<number> {
  return withClient(context, async (client) => {
    const count = await client.count()

    if (context.jsonOutput) {
      ui.output(JSON.stringify({ collection: client.getCollection(), count }))
    } else {
      ui.output(String(count))
      ui.verbose(`${client.getCollection()} contains ${count} domains`, context.verbose)
    }

    return count
  })
}

export interface ProjectsCommandOptions {
  /** Draw a table with counts (default: stdout is a terminal) */
  tty?: boolean
}

/**
 * List project collections under the configured prefix.
 * A terminal gets a table with counts; a pipe gets one name per line.
 */
export async function runProjects(context: CliContext, options: ProjectsCommandOptions = {}): Promise<ProjectSummary[]> {
  return withClient(context, async (client) => {
    const summaries = await client.projectSummaries()

    if (context.jsonOutput) {
      ui.output(JSON.stringify(summaries, null, 2))
    } else if (summaries.length === 0) {
      print.info('No project collections found')
    } else if (options.tty ?? ui.isTTY) {
      ui.output(ui.formatTable(
        [
          { key: 'project', header: 'PROJECT' },
          { key: 'count', header: 'DOMAINS', align: 'right' }
        ],
        summaries.map(summary => ({ project: summary.project, count: summary.count })),
        { tty: true }
      ))
    } else {
      ui.output(summaries.map(summary => summary.project).join('\n'))
    }

    return summaries
  })
}
