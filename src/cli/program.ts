/**
 * domainset CLI - command definitions
 *
 * Global options live on the root program and are read by every command
 * through optsWithGlobals().
 */

import { Command, Option } from 'commander'
import { isDomainSetError } from '../lib/errors.js'
import { buildContext, type BuildContextOptions, type CliContext, type GlobalOptions } from './lib/create-client.js'
import { c, print } from './lib/colors.js'
import * as ui from './ui.js'
import { runAdd, type AddCommandOptions } from './commands/add.js'
import { runRemove, type RemoveCommandOptions } from './commands/remove.js'
import { runExport, type ExportCommandOptions } from './commands/export.js'
import { runPrint, runCount, runProjects } from './commands/print.js'
import { runDelete, type DeleteCommandOptions, type DeletePrompt } from './commands/delete.js'
import { runConfig } from './commands/config.js'

export interface ProgramOptions {
  version?: string
  /** Environment and working directory used to resolve config */
  context?: BuildContextOptions
  /** Confirmation source for delete (default: terminal prompt) */
  deletePrompt?: DeletePrompt
}

const EXAMPLES = `
Examples:
  $ domainset add -f domains.txt
  $ domainset add -f scope.txt -p acme
  $ domainset export -f output.json --format json
  $ domainset count
  $ domainset remove -f domains_to_remove.txt
  $ domainset remove -d example.com
  $ domainset delete --confirm
`

/**
 * Build the root command
 */
export function createProgram(options: ProgramOptions = {}): Command {
  const program = new Command()

  const contextFor = (command: Command): CliContext =>
    buildContext(command.optsWithGlobals<GlobalOptions>(), options.context)

  program
    .name('domainset')
    .description('Deduplicated domain lists for recon scope, stored in Redis sets')
    .version(options.version ?? '0.0.0', '-V, --version')
    .option('-c, --config <path>', 'configuration file path')
    .option('-p, --project <name>', 'project collection (default: global collection)')
    .option('-v, --verbose', 'enable debug logging')
    .option('-q, --quiet', 'only log errors')
    .option('--json', 'machine-readable output')
    .addHelpText('after', EXAMPLES)
    .configureOutput({
      writeErr: (str) => process.stderr.write(str),
      outputError: (str, write) => write(c.error(str))
    })

  program
    .command('add')
    .description('Add domains from a file (- reads stdin)')
    .requiredOption('-f, --file <path>', 'file containing domains, one per line')
    .option('--no-validate', 'skip domain validation (only trim and lowercase)')
    .action(async (opts: AddCommandOptions, command: Command) => {
      await runAdd(contextFor(command), opts)
    })

  program
    .command('remove')
    .description('Remove domains from the collection')
    .option('-f, --file <path>', 'file containing domains to remove')
    .addOption(new Option('-d, --domain <name>', 'single domain to remove').conflicts('file'))
    .action(async (opts: RemoveCommandOptions, command: Command) => {
      await runRemove(contextFor(command), opts)
    })

  program
    .command('export')
    .description('Export domains to a file (- writes stdout)')
    .requiredOption('-f, --file <path>', 'output file')
    .addOption(new Option('--format <format>', 'export format').choices(['text', 'json']).default('text'))
    .action(async (opts: ExportCommandOptions, command: Command) => {
      await runExport(contextFor(command), opts)
    })

  program
    .command('print')
    .alias('list')
    .description('Print all domains, sorted')
    .action(async (_opts: Record<string, never>, command: Command) => {
      await runPrint(contextFor(command))
    })

  program
    .command('count')
    .description('Count domains in the collection')
    .action(async (_opts: Record<string, never>, command: Command) => {
      await runCount(contextFor(command))
    })

  program
    .command('projects')
    .description('List project collections')
    .action(async (_opts: Record<string, never>, command: Command) => {
      await runProjects(contextFor(command))
    })

  program
    .command('delete')
    .alias('delete-all')
    .description('Delete ALL domains in the collection')
    .option('--confirm', 'skip the confirmation prompt')
    .option('--force', 'skip the confirmation prompt (for scripts)')
    .action(async (opts: DeleteCommandOptions, command: Command) => {
      await runDelete(contextFor(command), opts, options.deletePrompt)
    })

  program
    .command('config')
    .description('Show the resolved configuration')
    .action(async (_opts: Record<string, never>, command: Command) => {
      await runConfig(contextFor(command))
    })

  return program
}

/**
 * Print an error the way every command does and return the exit code
 */
export function reportError(err: unknown, verbose: boolean): number {
  if (isDomainSetError(err)) {
    print.error(err.message)
    if (err.suggestion) {
      ui.log(`  ${c.muted('Suggestion:')} ${err.suggestion}`)
    }
    if (verbose && err.context) {
      ui.log(`  ${c.muted('Context:')} ${JSON.stringify(err.context)}`)
    }
  } else if (err instanceof Error) {
    print.error(err.message)
    if (verbose && err.stack) {
      ui.log(c.muted(err.stack))
    }
  } else {
    print.error(String(err))
  }
  return 1
}
