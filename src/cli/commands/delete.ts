/**
 * domainset CLI - Delete Command
 *
 * DANGER: removes the whole collection in one call.
 *
 * Safety locks:
 * 1. Interactive mode: y/N prompt (default no)
 * 2. Non-interactive mode (CI, pipes): requires --confirm or --force
 */

import type { DeleteResult } from '../../types.js'
import { ConfirmationRequiredError } from '../../lib/errors.js'
import { withClient, type CliContext } from '../lib/create-client.js'
import { isInteractive, promptConfirmation } from '../lib/confirm.js'
import { c, print, symbols } from '../lib/colors.js'
import * as ui from '../ui.js'

export interface DeleteCommandOptions {
  confirm?: boolean
  force?: boolean
}

export interface DeletePrompt {
  interactive: () => boolean
  ask: (message: string) => Promise<boolean>
}

const terminalPrompt: DeletePrompt = {
  interactive: isInteractive,
  ask: message => promptConfirmation(message)
}

/**
 * Run the delete command. Resolves to null when the user declines.
 */
export async function runDelete(
  context: CliContext,
  options: DeleteCommandOptions,
  prompt: DeletePrompt = terminalPrompt
): Promise<DeleteResult | null> {
  return withClient(context, async (client) => {
    const collection = client.getCollection()

    if (!options.confirm && !options.force) {
      if (!prompt.interactive()) {
        throw new ConfirmationRequiredError('delete', collection)
      }

      const count = await client.count()
      const confirmed = await prompt.ask(
        `Are you sure you want to delete ALL ${count} domains from ${collection}? (y/N): `
      )

      if (!confirmed) {
        if (context.jsonOutput) {
          ui.output(JSON.stringify({ error: 'cancelled', message: 'Operation cancelled by user' }))
        } else {
          ui.log(`${symbols.info} Delete operation cancelled. No domains were deleted.`)
        }
        return null
      }
    }

    const result = await client.delete({ confirm: true })

    if (context.jsonOutput) {
      ui.output(JSON.stringify(result))
    } else if (result.deleted) {
      print.success(`Deleted ${c.count(String(result.count))} domains from ${collection}`)
    } else {
      print.warning(`No domains existed in ${collection}`)
    }

    return result
  })
}
