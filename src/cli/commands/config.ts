/**
 * domainset CLI - Config Command
 *
 * Show the resolved configuration. The password is masked.
 */

import { stringify as stringifyYaml } from 'yaml'
import type { DomainSetConfig } from '../../types.js'
import { maskConfig } from '../../lib/config-loader.js'
import { collectionKey } from '../../client.js'
import type { CliContext } from '../lib/create-client.js'
import { c, labeled } from '../lib/colors.js'
import * as ui from '../ui.js'

/**
 * Run the config command
 */
export async function runConfig(context: CliContext): Promise<DomainSetConfig> {
  const masked = maskConfig({ ...context.config, project: context.project })

  if (context.jsonOutput) {
    ui.output(JSON.stringify({ source: context.configSource, config: masked }, null, 2))
    return masked
  }

  ui.log(labeled('Config file', context.configSource ? c.value(context.configSource) : c.muted('(defaults)')))
  ui.log(labeled('Collection key', c.value(collectionKey(masked.collection.prefix, masked.project))))
  ui.log('')
  ui.outputRaw(stringifyYaml(masked))

  return masked
}
