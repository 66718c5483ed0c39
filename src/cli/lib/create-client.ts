/**
 * Shared helpers for building the CLI context and a connected DomainSetClient
 */

import type { DomainSetConfig, LogLevel, Logger } from '../../types.js'
import { withClient as withConnectedClient, type DomainSetClient } from '../../client.js'
import type { SetBackend } from '../../lib/set-backend.js'
import { loadConfig } from '../../lib/config-loader.js'
import * as ui from '../ui.js'

/**
 * Options every command accepts (registered on the root program)
 */
export interface GlobalOptions {
  config?: string
  project?: string
  verbose?: boolean
  quiet?: boolean
  json?: boolean
}

export interface CliContext {
  config: DomainSetConfig
  /** Config file that was read, null when running on defaults */
  configSource: string | null
  /** Effective project: --project > DOMAINSET_PROJECT > config.project */
  project: string
  verbose: boolean
  jsonOutput: boolean
  logger: Logger
  /** Backend shared by every command of this context; built from config when absent */
  backend?: SetBackend
}

export interface BuildContextOptions {
  env?: Record<string, string | undefined>
  cwd?: string
  /** Logger override, mainly for tests */
  logger?: Logger
  backend?: SetBackend
}

/**
 * Effective log level: -v wins over -q, both win over config
 */
export function resolveLogLevel(options: GlobalOptions, configured: LogLevel): LogLevel {
  if (options.verbose) return 'debug'
  if (options.quiet) return 'error'
  return configured
}

/**
 * Resolve config and logging for one invocation
 */
export function buildContext(options: GlobalOptions, buildOptions: BuildContextOptions = {}): CliContext {
  const { config, source } = loadConfig({
    configPath: options.config,
    startDir: buildOptions.cwd,
    env: buildOptions.env,
    onWarning: message => ui.warn(message)
  })

  const level = resolveLogLevel(options, config.logging.level)
  const logger = buildOptions.logger ?? ui.createLogger(level)

  if (source) {
    logger.debug(`Using config ${source}`)
  }

  return {
    config,
    configSource: source,
    project: (options.project ?? config.project ?? '').trim(),
    verbose: options.verbose === true,
    jsonOutput: options.json === true,
    logger,
    backend: buildOptions.backend
  }
}

/**
 * Run a function with a connected client for the context's collection
 */
export async function withClient<T>(
  context: CliContext,
  fn: (client: DomainSetClient) => Promise<T>
): Promise<T> {
  return withConnectedClient(
    {
      config: context.config,
      project: context.project,
      logger: context.logger,
      backend: context.backend
    },
    fn
  )
}
