/**
 * DomainSetClient - deduplicated domain collections on a set-storage backend
 *
 * A collection is one set key:
 *   <prefix>            global collection
 *   <prefix>:<project>  project collection
 *
 * Deduplication is the set's job: SADD of an existing member is a duplicate,
 * SREM of an absent member is "not found". Batches run one set operation per
 * entry, so a batch can partly succeed; that is the expected outcome.
 */

import pLimit from 'p-limit'
import type {
  AddOptions,
  AddReport,
  DeleteOptions,
  DeleteResult,
  DomainSetConfig,
  ExportArtifact,
  ExportFormat,
  FailedEntry,
  Logger,
  ProjectSummary,
  RemoveReport
} from './types.js'
import { classify, normalizeDomain } from './lib/validator.js'
import { renderExport, sortDomains } from './lib/export-format.js'
import { createBackend, type SetBackend } from './lib/set-backend.js'
import { DEFAULT_CONFIG } from './lib/config-loader.js'
import {
  BatchInterruptedError,
  ConfirmationRequiredError,
  ConnectionError,
  InvalidProjectNameError,
  NotInitializedError,
  isConnectionFailure
} from './lib/errors.js'

export const GLOBAL_COLLECTION = '(global)'

const PROJECT_NAME = /^[A-Za-z0-9._-]+$/

export interface DomainSetClientOptions {
  /** Backend instance; built from `config` when omitted */
  backend?: SetBackend
  /** Resolved configuration (default: DEFAULT_CONFIG) */
  config?: DomainSetConfig
  /** Project collection; empty or omitted means the global collection */
  project?: string
  /** Key prefix override (default: config.collection.prefix) */
  prefix?: string
  /** Entries in flight during a batch (default: config.redis.max_connections) */
  concurrency?: number
  logger?: Logger
}

/**
 * Storage key for a collection
 */
export function collectionKey(prefix: string, project?: string): string {
  return project ? `${prefix}:${project}` : prefix
}

/**
 * Throw unless the name is usable as a key suffix
 */
export function assertProjectName(project: string): void {
  if (!PROJECT_NAME.test(project)) {
    throw new InvalidProjectNameError(project)
  }
}

interface PendingEntry {
  line: number
  domain: string
}

export class DomainSetClient {
  private readonly backend: SetBackend
  private readonly project: string
  private readonly prefix: string
  private readonly key: string
  private readonly concurrency: number
  private readonly logger?: Logger

  constructor(options: DomainSetClientOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG

    this.project = options.project ?? config.project ?? ''
    if (this.project) assertProjectName(this.project)

    this.prefix = options.prefix ?? config.collection.prefix
    this.key = collectionKey(this.prefix, this.project)
    this.logger = options.logger
    this.backend = options.backend ?? createBackend(config, options.logger)
    this.concurrency = Math.max(1, options.concurrency ?? config.redis.max_connections)
  }

  /**
   * Connect the backend; throws ConnectionError when it is unreachable
   */
  async connect(): Promise<void> {
    if (this.backend.isConnected()) return
    try {
      await this.backend.connect()
    } catch (err) {
      throw this.toConnectionError(err)
    }
    this.logger?.debug(`Connected to ${this.backend.describe()}`)
  }

  async disconnect(): Promise<void> {
    await this.backend.disconnect()
  }

  isConnected(): boolean {
    return this.backend.isConnected()
  }

  /** Project name, or "(global)" */
  getCollection(): string {
    return this.project || GLOBAL_COLLECTION
  }

  getCollectionKey(): string {
    return this.key
  }

  getBackend(): SetBackend {
    return this.backend
  }

  private ensureConnected(): void {
    if (!this.backend.isConnected()) {
      throw new NotInitializedError()
    }
  }

  private toConnectionError(err: unknown): unknown {
    if (err instanceof ConnectionError || !isConnectionFailure(err)) return err
    const cause = err instanceof Error ? err : new Error(String(err))
    return new ConnectionError(this.backend.describe(), cause.message, cause)
  }

  /**
   * Run a backend call, turning raw socket errors into ConnectionError
   */
  private async call<T>(fn: () => Promise<T>): Promise<T> {
    this.ensureConnected()
    try {
      return await fn()
    } catch (err) {
      throw this.toConnectionError(err)
    }
  }

  /**
   * Run one backend call per entry with bounded concurrency.
   * Non-connection failures are recorded per entry; the first connection
   * failure stops new entries from starting and is returned.
   */
  private async runEntries(
    entries: PendingEntry[],
    operation: (entry: PendingEntry) => Promise<void>,
    failures: FailedEntry[]
  ): Promise<ConnectionError | null> {
    const limit = pLimit(this.concurrency)
    let connectionFailure: ConnectionError | null = null

    await Promise.all(
      entries.map(entry =>
        limit(async () => {
          if (connectionFailure) return
          try {
            await operation(entry)
          } catch (err) {
            const mapped = this.toConnectionError(err)
            if (mapped instanceof ConnectionError) {
              connectionFailure ??= mapped
              return
            }
            const message = mapped instanceof Error ? mapped.message : String(mapped)
            failures.push({ line: entry.line, domain: entry.domain, error: message })
            this.logger?.warn(`Failed to process '${entry.domain}' (line ${entry.line}): ${message}`)
          }
        })
      )
    )

    failures.sort((a, b) => a.line - b.line)
    return connectionFailure
  }

  /**
   * Add domains to the collection.
   *
   * Blank lines are skipped. Unless `validate` is false, each line goes through
   * the validator and rejected lines are reported, not thrown.
   */
  async add(domains: string[], options: AddOptions = {}): Promise<AddReport> {
    this.ensureConnected()
    const validate = options.validate ?? true

    const report: AddReport = {
      collection: this.getCollection(),
      processed: 0,
      added: 0,
      duplicate: 0,
      invalid: 0,
      invalidEntries: [],
      failures: []
    }

    const pending: PendingEntry[] = []
    domains.forEach((raw, index) => {
      const line = index + 1

      if (!validate) {
        const domain = normalizeDomain(raw)
        if (domain === '') return
        report.processed++
        pending.push({ line, domain })
        return
      }

      const result = classify(raw)
      if ('skipped' in result) return
      report.processed++

      if (result.valid) {
        pending.push({ line, domain: result.domain })
        return
      }

      report.invalid++
      report.invalidEntries.push({ line, input: result.input, reason: result.reason })
      this.logger?.debug(`Invalid domain '${result.input}' on line ${line} (${result.reason}), skipping`)
    })

    const failure = await this.runEntries(pending, async ({ domain }) => {
      if (await this.backend.addMember(this.key, domain)) {
        report.added++
      } else {
        report.duplicate++
      }
    }, report.failures)

    if (failure) throw new BatchInterruptedError('add', report, failure)

    this.logger?.debug(
      `Added to ${report.collection}: ${report.added} new, ${report.duplicate} duplicate, ${report.invalid} invalid`
    )
    return report
  }

  /**
   * Remove domains from the collection. No validation: any string may be tried.
   */
  async remove(domains: string[]): Promise<RemoveReport> {
    this.ensureConnected()

    const report: RemoveReport = {
      collection: this.getCollection(),
      processed: 0,
      removed: 0,
      notFound: 0,
      notFoundEntries: [],
      failures: []
    }

    const pending: PendingEntry[] = []
    domains.forEach((raw, index) => {
      const domain = normalizeDomain(raw)
      if (domain === '') return
      report.processed++
      pending.push({ line: index + 1, domain })
    })

    const notFound: PendingEntry[] = []
    const failure = await this.runEntries(pending, async (entry) => {
      if (await this.backend.removeMember(this.key, entry.domain)) {
        report.removed++
      } else {
        report.notFound++
        notFound.push(entry)
        this.logger?.debug(`Domain '${entry.domain}' not found in ${report.collection}`)
      }
    }, report.failures)

    report.notFoundEntries = notFound.sort((a, b) => a.line - b.line).map(entry => entry.domain)

    if (failure) throw new BatchInterruptedError('remove', report, failure)

    this.logger?.debug(`Removed from ${report.collection}: ${report.removed} removed, ${report.notFound} not found`)
    return report
  }

  /**
   * Remove a single domain; false when it was not present
   */
  async removeOne(domain: string): Promise<boolean> {
    const normalized = normalizeDomain(domain)
    if (normalized === '') return false
    return this.call(() => this.backend.removeMember(this.key, normalized))
  }

  /**
   * Number of domains; 0 when the collection does not exist
   */
  async count(): Promise<number> {
    return this.call(() => this.backend.cardinality(this.key))
  }

  async exists(): Promise<boolean> {
    return this.call(() => this.backend.exists(this.key))
  }

  /**
   * All domains, sorted; empty when the collection does not exist
   */
  async list(): Promise<string[]> {
    const members = await this.call(() => this.backend.members(this.key))
    return sortDomains(members)
  }

  /**
   * Snapshot of the collection in the given format. Read-only.
   */
  async export(format: ExportFormat = 'text', now: Date = new Date()): Promise<ExportArtifact> {
    const domains = await this.list()
    return renderExport(domains, format, now)
  }

  /**
   * Delete the whole collection in one call.
   * Throws ConfirmationRequiredError, without touching anything, unless confirm is true.
   */
  async delete(options: DeleteOptions = {}): Promise<DeleteResult> {
    if (options.confirm !== true) {
      throw new ConfirmationRequiredError('delete', this.getCollection())
    }

    const count = await this.count()
    const deleted = await this.call(() => this.backend.deleteKey(this.key))
    this.logger?.debug(deleted ? `Deleted ${this.getCollection()} (${count} domains)` : `${this.getCollection()} did not exist`)

    return { collection: this.getCollection(), deleted, count }
  }

  /**
   * Names of project collections under the prefix, sorted
   */
  async projects(): Promise<string[]> {
    const keyPrefix = `${this.prefix}:`
    const keys = await this.call(() => this.backend.keys(`${escapeGlob(this.prefix)}:*`))
    return sortDomains(
      keys
        .filter(key => key.startsWith(keyPrefix) && key.length > keyPrefix.length)
        .map(key => key.slice(keyPrefix.length))
    )
  }

  /**
   * Project collections with their sizes, sorted by name
   */
  async projectSummaries(): Promise<ProjectSummary[]> {
    const summaries: ProjectSummary[] = []
    for (const project of await this.projects()) {
      const count = await this.call(() => this.backend.cardinality(collectionKey(this.prefix, project)))
      summaries.push({ project, count })
    }
    return summaries
  }
}

/**
 * Escape glob metacharacters so a prefix matches literally in SCAN MATCH
 */
export function escapeGlob(value: string): string {
  return value.replace(/[*?[\]\\]/g, '\\$&')
}

// Factory function for creating clients
export function createClient(options?: DomainSetClientOptions): DomainSetClient {
  return new DomainSetClient(options)
}

/**
 * Execute a function with a connected client, disconnecting afterwards
 *
 * @example
 * ```typescript
 * const count = await withClient({ config, project: 'acme' }, client => client.count())
 * ```
 */
export async function withClient<T>(
  options: DomainSetClientOptions,
  fn: (client: DomainSetClient) => Promise<T>
): Promise<T> {
  const client = createClient(options)
  try {
    await client.connect()
    return await fn(client)
  } finally {
    await client.disconnect()
  }
}

export default DomainSetClient
