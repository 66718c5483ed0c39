/**
 * Set-storage backends
 *
 * The client only needs a handful of set operations per collection key, so the
 * storage service is reached through the small SetBackend contract below.
 *
 * - RedisSetBackend: ioredis connections held in a generic-pool pool
 * - MemorySetBackend: process-local maps (library use and tests)
 *
 * Both are idempotent: adding an existing member or removing an absent one is a
 * no-op reported as `false`, never an error.
 */

import genericPool from 'generic-pool'
import type { Factory, Pool } from 'generic-pool'
import { Redis } from 'ioredis'
import type { DomainSetConfig, Logger, RedisConfig } from '../types.js'
import { ConnectionError, NotInitializedError, isConnectionFailure } from './errors.js'

export interface SetBackend {
  /** Human-readable target, never includes credentials */
  describe(): string
  connect(): Promise<void>
  disconnect(): Promise<void>
  isConnected(): boolean
  ping(): Promise<void>
  /** True when the member was not already present */
  addMember(key: string, member: string): Promise<boolean>
  /** True when the member was present and removed */
  removeMember(key: string, member: string): Promise<boolean>
  cardinality(key: string): Promise<number>
  /** Members in no particular order */
  members(key: string): Promise<string[]>
  exists(key: string): Promise<boolean>
  /** True when the key existed */
  deleteKey(key: string): Promise<boolean>
  /** Keys matching a glob pattern (`*`, `?`, `\` escapes) */
  keys(pattern: string): Promise<string[]>
}

const SCAN_COUNT = 200
const RECONNECT_DELAY_MS = 100

// ============================================================================
// Redis
// ============================================================================

export interface RedisSetBackendOptions {
  logger?: Logger
}

export class RedisSetBackend implements SetBackend {
  private pool: Pool<Redis> | null = null
  private lastCreateError: Error | null = null
  private lastCreateFailureAt = 0
  private readonly config: RedisConfig
  private readonly logger?: Logger

  constructor(config: RedisConfig, options: RedisSetBackendOptions = {}) {
    this.config = config
    this.logger = options.logger
  }

  describe(): string {
    return `redis://${this.config.host}:${this.config.port}/${this.config.db}`
  }

  /**
   * Open one connection. Rejects with the socket error (ECONNREFUSED, NOAUTH, ...)
   * rather than ioredis's generic "Connection is closed."
   */
  private async openClient(): Promise<Redis> {
    const { host, port, db, password, username, connect_timeout, command_timeout } = this.config

    // A failure moments ago: wait before the next socket so pool retries do not spin
    const sinceFailure = Date.now() - this.lastCreateFailureAt
    if (sinceFailure < RECONNECT_DELAY_MS) {
      await new Promise(resolve => setTimeout(resolve, RECONNECT_DELAY_MS - sinceFailure))
    }

    const client = new Redis({
      host,
      port,
      db,
      password,
      username,
      lazyConnect: true,
      connectTimeout: connect_timeout,
      commandTimeout: command_timeout || undefined,
      maxRetriesPerRequest: 1,
      enableOfflineQueue: false,
      // Fail fast: reconnection is the pool's job, not the socket's
      retryStrategy: () => null
    })

    let socketError: Error | null = null
    client.on('error', (err: Error) => {
      socketError ??= err
      this.logger?.debug(`Redis connection error: ${err.message}`)
    })

    try {
      await client.connect()
      return client
    } catch (err) {
      client.disconnect()
      this.lastCreateFailureAt = Date.now()
      throw socketError ?? err
    }
  }

  /**
   * Verify the server answers PING on one connection, then create the pool.
   * Throws ConnectionError on the first failure.
   */
  async connect(): Promise<void> {
    if (this.pool) return

    let probe: Redis
    try {
      probe = await this.openClient()
    } catch (err) {
      throw this.toConnectionError(err)
    }
    try {
      await probe.ping()
    } catch (err) {
      probe.disconnect()
      throw this.toConnectionError(err)
    }
    await probe.quit()

    const factory: Factory<Redis> = {
      create: () => this.openClient(),
      destroy: async (client) => {
        if (client.status === 'ready') {
          await client.quit()
        } else {
          client.disconnect()
        }
      },
      validate: async (client) => client.status === 'ready'
    }

    const pool = genericPool.createPool(factory, {
      max: Math.max(1, this.config.max_connections),
      min: 0,
      testOnBorrow: true,
      acquireTimeoutMillis: this.config.connect_timeout
    })

    // After a mid-run outage acquire only times out; keep the create error that says why
    pool.on('factoryCreateError', (err: Error) => {
      this.lastCreateError = err
      this.logger?.debug(`Failed to open Redis connection: ${err.message}`)
    })

    this.pool = pool
    this.logger?.debug(`Connected to ${this.describe()} (pool max ${this.config.max_connections})`)
  }

  async disconnect(): Promise<void> {
    const pool = this.pool
    if (!pool) return
    this.pool = null
    await pool.drain()
    await pool.clear()
  }

  isConnected(): boolean {
    return this.pool !== null
  }

  private toConnectionError(err: unknown): ConnectionError {
    if (err instanceof ConnectionError) return err
    const raw = err instanceof Error ? err : new Error(String(err))
    // An acquire timeout only says "timed out"; the failed create says why
    const cause = raw.name === 'TimeoutError' && this.lastCreateError ? this.lastCreateError : raw
    return new ConnectionError(this.describe(), cause.message, cause)
  }

  /**
   * Borrow a pooled connection for one call.
   * Connections that failed at the socket level are destroyed instead of returned.
   */
  private async withConnection<T>(fn: (client: Redis) => Promise<T>): Promise<T> {
    const pool = this.pool
    if (!pool) throw new NotInitializedError()

    let client: Redis
    try {
      client = await pool.acquire()
    } catch (err) {
      throw this.toConnectionError(err)
    }

    try {
      const result = await fn(client)
      await pool.release(client)
      return result
    } catch (err) {
      if (isConnectionFailure(err)) {
        await pool.destroy(client)
        throw this.toConnectionError(err)
      }
      await pool.release(client)
      throw err
    }
  }

  async ping(): Promise<void> {
    await this.withConnection(async (client) => {
      await client.ping()
    })
  }

  async addMember(key: string, member: string): Promise<boolean> {
    return this.withConnection(async (client) => (await client.sadd(key, member)) === 1)
  }

  async removeMember(key: string, member: string): Promise<boolean> {
    return this.withConnection(async (client) => (await client.srem(key, member)) === 1)
  }

  async cardinality(key: string): Promise<number> {
    return this.withConnection(client => client.scard(key))
  }

  async members(key: string): Promise<string[]> {
    return this.withConnection(client => client.smembers(key))
  }

  async exists(key: string): Promise<boolean> {
    return this.withConnection(async (client) => (await client.exists(key)) > 0)
  }

  async deleteKey(key: string): Promise<boolean> {
    return this.withConnection(async (client) => (await client.del(key)) > 0)
  }

  async keys(pattern: string): Promise<string[]> {
    return this.withConnection(async (client) => {
      const found = new Set<string>()
      let cursor = '0'
      do {
        const [next, batch] = await client.scan(cursor, 'MATCH', pattern, 'COUNT', SCAN_COUNT)
        for (const key of batch) found.add(key)
        cursor = next
      } while (cursor !== '0')
      return [...found]
    })
  }
}

// ============================================================================
// Memory
// ============================================================================

function escapeRegExp(char: string): string {
  return char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Convert a Redis-style glob (`*`, `?`, `\` escapes) into an anchored RegExp
 */
export function globToRegExp(pattern: string): RegExp {
  let source = ''
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i]
    if (char === '\\' && i + 1 < pattern.length) {
      i++
      source += escapeRegExp(pattern[i])
    } else if (char === '*') {
      source += '.*'
    } else if (char === '?') {
      source += '.'
    } else {
      source += escapeRegExp(char)
    }
  }
  return new RegExp(`^${source}$`)
}

export class MemorySetBackend implements SetBackend {
  private readonly sets = new Map<string, Set<string>>()
  private connected = false
  private readonly name: string

  constructor(name: string = 'default') {
    this.name = name
  }

  describe(): string {
    return `memory://${this.name}`
  }

  async connect(): Promise<void> {
    this.connected = true
  }

  async disconnect(): Promise<void> {
    this.connected = false
  }

  isConnected(): boolean {
    return this.connected
  }

  private ensureConnected(): void {
    if (!this.connected) throw new NotInitializedError()
  }

  async ping(): Promise<void> {
    this.ensureConnected()
  }

  async addMember(key: string, member: string): Promise<boolean> {
    this.ensureConnected()
    let set = this.sets.get(key)
    if (!set) {
      set = new Set()
      this.sets.set(key, set)
    }
    if (set.has(member)) return false
    set.add(member)
    return true
  }

  async removeMember(key: string, member: string): Promise<boolean> {
    this.ensureConnected()
    const set = this.sets.get(key)
    if (!set || !set.delete(member)) return false
    // Redis drops a set once its last member is removed
    if (set.size === 0) this.sets.delete(key)
    return true
  }

  async cardinality(key: string): Promise<number> {
    this.ensureConnected()
    return this.sets.get(key)?.size ?? 0
  }

  async members(key: string): Promise<string[]> {
    this.ensureConnected()
    return [...(this.sets.get(key) ?? [])]
  }

  async exists(key: string): Promise<boolean> {
    this.ensureConnected()
    return this.sets.has(key)
  }

  async deleteKey(key: string): Promise<boolean> {
    this.ensureConnected()
    return this.sets.delete(key)
  }

  async keys(pattern: string): Promise<string[]> {
    this.ensureConnected()
    const regex = globToRegExp(pattern)
    return [...this.sets.keys()].filter(key => regex.test(key))
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Build the backend named by config.backend.type
 */
export function createBackend(config: DomainSetConfig, logger?: Logger): SetBackend {
  switch (config.backend.type) {
    case 'memory':
      return new MemorySetBackend()
    case 'redis':
      return new RedisSetBackend(config.redis, { logger })
  }
}
