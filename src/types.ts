/**
 * domainset - Type Definitions
 */

// ============================================================================
// Validation Types
// ============================================================================

/**
 * Why a line was rejected by the validator.
 *
 * - protocol_or_path: contains a scheme marker (`http://`) or a `/`
 * - empty_label: two consecutive dots, or a leading/trailing dot
 * - bad_label: a label with characters or hyphens in the wrong place
 * - bad_tld: final label is not alphabetic, shorter than 2, or contains `_`
 * - malformed_wildcard: `*` glued to a leading label, or a wildcard with no TLD after it
 * - too_long: domain over 253 characters or a label over 63
 * - too_few_labels: a bare label with no dot
 */
export type InvalidReason =
  | 'protocol_or_path'
  | 'empty_label'
  | 'bad_label'
  | 'bad_tld'
  | 'malformed_wildcard'
  | 'too_long'
  | 'too_few_labels'

export interface ValidDomain {
  valid: true
  /** Normalized (trimmed, lowercased) domain */
  domain: string
}

export interface InvalidDomain {
  valid: false
  reason: InvalidReason
  /** Trimmed input as received */
  input: string
}

/** Blank line: skipped, never counted as invalid */
export interface SkippedLine {
  valid: false
  skipped: true
}

export type ValidationResult = ValidDomain | InvalidDomain | SkippedLine

// ============================================================================
// Store Reports
// ============================================================================

export interface InvalidEntry {
  /** 1-based position in the batch */
  line: number
  input: string
  reason: InvalidReason
}

export interface FailedEntry {
  line: number
  domain: string
  error: string
}

export interface AddReport {
  collection: string
  /** Non-empty lines seen */
  processed: number
  added: number
  duplicate: number
  invalid: number
  invalidEntries: InvalidEntry[]
  /** Entries rejected by the backend for reasons other than connectivity */
  failures: FailedEntry[]
}

export interface RemoveReport {
  collection: string
  processed: number
  removed: number
  notFound: number
  notFoundEntries: string[]
  failures: FailedEntry[]
}

/** Report carried by an interrupted batch */
export type BatchReport = AddReport | RemoveReport

export interface ProjectSummary {
  project: string
  count: number
}

export interface DeleteResult {
  collection: string
  /** False when the collection did not exist */
  deleted: boolean
  /** Number of entries the collection held before deletion */
  count: number
}

// ============================================================================
// Export Types
// ============================================================================

export type ExportFormat = 'text' | 'json'

export const EXPORT_FORMATS: readonly ExportFormat[] = ['text', 'json'] as const

/** JSON export document, keys are part of the file format */
export interface ExportDocument {
  domain_count: number
  exported_at: string
  domains: string[]
}

export interface ExportArtifact {
  format: ExportFormat
  count: number
  content: string
}

// ============================================================================
// Configuration Types
// ============================================================================

export type BackendType = 'redis' | 'memory'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'] as const

export interface RedisConfig {
  host: string
  port: number
  db: number
  password?: string
  username?: string
  /** Upper bound of pooled connections */
  max_connections: number
  /** Milliseconds before a connection attempt is abandoned */
  connect_timeout: number
  /** Milliseconds before a single command is abandoned (0 = no limit) */
  command_timeout?: number
}

export interface DomainSetConfig {
  /** Default project; empty means the global collection */
  project?: string
  backend: {
    type: BackendType
  }
  redis: RedisConfig
  collection: {
    /** Key prefix, project collections live at `<prefix>:<project>` */
    prefix: string
  }
  logging: {
    level: LogLevel
  }
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Minimal logger the client writes to; the CLI passes one bound to its log level
 */
export interface Logger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

// ============================================================================
// Client Options
// ============================================================================

export interface AddOptions {
  /** Validate each line before insertion (default: true) */
  validate?: boolean
}

export interface DeleteOptions {
  /** Must be true, otherwise ConfirmationRequiredError is thrown */
  confirm?: boolean
}
