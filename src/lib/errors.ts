/**
 * domainset Error Hierarchy
 *
 * Hierarchy:
 *   DomainSetError (base)
 *   ├── ConfigError (configuration issues)
 *   │   ├── ConfigNotFoundError
 *   │   └── InvalidConfigError
 *   ├── BackendError (set-storage connectivity)
 *   │   ├── ConnectionError
 *   │   ├── BatchInterruptedError
 *   │   └── NotInitializedError
 *   ├── ValidationError (input validation)
 *   │   ├── InvalidDomainError
 *   │   ├── InvalidOptionError
 *   │   ├── InvalidProjectNameError
 *   │   └── MissingInputError
 *   └── OperationError (operational failures)
 *       ├── FileNotFoundError
 *       └── ConfirmationRequiredError
 *
 * Per-line validation failures and "not found" removals are reported inside
 * AddReport/RemoveReport and are not thrown.
 */

import type { BatchReport, InvalidReason } from '../types.js'

interface ErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: Error
}

/**
 * Base error class for all domainset errors
 */
export class DomainSetError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'DomainSetError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends DomainSetError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when an explicitly requested config file does not exist
 */
export class ConfigNotFoundError extends ConfigError {
  constructor(searchedPath: string) {
    super(
      `Config file not found: ${searchedPath}`,
      'CONFIG_NOT_FOUND',
      {
        suggestion: 'Check the --config path or create .domainset/config.yaml',
        context: { searchedPath }
      }
    )
    this.name = 'ConfigNotFoundError'
  }
}

/**
 * Thrown when a config file cannot be parsed
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: Error) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check your config file syntax',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Backend Errors
// =============================================================================

export class BackendError extends DomainSetError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'BackendError'
  }
}

/**
 * Thrown when the set-storage service is unreachable or rejects authentication.
 * Fatal for the current operation.
 */
export class ConnectionError extends BackendError {
  constructor(target: string, reason: string, cause?: Error) {
    super(
      `Failed to connect to ${target}: ${reason}`,
      'CONNECTION_FAILED',
      {
        suggestion: 'Check that Redis is running and that host, port and password are correct',
        context: { target, reason },
        cause
      }
    )
    this.name = 'ConnectionError'
  }
}

/**
 * Thrown when the connection drops in the middle of a batch.
 * Entries already written stay written; `report` holds what happened before the drop.
 */
export class BatchInterruptedError extends BackendError {
  readonly report: BatchReport

  constructor(operation: string, report: BatchReport, cause: ConnectionError) {
    super(
      `${operation} interrupted: ${cause.message}`,
      'BATCH_INTERRUPTED',
      {
        suggestion: 'Entries processed before the failure were kept; re-run the batch once the server is reachable',
        context: { operation },
        cause
      }
    )
    this.name = 'BatchInterruptedError'
    this.report = report
  }
}

/**
 * Thrown when the client is used before connect()
 */
export class NotInitializedError extends BackendError {
  constructor() {
    super(
      'DomainSetClient not initialized',
      'NOT_INITIALIZED',
      {
        suggestion: 'Call connect() before using the client'
      }
    )
    this.name = 'NotInitializedError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends DomainSetError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown by callers that need a single valid domain (not used for batches)
 */
export class InvalidDomainError extends ValidationError {
  readonly reason: InvalidReason

  constructor(input: string, reason: InvalidReason) {
    super(
      `Invalid domain "${input}" (${reason})`,
      'INVALID_DOMAIN',
      {
        context: { input, reason }
      }
    )
    this.name = 'InvalidDomainError'
    this.reason = reason
  }
}

/**
 * Thrown when an option value is outside its allowed set
 */
export class InvalidOptionError extends ValidationError {
  constructor(option: string, value: string, allowed: readonly string[]) {
    super(
      `Invalid value for ${option}: "${value}"`,
      'INVALID_OPTION',
      {
        suggestion: `Allowed values: ${allowed.join(', ')}`,
        context: { option, value, allowed }
      }
    )
    this.name = 'InvalidOptionError'
  }
}

/**
 * Thrown when a project name cannot be used as a key suffix
 */
export class InvalidProjectNameError extends ValidationError {
  constructor(project: string) {
    super(
      `Invalid project name: "${project}"`,
      'INVALID_PROJECT_NAME',
      {
        suggestion: 'Use letters, digits, ".", "_" and "-" only',
        context: { project }
      }
    )
    this.name = 'InvalidProjectNameError'
  }
}

/**
 * Thrown when required input is missing
 */
export class MissingInputError extends ValidationError {
  constructor(inputName: string) {
    super(
      `Input required and not supplied: ${inputName}`,
      'MISSING_INPUT',
      {
        suggestion: `Provide the "${inputName}" parameter`,
        context: { inputName }
      }
    )
    this.name = 'MissingInputError'
  }
}

// =============================================================================
// Operation Errors
// =============================================================================

export class OperationError extends DomainSetError {
  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, code, options)
    this.name = 'OperationError'
  }
}

/**
 * Thrown when an input domain file does not exist
 */
export class FileNotFoundError extends OperationError {
  constructor(filePath: string) {
    super(
      `File not found: ${filePath}`,
      'FILE_NOT_FOUND',
      {
        suggestion: 'Check if the file path is correct',
        context: { filePath }
      }
    )
    this.name = 'FileNotFoundError'
  }
}

/**
 * Thrown when a destructive operation is attempted without confirmation
 */
export class ConfirmationRequiredError extends OperationError {
  constructor(operation: string, collection: string) {
    super(
      `Refusing to ${operation} "${collection}" without confirmation`,
      'CONFIRMATION_REQUIRED',
      {
        suggestion: 'Answer the prompt with "y" or pass --confirm',
        context: { operation, collection }
      }
    )
    this.name = 'ConfirmationRequiredError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isDomainSetError(error: unknown): error is DomainSetError {
  return error instanceof DomainSetError
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}

export function isOperationError(error: unknown): error is OperationError {
  return error instanceof OperationError
}

const CONNECTION_FAILURE_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'EAI_AGAIN',
  'EPIPE'
])

const CONNECTION_FAILURE_PATTERNS = [
  /connection is closed/i,
  /stream isn't writeable/i,
  /max retries per request/i,
  /\bNOAUTH\b/,
  /\bWRONGPASS\b/,
  /connect ETIMEDOUT/i,
  /ResourceRequest timed out/i
]

/**
 * Whether a raw error from the storage client means the service is unreachable.
 * Anything else is a per-command failure.
 */
export function isConnectionFailure(error: unknown): boolean {
  if (error instanceof ConnectionError || error instanceof BatchInterruptedError) return true
  if (!(error instanceof Error)) return false

  if ('code' in error && typeof error.code === 'string' && CONNECTION_FAILURE_CODES.has(error.code)) {
    return true
  }
  if (error.name === 'MaxRetriesPerRequestError') return true

  return CONNECTION_FAILURE_PATTERNS.some(pattern => pattern.test(error.message))
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isDomainSetError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a DomainSetError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): DomainSetError {
  if (isDomainSetError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new DomainSetError(error.message, defaultCode, { cause: error })
  }
  return new DomainSetError(String(error), defaultCode)
}
