/**
 * domainset - deduplicated domain lists on set storage
 *
 * Main library exports for programmatic usage
 */

// Client
export {
  DomainSetClient,
  createClient,
  withClient,
  collectionKey,
  assertProjectName,
  escapeGlob,
  GLOBAL_COLLECTION
} from './client.js'
export type { DomainSetClientOptions } from './client.js'

// Types
export type {
  InvalidReason,
  ValidDomain,
  InvalidDomain,
  SkippedLine,
  ValidationResult,
  InvalidEntry,
  FailedEntry,
  AddReport,
  RemoveReport,
  BatchReport,
  DeleteResult,
  ProjectSummary,
  ExportFormat,
  ExportDocument,
  ExportArtifact,
  BackendType,
  LogLevel,
  RedisConfig,
  DomainSetConfig,
  Logger,
  AddOptions,
  DeleteOptions
} from './types.js'

export { EXPORT_FORMATS, LOG_LEVELS } from './types.js'

// Validator
export {
  classify,
  isValidDomain,
  normalizeDomain,
  describeReason,
  assertValidDomain,
  INVALID_REASONS
} from './lib/validator.js'

// Set backends
export {
  RedisSetBackend,
  MemorySetBackend,
  createBackend
} from './lib/set-backend.js'
export type { SetBackend, RedisSetBackendOptions } from './lib/set-backend.js'

// Domain files and export formats
export {
  parseDomainList,
  readDomainFile,
  readDomainSource,
  writeOutputFile
} from './lib/domain-file.js'

export {
  sortDomains,
  parseExportFormat,
  formatText,
  formatJson,
  buildExportDocument,
  renderExport
} from './lib/export-format.js'

// Config utilities
export {
  loadConfig,
  loadConfigFile,
  findConfigDir,
  mergeConfig,
  maskConfig,
  DEFAULT_CONFIG
} from './lib/config-loader.js'
export type { LoadConfigOptions, LoadedConfig } from './lib/config-loader.js'

// Errors
export {
  DomainSetError,
  ConfigError,
  ConfigNotFoundError,
  InvalidConfigError,
  BackendError,
  ConnectionError,
  BatchInterruptedError,
  NotInitializedError,
  ValidationError,
  InvalidDomainError,
  InvalidOptionError,
  InvalidProjectNameError,
  MissingInputError,
  OperationError,
  FileNotFoundError,
  ConfirmationRequiredError,
  isDomainSetError,
  isConfigError,
  isBackendError,
  isValidationError,
  isOperationError,
  isConnectionFailure,
  formatErrorForCli,
  wrapError
} from './lib/errors.js'
