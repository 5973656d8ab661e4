// Core
export {
  RecordValidator,
  validateRecords,
  getRecordId,
  type RecordValidatorOptions,
} from './core/validator.js'
export { computeFingerprint, canonicalize } from './core/fingerprint.js'
export { isValidZip } from './core/zip.js'

// Types - Records
export {
  ID_FIELD,
  REQUIRED_FIELDS,
  type RecordId,
  type InputRecord,
  type Fingerprint,
  type SeenRegistry,
  type BadRecordSet,
  type RequiredField,
} from './types/record.js'

// Types - Reports
export type {
  BadRecordReason,
  BadRecordReasonKind,
  BadRecordEntry,
  ValidationStats,
  ValidationReport,
} from './types/report.js'

// Loading and reporting
export { loadRecords, parseRecords } from './io/loader.js'
export {
  formatBadRecords,
  formatReport,
  renderReport,
  isReportFormat,
  REPORT_FORMATS,
  type ReportFormat,
} from './io/reporter.js'

// Configuration
export { loadConfig, DEFAULT_INPUT_PATH, type CliConfig, type Env } from './config.js'
export {
  runCli,
  runValidateCommand,
  handleCliError,
  type ValidateCommandOptions,
} from './cli.js'

// Logging
export {
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogSink,
} from './utils/logger.js'

// Errors
export {
  RecordValidatorError,
  MissingIdentifierError,
  InvalidParameterError,
  ConfigurationError,
  RecordLoadError,
  requireNonEmptyString,
  requirePlainObject,
  isPlainObject,
  isRecordValidatorError,
} from './utils/errors.js'
