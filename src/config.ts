import { isReportFormat } from './io/reporter.js'
import type { ReportFormat } from './io/reporter.js'
import { ConfigurationError } from './utils/errors.js'
import { isLogLevel, LOG_LEVELS } from './utils/logger.js'
import type { LogLevel } from './utils/logger.js'

export const DEFAULT_INPUT_PATH = 'data.json'

export interface CliConfig {
  /** File read when no path is given on the command line */
  inputPath: string
  logLevel: LogLevel
  format: ReportFormat
}

export type Env = Readonly<Record<string, string | undefined>>

/**
 * Reads CLI defaults from the environment:
 * `RECORD_VALIDATOR_INPUT`, `RECORD_VALIDATOR_FORMAT` and `LOG_LEVEL`.
 *
 * @throws {ConfigurationError} If a variable holds an unsupported value
 */
export function loadConfig(env: Env = process.env): CliConfig {
  const logLevel = env.LOG_LEVEL || 'warn'
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(
      `LOG_LEVEL must be one of: ${LOG_LEVELS.join(', ')}`,
      'LOG_LEVEL',
      { value: logLevel }
    )
  }

  const format = env.RECORD_VALIDATOR_FORMAT || 'text'
  if (!isReportFormat(format)) {
    throw new ConfigurationError(
      'RECORD_VALIDATOR_FORMAT must be one of: text, json',
      'RECORD_VALIDATOR_FORMAT',
      { value: format }
    )
  }

  return {
    inputPath: env.RECORD_VALIDATOR_INPUT || DEFAULT_INPUT_PATH,
    logLevel,
    format,
  }
}
