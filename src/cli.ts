import process from 'node:process'

import { Command, InvalidArgumentError } from 'commander'

import { loadConfig } from './config.js'
import type { Env } from './config.js'
import { RecordValidator } from './core/validator.js'
import { loadRecords } from './io/loader.js'
import { isReportFormat, renderReport, REPORT_FORMATS } from './io/reporter.js'
import type { ReportFormat } from './io/reporter.js'
import { requireNonEmptyString } from './utils/errors.js'
import { createLogger, isLogLevel, LOG_LEVELS } from './utils/logger.js'
import type { Logger, LogLevel } from './utils/logger.js'

export interface ValidateCommandOptions {
  inputPath: string
  format: ReportFormat
  logger?: Logger
}

/**
 * Loads the records, runs a fresh validator and returns the rendered report.
 *
 * @throws {RecordLoadError} If the file cannot be read or decoded
 * @throws {MissingIdentifierError} If a record has no `id`
 */
export async function runValidateCommand(
  options: ValidateCommandOptions
): Promise<string> {
  const records = await loadRecords(requireNonEmptyString(options.inputPath, 'inputPath'))
  options.logger?.info('records loaded', {
    path: options.inputPath,
    count: records.length,
  })

  const validator = new RecordValidator({ logger: options.logger })
  const report = validator.inspect(records)
  options.logger?.info('validation complete', { ...report.stats })

  return renderReport(report, options.format)
}

function parseFormat(value: string): ReportFormat {
  if (!isReportFormat(value)) {
    throw new InvalidArgumentError(`Expected one of ${REPORT_FORMATS.join(', ')}.`)
  }
  return value
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(', ')}.`)
  }
  return value
}

function isCommanderError(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    error.code.startsWith('commander.')
  )
}

function isCommanderHelpDisplayed(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    (error.code === 'commander.helpDisplayed' || error.code === 'commander.version')
  )
}

function createProgram(env: Env): Command {
  const config = loadConfig(env)
  const program = new Command()

  program
    .name('record-validator')
    .description(
      'Print the ids of records that are duplicated or miss a name, address or valid U.S. ZIP code'
    )
    .version('0.1.0')
    .argument('[file]', 'JSON file holding an array of records', config.inputPath)
    .option('--format <format>', 'Output format (text or json)', parseFormat, config.format)
    .option('--log-level <level>', 'Log level for stderr output', parseLogLevel, config.logLevel)
    .exitOverride()
    .action(async (file: string, cmdOptions: { format: ReportFormat; logLevel: LogLevel }) => {
      const output = await runValidateCommand({
        inputPath: file,
        format: cmdOptions.format,
        logger: createLogger(cmdOptions.logLevel),
      })
      process.stdout.write(output)
    })

  return program
}

export async function runCli(argv: string[] = process.argv, env: Env = process.env): Promise<void> {
  const program = createProgram(env)
  try {
    await program.parseAsync(argv)
  } catch (error) {
    if (isCommanderHelpDisplayed(error)) {
      return
    }
    throw error
  }
}

/**
 * Marks the process as failed and prints the error to stderr.
 * Commander has already printed its own parse errors, so those are not repeated.
 */
export function handleCliError(error: unknown): void {
  process.exitCode = 1
  if (isCommanderError(error)) return
  console.error(error instanceof Error ? error.message : error)
}
