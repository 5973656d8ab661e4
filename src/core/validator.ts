import { computeFingerprint } from './fingerprint.js'
import { isValidZip } from './zip.js'
import { ID_FIELD, REQUIRED_FIELDS } from '../types/record.js'
import type {
  BadRecordSet,
  Fingerprint,
  InputRecord,
  RecordId,
  RequiredField,
  SeenRegistry,
} from '../types/record.js'
import type {
  BadRecordEntry,
  BadRecordReason,
  ValidationReport,
  ValidationStats,
} from '../types/report.js'
import {
  InvalidParameterError,
  MissingIdentifierError,
  requirePlainObject,
} from '../utils/errors.js'
import { silentLogger } from '../utils/logger.js'
import type { Logger } from '../utils/logger.js'

/**
 * Options for constructing a {@link RecordValidator}.
 */
export interface RecordValidatorOptions {
  /** Receives a debug entry per flagged record and an info summary per run. Silent by default. */
  logger?: Logger
}

type RecordOutcome = 'unique' | 'duplicate' | 'invalid'

type FlagListener = (id: RecordId, reason: BadRecordReason) => void

const BLANK_FIELD_REASONS: Record<RequiredField, BadRecordReason> = {
  name: { kind: 'blank-name' },
  address: { kind: 'blank-address' },
  zip: { kind: 'blank-zip' },
}

function isRecordId(value: unknown): value is RecordId {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  )
}

/**
 * Reads a record's identifier. A present `id` is used as is, `null` included.
 *
 * @throws {MissingIdentifierError} If the record has no `id` field (or it is `undefined`)
 * @throws {InvalidParameterError} If `id` is an object or array
 */
export function getRecordId(record: InputRecord, index?: number): RecordId {
  const id = record[ID_FIELD]
  if (!Object.hasOwn(record, ID_FIELD) || id === undefined) {
    throw new MissingIdentifierError(Object.keys(record), index)
  }
  if (!isRecordId(id)) {
    throw new InvalidParameterError(ID_FIELD, id, 'must be a JSON scalar', {
      index,
    })
  }
  return id
}

/**
 * Flags records that duplicate another record's content or fail the field rules.
 *
 * One instance holds the state of one run: the fingerprints seen so far and the
 * identifiers flagged so far. Records must be fed in input order, because the
 * first record to produce a fingerprint is the one every later copy points back to.
 *
 * @example
 * ```typescript
 * const validator = new RecordValidator()
 * const bad = validator.validateAll([
 *   { id: 1, name: 'Ann', address: '1 Main St', zip: '02134' },
 *   { id: 2, name: 'Ann', address: '1 Main St', zip: '02134' },
 *   { id: 3, name: 'Bob', address: '', zip: '02134' },
 * ])
 * // Set { 2, 1, 3 }
 * ```
 */
export class RecordValidator {
  private readonly registry: SeenRegistry = new Map()
  private readonly flagged: BadRecordSet = new Set()
  private readonly logger: Logger

  constructor(options: RecordValidatorOptions = {}) {
    this.logger = options.logger ?? silentLogger
  }

  /** Identifiers flagged so far in this run */
  get badRecords(): ReadonlySet<RecordId> {
    return this.flagged
  }

  /** Fingerprints registered so far, mapped to the identifier of their first record */
  get seen(): ReadonlyMap<Fingerprint, RecordId> {
    return this.registry
  }

  computeFingerprint(record: InputRecord): Fingerprint {
    return computeFingerprint(record)
  }

  /**
   * Returns true when a record with the same content has been seen before.
   * Otherwise registers the record's fingerprint and returns false, so a second
   * call with the same content answers differently.
   */
  isDuplicate(record: InputRecord, registry: SeenRegistry = this.registry): boolean {
    const id = getRecordId(record)
    return this.register(this.computeFingerprint(record), id, registry) !== undefined
  }

  /**
   * True if the field is absent, `null`/`undefined`, or an empty string.
   * Values of any other type are never blank.
   */
  isBlank(record: InputRecord, field: string): boolean {
    if (!Object.hasOwn(record, field)) return true
    const value = record[field]
    if (value === null || value === undefined) return true
    return typeof value === 'string' && value.length === 0
  }

  isValidZip(zip: unknown): boolean {
    return isValidZip(zip)
  }

  /**
   * Checks the field rules: non-blank `name`, `address` and `zip`, and a
   * well-formed ZIP code.
   *
   * @throws {MissingIdentifierError} If the record has no `id`
   */
  isStructurallyValid(record: InputRecord): boolean {
    getRecordId(record)
    return this.findProblem(record) === undefined
  }

  /**
   * Processes records in order and returns the identifiers of every duplicate
   * (first occurrence included) and every invalid record.
   *
   * A duplicate is not checked against the field rules.
   *
   * @throws {MissingIdentifierError} As soon as a record without `id` is reached
   */
  validateAll(records: Iterable<InputRecord>): BadRecordSet {
    let index = 0
    for (const record of records) {
      this.processRecord(record, index++)
    }
    this.logger.info('validation complete', {
      recordsProcessed: index,
      badRecords: this.flagged.size,
    })
    return new Set(this.flagged)
  }

  /**
   * Same pass as {@link validateAll}, also recording why each identifier was
   * flagged and counting outcomes.
   *
   * The report covers this call only. Fingerprints seen by earlier calls still
   * count, so a copy of an earlier record is flagged here along with its original.
   */
  inspect(records: Iterable<InputRecord>): ValidationReport {
    const reasons = new Map<RecordId, BadRecordReason[]>()
    const stats: ValidationStats = {
      recordsProcessed: 0,
      uniqueRecords: 0,
      duplicateRecords: 0,
      invalidRecords: 0,
      badRecordCount: 0,
    }

    const onFlag: FlagListener = (id, reason) => {
      const list = reasons.get(id)
      if (list) {
        list.push(reason)
      } else {
        reasons.set(id, [reason])
      }
    }

    for (const record of records) {
      const outcome = this.processRecord(record, stats.recordsProcessed, onFlag)
      stats.recordsProcessed++
      if (outcome === 'duplicate') {
        stats.duplicateRecords++
      } else {
        stats.uniqueRecords++
        if (outcome === 'invalid') stats.invalidRecords++
      }
    }

    const entries: BadRecordEntry[] = Array.from(reasons, ([id, list]) => ({
      id,
      reasons: list,
    }))
    stats.badRecordCount = reasons.size

    return { badRecords: new Set(reasons.keys()), entries, stats }
  }

  /**
   * Forgets every fingerprint and flagged identifier.
   */
  reset(): void {
    this.registry.clear()
    this.flagged.clear()
  }

  private processRecord(
    record: InputRecord,
    index: number,
    onFlag?: FlagListener
  ): RecordOutcome {
    requirePlainObject(record, `records[${index}]`)
    const id = getRecordId(record, index)
    const fingerprint = this.computeFingerprint(record)
    const originalId = this.register(fingerprint, id, this.registry)

    if (originalId !== undefined) {
      this.flag(id, { kind: 'duplicate', sharedWith: originalId }, onFlag)
      this.flag(originalId, { kind: 'duplicate', sharedWith: id }, onFlag)
      this.logger.debug('duplicate record', { id, originalId, index })
      return 'duplicate'
    }

    const problem = this.findProblem(record)
    if (problem) {
      this.flag(id, problem, onFlag)
      this.logger.debug('invalid record', { id, reason: problem.kind, index })
      return 'invalid'
    }

    return 'unique'
  }

  /**
   * Returns the identifier already stored for the fingerprint, or stores `id`
   * and returns undefined.
   */
  private register(
    fingerprint: Fingerprint,
    id: RecordId,
    registry: SeenRegistry
  ): RecordId | undefined {
    const existing = registry.get(fingerprint)
    if (existing !== undefined) return existing
    registry.set(fingerprint, id)
    return undefined
  }

  private findProblem(record: InputRecord): BadRecordReason | undefined {
    for (const field of REQUIRED_FIELDS) {
      if (this.isBlank(record, field)) {
        return { ...BLANK_FIELD_REASONS[field] }
      }
    }
    if (!this.isValidZip(record.zip)) {
      return { kind: 'invalid-zip', value: record.zip }
    }
    return undefined
  }

  private flag(id: RecordId, reason: BadRecordReason, onFlag?: FlagListener): void {
    this.flagged.add(id)
    onFlag?.(id, reason)
  }
}

/**
 * Runs a fresh {@link RecordValidator} over the records and returns the bad set.
 */
export function validateRecords(
  records: Iterable<InputRecord>,
  options?: RecordValidatorOptions
): BadRecordSet {
  return new RecordValidator(options).validateAll(records)
}
