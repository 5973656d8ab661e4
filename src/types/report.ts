import type { RecordId } from './record.js'

/**
 * Why a record ended up in the bad set.
 */
export type BadRecordReason =
  | { kind: 'duplicate'; sharedWith: RecordId }
  | { kind: 'blank-name' }
  | { kind: 'blank-address' }
  | { kind: 'blank-zip' }
  | { kind: 'invalid-zip'; value: unknown }

export type BadRecordReasonKind = BadRecordReason['kind']

/**
 * A flagged record together with every reason it was flagged.
 * A first occurrence collects one `duplicate` reason per later copy.
 */
export interface BadRecordEntry {
  id: RecordId
  reasons: BadRecordReason[]
}

/**
 * Statistics from one validation run.
 */
export interface ValidationStats {
  /** Total number of records processed */
  recordsProcessed: number
  /** Records whose fingerprint had not been seen before */
  uniqueRecords: number
  /** Records whose fingerprint matched an earlier record */
  duplicateRecords: number
  /** First occurrences that failed the field rules */
  invalidRecords: number
  /** Size of the bad-record set */
  badRecordCount: number
}

/**
 * Complete result of {@link RecordValidator.inspect}.
 */
export interface ValidationReport {
  /** Identifiers flagged during this call; on a fresh validator, the set `validateAll` returns */
  badRecords: Set<RecordId>
  /** One entry per bad identifier, in the order it was first flagged */
  entries: BadRecordEntry[]
  stats: ValidationStats
}
