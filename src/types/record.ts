/**
 * Type alias for record identifiers.
 * Any JSON scalar is accepted: strings and numbers usually, but `null` and
 * booleans are identifiers too when the input carries them.
 */
export type RecordId = string | number | boolean | null

/**
 * A record as supplied by the loader: an unordered mapping of field name to value.
 *
 * `id`, `name`, `address` and `zip` are the expected fields. Any other field is
 * allowed and takes part in duplicate detection, but not in validity rules.
 */
export interface InputRecord {
  [field: string]: unknown
}

/**
 * Canonical, type-preserving serialization of a record without its identifier.
 */
export type Fingerprint = string & { readonly __brand: 'Fingerprint' }

/**
 * Fingerprint to the identifier of the first record that produced it.
 * Entries are only ever added.
 */
export type SeenRegistry = Map<Fingerprint, RecordId>

/**
 * Identifiers of records flagged as duplicate or invalid.
 */
export type BadRecordSet = Set<RecordId>

/** Name of the identifier field. Never used for equality or validity. */
export const ID_FIELD = 'id'

/** Fields that must be present and non-blank for a record to be valid. */
export const REQUIRED_FIELDS = ['name', 'address', 'zip'] as const

export type RequiredField = (typeof REQUIRED_FIELDS)[number]
