/**
 * Content fingerprints used for duplicate detection
 * @module core/fingerprint
 */

import { ID_FIELD } from '../types/record.js'
import type { Fingerprint, InputRecord } from '../types/record.js'
import { InvalidParameterError } from '../utils/errors.js'

/**
 * Create a canonical, type-tagged string from any value
 *
 * Every scalar carries a type marker, so values that print alike stay apart:
 * `0` is `n:0`, `"0"` is `s:"0"`, `null` is `null`, `"null"` is `s:"null"`.
 *
 * Handles:
 * - Object key ordering (alphabetical)
 * - Circular references (error)
 * - Undefined object values (skipped, same as an absent key)
 * - Date objects (tagged ISO string)
 * - RegExp objects (tagged source and flags)
 * - Map and Set (tagged, members sorted, so insertion order does not count)
 */
export function canonicalize(
  value: unknown,
  seen: WeakSet<object> = new WeakSet()
): string {
  if (value === null) {
    return 'null'
  }

  switch (typeof value) {
    case 'undefined':
      return 'u'
    case 'string':
      return `s:${JSON.stringify(value)}`
    case 'number':
      return `n:${Object.is(value, -0) ? '-0' : String(value)}`
    case 'boolean':
      return `b:${String(value)}`
    case 'bigint':
      return `i:${value.toString()}`
    case 'function':
    case 'symbol':
      throw new InvalidParameterError(
        'record',
        value,
        `${typeof value} values cannot be fingerprinted`
      )
  }

  if (value instanceof Date) {
    return `d:${Number.isNaN(value.getTime()) ? 'invalid' : value.toISOString()}`
  }

  if (value instanceof RegExp) {
    return `r:${value.toString()}`
  }

  if (typeof value === 'object') {
    if (seen.has(value)) {
      throw new InvalidParameterError(
        'record',
        value,
        'circular reference detected'
      )
    }

    seen.add(value)

    try {
      if (Array.isArray(value)) {
        const items = value.map((item: unknown) => canonicalize(item, seen))
        return `[${items.join(',')}]`
      }

      if (value instanceof Map) {
        const entries = Array.from(
          value,
          ([key, entryValue]: [unknown, unknown]) =>
            `[${canonicalize(key, seen)},${canonicalize(entryValue, seen)}]`
        )
        return `m:[${entries.sort().join(',')}]`
      }

      if (value instanceof Set) {
        const members = Array.from(value, (member: unknown) => canonicalize(member, seen))
        return `set:[${members.sort().join(',')}]`
      }

      return canonicalizeEntries(Object.entries(value), seen)
    } finally {
      seen.delete(value)
    }
  }

  return String(value)
}

function canonicalizeEntries(
  entries: [string, unknown][],
  seen: WeakSet<object>
): string {
  const pairs = entries
    .filter(([, fieldValue]) => fieldValue !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, fieldValue]) => `${JSON.stringify(key)}:${canonicalize(fieldValue, seen)}`)

  return `{${pairs.join(',')}}`
}

/**
 * Computes the fingerprint of a record: every field except `id`, key order ignored.
 *
 * @example
 * ```typescript
 * computeFingerprint({ id: '1', zip: '00000', name: 'Ann' })
 * // '{"name":s:"Ann","zip":s:"00000"}'
 * ```
 */
export function computeFingerprint(record: InputRecord): Fingerprint {
  const entries = Object.entries(record).filter(([key]) => key !== ID_FIELD)
  // Branded type: the only place a Fingerprint is minted.
  return canonicalizeEntries(entries, new WeakSet()) as Fingerprint
}
