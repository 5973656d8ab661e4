/**
 * U.S. ZIP code patterns: `12345`, `123456789` or ZIP+4 `12345-6789`.
 * ASCII digits only, no surrounding whitespace.
 */
const ZIP_PATTERNS: readonly RegExp[] = [
  /^[0-9]{5}$/,
  /^[0-9]{9}$/,
  /^[0-9]{5}-[0-9]{4}$/,
]

/**
 * Checks whether a value is a well-formed U.S. ZIP code.
 *
 * @example
 * ```typescript
 * isValidZip('02134') // true
 * isValidZip('02134-0001') // true
 * isValidZip('021340001') // true
 * isValidZip('0213a') // false
 * isValidZip(2134) // false, ZIP codes are text
 * ```
 */
export function isValidZip(zip: unknown): boolean {
  if (typeof zip !== 'string') return false
  return ZIP_PATTERNS.some((pattern) => pattern.test(zip))
}
