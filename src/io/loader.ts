/**
 * Reads records from JSON: a top-level array of objects.
 * @module io/loader
 */

import { readFile } from 'node:fs/promises'
import path from 'node:path'

import type { InputRecord } from '../types/record.js'
import { isPlainObject, RecordLoadError } from '../utils/errors.js'

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Parses JSON text into records.
 *
 * @param content - JSON text holding an array of objects
 * @param source - Name used in error messages
 * @throws {RecordLoadError} If the text is not JSON, or not an array of objects
 */
export function parseRecords(content: string, source: string = 'input'): InputRecord[] {
  let data: unknown
  try {
    data = JSON.parse(content)
  } catch (error) {
    throw new RecordLoadError(source, `invalid JSON (${describeError(error)})`)
  }

  if (!Array.isArray(data)) {
    throw new RecordLoadError(source, 'expected a JSON array of records', {
      actualType: data === null ? 'null' : typeof data,
    })
  }

  return data.map((entry: unknown, index) => {
    if (!isPlainObject(entry)) {
      throw new RecordLoadError(source, `entry at index ${index} is not an object`, {
        index,
      })
    }
    return entry
  })
}

/**
 * Reads a UTF-8 JSON file and parses it with {@link parseRecords}.
 *
 * @throws {RecordLoadError} If the file cannot be read or decoded
 */
export async function loadRecords(filePath: string): Promise<InputRecord[]> {
  const absolute = path.resolve(filePath)
  let content: string
  try {
    content = await readFile(absolute, 'utf8')
  } catch (error) {
    throw new RecordLoadError(filePath, describeError(error), { path: absolute })
  }
  return parseRecords(content, filePath)
}
