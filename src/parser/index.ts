/**
 * Input Reader
 *
 * Turn raw export text into JSON values, one per record. Records that are not
 * valid JSON objects are counted and skipped; they never abort the batch.
 */

import type { BatchResult, RecordError } from '../types'
import { splitJsonObjects } from './json-stream'

export { type ObjectChunk, type SplitResult, splitJsonObjects } from './json-stream'

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Parse every JSON object in an export (JSONL or concatenated).
 *
 * Values are returned unvalidated; the normalizer decides whether their
 * fields are usable.
 */
export function parseRawRecords(content: string): BatchResult<Record<string, unknown>> {
  const { chunks, unterminated } = splitJsonObjects(content)
  const records: Record<string, unknown>[] = []
  const errors: RecordError[] = []

  for (const chunk of chunks) {
    try {
      const value: unknown = JSON.parse(chunk.text)
      if (isPlainObject(value)) {
        records.push(value)
      } else {
        errors.push({ index: chunk.index, message: 'Record is not a JSON object' })
      }
    } catch (error) {
      errors.push({ index: chunk.index, message: `Invalid JSON: ${describeError(error)}` })
    }
  }

  if (unterminated !== null) {
    errors.push({ index: chunks.length, message: 'Unterminated JSON object at end of input' })
  }

  return { records, errors }
}

/**
 * Read a JSONL file of previously written objects, one per non-blank line.
 * `index` in errors is the 1-based line number.
 */
export function parseJsonl(content: string): BatchResult<Record<string, unknown>> {
  const records: Record<string, unknown>[] = []
  const errors: RecordError[] = []

  content.split('\n').forEach((line, i) => {
    const trimmed = line.trim()
    if (trimmed.length === 0) return
    try {
      const value: unknown = JSON.parse(trimmed)
      if (isPlainObject(value)) {
        records.push(value)
      } else {
        errors.push({ index: i + 1, message: 'Line is not a JSON object' })
      }
    } catch (error) {
      errors.push({ index: i + 1, message: `Invalid JSON: ${describeError(error)}` })
    }
  })

  return { records, errors }
}

/**
 * Serialize values as JSONL, one object per line with a trailing newline.
 */
export function toJsonl(values: readonly unknown[]): string {
  return values.map((value) => `${JSON.stringify(value)}\n`).join('')
}
