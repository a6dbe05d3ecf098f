/**
 * Raw Record Reader
 *
 * Reads an untrusted JSON object into a `RawRecord`. `null` counts as absent.
 * A present field of the wrong type is a `NormalizationError` for the fields
 * the pipeline interprets; `is_from_me` and `readtime` pass through as-is.
 */

import { NormalizationError } from '../errors'
import type { Attachment, JsonValue, RawRecord } from '../types'

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readString(obj: JsonObject, field: string): string | undefined {
  const value = obj[field]
  if (value === undefined || value === null) return undefined
  if (typeof value !== 'string') {
    throw new NormalizationError(`Field '${field}' must be a string, got ${typeof value}`, field)
  }
  return value
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true
    case 'number':
      return Number.isFinite(value)
    case 'object':
      return Array.isArray(value)
        ? value.every((item) => isJsonValue(item))
        : Object.values(value).every((item) => isJsonValue(item))
    default:
      return false
  }
}

function readPassthrough(obj: JsonObject, field: string): JsonValue | undefined {
  const value = obj[field]
  if (value === undefined || value === null) return undefined
  if (!isJsonValue(value)) {
    throw new NormalizationError(`Field '${field}' is not a JSON value`, field)
  }
  return value
}

function readAttachments(obj: JsonObject): Attachment[] | undefined {
  const value = obj.attachments
  if (value === undefined || value === null) return undefined
  if (!Array.isArray(value)) {
    throw new NormalizationError("Field 'attachments' must be an array", 'attachments')
  }
  return value.map((item, i) => {
    if (!isObject(item)) {
      throw new NormalizationError(`Attachment ${i} is not an object`, 'attachments')
    }
    const mimeType = item.mime_type
    if (mimeType !== undefined && mimeType !== null && typeof mimeType !== 'string') {
      throw new NormalizationError(`Attachment ${i} has a non-string mime_type`, 'attachments')
    }
    return item
  })
}

/**
 * Read the known fields of a raw JSON object. Unknown fields are dropped.
 */
export function readRawRecord(obj: JsonObject): RawRecord {
  return {
    guid: readString(obj, 'guid'),
    timestamp: readString(obj, 'timestamp'),
    sender: readString(obj, 'sender'),
    contents: readString(obj, 'contents'),
    attachments: readAttachments(obj),
    is_from_me: readPassthrough(obj, 'is_from_me'),
    readtime: readPassthrough(obj, 'readtime')
  }
}
