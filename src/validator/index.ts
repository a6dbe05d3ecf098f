/**
 * Output Validator
 *
 * Checks normalized JSONL for schema compliance: required fields, timestamp
 * form, exactly one sender tag, id and fingerprint shape. Also serves as the
 * type guard used when normalized records are read back from disk.
 */

import { parseJsonl } from '../parser/index'
import type { BatchResult, NormalizedRecord, RecordError, Segment, SenderKind } from '../types'

const REQUIRED_FIELDS = [
  'id',
  'timestamp',
  'contents',
  'source_device_id',
  'schema_version',
  'fingerprint'
] as const

const SENDER_TAGS: readonly SenderKind[] = ['me', 'phone', 'other']

const FINGERPRINT_PATTERN = /^[0-9a-f]{64}$/
const CANONICAL_TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}Z$/
const MIN_ID_LENGTH = 10

const NUMBER_FEATURES = ['token_count', 'character_count', 'emoji_count', 'url_count'] as const
const BOOLEAN_FEATURES = [
  'is_question',
  'is_exclamation',
  'contains_date',
  'contains_place',
  'contains_money',
  'has_emojis',
  'has_urls'
] as const

export interface ValidationReport {
  readonly totalRecords: number
  readonly validRecords: number
  /** One entry per problem, prefixed with its 1-based line */
  readonly errors: readonly string[]
  readonly schemaVersions: Readonly<Record<string, number>>
  readonly senderTypes: Readonly<Record<SenderKind, number>>
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string')
}

/**
 * Sender tags present on the record's `sender` object.
 */
function senderTags(record: Record<string, unknown>): SenderKind[] {
  const { sender } = record
  if (!isObject(sender)) return []
  return SENDER_TAGS.filter((tag) => tag in sender)
}

function validateSender(sender: Record<string, unknown>, tag: SenderKind): boolean {
  const value = sender[tag]
  return tag === 'me' ? value === true : typeof value === 'string'
}

function validateFeatures(features: unknown): string[] {
  if (!isObject(features)) return ['features must be an object']

  const errors: string[] = []
  for (const key of NUMBER_FEATURES) {
    if (typeof features[key] !== 'number') errors.push(`features.${key} must be a number`)
  }
  for (const key of BOOLEAN_FEATURES) {
    if (typeof features[key] !== 'boolean') errors.push(`features.${key} must be a boolean`)
  }
  if (!isStringArray(features.mentions)) errors.push('features.mentions must be a string list')
  return errors
}

function validateExtracted(extracted: unknown): string[] {
  if (!isObject(extracted)) return ['extracted must be an object']
  const errors: string[] = []
  if (!isStringArray(extracted.emojis)) errors.push('extracted.emojis must be a string list')
  if (!isStringArray(extracted.urls)) errors.push('extracted.urls must be a string list')
  return errors
}

/**
 * Problems with one record, without line prefixes. Empty when valid.
 */
export function findRecordProblems(record: Record<string, unknown>): string[] {
  const errors: string[] = []

  for (const field of REQUIRED_FIELDS) {
    if (!(field in record)) errors.push(`Missing required field '${field}'`)
  }

  const { id, timestamp, fingerprint, contents } = record
  if ('timestamp' in record && timestamp !== null) {
    if (typeof timestamp !== 'string' || !CANONICAL_TIMESTAMP.test(timestamp)) {
      errors.push(`Invalid timestamp format: ${String(timestamp)}`)
    }
  }

  const tags = senderTags(record)
  if (tags.length === 0) {
    errors.push('Missing sender normalization')
  } else if (tags.length > 1) {
    errors.push(`Multiple sender fields: ${tags.join(', ')}`)
  } else if (isObject(record.sender) && tags[0] && !validateSender(record.sender, tags[0])) {
    errors.push(`Invalid sender value for '${tags[0]}'`)
  }

  if ('id' in record && (typeof id !== 'string' || id.length < MIN_ID_LENGTH)) {
    errors.push(`Invalid ID format: ${String(id)}`)
  }

  if ('fingerprint' in record) {
    if (typeof fingerprint !== 'string' || !FINGERPRINT_PATTERN.test(fingerprint)) {
      errors.push(`Invalid fingerprint format: ${String(fingerprint)}`)
    }
  }

  if ('contents' in record && typeof contents !== 'string') {
    errors.push('contents must be a string')
  }

  return errors
}

/**
 * Full structural check, including features and extracted content.
 */
export function isNormalizedRecord(value: unknown): value is NormalizedRecord {
  if (!isObject(value)) return false
  if (findRecordProblems(value).length > 0) return false
  if (validateFeatures(value.features).length > 0) return false
  if (validateExtracted(value.extracted).length > 0) return false
  return Array.isArray(value.attachments)
}

/**
 * Validate one record; each error is prefixed with the line number.
 */
export function validateNormalizedRecord(record: Record<string, unknown>, line: number): string[] {
  return findRecordProblems(record).map((error) => `Line ${line}: ${error}`)
}

/**
 * Validate a normalized JSONL file's content.
 */
export function validateJsonl(content: string): ValidationReport {
  const errors: string[] = []
  const schemaVersions: Record<string, number> = {}
  const senderTypes: Record<SenderKind, number> = { me: 0, phone: 0, other: 0 }
  let totalRecords = 0
  let validRecords = 0

  content.split('\n').forEach((line, i) => {
    if (line.trim().length === 0) return
    totalRecords++

    const parsed = parseJsonl(line)
    const record = parsed.records[0]
    if (!record) {
      errors.push(`Line ${i + 1}: ${parsed.errors[0]?.message ?? 'Invalid JSON'}`)
      return
    }

    const recordErrors = validateNormalizedRecord(record, i + 1)
    errors.push(...recordErrors)
    if (recordErrors.length === 0) validRecords++

    const version = typeof record.schema_version === 'string' ? record.schema_version : 'unknown'
    schemaVersions[version] = (schemaVersions[version] ?? 0) + 1

    const [tag] = senderTags(record)
    if (tag) senderTypes[tag]++
  })

  return { totalRecords, validRecords, errors, schemaVersions, senderTypes }
}

/**
 * Read JSONL line by line, keeping values that pass `accept` and reporting the
 * rest through `describe`. `index` in `errors` is the 1-based line number.
 */
function readJsonlLines<T>(
  content: string,
  accept: (value: unknown) => value is T,
  describe: (value: Record<string, unknown>) => string
): BatchResult<T> {
  const records: T[] = []
  const errors: RecordError[] = []

  content.split('\n').forEach((line, i) => {
    if (line.trim().length === 0) return
    const parsed = parseJsonl(line)
    const value = parsed.records[0]
    if (value === undefined) {
      errors.push({ index: i + 1, message: parsed.errors[0]?.message ?? 'Invalid JSON' })
    } else if (accept(value)) {
      records.push(value)
    } else {
      errors.push({ index: i + 1, message: describe(value) })
    }
  })

  return { records, errors }
}

/**
 * Read normalized records back from JSONL, skipping lines that are not
 * valid records.
 */
export function readNormalizedRecords(content: string): BatchResult<NormalizedRecord> {
  return readJsonlLines(content, isNormalizedRecord, (value) => {
    const problems = [
      ...findRecordProblems(value),
      ...validateFeatures(value.features),
      ...validateExtracted(value.extracted)
    ]
    return problems.join('; ') || 'attachments must be a list'
  })
}

const SEGMENT_NUMBER_FIELDS = [
  'message_count',
  'total_duration_minutes',
  'avg_gap_minutes',
  'min_gap_minutes',
  'max_gap_minutes'
] as const

/**
 * Structural check for a segment read back from segmented JSONL.
 */
export function isSegment(value: unknown): value is Segment {
  if (!isObject(value)) return false
  const { segment_id, date, start_time, end_time, participants, messages, time_gaps } = value
  if (typeof segment_id !== 'string' || typeof date !== 'string') return false
  if (typeof start_time !== 'string' || typeof end_time !== 'string') return false
  if (!isStringArray(participants)) return false
  if (!Array.isArray(time_gaps) || !time_gaps.every((gap) => typeof gap === 'number')) return false
  if (!SEGMENT_NUMBER_FIELDS.every((field) => typeof value[field] === 'number')) return false
  return Array.isArray(messages) && messages.every((message) => isNormalizedRecord(message))
}

/**
 * Read segments back from segmented JSONL, skipping lines that are not
 * valid segments.
 */
export function readSegments(content: string): BatchResult<Segment> {
  return readJsonlLines(content, isSegment, (value) => {
    const id = typeof value.segment_id === 'string' ? value.segment_id : 'unknown'
    return `Invalid segment ${id}`
  })
}
