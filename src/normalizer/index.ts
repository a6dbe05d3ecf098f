/**
 * Normalizer Module
 *
 * Turn raw exported records into canonical, feature-enriched, fingerprinted
 * records. Each record is independent of every other.
 */

import { NormalizationError } from '../errors'
import { type ExtractorOptions, extractFeatures } from '../extractor/index'
import { fingerprintRecord } from '../fingerprint/index'
import type {
  BatchResult,
  NormalizedRecord,
  NormalizeOptions,
  RawRecord,
  RecordError,
  UnfingerprintedRecord
} from '../types'
import { deriveRecordId } from './identity'
import { readRawRecord } from './raw'
import { normalizeSender } from './sender'
import { parseTimestamp } from './timestamp'

export { deriveRecordId } from './identity'
export { readRawRecord } from './raw'
export { sanitizeText } from './sanitize'
export { normalizeSender, senderIdentity, senderKind } from './sender'
export { formatUtc, parseTimestamp, timestampToEpoch, utcDateKey } from './timestamp'

export const DEFAULT_SCHEMA_VERSION = '1.0'
export const DEFAULT_SOURCE_DEVICE_ID = 'unknown'

export interface NormalizerOptions extends NormalizeOptions, ExtractorOptions {}

/**
 * Normalize one raw record.
 */
export function normalizeRecord(raw: RawRecord, options?: NormalizerOptions): NormalizedRecord {
  const { cleanedText, extracted, features } = extractFeatures(raw.contents ?? '', options)

  const fields: UnfingerprintedRecord = {
    id: deriveRecordId(raw),
    timestamp: parseTimestamp(raw.timestamp),
    sender: normalizeSender(raw.sender ?? ''),
    is_from_me: raw.is_from_me ?? null,
    readtime: raw.readtime ?? null,
    contents: cleanedText,
    attachments: raw.attachments ?? [],
    extracted,
    features,
    source_device_id: options?.sourceDeviceId ?? DEFAULT_SOURCE_DEVICE_ID,
    schema_version: options?.schemaVersion ?? DEFAULT_SCHEMA_VERSION
  }

  return { ...fields, fingerprint: fingerprintRecord(fields) }
}

/**
 * Normalize a batch of parsed JSON objects.
 *
 * Objects whose fields have the wrong types are reported in `errors` by
 * input position and skipped. Output order follows input order.
 */
export function normalizeBatch(
  objects: readonly Record<string, unknown>[],
  options?: NormalizerOptions
): BatchResult<NormalizedRecord> {
  const records: NormalizedRecord[] = []
  const errors: RecordError[] = []

  objects.forEach((obj, index) => {
    try {
      records.push(normalizeRecord(readRawRecord(obj), options))
    } catch (error) {
      if (!(error instanceof NormalizationError)) throw error
      errors.push({ index, message: error.message })
    }
  })

  return { records, errors }
}
