/**
 * Fingerprint Module
 *
 * Content digests of normalized records, for deduplication and validation.
 * A fingerprint is not an identity: two exports of the same message share an
 * `id` (its guid) but differ in fingerprint when their content differs.
 *
 * @example
 * ```typescript
 * import { dedupeRecords, fingerprintRecord } from 'chat-segments'
 *
 * const { records, duplicateCount } = dedupeRecords([...firstExport, ...secondExport])
 * console.log(`Dropped ${duplicateCount} duplicate records`)
 * ```
 *
 * @module
 */

import { createHash } from 'node:crypto'
import type { NormalizedRecord, UnfingerprintedRecord } from '../types/record'
import { canonicalJson } from './canonical'
import type { DeduplicationResult } from './types'

export { canonicalJson } from './canonical'
export type { DeduplicationResult } from './types'

/**
 * SHA-256 hex digest of the canonical serialization of every field except
 * `fingerprint` itself.
 */
export function fingerprintRecord(fields: UnfingerprintedRecord): string {
  return createHash('sha256').update(canonicalJson(fields), 'utf8').digest('hex')
}

/**
 * Recompute a record's fingerprint and compare it with the stored one.
 */
export function verifyFingerprint(record: NormalizedRecord): boolean {
  const { fingerprint, ...fields } = record
  return fingerprintRecord(fields) === fingerprint
}

/**
 * Keep the first record of every fingerprint.
 */
export function dedupeRecords(records: readonly NormalizedRecord[]): DeduplicationResult {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  const kept: NormalizedRecord[] = []

  for (const record of records) {
    if (seen.has(record.fingerprint)) {
      duplicates.add(record.fingerprint)
      continue
    }
    seen.add(record.fingerprint)
    kept.push(record)
  }

  return {
    records: kept,
    duplicateCount: records.length - kept.length,
    duplicateFingerprints: [...duplicates]
  }
}
