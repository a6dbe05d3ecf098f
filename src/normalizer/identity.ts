/**
 * Record Identity
 */

import { createHash } from 'node:crypto'
import type { RawRecord } from '../types'

/**
 * Stable id of a raw record: its `guid` when present, otherwise the SHA-256
 * of `timestamp|sender|contents` over the raw, pre-normalization values.
 * Hashing the raw triplet keeps ids stable when normalization rules change.
 */
export function deriveRecordId(raw: RawRecord): string {
  if (raw.guid) return raw.guid

  const input = `${raw.timestamp ?? ''}|${raw.sender ?? ''}|${raw.contents ?? ''}`
  return createHash('sha256').update(input, 'utf8').digest('hex')
}
