/**
 * Fingerprint Types
 */

import type { NormalizedRecord } from '../types/record'

/**
 * Result of dropping records whose fingerprint was already seen.
 */
export interface DeduplicationResult {
  /** First record for each fingerprint, in input order */
  readonly records: readonly NormalizedRecord[]
  /** Number of records dropped as duplicates */
  readonly duplicateCount: number
  /** Fingerprints that occurred more than once */
  readonly duplicateFingerprints: readonly string[]
}
