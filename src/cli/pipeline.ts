/**
 * CLI pipeline stages shared by the commands. The library functions are pure;
 * this layer logs skipped records and prints the run summary.
 */

import { normalizeBatch } from '../normalizer/index'
import { parseRawRecords } from '../parser/index'
import { computeSegmentStats, segmentMessages } from '../segmenter/index'
import type { NormalizedRecord, RecordError, Segment } from '../types'
import type { Logger } from './logger'
import type { Settings } from './settings'

/** Records shown individually before the rest are only counted */
const MAX_LOGGED_ERRORS = 10

export interface NormalizeStageResult {
  readonly records: readonly NormalizedRecord[]
  /** Malformed JSON plus unreadable records */
  readonly skipped: number
  /** Records emitted with a null timestamp */
  readonly untimed: number
}

/**
 * Log each skipped record as a warning, up to a cap.
 */
export function logRecordErrors(
  label: string,
  errors: readonly RecordError[],
  logger: Logger
): void {
  for (const error of errors.slice(0, MAX_LOGGED_ERRORS)) {
    logger.warn(`${label} #${error.index}: ${error.message}`)
  }
  if (errors.length > MAX_LOGGED_ERRORS) {
    logger.warn(`...and ${errors.length - MAX_LOGGED_ERRORS} more`)
  }
}

export function runNormalizeStage(
  content: string,
  settings: Settings,
  logger: Logger
): NormalizeStageResult {
  const parsed = parseRawRecords(content)
  logRecordErrors('Skipped malformed record', parsed.errors, logger)
  logger.verbose(`Parsed ${parsed.records.length} JSON objects`)

  const normalized = normalizeBatch(parsed.records, {
    schemaVersion: settings.schemaVersion,
    sourceDeviceId: settings.sourceDeviceId
  })
  logRecordErrors('Skipped unreadable record', normalized.errors, logger)

  const untimed = normalized.records.filter((record) => record.timestamp === null).length
  logger.success(`Normalized ${normalized.records.length.toLocaleString()} records`)
  if (untimed > 0) {
    logger.warn(`${untimed} records have no parseable timestamp and will not be segmented`)
  }

  return {
    records: normalized.records,
    skipped: parsed.errors.length + normalized.errors.length,
    untimed
  }
}

export function runSegmentStage(
  records: readonly NormalizedRecord[],
  settings: Settings,
  logger: Logger
): Segment[] {
  const segments = segmentMessages(records, { windowHours: settings.windowHours })
  logSegmentStats(segments, settings.windowHours, logger)
  return segments
}

export function logSegmentStats(
  segments: readonly Segment[],
  windowHours: number,
  logger: Logger
): void {
  const stats = computeSegmentStats(segments)
  logger.success(
    `${stats.segmentCount.toLocaleString()} segments (${windowHours}h window) from ${stats.messageCount.toLocaleString()} messages`
  )
  if (stats.segmentCount === 0) return

  logger.log(`  Average messages per segment: ${stats.avgMessagesPerSegment.toFixed(1)}`)
  logger.log(`  Average duration: ${stats.avgDurationMinutes.toFixed(1)} minutes`)
  const { small, medium, large } = stats.sizeDistribution
  logger.log(`  Sizes: ${small} small (≤5), ${medium} medium (6-20), ${large} large (>20)`)
  for (const { date, count } of stats.segmentsPerDate) {
    logger.verbose(`${date}: ${count} segments`)
  }
}

/**
 * Final error tally for a run.
 */
export function logErrorTally(skipped: number, logger: Logger): void {
  if (skipped === 0) {
    logger.verbose('No records skipped')
  } else {
    logger.warn(`${skipped} record${skipped === 1 ? '' : 's'} skipped`)
  }
}
