/**
 * Segmenter Module
 *
 * Groups normalized records into conversation segments: maximal runs of
 * chronologically consecutive messages on one UTC calendar day where no gap
 * between neighbours exceeds the window.
 *
 * Records without a timestamp are never placed in a segment. Ties in
 * timestamp keep input order, and a tie is a gap of 0.
 */

import { ConfigError } from '../errors'
import { senderIdentity } from '../normalizer/sender'
import { timestampToEpoch, utcDateKey } from '../normalizer/timestamp'
import type { NormalizedRecord, Segment, SegmenterOptions } from '../types'

export { computeSegmentStats } from './stats'

export const DEFAULT_WINDOW_HOURS = 2

const MS_PER_MINUTE = 60_000

interface TimedRecord {
  readonly record: NormalizedRecord
  readonly timestamp: string
  readonly epoch: number
}

/**
 * Open segment being accumulated during the scan.
 */
interface SegmentBuilder {
  readonly date: string
  readonly first: TimedRecord
  last: TimedRecord
  readonly messages: NormalizedRecord[]
  readonly participants: Set<string>
  readonly gaps: number[]
}

export function formatSegmentId(counter: number): string {
  return `segment_${counter.toString().padStart(4, '0')}`
}

function validateWindowHours(windowHours: number): number {
  if (!Number.isFinite(windowHours) || windowHours <= 0) {
    throw new ConfigError(`windowHours must be a positive number, got ${windowHours}`)
  }
  return windowHours
}

/**
 * Keep records with a timestamp, sorted ascending. Array sort is stable, so
 * equal timestamps stay in input order.
 */
function sortByTimestamp(records: readonly NormalizedRecord[]): TimedRecord[] {
  const timed: TimedRecord[] = []
  for (const record of records) {
    if (record.timestamp === null) continue
    const epoch = timestampToEpoch(record.timestamp)
    if (Number.isNaN(epoch)) continue
    timed.push({ record, timestamp: record.timestamp, epoch })
  }
  return timed.sort((a, b) => a.epoch - b.epoch)
}

/**
 * Split a sorted stream into runs sharing a UTC calendar day.
 */
function groupByDay(sorted: readonly TimedRecord[]): TimedRecord[][] {
  const days: TimedRecord[][] = []
  let currentKey: string | null = null

  for (const item of sorted) {
    const key = utcDateKey(item.timestamp)
    const currentDay = days[days.length - 1]
    if (key === currentKey && currentDay) {
      currentDay.push(item)
    } else {
      days.push([item])
      currentKey = key
    }
  }
  return days
}

function openSegment(item: TimedRecord): SegmentBuilder {
  return {
    date: utcDateKey(item.timestamp),
    first: item,
    last: item,
    messages: [item.record],
    participants: new Set([senderIdentity(item.record.sender)]),
    gaps: []
  }
}

function sum(values: readonly number[]): number {
  return values.reduce((total, value) => total + value, 0)
}

function closeSegment(builder: SegmentBuilder, counter: number): Segment {
  const { gaps } = builder
  const total = sum(gaps)

  return {
    segment_id: formatSegmentId(counter),
    date: builder.date,
    start_time: builder.first.timestamp,
    end_time: builder.last.timestamp,
    message_count: builder.messages.length,
    participants: [...builder.participants],
    messages: builder.messages,
    time_gaps: gaps,
    total_duration_minutes: total,
    avg_gap_minutes: gaps.length > 0 ? total / gaps.length : 0,
    min_gap_minutes: gaps.length > 0 ? gaps.reduce((a, b) => Math.min(a, b)) : 0,
    max_gap_minutes: gaps.length > 0 ? gaps.reduce((a, b) => Math.max(a, b)) : 0
  }
}

/**
 * Segments a record stream. The segment-id counter belongs to the instance
 * and restarts at 1 on every `segment()` call.
 */
export class Segmenter {
  private readonly windowMinutes: number
  private counter = 0

  constructor(options: SegmenterOptions = {}) {
    this.windowMinutes = validateWindowHours(options.windowHours ?? DEFAULT_WINDOW_HOURS) * 60
  }

  segment(records: readonly NormalizedRecord[]): Segment[] {
    this.counter = 0
    const segments: Segment[] = []

    for (const day of groupByDay(sortByTimestamp(records))) {
      segments.push(...this.segmentDay(day))
    }
    return segments
  }

  private segmentDay(day: readonly TimedRecord[]): Segment[] {
    const [first, ...rest] = day
    if (!first) return []

    const segments: Segment[] = []
    let current = openSegment(first)

    for (const item of rest) {
      const gap = (item.epoch - current.last.epoch) / MS_PER_MINUTE
      if (gap <= this.windowMinutes) {
        current.messages.push(item.record)
        current.participants.add(senderIdentity(item.record.sender))
        current.gaps.push(gap)
        current.last = item
      } else {
        segments.push(closeSegment(current, ++this.counter))
        current = openSegment(item)
      }
    }

    segments.push(closeSegment(current, ++this.counter))
    return segments
  }
}

/**
 * Segment records with a fresh `Segmenter`.
 */
export function segmentMessages(
  records: readonly NormalizedRecord[],
  options?: SegmenterOptions
): Segment[] {
  return new Segmenter(options).segment(records)
}

/**
 * Messages of every segment, in segment order.
 */
export function flattenSegments(segments: readonly Segment[]): NormalizedRecord[] {
  return segments.flatMap((segment) => segment.messages)
}
