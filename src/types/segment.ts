/**
 * Segment Types
 *
 * Conversation segments and their summaries.
 */

import type { NormalizedRecord } from './record'

export interface Segment {
  /** `segment_` + 4-digit counter, global across the run */
  readonly segment_id: string
  /** UTC calendar day, `YYYY-MM-DD` */
  readonly date: string
  readonly start_time: string
  readonly end_time: string
  readonly message_count: number
  /** Sender identities in first-seen order */
  readonly participants: readonly string[]
  readonly messages: readonly NormalizedRecord[]
  /** Gap in minutes between each consecutive message pair */
  readonly time_gaps: readonly number[]
  readonly total_duration_minutes: number
  readonly avg_gap_minutes: number
  readonly min_gap_minutes: number
  readonly max_gap_minutes: number
}

export interface SegmenterOptions {
  /** Maximum inactivity gap inside one segment, in hours (default 2) */
  readonly windowHours?: number | undefined
}

export interface SegmentSummary {
  readonly date: string
  readonly timeframe: string
  readonly summary: string
  readonly segment_id: string
  readonly message_count: number
  readonly participants: readonly string[]
  readonly generated_by_model: boolean
}

export interface SegmentStats {
  readonly segmentCount: number
  readonly messageCount: number
  readonly avgMessagesPerSegment: number
  readonly avgDurationMinutes: number
  /** Segment count per date, dates ascending */
  readonly segmentsPerDate: ReadonlyArray<{ readonly date: string; readonly count: number }>
  readonly sizeDistribution: {
    readonly small: number
    readonly medium: number
    readonly large: number
  }
}
