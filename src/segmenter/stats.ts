/**
 * Segment Statistics
 *
 * Aggregate counts over a segment list, for the run summary.
 */

import type { Segment, SegmentStats } from '../types'

const SMALL_SEGMENT_MAX = 5
const MEDIUM_SEGMENT_MAX = 20

export function computeSegmentStats(segments: readonly Segment[]): SegmentStats {
  const segmentCount = segments.length
  const perDate = new Map<string, number>()
  const sizeDistribution = { small: 0, medium: 0, large: 0 }
  let messageCount = 0
  let durationTotal = 0

  for (const segment of segments) {
    messageCount += segment.message_count
    durationTotal += segment.total_duration_minutes
    perDate.set(segment.date, (perDate.get(segment.date) ?? 0) + 1)

    if (segment.message_count <= SMALL_SEGMENT_MAX) {
      sizeDistribution.small++
    } else if (segment.message_count <= MEDIUM_SEGMENT_MAX) {
      sizeDistribution.medium++
    } else {
      sizeDistribution.large++
    }
  }

  return {
    segmentCount,
    messageCount,
    avgMessagesPerSegment: segmentCount > 0 ? messageCount / segmentCount : 0,
    avgDurationMinutes: segmentCount > 0 ? durationTotal / segmentCount : 0,
    segmentsPerDate: [...perDate.entries()]
      .sort(([a], [b]) => a.localeCompare(b))
      .map(([date, count]) => ({ date, count })),
    sizeDistribution
  }
}
