import { describe, expect, it } from 'vitest'
import { makeConversation } from '../test-support/records'
import { segmentMessages } from './index'
import { computeSegmentStats } from './stats'

function minutesAfter(base: number, minutes: number): string {
  return new Date(base + minutes * 60_000).toISOString()
}

describe('computeSegmentStats', () => {
  it('returns zeros for no segments', () => {
    expect(computeSegmentStats([])).toEqual({
      segmentCount: 0,
      messageCount: 0,
      avgMessagesPerSegment: 0,
      avgDurationMinutes: 0,
      segmentsPerDate: [],
      sizeDistribution: { small: 0, medium: 0, large: 0 }
    })
  })

  it('aggregates counts, durations, dates and sizes', () => {
    const day1 = Date.UTC(2025, 1, 27, 8, 0, 0)
    const day2 = Date.UTC(2025, 1, 28, 8, 0, 0)
    const records = makeConversation([
      // 6 messages, 10 minutes apart: medium, 50 minutes
      ...Array.from({ length: 6 }, (_, i): [string, string] => [minutesAfter(day1, i * 10), 'Me']),
      // 1 message on the same day, 5 hours later: small
      [minutesAfter(day1, 300), 'Me'],
      // 21 messages one minute apart: large, 20 minutes
      ...Array.from({ length: 21 }, (_, i): [string, string] => [minutesAfter(day2, i), 'Alex'])
    ])

    const stats = computeSegmentStats(segmentMessages(records))
    expect(stats.segmentCount).toBe(3)
    expect(stats.messageCount).toBe(28)
    expect(stats.avgMessagesPerSegment).toBeCloseTo(28 / 3)
    expect(stats.avgDurationMinutes).toBeCloseTo(70 / 3)
    expect(stats.segmentsPerDate).toEqual([
      { date: '2025-02-27', count: 2 },
      { date: '2025-02-28', count: 1 }
    ])
    expect(stats.sizeDistribution).toEqual({ small: 1, medium: 1, large: 1 })
  })
})
