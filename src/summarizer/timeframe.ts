/**
 * Timeframe Formatting
 */

import type { Segment } from '../types'

/**
 * `06:20 PM` from a canonical UTC timestamp, or null if it does not parse.
 */
function formatClock(timestamp: string): string | null {
  const date = new Date(timestamp)
  if (Number.isNaN(date.getTime())) return null

  const hours = date.getUTCHours()
  const hour12 = hours % 12 === 0 ? 12 : hours % 12
  const minutes = date.getUTCMinutes().toString().padStart(2, '0')
  return `${hour12.toString().padStart(2, '0')}:${minutes} ${hours < 12 ? 'AM' : 'PM'}`
}

/**
 * `06:20 PM - 07:05 PM`. Falls back to the raw values when they do not parse.
 */
export function formatTimeframe(segment: Pick<Segment, 'start_time' | 'end_time'>): string {
  const { start_time: start, end_time: end } = segment
  if (!start || !end) return 'Unknown timeframe'

  const startClock = formatClock(start)
  const endClock = formatClock(end)
  if (startClock === null || endClock === null) return `${start} to ${end}`

  return `${startClock} - ${endClock}`
}
