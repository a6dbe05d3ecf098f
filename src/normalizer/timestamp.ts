/**
 * Timestamp Parsing
 *
 * Exported timestamps look like `Feb 27, 2025  6:20:21 PM`. They carry no
 * timezone and are taken as UTC as-is: the true local offset of the device is
 * unknown, and segment boundaries downstream are computed on these values.
 *
 * Values that are already ISO-8601 pass through, re-rendered in the canonical
 * form `YYYY-MM-DDTHH:MM:SSZ`.
 */

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11
}

// Feb 27, 2025  6:20:21 PM
const EXPORT_PATTERN = /^([A-Za-z]{3}) (\d{1,2}), (\d{4})\s+(\d{1,2}):(\d{2}):(\d{2}) ([AaPp][Mm])$/

// 2025-02-27T18:20:21Z, 2025-02-27T18:20:21.123+05:30, 2025-02-27 18:20
const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?(Z|[+-]\d{2}:?\d{2})?$/i

/**
 * Build a UTC epoch, rejecting values that roll over (Feb 30, 25:00).
 */
function utcEpoch(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number
): number | null {
  if (month < 0 || month > 11 || hour > 23 || minute > 59 || second > 59) return null

  const epoch = Date.UTC(year, month, day, hour, minute, second)
  const date = new Date(epoch)
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month || date.getUTCDate() !== day) {
    return null
  }
  return epoch
}

/**
 * Render an epoch in the canonical second-precision UTC form.
 */
export function formatUtc(epoch: number): string {
  return new Date(epoch).toISOString().replace(/\.\d{3}Z$/, 'Z')
}

function parseExportTimestamp(value: string): number | null {
  const match = EXPORT_PATTERN.exec(value)
  if (!match) return null

  const [, monthName, day, year, hour, minute, second, meridiem] = match
  const month = MONTHS[(monthName ?? '').toLowerCase()]
  if (month === undefined) return null

  let hour24 = Number.parseInt(hour ?? '', 10)
  if (hour24 < 1 || hour24 > 12) return null
  const isPm = meridiem?.toUpperCase() === 'PM'
  if (isPm && hour24 !== 12) {
    hour24 += 12
  } else if (!isPm && hour24 === 12) {
    hour24 = 0
  }

  return utcEpoch(
    Number.parseInt(year ?? '', 10),
    month,
    Number.parseInt(day ?? '', 10),
    hour24,
    Number.parseInt(minute ?? '', 10),
    Number.parseInt(second ?? '', 10)
  )
}

/**
 * Offset in minutes east of UTC: `+05:30` → 330. `Z` or none → 0.
 */
function parseOffsetMinutes(offset: string | undefined): number {
  if (!offset || offset.toUpperCase() === 'Z') return 0
  const sign = offset.startsWith('-') ? -1 : 1
  const digits = offset.slice(1).replace(':', '')
  const hours = Number.parseInt(digits.slice(0, 2), 10)
  const minutes = Number.parseInt(digits.slice(2), 10)
  return sign * (hours * 60 + minutes)
}

function parseIsoTimestamp(value: string): number | null {
  const match = ISO_PATTERN.exec(value)
  if (!match) return null

  const [, year, month, day, hour, minute, second, offset] = match
  const epoch = utcEpoch(
    Number.parseInt(year ?? '', 10),
    Number.parseInt(month ?? '', 10) - 1,
    Number.parseInt(day ?? '', 10),
    Number.parseInt(hour ?? '', 10),
    Number.parseInt(minute ?? '', 10),
    Number.parseInt(second ?? '0', 10)
  )
  if (epoch === null) return null

  return epoch - parseOffsetMinutes(offset) * 60_000
}

/**
 * Parse an exported timestamp into canonical UTC form.
 * Returns null when the value matches no supported format.
 */
export function parseTimestamp(value: string | null | undefined): string | null {
  if (!value) return null
  const trimmed = value.trim()

  const epoch = parseExportTimestamp(trimmed) ?? parseIsoTimestamp(trimmed)
  return epoch === null ? null : formatUtc(epoch)
}

/**
 * Epoch milliseconds of a canonical timestamp produced by `parseTimestamp`.
 */
export function timestampToEpoch(timestamp: string): number {
  return Date.parse(timestamp)
}

/**
 * UTC calendar day (`YYYY-MM-DD`) of a canonical timestamp.
 */
export function utcDateKey(timestamp: string): string {
  return timestamp.slice(0, 10)
}
