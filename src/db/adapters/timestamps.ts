import { ValueTransformer } from 'typeorm'
import { InvalidTimestamp } from '../../services/errors.js'

// Zoned ISO-8601: 2025-03-01T14:30:00Z, 2025-03-01 14:30:00.123+02:00
const ZONED = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2})?)(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})$/i
// What SQLite's CURRENT_TIMESTAMP and friends write: no zone, always UTC
const STORED_NAIVE = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}:\d{2}(?::\d{2})?)(?:\.(\d+))?$/

// Date rolls overflowing fields into the next unit (Feb 30 becomes Mar 2)
function assertCalendarFields(input: unknown, date: string, time: string): void {
  const [year, month, day] = date.split('-').map(Number)
  const [hour, minute, second = 0] = time.split(':').map(Number)
  const check = new Date(0)
  check.setUTCFullYear(year, month - 1, day)
  check.setUTCHours(hour, minute, second)
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    check.getUTCHours() !== hour ||
    check.getUTCMinutes() !== minute ||
    check.getUTCSeconds() !== second
  ) {
    throw new InvalidTimestamp(input, 'not a calendar date')
  }
}

function fromParts(input: unknown, date: string, time: string, fraction: string | undefined, zone: string): Date {
  assertCalendarFields(input, date, time)
  const millis = fraction ? `.${fraction.slice(0, 3).padEnd(3, '0')}` : ''
  const parsed = new Date(`${date}T${time}${millis}${zone.toUpperCase()}`)
  if (Number.isNaN(parsed.getTime())) throw new InvalidTimestamp(input, 'not a calendar date')
  return parsed
}

/**
 * Converts a timestamp supplied by a caller into a UTC instant.
 *
 * Strings must carry an explicit zone (`Z` or `±HH:MM`); naive strings are
 * rejected rather than guessed.
 */
export function normalizeTimestamp(input: Date | string): Date {
  if (input instanceof Date) {
    if (Number.isNaN(input.getTime())) throw new InvalidTimestamp(input, 'invalid Date')
    return new Date(input.getTime())
  }
  const m = ZONED.exec(input.trim())
  if (!m) {
    if (STORED_NAIVE.test(input.trim())) throw new InvalidTimestamp(input, 'missing timezone offset')
    throw new InvalidTimestamp(input, 'not an ISO-8601 timestamp')
  }
  return fromParts(input, m[1], m[2], m[3], m[4])
}

export function encodeTimestamp(input: Date | string): string {
  return normalizeTimestamp(input).toISOString()
}

/** Reads a stored value back as a UTC instant. Zoneless stored text is UTC. */
export function denormalizeTimestamp(raw: string | Date): Date {
  if (raw instanceof Date) return normalizeTimestamp(raw)
  const naive = STORED_NAIVE.exec(raw.trim())
  if (naive) return fromParts(raw, naive[1], naive[2], naive[3], 'Z')
  return normalizeTimestamp(raw)
}

export const utcTimestamp: ValueTransformer = {
  to: (value: Date | string | null | undefined) => (value == null ? value : encodeTimestamp(value)),
  from: (raw: string | null) => (raw == null ? null : denormalizeTimestamp(raw)),
}
