/**
 * Date values and calendar arithmetic.
 *
 * Values are floating local time: no TZID or UTC offset is honoured,
 * a trailing `Z` is accepted and ignored.
 */

import type { Frequency, TemporalValue } from './types.js'

export const INVALID_DATE_FORMAT = 'invalid date format'

export type TemporalParseResult =
  | { ok: true; value: TemporalValue }
  | { ok: false; error: typeof INVALID_DATE_FORMAT }

const DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/
const DATE_TIME_PATTERN = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})Z?$/

function toInstant(date: Date): number {
  return Math.floor(date.getTime() / 1000)
}

function toDate(instant: number): Date {
  return new Date(instant * 1000)
}

/**
 * Compose a local date; fields out of range roll over into the next larger field.
 */
function localDate(year: number, month: number, day: number, hh = 0, mm = 0, ss = 0): Date {
  const d = new Date(year, month, day, hh, mm, ss)
  // Date treats years 0-99 as 1900-1999
  if (year >= 0 && year < 100) d.setFullYear(year, month, day)
  return d
}

/**
 * Parse `YYYYMMDD` or `YYYYMMDDTHHMMSS`.
 */
export function parseTemporalValue(raw: string): TemporalParseResult {
  const value = raw.trim()

  const dateMatch = value.match(DATE_PATTERN)
  if (dateMatch) {
    const [, y, m, d] = dateMatch
    return {
      ok: true,
      value: {
        precision: 'date',
        instant: toInstant(localDate(Number(y), Number(m) - 1, Number(d))),
      },
    }
  }

  const dateTimeMatch = value.match(DATE_TIME_PATTERN)
  if (dateTimeMatch) {
    const [, y, m, d, hh, mm, ss] = dateTimeMatch
    return {
      ok: true,
      value: {
        precision: 'date-time',
        instant: toInstant(
          localDate(Number(y), Number(m) - 1, Number(d), Number(hh), Number(mm), Number(ss)),
        ),
      },
    }
  }

  return { ok: false, error: INVALID_DATE_FORMAT }
}

/**
 * Parse a value, returning undefined when it is absent or malformed.
 */
export function parseOptionalTemporalValue(raw: string | undefined): TemporalValue | undefined {
  if (raw === undefined) return undefined
  const result = parseTemporalValue(raw)
  return result.ok ? result.value : undefined
}

/**
 * Local midnight of the day containing `instant`.
 */
export function startOfDay(instant: number): number {
  const d = toDate(instant)
  return toInstant(localDate(d.getFullYear(), d.getMonth(), d.getDate()))
}

/**
 * Move `instant` forward by `interval` units through the local calendar.
 * Field overflow is normalized by Date (Jan 31 + 1 month lands in March).
 * Unknown units leave the instant unchanged.
 */
export function advance(instant: number, interval: number, unit: Frequency | null): number {
  const d = toDate(instant)
  let year = d.getFullYear()
  let month = d.getMonth()
  let day = d.getDate()

  switch (unit) {
    case 'DAILY':
      day += interval
      break
    case 'WEEKLY':
      day += interval * 7
      break
    case 'MONTHLY':
      month += interval
      break
    case 'YEARLY':
      year += interval
      break
    default:
      return instant
  }

  return toInstant(localDate(year, month, day, d.getHours(), d.getMinutes(), d.getSeconds()))
}

/**
 * Instant → Date, for formatting at the edges.
 */
export function instantToDate(instant: number): Date {
  return toDate(instant)
}
