import type { Entry, TemporalValue } from '../src/calendar/types.js'

/** Seconds for a local wall-clock time (month is 1-based) */
export function local(year: number, month: number, day: number, hh = 0, mm = 0, ss = 0): number {
  const d = new Date(year, month - 1, day, hh, mm, ss)
  if (year >= 0 && year < 100) d.setFullYear(year, month - 1, day)
  return d.getTime() / 1000
}

export function date(year: number, month: number, day: number): TemporalValue {
  return { precision: 'date', instant: local(year, month, day) }
}

export function dateTime(
  year: number,
  month: number,
  day: number,
  hh: number,
  mm = 0,
  ss = 0,
): TemporalValue {
  return { precision: 'date-time', instant: local(year, month, day, hh, mm, ss) }
}

export function makeEntry(overrides: Partial<Entry> & Pick<Entry, 'start'>): Entry {
  return {
    summary: 'Event',
    sourcePath: '/calendars/work/event.ics',
    ...overrides,
  }
}
