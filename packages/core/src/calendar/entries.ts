/**
 * Entry Builder
 *
 * Maps a raw record onto the closed Entry shape. Only DTSTART is mandatory.
 */

import { parseOptionalTemporalValue, parseTemporalValue } from './temporal.js'
import type { CalendarDiagnostic, Entry, EventRecord } from './types.js'

export type EntryBuildResult =
  | { ok: true; entry: Entry }
  | { ok: false; diagnostic: CalendarDiagnostic }

export function buildEntry(record: EventRecord): EntryBuildResult {
  const { fields, sourcePath } = record

  const rawStart = fields.get('DTSTART')
  if (rawStart === undefined) {
    return {
      ok: false,
      diagnostic: { kind: 'parse-failure', path: sourcePath, message: `No start date for: ${sourcePath}` },
    }
  }

  const start = parseTemporalValue(rawStart)
  if (!start.ok) {
    return {
      ok: false,
      diagnostic: {
        kind: 'parse-failure',
        path: sourcePath,
        message: `Invalid start date "${rawStart}" (${start.error}) for: ${sourcePath}`,
      },
    }
  }

  const entry: Entry = {
    start: start.value,
    end: parseOptionalTemporalValue(fields.get('DTEND')),
    recurrenceRule: fields.get('RRULE'),
    summary: (fields.get('SUMMARY') ?? '').trim(),
    recurrenceId: parseOptionalTemporalValue(fields.get('RECURRENCE-ID')),
    sourcePath,
  }

  return { ok: true, entry }
}

/**
 * Exceptions replace a single occurrence of another entry.
 */
export function isException(entry: Entry): boolean {
  return entry.recurrenceId !== undefined
}
