/**
 * Recurrence Expander
 *
 * Expands one entry into the occurrences that overlap a query window,
 * substituting exceptions whose RECURRENCE-ID matches a generated instant.
 */

import { parseRecurrenceRule } from './rrule.js'
import { advance } from './temporal.js'
import type { Entry, Occurrence, TemporalValue } from './types.js'

/** Hard cap on accepted occurrences per entry, whatever COUNT/UNTIL say */
export const MAX_OCCURRENCES_PER_ENTRY = 1000

function copyTemporal(value: TemporalValue | undefined): TemporalValue | undefined {
  return value ? { precision: value.precision, instant: value.instant } : undefined
}

/**
 * Deep copy of an entry, so occurrences never share values.
 */
export function copyEntry(entry: Entry): Occurrence {
  return {
    ...entry,
    start: { precision: entry.start.precision, instant: entry.start.instant },
    end: copyTemporal(entry.end),
    recurrenceId: copyTemporal(entry.recurrenceId),
  }
}

function rebind(entry: Entry, instant: number, offset: number): Occurrence {
  return {
    ...copyEntry(entry),
    start: { precision: entry.start.precision, instant },
    end: entry.end ? { precision: entry.end.precision, instant: instant + offset } : undefined,
  }
}

/**
 * Expand `entry` within [windowStart, windowEnd].
 *
 * Entries without a rule come back as a single copy regardless of the window.
 * Instants that do not overlap the window are skipped but still count toward COUNT.
 */
export function expandEntry(
  entry: Entry,
  exceptions: readonly Entry[],
  windowStart: number,
  windowEnd: number,
): Occurrence[] {
  if (entry.recurrenceRule === undefined) {
    return [copyEntry(entry)]
  }

  const rule = parseRecurrenceRule(entry.recurrenceRule)
  const offset = entry.end ? entry.end.instant - entry.start.instant : 0

  const occurrences: Occurrence[] = []
  let current = entry.start.instant
  let generated = 0

  while (occurrences.length < MAX_OCCURRENCES_PER_ENTRY) {
    if (rule.until && current > rule.until.instant) break
    if (rule.count !== undefined && generated >= rule.count) break
    if (current > windowEnd) break

    generated++

    if (current >= windowStart || current + offset > windowStart) {
      const exception = exceptions.find((ex) => ex.recurrenceId?.instant === current)
      occurrences.push(exception ? copyEntry(exception) : rebind(entry, current, offset))
    }

    const next = advance(current, rule.interval, rule.freq)
    // Absent or unknown FREQ never moves forward
    if (next <= current) break
    current = next
  }

  return occurrences
}
