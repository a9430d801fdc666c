/**
 * Day-Bucket Projector
 *
 * Expands all entries, merges exceptions, and distributes occurrences over
 * every local day they touch inside the window.
 */

import { isException } from './entries.js'
import { expandEntry } from './recurrence.js'
import { advance, startOfDay } from './temporal.js'
import type {
  DayBucket,
  DayView,
  DayViewOptions,
  Entry,
  Occurrence,
  PlacementLayout,
} from './types.js'

export const DEFAULT_MAX_TOTAL_OCCURRENCES = 100_000

function nextDay(day: number): number {
  return startOfDay(advance(day, 1, 'DAILY'))
}

/**
 * Last day an occurrence covers: the day holding the second before its
 * exclusive end, or its start day when it has none.
 */
function lastDayOf(occurrence: Occurrence): number {
  const startDay = startOfDay(occurrence.start.instant)
  if (!occurrence.end) return startDay
  return Math.max(startDay, startOfDay(occurrence.end.instant - 1))
}

export function classifyPlacement(occurrence: Occurrence, day: number): PlacementLayout {
  if (occurrence.start.precision === 'date-time') return 'timed'

  const firstDay = startOfDay(occurrence.start.instant)
  const lastDay = lastDayOf(occurrence)
  if (firstDay === lastDay) return 'all-day'

  if (day <= firstDay) return 'span-start'
  if (day >= lastDay) return 'span-end'
  return 'span-middle'
}

function expandAll(
  entries: readonly Entry[],
  windowStart: number,
  windowEnd: number,
  budget: number,
): { occurrences: Occurrence[]; truncated: boolean } {
  const exceptions = entries.filter(isException)
  const occurrences: Occurrence[] = []

  for (const entry of entries) {
    if (isException(entry)) continue
    if (occurrences.length >= budget) {
      return { occurrences, truncated: true }
    }
    occurrences.push(...expandEntry(entry, exceptions, windowStart, windowEnd))
  }

  return { occurrences, truncated: false }
}

/**
 * Build the per-day view of `entries` for [windowStart, windowEnd].
 */
export function buildDayView(
  entries: readonly Entry[],
  windowStart: number,
  windowEnd: number,
  options: DayViewOptions = {},
): DayView {
  const budget = options.maxTotalOccurrences ?? DEFAULT_MAX_TOTAL_OCCURRENCES
  const { occurrences, truncated } = expandAll(entries, windowStart, windowEnd, budget)

  // Array.prototype.sort is stable: equal starts keep entry order
  occurrences.sort((a, b) => a.start.instant - b.start.instant)

  const buckets = new Map<number, DayBucket>()

  for (const occurrence of occurrences) {
    const start = occurrence.start.instant
    if (start > windowEnd || start < windowStart) continue

    let day = startOfDay(start)
    do {
      if (day >= windowStart && day <= windowEnd) {
        let bucket = buckets.get(day)
        if (!bucket) {
          bucket = { day, placements: [] }
          buckets.set(day, bucket)
        }
        bucket.placements.push({ occurrence, layout: classifyPlacement(occurrence, day) })
      }
      day = nextDay(day)
    } while (occurrence.end && day < occurrence.end.instant && day <= windowEnd)
  }

  const days = [...buckets.values()].sort((a, b) => a.day - b.day)
  const today = startOfDay(Math.floor((options.now ?? new Date()).getTime() / 1000))
  const todayIndex = days.findIndex((bucket) => bucket.day === today)

  return {
    days,
    todayIndex: todayIndex === -1 ? null : todayIndex,
    truncated,
  }
}
