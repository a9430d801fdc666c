/**
 * Agenda Renderer
 *
 * Turns a DayView into fixed-width text lines, one per placement, with a
 * line → occurrence map so a caller can open the event's file.
 */

import { DateTime } from 'luxon'
import type { DayPlacement, DayView, Occurrence, PlacementLayout, RenderedAgenda } from './types.js'

const DAY_FORMAT = 'ccc yyyy-MM-dd'
const TIME_FORMAT = 'hh:mma'
const TIME_COLUMN_WIDTH = 17
const LOCALE = 'en-US'

const SPAN_MARKERS: Partial<Record<PlacementLayout, string>> = {
  'span-start': '|->',
  'span-middle': '<->',
  'span-end': '<-|',
}

function format(instant: number, pattern: string): string {
  return DateTime.fromSeconds(instant, { locale: LOCALE }).toFormat(pattern)
}

export function formatDay(day: number): string {
  return format(day, DAY_FORMAT)
}

export function formatTimeRange(occurrence: Occurrence): string {
  const start = format(occurrence.start.instant, TIME_FORMAT)
  const end = occurrence.end ? format(occurrence.end.instant, TIME_FORMAT) : ''
  return `${start.padStart(7)} - ${end.padStart(7)}`
}

function describe(placement: DayPlacement): { time: string; summary: string } {
  const { occurrence, layout } = placement
  if (layout === 'timed') {
    return { time: formatTimeRange(occurrence), summary: occurrence.summary }
  }
  return { time: '', summary: `${SPAN_MARKERS[layout] ?? ''}${occurrence.summary}` }
}

export function renderAgenda(view: DayView): RenderedAgenda {
  const lines: string[] = []
  const lineEntries = new Map<number, Occurrence>()
  let currentLine: number | null = null

  for (const [index, bucket] of view.days.entries()) {
    if (index === view.todayIndex && bucket.placements.length > 0) {
      currentLine = lines.length + 1
    }

    const dayLabel = formatDay(bucket.day)
    const indent = ' '.repeat(dayLabel.length)

    for (const [i, placement] of bucket.placements.entries()) {
      const { time, summary } = describe(placement)
      const prefix = i === 0 ? dayLabel : indent
      lines.push(`${prefix} ${time.padStart(TIME_COLUMN_WIDTH)} ${summary}`)
      lineEntries.set(lines.length, placement.occurrence)
    }
  }

  return { lines, lineEntries, currentLine }
}
