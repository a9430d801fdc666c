/**
 * Unit Tests: Day-Bucket Projector
 */

import { describe, it, expect } from 'vitest'
import { buildDayView, classifyPlacement } from '../src/calendar/day-view.js'
import type { DayView } from '../src/calendar/types.js'
import { date, dateTime, local, makeEntry } from './helpers.js'

const MARCH = { start: local(2024, 3, 1), end: local(2024, 3, 31, 23, 59, 59) }
const JANUARY = { start: local(2024, 1, 1), end: local(2024, 1, 31, 23, 59, 59) }
const NOW = new Date(2030, 0, 1)

function layoutByDay(view: DayView): Array<[number, string, string]> {
  return view.days.flatMap((bucket) =>
    bucket.placements.map((p): [number, string, string] => [
      bucket.day,
      p.layout,
      p.occurrence.summary,
    ]),
  )
}

// -------------------------------------------------------------------
// Multi-day placement
// -------------------------------------------------------------------

describe('buildDayView spans', () => {
  it('places a date span on each covered day and classifies it', () => {
    const trip = makeEntry({ start: date(2024, 3, 10), end: date(2024, 3, 13), summary: 'Trip' })

    const view = buildDayView([trip], MARCH.start, MARCH.end, { now: NOW })

    expect(layoutByDay(view)).toEqual([
      [local(2024, 3, 10), 'span-start', 'Trip'],
      [local(2024, 3, 11), 'span-middle', 'Trip'],
      [local(2024, 3, 12), 'span-end', 'Trip'],
    ])
  })

  it('places a span across a daylight-saving change on calendar days', () => {
    const easter = makeEntry({ start: date(2024, 3, 30), end: date(2024, 4, 2), summary: 'Easter' })

    const view = buildDayView([easter], MARCH.start, local(2024, 4, 30), { now: NOW })

    expect(layoutByDay(view)).toEqual([
      [local(2024, 3, 30), 'span-start', 'Easter'],
      [local(2024, 3, 31), 'span-middle', 'Easter'],
      [local(2024, 4, 1), 'span-end', 'Easter'],
    ])
  })

  it('ends a date span with a date-time end on the day holding the end', () => {
    const trip = makeEntry({ start: date(2024, 3, 10), end: dateTime(2024, 3, 12, 12), summary: 'Trip' })

    const view = buildDayView([trip], MARCH.start, MARCH.end, { now: NOW })

    expect(layoutByDay(view)).toEqual([
      [local(2024, 3, 10), 'span-start', 'Trip'],
      [local(2024, 3, 11), 'span-middle', 'Trip'],
      [local(2024, 3, 12), 'span-end', 'Trip'],
    ])
  })

  it('treats a one-day date event as all-day', () => {
    const holiday = makeEntry({ start: date(2024, 3, 29), end: date(2024, 3, 30), summary: 'Holiday' })

    const view = buildDayView([holiday], MARCH.start, MARCH.end, { now: NOW })

    expect(layoutByDay(view)).toEqual([[local(2024, 3, 29), 'all-day', 'Holiday']])
  })

  it('places a timed event on every day it touches', () => {
    const night = makeEntry({
      start: dateTime(2024, 1, 1, 22),
      end: dateTime(2024, 1, 2, 2),
      summary: 'Night shift',
    })

    const view = buildDayView([night], JANUARY.start, JANUARY.end, { now: NOW })

    expect(layoutByDay(view)).toEqual([
      [local(2024, 1, 1), 'timed', 'Night shift'],
      [local(2024, 1, 2), 'timed', 'Night shift'],
    ])
  })

  it('treats the end as exclusive', () => {
    const meeting = makeEntry({
      start: dateTime(2024, 1, 1, 10),
      end: dateTime(2024, 1, 2, 0),
      summary: 'Long meeting',
    })

    const view = buildDayView([meeting], JANUARY.start, JANUARY.end, { now: NOW })

    expect(view.days.map((b) => b.day)).toEqual([local(2024, 1, 1)])
  })

  it('only places days inside the window', () => {
    const trip = makeEntry({ start: date(2024, 3, 30), end: date(2024, 4, 3), summary: 'Trip' })

    const view = buildDayView([trip], MARCH.start, MARCH.end, { now: NOW })

    expect(layoutByDay(view)).toEqual([
      [local(2024, 3, 30), 'span-start', 'Trip'],
      [local(2024, 3, 31), 'span-middle', 'Trip'],
    ])
  })
})

describe('classifyPlacement', () => {
  it('returns span-end for the day before the exclusive end', () => {
    const trip = makeEntry({ start: date(2024, 3, 10), end: date(2024, 3, 13) })
    expect(classifyPlacement(trip, local(2024, 3, 12))).toBe('span-end')
  })

  it('treats a date event without end as a single day', () => {
    expect(classifyPlacement(makeEntry({ start: date(2024, 3, 10) }), local(2024, 3, 10))).toBe('all-day')
  })
})

// -------------------------------------------------------------------
// Window clipping, ordering, exceptions
// -------------------------------------------------------------------

describe('buildDayView clipping and ordering', () => {
  it('drops occurrences starting outside the window', () => {
    const entries = [
      makeEntry({ start: dateTime(2023, 12, 31, 9), summary: 'Before' }),
      makeEntry({ start: dateTime(2024, 1, 15, 9), summary: 'Inside' }),
      makeEntry({ start: dateTime(2024, 2, 1, 9), summary: 'After' }),
    ]

    const view = buildDayView(entries, JANUARY.start, JANUARY.end, { now: NOW })

    expect(layoutByDay(view)).toEqual([[local(2024, 1, 15), 'timed', 'Inside']])
  })

  it('sorts by start and keeps input order for equal starts', () => {
    const entries = [
      makeEntry({ start: dateTime(2024, 1, 5, 9), summary: 'First' }),
      makeEntry({ start: dateTime(2024, 1, 5, 9), summary: 'Second' }),
      makeEntry({ start: dateTime(2024, 1, 5, 8), summary: 'Earlier' }),
      makeEntry({ start: dateTime(2024, 1, 5, 9), summary: 'Third' }),
    ]

    const view = buildDayView(entries, JANUARY.start, JANUARY.end, { now: NOW })

    expect(view.days).toHaveLength(1)
    expect(view.days[0].placements.map((p) => p.occurrence.summary)).toEqual([
      'Earlier',
      'First',
      'Second',
      'Third',
    ])
  })

  it('merges recurring occurrences with their exceptions', () => {
    const entries = [
      makeEntry({
        start: dateTime(2024, 1, 1, 10),
        end: dateTime(2024, 1, 1, 11),
        recurrenceRule: 'FREQ=DAILY;COUNT=3',
        summary: 'Sync',
      }),
      makeEntry({
        start: dateTime(2024, 1, 2, 8),
        end: dateTime(2024, 1, 2, 9),
        recurrenceId: dateTime(2024, 1, 2, 10),
        summary: 'Early sync',
      }),
      makeEntry({ start: dateTime(2024, 1, 2, 9), summary: 'Coffee' }),
    ]

    const view = buildDayView(entries, JANUARY.start, JANUARY.end, { now: NOW })

    expect(layoutByDay(view)).toEqual([
      [local(2024, 1, 1), 'timed', 'Sync'],
      [local(2024, 1, 2), 'timed', 'Early sync'],
      [local(2024, 1, 2), 'timed', 'Coffee'],
      [local(2024, 1, 3), 'timed', 'Sync'],
    ])
  })

  it('never shows an exception on its own', () => {
    const orphan = makeEntry({
      start: dateTime(2024, 1, 2, 8),
      recurrenceId: dateTime(2024, 1, 2, 10),
      summary: 'Orphan',
    })

    expect(buildDayView([orphan], JANUARY.start, JANUARY.end, { now: NOW }).days).toEqual([])
  })
})

// -------------------------------------------------------------------
// Today marker and budget
// -------------------------------------------------------------------

describe('buildDayView today marker', () => {
  const entries = [
    makeEntry({ start: dateTime(2024, 1, 1, 9), summary: 'Mon' }),
    makeEntry({ start: dateTime(2024, 1, 2, 9), summary: 'Tue' }),
  ]

  it('points at the bucket for today', () => {
    const view = buildDayView(entries, JANUARY.start, JANUARY.end, { now: new Date(2024, 0, 2, 18) })
    expect(view.todayIndex).toBe(1)
  })

  it('is null when today has no bucket', () => {
    const view = buildDayView(entries, JANUARY.start, JANUARY.end, { now: new Date(2024, 0, 3, 18) })
    expect(view.todayIndex).toBeNull()
  })
})

describe('buildDayView expansion budget', () => {
  it('stops expanding entries once the budget is used', () => {
    const entries = [
      makeEntry({ start: dateTime(2024, 1, 1, 9), summary: 'A' }),
      makeEntry({ start: dateTime(2024, 1, 2, 9), summary: 'B' }),
      makeEntry({ start: dateTime(2024, 1, 3, 9), summary: 'C' }),
    ]

    const view = buildDayView(entries, JANUARY.start, JANUARY.end, {
      now: NOW,
      maxTotalOccurrences: 2,
    })

    expect(view.truncated).toBe(true)
    expect(layoutByDay(view).map(([, , summary]) => summary)).toEqual(['A', 'B'])
  })

  it('is not truncated under the default budget', () => {
    const daily = makeEntry({ start: date(2024, 1, 1), recurrenceRule: 'FREQ=DAILY' })

    const view = buildDayView([daily], JANUARY.start, JANUARY.end, { now: NOW })

    expect(view.truncated).toBe(false)
    expect(view.days).toHaveLength(31)
  })
})
