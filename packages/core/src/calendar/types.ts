/**
 * Calendar System Types
 *
 * Core types for the event parsing and recurrence expansion engine.
 * All instants are integer seconds since the epoch, interpreted as floating local time.
 */

/**
 * Precision of a parsed date value.
 * `date` values always sit on local midnight.
 */
export type Precision = 'date' | 'date-time'

export interface TemporalValue {
  readonly precision: Precision
  /** Seconds since the epoch */
  readonly instant: number
}

/** Recurrence units understood by `advance` */
export type Frequency = 'DAILY' | 'WEEKLY' | 'MONTHLY' | 'YEARLY'

/**
 * Raw VEVENT record: field name → value, parameters stripped.
 */
export interface EventRecord {
  readonly fields: ReadonlyMap<string, string>
  readonly sourcePath: string
}

/**
 * Validated event.
 * An entry carrying `recurrenceId` is an exception: it replaces one occurrence
 * of another entry and is never expanded on its own.
 */
export interface Entry {
  readonly start: TemporalValue

  /** Exclusive end */
  readonly end?: TemporalValue

  /** Raw RRULE text, parsed at expansion time */
  readonly recurrenceRule?: string

  readonly summary: string

  /** Instant of the occurrence this entry overrides */
  readonly recurrenceId?: TemporalValue

  /** File the event was read from */
  readonly sourcePath: string
}

/**
 * One concrete instantiation of an entry.
 * Always a fresh value; never shares TemporalValues with its entry.
 */
export type Occurrence = Entry

export interface RecurrenceRule {
  freq: Frequency | null
  interval: number
  until?: TemporalValue
  count?: number
}

/**
 * How an occurrence is drawn on one day.
 * Span layouts apply to multi-day date-only occurrences.
 */
export type PlacementLayout = 'timed' | 'all-day' | 'span-start' | 'span-middle' | 'span-end'

export interface DayPlacement {
  occurrence: Occurrence
  layout: PlacementLayout
}

export interface DayBucket {
  /** Local midnight of the day */
  day: number
  placements: DayPlacement[]
}

export interface DayView {
  /** Buckets in ascending day order */
  days: DayBucket[]

  /** Index into `days` of today's bucket, if the view contains one */
  todayIndex: number | null

  /** True when the aggregate expansion budget stopped expansion early */
  truncated: boolean
}

export interface DayViewOptions {
  /** Reference time for `todayIndex` (default: current time) */
  now?: Date

  /** Upper bound on occurrences expanded across all entries */
  maxTotalOccurrences?: number
}

export type DiagnosticKind = 'io-failure' | 'parse-failure'

/**
 * Non-fatal problem found while loading a calendar.
 */
export interface CalendarDiagnostic {
  kind: DiagnosticKind
  path: string
  message: string
}

export interface LoadedCalendar {
  /** Display name (base name of the calendar directory) */
  name: string
  entries: Entry[]
  diagnostics: CalendarDiagnostic[]
}

export interface DirectoryItem {
  name: string
  isFile: boolean
}

/**
 * Filesystem collaborator for the loader.
 * Both methods throw on failure; the loader turns that into diagnostics.
 */
export interface CalendarSource {
  listDirectory(dir: string): DirectoryItem[]
  readFile(filePath: string): string
}

export interface RenderedAgenda {
  lines: string[]

  /** 1-based line number → occurrence shown on that line */
  lineEntries: Map<number, Occurrence>

  /** 1-based first line of today's bucket */
  currentLine: number | null
}

/**
 * Almanac configuration from .almanac/config.yaml
 */
export interface AlmanacConfig {
  calendar: {
    /** Default calendar directory */
    directory?: string
    window: {
      /** Default window start, as a date string */
      start: string
      /** Default window end, in years from now */
      futureYears: number
    }
    maxTotalOccurrences: number
  }

  server: {
    host: string
    port: number
  }
}

export interface QueryWindow {
  start: number
  end: number
}
