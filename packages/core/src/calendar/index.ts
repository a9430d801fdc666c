/**
 * Calendar System
 *
 * Event parsing, recurrence expansion and day bucketing for a directory of
 * VEVENT files.
 */

// Types
export type {
  Precision,
  TemporalValue,
  Frequency,
  EventRecord,
  Entry,
  Occurrence,
  RecurrenceRule,
  PlacementLayout,
  DayPlacement,
  DayBucket,
  DayView,
  DayViewOptions,
  DiagnosticKind,
  CalendarDiagnostic,
  LoadedCalendar,
  DirectoryItem,
  CalendarSource,
  RenderedAgenda,
  AlmanacConfig,
  QueryWindow,
} from './types.js'

// Implementation
export { parseEventRecords } from './records.js'
export {
  parseTemporalValue,
  parseOptionalTemporalValue,
  startOfDay,
  advance,
  instantToDate,
  INVALID_DATE_FORMAT,
} from './temporal.js'
export type { TemporalParseResult } from './temporal.js'
export { buildEntry, isException } from './entries.js'
export type { EntryBuildResult } from './entries.js'
export { parseRecurrenceRule } from './rrule.js'
export { expandEntry, copyEntry, MAX_OCCURRENCES_PER_ENTRY } from './recurrence.js'
export { buildDayView, classifyPlacement, DEFAULT_MAX_TOTAL_OCCURRENCES } from './day-view.js'
export { loadCalendar, nodeCalendarSource, normalizeCalendarPath, reportDiagnostics } from './loader.js'
export { renderAgenda, formatDay, formatTimeRange } from './agenda.js'
export { loadAlmanacConfig, defaultAlmanacConfig, resolveWindow } from './config.js'
