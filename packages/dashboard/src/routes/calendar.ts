/**
 * Calendar API Routes
 *
 * Read-only views over a calendar directory: per-day buckets for a UI,
 * and pre-rendered agenda lines for text clients.
 */

import { existsSync } from "node:fs";
import type { FastifyBaseLogger, FastifyInstance } from "fastify";
import { DateTime } from "luxon";
import {
  buildDayView,
  loadCalendar,
  normalizeCalendarPath,
  renderAgenda,
  resolveWindow,
  type CalendarDiagnostic,
  type DayPlacement,
  type DayView,
  type LoadedCalendar,
  type QueryWindow,
} from "@almanac/core";

// ─── Response Types ───

interface PlacementResponse {
  layout: DayPlacement["layout"];
  summary: string;
  allDay: boolean;
  start: string;
  end: string | null;
  sourcePath: string;
}

interface DayResponse {
  date: string;
  placements: PlacementResponse[];
}

interface DaysResponse {
  name: string;
  days: DayResponse[];
  todayIndex: number | null;
  truncated: boolean;
  diagnostics: CalendarDiagnostic[];
}

interface AgendaResponse {
  name: string;
  lines: string[];
  currentLine: number | null;
  /** 1-based line number → source file */
  sources: Record<string, string>;
  truncated: boolean;
  diagnostics: CalendarDiagnostic[];
}

interface CalendarHealth {
  status: "healthy" | "unconfigured" | "missing";
  directory: string | null;
}

interface ErrorResponse {
  error: string;
}

interface CalendarQuery {
  dir?: string;
  start?: string;
  end?: string;
}

// ─── Helpers ───

/**
 * Local wall-clock ISO string without offset (values are floating time)
 */
function toLocalIso(instant: number): string {
  return DateTime.fromSeconds(instant).toISO({
    includeOffset: false,
    suppressMilliseconds: true,
  }) ?? "";
}

function toPlacementResponse(placement: DayPlacement): PlacementResponse {
  const { occurrence, layout } = placement;
  return {
    layout,
    summary: occurrence.summary,
    allDay: occurrence.start.precision === "date",
    start: toLocalIso(occurrence.start.instant),
    end: occurrence.end ? toLocalIso(occurrence.end.instant) : null,
    sourcePath: occurrence.sourcePath,
  };
}

function logDiagnostics(
  log: FastifyBaseLogger,
  diagnostics: readonly CalendarDiagnostic[],
): void {
  for (const diagnostic of diagnostics) {
    log.warn({ kind: diagnostic.kind, path: diagnostic.path }, diagnostic.message);
  }
}

type QueryOutcome =
  | { ok: true; calendar: LoadedCalendar; view: DayView }
  | { ok: false; error: string };

/**
 * Load the requested calendar and build its day view
 */
function runQuery(
  fastify: FastifyInstance,
  log: FastifyBaseLogger,
  query: CalendarQuery,
): QueryOutcome {
  const config = fastify.almanacConfig;
  const dir = query.dir || config.calendar.directory;
  if (!dir) {
    return { ok: false, error: "Missing calendar directory (dir)" };
  }

  let window: QueryWindow;
  try {
    window = resolveWindow(config, query.start, query.end);
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }

  const calendar = loadCalendar(dir);
  logDiagnostics(log, calendar.diagnostics);

  const view = buildDayView(calendar.entries, window.start, window.end, {
    maxTotalOccurrences: config.calendar.maxTotalOccurrences,
  });
  if (view.truncated) {
    log.warn(`Expansion budget reached for calendar ${calendar.name}`);
  }

  return { ok: true, calendar, view };
}

const calendarQuerySchema = {
  type: "object",
  properties: {
    dir: { type: "string" },
    start: { type: "string" },
    end: { type: "string" },
  },
} as const;

/**
 * Register calendar routes
 */
export async function registerCalendarRoutes(
  fastify: FastifyInstance,
): Promise<void> {
  /**
   * GET /api/calendar/health
   *
   * Reports whether the default calendar directory exists
   */
  fastify.get<{ Reply: CalendarHealth }>("/api/calendar/health", async () => {
    const configured = fastify.almanacConfig.calendar.directory;
    if (!configured) {
      return { status: "unconfigured", directory: null };
    }
    const directory = normalizeCalendarPath(configured);
    return {
      status: existsSync(directory) ? "healthy" : "missing",
      directory,
    };
  });

  /**
   * GET /api/calendar/days
   *
   * Query params:
   *   - dir: calendar directory (default: configured directory)
   *   - start: YYYYMMDD[THHMMSS] (default: configured window start)
   *   - end: YYYYMMDD[THHMMSS] (default: now + configured years)
   */
  fastify.get<{
    Querystring: CalendarQuery;
    Reply: DaysResponse | ErrorResponse;
  }>(
    "/api/calendar/days",
    { schema: { querystring: calendarQuerySchema } },
    async (request, reply) => {
      const outcome = runQuery(fastify, request.log, request.query);
      if (!outcome.ok) {
        return reply.code(400).send({ error: outcome.error });
      }

      const { calendar, view } = outcome;
      return {
        name: calendar.name,
        days: view.days.map((bucket) => ({
          date: DateTime.fromSeconds(bucket.day).toISODate() ?? "",
          placements: bucket.placements.map(toPlacementResponse),
        })),
        todayIndex: view.todayIndex,
        truncated: view.truncated,
        diagnostics: calendar.diagnostics,
      };
    },
  );

  /**
   * GET /api/calendar/agenda
   *
   * Same query params as /days; returns rendered text lines
   */
  fastify.get<{
    Querystring: CalendarQuery;
    Reply: AgendaResponse | ErrorResponse;
  }>(
    "/api/calendar/agenda",
    { schema: { querystring: calendarQuerySchema } },
    async (request, reply) => {
      const outcome = runQuery(fastify, request.log, request.query);
      if (!outcome.ok) {
        return reply.code(400).send({ error: outcome.error });
      }

      const { calendar, view } = outcome;
      const agenda = renderAgenda(view);
      const sources: Record<string, string> = {};
      for (const [line, occurrence] of agenda.lineEntries) {
        sources[String(line)] = occurrence.sourcePath;
      }

      return {
        name: calendar.name,
        lines: agenda.lines,
        currentLine: agenda.currentLine,
        sources,
        truncated: view.truncated,
        diagnostics: calendar.diagnostics,
      };
    },
  );
}
