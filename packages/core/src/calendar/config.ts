/**
 * Almanac Configuration Loader
 *
 * Loads settings from .almanac/config.yaml, validated with zod.
 * Missing or invalid files fall back to defaults.
 */

import * as path from 'node:path'
import { existsSync, readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { findAlmanacDir } from '../config.js'
import { DEFAULT_MAX_TOTAL_OCCURRENCES } from './day-view.js'
import { advance, parseTemporalValue } from './temporal.js'
import type { AlmanacConfig, QueryWindow } from './types.js'

const CONFIG_FILENAME = 'config.yaml'

const DEFAULT_WINDOW_START = '00000101'
const DEFAULT_FUTURE_YEARS = 100
const DEFAULT_SERVER_HOST = '127.0.0.1'
const DEFAULT_SERVER_PORT = 4322

const configSchema = z.object({
  calendar: z
    .object({
      directory: z.string().min(1).optional(),
      window: z
        .object({
          start: z.string().default(DEFAULT_WINDOW_START),
          futureYears: z.number().int().positive().default(DEFAULT_FUTURE_YEARS),
        })
        .default({}),
      maxTotalOccurrences: z.number().int().positive().default(DEFAULT_MAX_TOTAL_OCCURRENCES),
    })
    .default({}),
  server: z
    .object({
      host: z.string().default(DEFAULT_SERVER_HOST),
      port: z.number().int().min(0).max(65535).default(DEFAULT_SERVER_PORT),
    })
    .default({}),
})

export function defaultAlmanacConfig(): AlmanacConfig {
  return configSchema.parse({})
}

/**
 * Load config.yaml from the almanac directory.
 */
export function loadAlmanacConfig(almanacDir?: string): AlmanacConfig {
  const dir = almanacDir ?? findAlmanacDir()
  const configPath = path.join(dir, CONFIG_FILENAME)

  if (!existsSync(configPath)) {
    return defaultAlmanacConfig()
  }

  let raw: unknown
  try {
    raw = parse(readFileSync(configPath, 'utf-8'))
  } catch (err) {
    console.warn(
      `Warning: Could not parse ${configPath}: ${err instanceof Error ? err.message : String(err)}. Using defaults.`,
    )
    return defaultAlmanacConfig()
  }

  const result = configSchema.safeParse(raw ?? {})
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    console.warn(`Warning: Invalid config in ${configPath}: ${issues}. Using defaults.`)
    return defaultAlmanacConfig()
  }

  return result.data
}

function parseBound(raw: string, label: string): number {
  const parsed = parseTemporalValue(raw)
  if (!parsed.ok) {
    throw new Error(`Invalid ${label} "${raw}": expected YYYYMMDD or YYYYMMDDTHHMMSS`)
  }
  return parsed.value.instant
}

/**
 * Resolve the query window from optional date strings, falling back to the
 * configured defaults.
 */
export function resolveWindow(
  config: AlmanacConfig,
  start?: string,
  end?: string,
  now: Date = new Date(),
): QueryWindow {
  const windowStart = parseBound(start ?? config.calendar.window.start, 'window start')
  const windowEnd = end
    ? parseBound(end, 'window end')
    : advance(Math.floor(now.getTime() / 1000), config.calendar.window.futureYears, 'YEARLY')

  if (windowStart > windowEnd) {
    throw new Error(`Window start ${start ?? config.calendar.window.start} is after window end`)
  }

  return { start: windowStart, end: windowEnd }
}
