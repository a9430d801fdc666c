/**
 * Calendar Loader
 *
 * Reads every file in a calendar directory and builds entries from the
 * VEVENT records found. Unreadable files and bad entries become diagnostics;
 * loading never aborts.
 */

import * as os from 'node:os'
import * as path from 'node:path'
import { readdirSync, readFileSync } from 'node:fs'
import { buildEntry } from './entries.js'
import { parseEventRecords } from './records.js'
import type {
  CalendarDiagnostic,
  CalendarSource,
  DirectoryItem,
  Entry,
  LoadedCalendar,
} from './types.js'

/**
 * CalendarSource backed by the local filesystem.
 */
export const nodeCalendarSource: CalendarSource = {
  listDirectory(dir) {
    return readdirSync(dir, { withFileTypes: true }).map((dirent) => ({
      name: dirent.name,
      isFile: dirent.isFile(),
    }))
  },
  readFile(filePath) {
    return readFileSync(filePath, 'utf-8')
  },
}

/**
 * Expand a leading `~` and drop trailing separators.
 */
export function normalizeCalendarPath(dir: string): string {
  let expanded = dir
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = path.join(os.homedir(), expanded.slice(1))
  }
  const normalized = path.normalize(expanded)
  return normalized.length > 1 ? normalized.replace(/[\\/]+$/, '') : normalized
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function loadCalendar(
  directoryPath: string,
  source: CalendarSource = nodeCalendarSource,
): LoadedCalendar {
  const dir = normalizeCalendarPath(directoryPath)
  const name = path.basename(dir)
  const entries: Entry[] = []
  const diagnostics: CalendarDiagnostic[] = []

  let items: DirectoryItem[]
  try {
    items = source.listDirectory(dir)
  } catch (err) {
    diagnostics.push({
      kind: 'io-failure',
      path: dir,
      message: `Could not read calendar directory ${dir}: ${describeError(err)}`,
    })
    return { name, entries, diagnostics }
  }

  const files = items
    .filter((item) => item.isFile)
    .map((item) => item.name)
    .sort()

  for (const fileName of files) {
    const filePath = path.join(dir, fileName)

    let content: string
    try {
      content = source.readFile(filePath)
    } catch (err) {
      diagnostics.push({
        kind: 'io-failure',
        path: filePath,
        message: `Could not read file ${filePath}: ${describeError(err)}`,
      })
      continue
    }

    for (const record of parseEventRecords(content, filePath)) {
      const result = buildEntry(record)
      if (result.ok) {
        entries.push(result.entry)
      } else {
        diagnostics.push(result.diagnostic)
      }
    }
  }

  return { name, entries, diagnostics }
}

/**
 * Print diagnostics the way the rest of the core reports problems.
 */
export function reportDiagnostics(diagnostics: readonly CalendarDiagnostic[]): void {
  for (const diagnostic of diagnostics) {
    console.warn(`Warning: ${diagnostic.message}`)
  }
}
