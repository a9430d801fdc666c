/**
 * VEVENT record splitter.
 *
 * Turns calendar text into key/value records. Field semantics are left to
 * the entry builder.
 */

import type { EventRecord } from './types.js'

const BEGIN_MARKER = 'BEGIN:VEVENT'
const END_MARKER = 'END:VEVENT'

// KEY[;params]:VALUE; the key stops at the first ';' or ':'
const CONTENT_LINE = /^([^;:]+)[^:]*:(.*)$/

/**
 * Split `text` into event records.
 * Lines outside BEGIN/END are ignored, malformed lines inside a record are skipped.
 */
export function parseEventRecords(text: string, sourcePath: string): EventRecord[] {
  const records: EventRecord[] = []
  let fields: Map<string, string> | null = null

  for (const line of text.split(/[\r\n]+/)) {
    if (!line) continue

    if (line.startsWith(BEGIN_MARKER)) {
      fields = new Map()
      continue
    }

    if (line.startsWith(END_MARKER)) {
      if (fields) {
        records.push({ fields, sourcePath })
      }
      fields = null
      continue
    }

    if (!fields) continue

    const match = line.match(CONTENT_LINE)
    if (match) {
      fields.set(match[1], match[2])
    }
  }

  return records
}
