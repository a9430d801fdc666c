/**
 * RRULE subset: FREQ, INTERVAL, UNTIL, COUNT. Everything else is ignored.
 */

import { parseOptionalTemporalValue } from './temporal.js'
import type { Frequency, RecurrenceRule } from './types.js'

const FREQUENCIES: readonly Frequency[] = ['DAILY', 'WEEKLY', 'MONTHLY', 'YEARLY']

function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some((freq) => freq === value)
}

function parseNonNegativeInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined
  return Number(value)
}

function parsePositiveInt(value: string | undefined): number | undefined {
  const n = parseNonNegativeInt(value)
  return n !== undefined && n > 0 ? n : undefined
}

export function parseRecurrenceRule(raw: string): RecurrenceRule {
  const tokens = new Map<string, string>()
  for (const chunk of raw.split(';')) {
    const idx = chunk.indexOf('=')
    if (idx <= 0) continue
    tokens.set(chunk.slice(0, idx).trim().toUpperCase(), chunk.slice(idx + 1).trim())
  }

  const freq = (tokens.get('FREQ') ?? '').toUpperCase()

  return {
    freq: isFrequency(freq) ? freq : null,
    interval: parsePositiveInt(tokens.get('INTERVAL')) ?? 1,
    until: parseOptionalTemporalValue(tokens.get('UNTIL')),
    // COUNT=0 is a rule with no occurrences
    count: parseNonNegativeInt(tokens.get('COUNT')),
  }
}
