import { findAlmanacDir } from './config.js'
import {
  buildDayView,
  loadAlmanacConfig,
  loadCalendar,
  renderAgenda,
  reportDiagnostics,
  resolveWindow,
} from './calendar/index.js'

const USAGE = 'Usage: almanac <dir> [<start_date>] [<end_date>]'

function main(): void {
  const [dirArg, startArg, endArg] = process.argv.slice(2)
  const config = loadAlmanacConfig(findAlmanacDir())

  const dir = dirArg || config.calendar.directory
  if (!dir) {
    console.log(USAGE)
    process.exitCode = 1
    return
  }

  const window = resolveWindow(config, startArg, endArg)
  const calendar = loadCalendar(dir)
  reportDiagnostics(calendar.diagnostics)

  const view = buildDayView(calendar.entries, window.start, window.end, {
    maxTotalOccurrences: config.calendar.maxTotalOccurrences,
  })
  if (view.truncated) {
    console.warn('Warning: expansion budget reached, later events omitted.')
  }

  const agenda = renderAgenda(view)
  console.log(`${calendar.name} Calendar`)
  console.log()
  for (const line of agenda.lines) {
    console.log(line)
  }
}

try {
  main()
} catch (err) {
  console.error('Error:', err instanceof Error ? err.message : String(err))
  process.exit(1)
}
