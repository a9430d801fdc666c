// Public API for consumption by other packages (dashboard)

export { findAlmanacDir } from './config.js'

export * from './calendar/index.js'
