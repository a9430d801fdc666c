import * as path from 'node:path'
import { existsSync } from 'node:fs'

const ALMANAC_DIRNAME = '.almanac'

/**
 * Locate the .almanac/ directory holding config.yaml.
 * ALMANAC_DIR wins; otherwise walk up from cwd, then fall back to the
 * project root (where .git lives), then cwd.
 */
export function findAlmanacDir(): string {
  if (process.env.ALMANAC_DIR) return path.resolve(process.env.ALMANAC_DIR)

  let dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    const candidate = path.join(dir, ALMANAC_DIRNAME)
    if (existsSync(candidate)) return candidate
    dir = path.dirname(dir)
  }
  // No .almanac/ found, default to project root
  dir = process.cwd()
  while (dir !== path.dirname(dir)) {
    if (existsSync(path.join(dir, '.git'))) {
      return path.join(dir, ALMANAC_DIRNAME)
    }
    dir = path.dirname(dir)
  }
  return path.resolve(ALMANAC_DIRNAME)
}
