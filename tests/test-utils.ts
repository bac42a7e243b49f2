import fs from 'fs'
import path from 'path'

/**
 * Fixture directories under `testsDir` that contain `marker`, sorted by name
 */
export function discoverTests(testsDir: string, marker = 'query.sql'): string[] {
  return fs
    .readdirSync(testsDir)
    .filter((name) => {
      const fullPath = path.join(testsDir, name)
      return fs.statSync(fullPath).isDirectory() && fs.existsSync(path.join(fullPath, marker))
    })
    .sort()
}
