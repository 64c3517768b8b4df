import fs from 'fs'
import path from 'path'
import type { PipelineContext } from './types.js'

export interface CleanOptions {
  all?: boolean
}

/**
 * Removes the download caches so the next run fetches the reference sequences
 * and taxonomy ids again. `all` also empties the database and results folders.
 */
export function cleanWorkspace(ctx: Pick<PipelineContext, 'paths'>, options: CleanOptions = {}): string[] {
  const { referenceFasta, taxidMap, customDbDir, htmlReport } = ctx.paths
  const removed: string[] = []

  for (const file of [referenceFasta, taxidMap]) {
    if (fs.existsSync(file)) {
      fs.rmSync(file)
      removed.push(file)
    }
  }

  if (options.all) {
    for (const dir of [customDbDir, path.dirname(htmlReport)]) {
      if (!fs.existsSync(dir)) continue
      for (const entry of fs.readdirSync(dir)) {
        const target = path.join(dir, entry)
        fs.rmSync(target, { recursive: true, force: true })
        removed.push(target)
      }
    }
  }

  return removed
}
