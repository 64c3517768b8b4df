import fs from 'fs'
import { InputMissingError } from '@blastflow/shared'
import type { WorkspacePaths } from '@blastflow/config'
import type { CommandSpec } from '../exec.js'
import type { PipelineContext, StepResult } from '../types.js'

export const BLAST_DB_VERSION = 5

export const makeblastdbCommand = (paths: WorkspacePaths, dbName: string): CommandSpec => ({
  command: 'makeblastdb',
  args: [
    '-in', paths.referenceFasta,
    '-dbtype', 'nucl',
    '-parse_seqids',
    '-out', dbName,
    '-title', dbName,
    '-taxid_map', paths.taxidMap,
    '-blastdb_version', String(BLAST_DB_VERSION),
  ],
  cwd: paths.customDbDir,
})

export async function buildDatabase(ctx: PipelineContext): Promise<StepResult> {
  const { referenceFasta, taxidMap, customDbDir } = ctx.paths
  for (const input of [referenceFasta, taxidMap]) {
    if (!fs.existsSync(input)) {
      throw new InputMissingError(`makeblastdb input ${input} not found`, input)
    }
  }

  fs.mkdirSync(customDbDir, { recursive: true })
  const { stdout } = await ctx.runner.run(makeblastdbCommand(ctx.paths, ctx.settings.dbName))
  const summary = stdout.trim().split('\n').filter(Boolean).pop()
  return { status: 'ok', detail: summary ?? ctx.settings.dbName }
}
