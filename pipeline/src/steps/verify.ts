import fs from 'fs'
import { InputMissingError } from '@blastflow/shared'
import type { CommandSpec } from '../exec.js'
import type { PipelineContext, StepResult } from '../types.js'

export const blastdbcmdCommand = (dbName: string, cwd: string): CommandSpec => ({
  command: 'blastdbcmd',
  args: ['-entry', 'all', '-db', dbName, '-outfmt', '%a %l'],
  cwd,
})

// Prints accession and length of every record. Output can be very long.
export async function verifyDatabase(ctx: PipelineContext): Promise<StepResult> {
  if (!ctx.settings.verifyDb) {
    return { status: 'skipped', detail: 'verification disabled' }
  }

  const { customDbDir } = ctx.paths
  if (!fs.existsSync(customDbDir)) {
    throw new InputMissingError(`BLAST database directory ${customDbDir} not found, run makeblastdb first`, customDbDir)
  }

  ctx.log.log('\n\n Accession     Sequence length')
  await ctx.runner.run(blastdbcmdCommand(ctx.settings.dbName, customDbDir), { stdout: 'inherit' })
  return { status: 'ok' }
}
