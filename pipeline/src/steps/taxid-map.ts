import fs from 'fs'
import { formatTaxidLine, splitAccessionQuery } from '@blastflow/shared'
import type { CommandSpec } from '../exec.js'
import type { PipelineContext, StepResult } from '../types.js'
import { loadAccessionQuery } from './references.js'

export const taxidChain = (accession: string): CommandSpec[] => [
  { command: 'esearch', args: ['-db', 'assembly', '-query', accession] },
  { command: 'elink', args: ['-target', 'taxonomy'] },
  { command: 'efetch', args: ['-format', 'uid'] },
]

/**
 * Appends one `<accession> <taxid>` line per query term. Terms are looked up
 * one at a time, in query order; a failed lookup stops the loop and keeps the
 * lines written so far.
 */
export async function generateTaxidMap(ctx: PipelineContext, query: string): Promise<StepResult> {
  const { taxidMap } = ctx.paths

  if (fs.existsSync(taxidMap)) {
    ctx.log.log('taxid_map file found')
    return { status: 'skipped', detail: 'cached' }
  }

  ctx.log.log('Preparing taxid_map file')
  fs.writeFileSync(taxidMap, '')

  let count = 0
  for (const accession of splitAccessionQuery(query)) {
    ctx.log.log(accession)
    const { stdout } = await ctx.runner.pipe(taxidChain(accession))
    fs.appendFileSync(taxidMap, formatTaxidLine(accession, stdout))
    count++
  }
  return { status: 'ok', detail: `${count} accessions mapped` }
}

export const taxidMapStep = (ctx: PipelineContext, query?: string): Promise<StepResult> =>
  generateTaxidMap(ctx, query ?? loadAccessionQuery(ctx))
