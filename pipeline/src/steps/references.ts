import fs from 'fs'
import path from 'path'
import readline from 'readline'
import chalk from 'chalk'
import { InputMissingError, composeAccessionQuery, readAccessions } from '@blastflow/shared'
import type { CommandSpec } from '../exec.js'
import type { PipelineContext, StepResult } from '../types.js'

// assembly records link to their INSDC nucleotide sequences through this name
export const ASSEMBLY_NUCCORE_LINK = 'assembly_nuccore_insdc'

export function loadAccessionQuery(ctx: PipelineContext): string {
  const { accessions, accessionColumn } = ctx.settings
  const csv = ctx.paths.accessionCsv

  if (!fs.existsSync(csv)) {
    throw new InputMissingError(
      `csv file for accession numbers (${accessions}) not found in ${ctx.paths.workdir}`,
      csv
    )
  }
  const ids = readAccessions(fs.readFileSync(csv, 'utf8'), accessionColumn)
  if (ids.length === 0) {
    throw new InputMissingError(`No accession numbers in column ${accessionColumn} of ${accessions}`, csv)
  }
  return composeAccessionQuery(ids)
}

export const referenceChain = (query: string): CommandSpec[] => [
  { command: 'esearch', args: ['-db', 'assembly', '-query', query] },
  { command: 'elink', args: ['-target', 'nucleotide', '-name', ASSEMBLY_NUCCORE_LINK] },
  { command: 'efetch', args: ['-format', 'fasta'] },
]

// Counts header lines a line at a time; a downloaded FASTA can outgrow a single string.
export async function countFastaRecords(file: string): Promise<number> {
  const lines = readline.createInterface({ input: fs.createReadStream(file), crlfDelay: Infinity })
  let count = 0
  for await (const line of lines) {
    if (line.startsWith('>')) count++
  }
  return count
}

/**
 * Downloads the reference sequences unless the FASTA file is already there.
 * The file's presence is the only cache key: its content is not checked.
 */
export async function fetchReferences(ctx: PipelineContext): Promise<StepResult> {
  const query = loadAccessionQuery(ctx)
  const { referenceFasta, workdir } = ctx.paths
  const relative = path.relative(workdir, referenceFasta)

  if (fs.existsSync(referenceFasta)) {
    ctx.log.log(`Sequences found in ${referenceFasta}, skipping download.`)
    return { status: 'skipped', detail: 'cached', carry: { accessionQuery: query } }
  }

  ctx.log.log(`  Retrieving database sequences using ${ctx.settings.accessions}`)
  ctx.log.log(`Query: ${query}`)
  ctx.log.log(chalk.gray('    This could take a while...'))

  fs.mkdirSync(path.dirname(referenceFasta), { recursive: true })
  await ctx.runner.pipe(referenceChain(query), { stdout: { file: referenceFasta } })

  const count = await countFastaRecords(referenceFasta)
  ctx.log.log(`\n\nSaved downloaded sequences in ${relative}`)
  return { status: 'ok', detail: `${count} sequences`, carry: { accessionQuery: query } }
}
