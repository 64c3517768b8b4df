import fs from 'fs'
import path from 'path'
import {
  InputMissingError,
  formatFasta,
  parseGenBank,
  qualifier,
  type FastaRecord,
  type GenBankFeature,
  type GenBankRecord,
  type Span,
} from '@blastflow/shared'
import type { CommandSpec } from './exec.js'
import type { PipelineContext } from './types.js'

export interface CdsOptions {
  accession: string
  /** LOCUS name of the record to keep, drops plasmids shipped with the genome */
  recordName: string
  locusTags: string[]
  flank: number
  output?: string
}

// B. cereus ATCC 14579 chromosome and the four-gene operon studied in it
export const DEFAULT_CDS_OPTIONS: CdsOptions = {
  accession: 'AE016877.1',
  recordName: 'AE016877',
  locusTags: ['BC_3514', 'BC_3515', 'BC_3516', 'BC_3517'],
  flank: 10_000,
}

export const genbankFetchCommand = (accession: string): CommandSpec => ({
  command: 'efetch',
  args: ['-db', 'nucleotide', '-id', accession, '-format', 'gbwithparts'],
})

const locusTag = (f: GenBankFeature): string | undefined => qualifier(f, 'locus_tag')

/**
 * Region spanning the operon genes widened by `flank` on each side,
 * 0-based and half-open.
 */
export function flankingRegion(operon: readonly GenBankFeature[], flank: number): Span {
  return {
    start: Math.min(...operon.map(f => f.location.start)) - flank,
    end: Math.max(...operon.map(f => f.location.end - 1)) + flank,
  }
}

// CDS features whose start or end falls inside the flanked operon region
export function selectFlankingCds(record: GenBankRecord, locusTags: readonly string[], flank: number): GenBankFeature[] {
  const cds = record.features.filter(f => f.type === 'CDS' && locusTag(f) !== undefined)
  const operon = cds.filter(f => locusTags.includes(locusTag(f) ?? ''))
  if (operon.length === 0) {
    throw new InputMissingError(`None of ${locusTags.join(', ')} found in record ${record.name}`, record.name)
  }

  const region = flankingRegion(operon, flank)
  const inRegion = (pos: number) => pos >= region.start && pos < region.end
  return cds.filter(f => inRegion(f.location.start) || inRegion(f.location.end))
}

// Pseudogenes carry no translation and are left out.
export function cdsToFasta(features: readonly GenBankFeature[]): FastaRecord[] {
  const out: FastaRecord[] = []
  for (const f of features) {
    const sequence = qualifier(f, 'translation')
    const id = locusTag(f)
    if (!sequence || !id) continue
    out.push({ id, description: qualifier(f, 'product'), sequence })
  }
  return out
}

export interface CdsResult {
  output: string
  proteins: number
}

export async function extractCds(
  ctx: Pick<PipelineContext, 'paths' | 'runner' | 'log'>,
  options: CdsOptions = DEFAULT_CDS_OPTIONS
): Promise<CdsResult> {
  const { workdir } = ctx.paths
  const gbFile = path.join(workdir, `${options.accession}.gb`)

  if (fs.existsSync(gbFile)) {
    ctx.log.log(`GenBank record found in ${gbFile}`)
  } else {
    ctx.log.log(`Downloading ${options.accession} from GenBank`)
    fs.mkdirSync(workdir, { recursive: true })
    await ctx.runner.run(genbankFetchCommand(options.accession), { stdout: { file: gbFile } })
  }

  const record = parseGenBank(fs.readFileSync(gbFile, 'utf8')).find(r => r.name === options.recordName)
  if (!record) {
    throw new InputMissingError(`Record ${options.recordName} not found in ${gbFile}`, gbFile)
  }

  const proteins = cdsToFasta(selectFlankingCds(record, options.locusTags, options.flank))
  const output = options.output ?? path.join(workdir, `${options.accession}.faa`)
  fs.mkdirSync(path.dirname(output), { recursive: true })
  fs.writeFileSync(output, formatFasta(proteins))
  ctx.log.log(`Saved ${proteins.length} protein sequences to ${output}`)

  return { output, proteins: proteins.length }
}
