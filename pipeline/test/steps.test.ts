import fs from 'fs'
import path from 'path'
import { afterEach, describe, expect, it, vi } from 'vitest'
import { ExternalCommandError, InputMissingError, ToolMissingError } from '@blastflow/shared'
import { REQUIRED_TOOLS, setup } from '../src/steps/environment.js'
import { stageQuery } from '../src/steps/query.js'
import { countFastaRecords, fetchReferences } from '../src/steps/references.js'
import { generateTaxidMap, taxidMapStep } from '../src/steps/taxid-map.js'
import { buildDatabase } from '../src/steps/database.js'
import { verifyDatabase } from '../src/steps/verify.js'
import { runSearch } from '../src/steps/search.js'
import { argAfter } from './support/fake-runner.js'
import { INPUTS, QUERY_FASTA, STRAINS_QUERY, createWorkspace, type TestWorkspace } from './support/workspace.js'

let ws: TestWorkspace | undefined

const open = (...args: Parameters<typeof createWorkspace>): TestWorkspace => {
  ws = createWorkspace(...args)
  return ws
}

afterEach(() => {
  vi.restoreAllMocks()
  ws?.cleanup()
  ws = undefined
})

describe('setup', () => {
  it('creates the working directory tree without invoking any tool', async () => {
    const { ctx, runner, workdir, log } = open()
    const result = await setup(ctx)

    expect(result).toEqual({ status: 'ok', detail: '6 tools on PATH' })
    expect(log.lines[0]).toBe(`Working directory: ${workdir}`)
    for (const dir of ['blastdb', 'queries', 'fasta', 'results', 'blastdb_custom']) {
      expect(fs.statSync(path.join(workdir, dir)).isDirectory()).toBe(true)
    }
    expect(runner.calls).toEqual([])
  })

  it('names the first missing tool with the install hint', async () => {
    const { ctx } = open({ onPath: ['conda', 'esearch', 'elink', 'efetch', 'blastdbcmd', 'blastn'] })
    const error = await setup(ctx).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ToolMissingError)
    expect(error).toMatchObject({
      tool: 'makeblastdb',
      message: 'makeblastdb not found in /opt/fake/bin',
      code: 'TOOL_MISSING',
    })
    expect(error instanceof ToolMissingError && error.hint).toBe(
      "Try this command: conda install -c bioconda entrez-direct blast\nIf it's already installed, maybe you didn't activate the conda environment?"
    )
  })

  it('only warns when conda is missing', async () => {
    const { ctx, log } = open({ onPath: [...REQUIRED_TOOLS] })
    await expect(setup(ctx)).resolves.toMatchObject({ status: 'ok' })
    expect(log.errors).toEqual([
      "⚠️  It seems Anaconda isn't installed. Follow instructions on https://docs.conda.io/en/latest/miniconda.html to install it to your system.",
    ])
  })
})

describe('stageQuery', () => {
  it('copies the query into queries/', async () => {
    const { ctx, workdir, log } = open({ files: INPUTS })
    const result = await stageQuery(ctx)

    expect(result).toEqual({ status: 'ok', detail: path.join('queries', 'query.fsa') })
    expect(fs.readFileSync(path.join(workdir, 'queries', 'query.fsa'), 'utf8')).toBe(QUERY_FASTA)
    expect(log.lines).toEqual(['  Copying query sequence query.fsa'])
  })

  it('fails when the query file is absent', async () => {
    const { ctx, workdir, runner } = open({ files: { 'strains.csv': INPUTS['strains.csv'] } })
    const error = await stageQuery(ctx).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(InputMissingError)
    expect(error).toMatchObject({
      message: `Query sequence query.fsa not found in ${workdir}`,
      file: path.join(workdir, 'query.fsa'),
    })
    expect(runner.calls).toEqual([])
  })
})

describe('fetchReferences', () => {
  it('downloads the sequences with esearch | elink | efetch', async () => {
    const { ctx, runner, workdir } = open({ files: INPUTS })
    const result = await fetchReferences(ctx)

    expect(runner.calls).toEqual([
      [
        { command: 'esearch', args: ['-db', 'assembly', '-query', STRAINS_QUERY] },
        { command: 'elink', args: ['-target', 'nucleotide', '-name', 'assembly_nuccore_insdc'] },
        { command: 'efetch', args: ['-format', 'fasta'] },
      ],
    ])
    expect(fs.readFileSync(path.join(workdir, 'fasta', 'test_db.fsa'), 'utf8')).toBe(
      '>GCA_000007825.1 chromosome\nACGTACGTAC\n' +
        '>GCA_000008005.1 chromosome\nACGTACGTAC\n' +
        '>GCA_000009925.1 chromosome\nACGTACGTAC\n'
    )
    expect(result).toEqual({ status: 'ok', detail: '3 sequences', carry: { accessionQuery: STRAINS_QUERY } })
  })

  it('counts the downloaded records without reading the file into memory', async () => {
    const { ctx, workdir } = open({ files: INPUTS })
    const readFileSync = vi.spyOn(fs, 'readFileSync')
    const result = await fetchReferences(ctx)

    expect(result.detail).toBe('3 sequences')
    expect(readFileSync.mock.calls.map(call => call[0])).not.toContain(path.join(workdir, 'fasta', 'test_db.fsa'))
  })

  it('skips the download when the FASTA file exists', async () => {
    const cached = '>partial\nACGT\n'
    const { ctx, runner, workdir } = open({ files: { ...INPUTS, 'fasta/test_db.fsa': cached } })
    const result = await fetchReferences(ctx)

    expect(result).toEqual({ status: 'skipped', detail: 'cached', carry: { accessionQuery: STRAINS_QUERY } })
    expect(runner.calls).toEqual([])
    expect(fs.readFileSync(path.join(workdir, 'fasta', 'test_db.fsa'), 'utf8')).toBe(cached)
  })

  it('fails when the accession CSV is absent', async () => {
    const { ctx, workdir } = open({ files: { 'query.fsa': QUERY_FASTA } })
    await expect(fetchReferences(ctx)).rejects.toThrow(
      `csv file for accession numbers (strains.csv) not found in ${workdir}`
    )
  })

  it('fails when the CSV column holds no accessions', async () => {
    const { ctx, runner } = open({ files: { 'strains.csv': 'strain,source,assembly\n' } })
    await expect(fetchReferences(ctx)).rejects.toBeInstanceOf(InputMissingError)
    expect(runner.calls).toEqual([])
  })

  it('reads the configured column', async () => {
    const { ctx, runner } = open({
      files: { 'strains.csv': 'assembly,strain\nGCA_1,a\nGCA_2,b\n' },
      settings: { accessionColumn: 1 },
    })
    await fetchReferences(ctx)
    expect(runner.calls[0]?.[0]?.args).toEqual(['-db', 'assembly', '-query', 'GCA_1 OR GCA_2'])
  })

  it('propagates a failing stage', async () => {
    const { ctx } = open({ files: INPUTS, tools: { elink: () => ({ code: 1, stderr: 'ERROR: network' }) } })
    await expect(fetchReferences(ctx)).rejects.toBeInstanceOf(ExternalCommandError)
  })
})

describe('generateTaxidMap', () => {
  it('appends one line per accession, in query order', async () => {
    const { ctx, runner, workdir } = open({ files: INPUTS })
    const result = await generateTaxidMap(ctx, STRAINS_QUERY)

    expect(result).toEqual({ status: 'ok', detail: '3 accessions mapped' })
    expect(fs.readFileSync(path.join(workdir, 'taxid_map.txt'), 'utf8')).toBe(
      'GCA_000007825 226900\nGCA_000008005 222523\nGCA_000009925 1396\n'
    )
    expect(runner.calls).toHaveLength(3)
    expect(runner.calls[1]).toEqual([
      { command: 'esearch', args: ['-db', 'assembly', '-query', 'GCA_000008005'] },
      { command: 'elink', args: ['-target', 'taxonomy'] },
      { command: 'efetch', args: ['-format', 'uid'] },
    ])
  })

  it('writes duplicate lines for repeated accessions', async () => {
    const { ctx, workdir } = open()
    await generateTaxidMap(ctx, 'GCA_000009925 OR GCA_000009925')
    expect(fs.readFileSync(path.join(workdir, 'taxid_map.txt'), 'utf8')).toBe(
      'GCA_000009925 1396\nGCA_000009925 1396\n'
    )
  })

  it('performs no lookups when the map exists', async () => {
    const { ctx, runner, log } = open({ files: { 'taxid_map.txt': 'A1 1\n' } })
    const result = await generateTaxidMap(ctx, STRAINS_QUERY)

    expect(result).toEqual({ status: 'skipped', detail: 'cached' })
    expect(runner.calls).toEqual([])
    expect(log.lines).toEqual(['taxid_map file found'])
  })

  it('stops at a failed lookup and keeps the earlier lines', async () => {
    const { ctx, workdir } = open({
      tools: {
        esearch: spec => {
          const query = argAfter(spec, '-query')
          return query === 'GCA_000008005' ? { code: 1, stderr: 'timeout' } : query
        },
      },
    })
    await expect(generateTaxidMap(ctx, STRAINS_QUERY)).rejects.toBeInstanceOf(ExternalCommandError)
    expect(fs.readFileSync(path.join(workdir, 'taxid_map.txt'), 'utf8')).toBe('GCA_000007825 226900\n')
  })

  it('composes the query from the CSV when no earlier step passed it', async () => {
    const { ctx, runner } = open({ files: INPUTS })
    await taxidMapStep(ctx)
    expect(runner.calls.map(c => c[0]?.args[3])).toEqual(['GCA_000007825', 'GCA_000008005', 'GCA_000009925'])
  })
})

describe('buildDatabase', () => {
  it('runs makeblastdb in blastdb_custom', async () => {
    const { ctx, runner, workdir } = open({
      files: { 'fasta/test_db.fsa': '>s\nACGT\n', 'taxid_map.txt': 'GCA_1 1396\n' },
    })
    const result = await buildDatabase(ctx)

    expect(runner.calls).toEqual([
      [
        {
          command: 'makeblastdb',
          args: [
            '-in', path.join(workdir, 'fasta', 'test_db.fsa'),
            '-dbtype', 'nucl',
            '-parse_seqids',
            '-out', 'test_db',
            '-title', 'test_db',
            '-taxid_map', path.join(workdir, 'taxid_map.txt'),
            '-blastdb_version', '5',
          ],
          cwd: path.join(workdir, 'blastdb_custom'),
        },
      ],
    ])
    expect(fs.readdirSync(path.join(workdir, 'blastdb_custom')).sort()).toEqual([
      'test_db.nhr',
      'test_db.nin',
      'test_db.nsq',
    ])
    expect(result).toEqual({ status: 'ok', detail: 'Adding sequences from FASTA; added 3 sequences in 0.01 seconds.' })
  })

  it('fails before running makeblastdb when the references are missing', async () => {
    const { ctx, runner } = open({ files: { 'taxid_map.txt': 'GCA_1 1396\n' } })
    await expect(buildDatabase(ctx)).rejects.toBeInstanceOf(InputMissingError)
    expect(runner.calls).toEqual([])
  })
})

describe('verifyDatabase', () => {
  it('does nothing when verification is disabled', async () => {
    const { ctx, runner, log } = open({ settings: { verifyDb: false } })
    const result = await verifyDatabase(ctx)

    expect(result).toEqual({ status: 'skipped', detail: 'verification disabled' })
    expect(runner.calls).toEqual([])
    expect(runner.inherited).toEqual([])
    expect(log.lines).toEqual([])
  })

  it('dumps accession and length of every record to the terminal', async () => {
    const { ctx, runner, log, workdir } = open({ files: { 'blastdb_custom/test_db.nsq': 'x' } })
    await verifyDatabase(ctx)

    expect(log.lines).toEqual(['\n\n Accession     Sequence length'])
    expect(runner.calls).toEqual([
      [
        {
          command: 'blastdbcmd',
          args: ['-entry', 'all', '-db', 'test_db', '-outfmt', '%a %l'],
          cwd: path.join(workdir, 'blastdb_custom'),
        },
      ],
    ])
    expect(runner.inherited).toEqual(['GCA_000007825.1 10\nGCA_000008005.1 10\n'])
  })

  it('fails when no database has been built', async () => {
    const { ctx, runner } = open()
    await expect(verifyDatabase(ctx)).rejects.toBeInstanceOf(InputMissingError)
    expect(runner.calls).toEqual([])
  })
})

describe('runSearch', () => {
  it('writes an HTML and a text report', async () => {
    const { ctx, runner, log, workdir } = open({ files: { 'queries/query.fsa': QUERY_FASTA } })
    await runSearch(ctx)

    const query = path.join(workdir, 'queries', 'query.fsa')
    const db = path.join(workdir, 'blastdb_custom', 'test_db')
    const html = path.join(workdir, 'results', 'query.fsa.html')
    const text = path.join(workdir, 'results', 'query.fsa.out')
    expect(runner.calls).toEqual([
      [{ command: 'blastn', args: ['-query', query, '-db', db, '-html', '-out', html] }],
      [{ command: 'blastn', args: ['-query', query, '-db', db, '-out', text] }],
    ])
    expect(fs.readFileSync(html, 'utf8')).toBe('<HTML><PRE>BLASTN 2.15.0+</PRE></HTML>\n')
    expect(fs.readFileSync(text, 'utf8')).toBe('BLASTN 2.15.0+\n')
    expect(log.lines).toEqual([`Saved results to ${html}`])
  })

  it('prints no confirmation when a search fails', async () => {
    const { ctx, runner, log } = open({
      files: { 'queries/query.fsa': QUERY_FASTA },
      tools: { blastn: () => ({ code: 2, stderr: 'BLAST Database error' }) },
    })
    await expect(runSearch(ctx)).rejects.toBeInstanceOf(ExternalCommandError)
    expect(runner.calls).toHaveLength(1)
    expect(log.lines).toEqual([])
  })
})

describe('countFastaRecords', () => {
  it('counts header lines only', async () => {
    const { workdir } = open()
    const file = path.join(workdir, 'refs.fsa')
    fs.writeFileSync(file, '>NZ_CP1.1 chromosome\r\nACGT\r\n>NZ_CP2.1 plasmid\nAC>GT\n\n>NZ_CP3.1\nA')
    expect(await countFastaRecords(file)).toBe(3)
  })

  it('returns 0 for an empty download', async () => {
    const { workdir } = open()
    const file = path.join(workdir, 'empty.fsa')
    fs.writeFileSync(file, '')
    expect(await countFastaRecords(file)).toBe(0)
  })
})
