import { Command, CommanderError } from 'commander'
import chalk from 'chalk'
import { loadSettings, type SettingsOverrides } from '@blastflow/config'
import { isPipelineError } from '@blastflow/shared'
import { createContext } from './context.js'
import { SpawnCommandRunner, type CommandRunner } from './exec.js'
import { PipelineRunner } from './runner.js'
import { pipelineSteps, STEP_IDS } from './config.js'
import { checkTools, prepareWorkspace } from './steps/environment.js'
import { verifyDatabase } from './steps/verify.js'
import { cleanWorkspace } from './clean.js'
import { DEFAULT_CDS_OPTIONS, extractCds } from './cds.js'
import type { Logger, PipelineContext } from './types.js'

export interface CliDeps {
  env?: Record<string, string | undefined>
  runner?: CommandRunner
  log?: Logger
}

interface SettingsFlags {
  workdir?: string
  query?: string
  accessions?: string
  column?: number
  dbName?: string
  verify?: boolean
}

interface RunFlags extends SettingsFlags {
  step?: string[]
  skip?: string[]
  quiet?: boolean
}

interface CleanFlags extends SettingsFlags {
  all?: boolean
}

interface CdsFlags extends SettingsFlags {
  accession: string
  record: string
  locusTags: string[]
  flank: number
  output?: string
}

const list = (value: string): string[] => value.split(',').map(v => v.trim()).filter(Boolean)
const integer = (value: string): number => Number.parseInt(value, 10)

function withSettingsOptions(command: Command): Command {
  return command
    .option('-w, --workdir <dir>', 'Working directory (env BLAST_WORKDIR)')
    .option('-q, --query <file>', 'Query FASTA file in the working directory (env BLAST_QUERY_SEQ)')
    .option('-a, --accessions <file>', 'CSV of assembly accessions in the working directory (env BLAST_ACCESSIONS)')
    .option('-c, --column <n>', 'CSV column holding the accessions, 1-based (env BLAST_ACCESSION_COLUMN)', integer)
    .option('-d, --db-name <name>', 'BLAST database name (env BLAST_DB_NAME)')
    .option('--verify', 'Dump the database records after building it (env BLAST_VERIFY_DB)')
    .option('--no-verify', 'Skip the database dump')
}

const toOverrides = (flags: SettingsFlags): SettingsOverrides => ({
  workdir: flags.workdir,
  querySeq: flags.query,
  accessions: flags.accessions,
  accessionColumn: flags.column,
  dbName: flags.dbName,
  verifyDb: flags.verify,
})

export function createProgram(deps: CliDeps = {}): { program: Command; exitCode: () => number } {
  const env = deps.env ?? process.env
  const log = deps.log ?? console
  let exitCode = 0

  const context = (flags: SettingsFlags, extra: SettingsOverrides = {}): PipelineContext => {
    const settings = loadSettings(env, { ...toOverrides(flags), ...extra })
    return createContext(settings, deps.runner ?? new SpawnCommandRunner(env), log)
  }

  // Every command reports failures the same way and exits with 1
  const guard = <T>(action: (flags: T) => Promise<void>) => async (flags: T) => {
    try {
      await action(flags)
    } catch (error) {
      exitCode = 1
      if (isPipelineError(error)) {
        log.error(chalk.red(`Error: ${error.message}`))
        if (error.hint) log.error(error.hint)
      } else if (error instanceof RangeError) {
        log.error(chalk.red(`Error: ${error.message}`))
      } else {
        log.error(chalk.red('❌ Unexpected error:'), error)
      }
    }
  }

  const program = new Command()

  program
    .name('blastflow')
    .description('Retrieve sequences with Entrez Direct, build a local BLAST database and search it')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: str => log.log(str.trimEnd()),
      writeErr: str => log.error(str.trimEnd()),
    })

  withSettingsOptions(
    program
      .command('run')
      .description('Run the full pipeline')
      .option('-s, --step <steps>', `Run only specific step(s): ${STEP_IDS.join(', ')}`, list)
      .option('--skip <steps>', 'Skip specific step(s)', list)
      .option('--quiet', 'Disable the progress spinners')
  ).action(guard<RunFlags>(async flags => {
    const ctx = context(flags)
    const runner = new PipelineRunner(ctx, pipelineSteps, { quiet: flags.quiet })
    const report = await runner.run({ only: flags.step, skip: flags.skip })
    if (!report.success) {
      log.error(chalk.red('\n❌ Pipeline failed'))
      exitCode = 1
    }
  }))

  withSettingsOptions(
    program
      .command('check')
      .description('Create the working directories and check the required executables')
  ).action(guard<SettingsFlags>(async flags => {
    const ctx = context(flags)
    prepareWorkspace(ctx)
    for (const tool of await checkTools(ctx)) {
      log.log(chalk.green(`✅ ${tool}`))
    }
  }))

  withSettingsOptions(
    program
      .command('verify')
      .description('List accession and length of every record in the local database')
  ).action(guard<SettingsFlags>(async flags => {
    await verifyDatabase(context(flags, { verifyDb: true }))
  }))

  withSettingsOptions(
    program
      .command('clean')
      .description('Delete the downloaded sequences and taxid map so the next run fetches them again')
      .option('--all', 'Also empty the database and results directories')
  ).action(guard<CleanFlags>(async flags => {
    const removed = cleanWorkspace(context(flags), { all: flags.all })
    log.log(chalk.yellow(`🧹 Removed ${removed.length} file(s)`))
    for (const file of removed) log.log(`   • ${file}`)
  }))

  withSettingsOptions(
    program
      .command('extract-cds')
      .description('Write the proteins coded around an operon of a GenBank record as FASTA')
      .option('--accession <id>', 'Nucleotide accession to fetch', DEFAULT_CDS_OPTIONS.accession)
      .option('--record <name>', 'LOCUS name of the record to use', DEFAULT_CDS_OPTIONS.recordName)
      .option('--locus-tags <tags>', 'Comma separated locus tags of the operon genes', list, DEFAULT_CDS_OPTIONS.locusTags)
      .option('--flank <bp>', 'Flanking region on each side of the operon', integer, DEFAULT_CDS_OPTIONS.flank)
      .option('-o, --output <file>', 'Output FASTA (default <workdir>/<accession>.faa)')
  ).action(guard<CdsFlags>(async flags => {
    if (!Number.isInteger(flags.flank) || flags.flank < 0) {
      throw new RangeError(`--flank must be a non-negative integer, got ${flags.flank}`)
    }
    await extractCds(context(flags), {
      accession: flags.accession,
      recordName: flags.record,
      locusTags: flags.locusTags,
      flank: flags.flank,
      output: flags.output,
    })
  }))

  return { program, exitCode: () => exitCode }
}

/** Parses `argv` (node-style, program path first) and resolves to the exit status. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const { program, exitCode } = createProgram(deps)
  try {
    await program.parseAsync([...argv])
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode
    throw error
  }
  return exitCode()
}

export { createContext } from './context.js'
export { SpawnCommandRunner, resolveExecutable, formatCommand } from './exec.js'
export type { CommandRunner, CommandSpec, CommandResult, RunOptions, StdoutTarget } from './exec.js'
export { PipelineRunner, selectSteps } from './runner.js'
export { pipelineSteps, STEP_IDS } from './config.js'
export type { PipelineContext, PipelineReport, PipelineStep, StepReport, StepResult, Logger } from './types.js'
