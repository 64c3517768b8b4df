import fs from 'fs'
import path from 'path'
import chalk from 'chalk'
import { InputMissingError } from '@blastflow/shared'
import type { WorkspacePaths } from '@blastflow/config'
import type { CommandSpec } from '../exec.js'
import type { PipelineContext, StepResult } from '../types.js'

export const blastnCommands = (paths: WorkspacePaths): [html: CommandSpec, text: CommandSpec] => {
  const base = ['-query', paths.stagedQuery, '-db', paths.database]
  return [
    { command: 'blastn', args: [...base, '-html', '-out', paths.htmlReport] },
    { command: 'blastn', args: [...base, '-out', paths.textReport] },
  ]
}

export async function runSearch(ctx: PipelineContext): Promise<StepResult> {
  const { stagedQuery, htmlReport } = ctx.paths
  if (!fs.existsSync(stagedQuery)) {
    throw new InputMissingError(`Staged query ${stagedQuery} not found`, stagedQuery)
  }

  fs.mkdirSync(path.dirname(htmlReport), { recursive: true })
  for (const command of blastnCommands(ctx.paths)) {
    await ctx.runner.run(command)
  }

  ctx.log.log(chalk.green(`Saved results to ${htmlReport}`))
  return { status: 'ok', detail: path.basename(htmlReport) }
}
