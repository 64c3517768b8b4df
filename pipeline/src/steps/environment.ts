import fs from 'fs'
import chalk from 'chalk'
import { ToolMissingError } from '@blastflow/shared'
import type { PipelineContext, StepResult } from '../types.js'

export const REQUIRED_TOOLS = ['esearch', 'elink', 'efetch', 'makeblastdb', 'blastdbcmd', 'blastn'] as const

const CONDA_DOCS = 'https://docs.conda.io/en/latest/miniconda.html'

export function prepareWorkspace(ctx: PipelineContext): void {
  ctx.log.log(`Working directory: ${ctx.paths.workdir}`)
  fs.mkdirSync(ctx.paths.workdir, { recursive: true })
  for (const dir of ctx.paths.dirs) fs.mkdirSync(dir, { recursive: true })
}

/**
 * Fails on the first required tool that is not on PATH. A missing conda
 * only produces a warning since it is never invoked.
 */
export async function checkTools(
  ctx: PipelineContext,
  tools: readonly string[] = REQUIRED_TOOLS
): Promise<string[]> {
  if (!(await ctx.runner.resolve('conda'))) {
    ctx.log.warn(chalk.yellow(
      `⚠️  It seems Anaconda isn't installed. Follow instructions on ${CONDA_DOCS} to install it to your system.`
    ))
  }

  const found: string[] = []
  for (const tool of tools) {
    const resolved = await ctx.runner.resolve(tool)
    if (!resolved) throw new ToolMissingError(tool, ctx.runner.searchPath)
    found.push(resolved)
  }
  return found
}

export async function setup(ctx: PipelineContext): Promise<StepResult> {
  prepareWorkspace(ctx)
  const found = await checkTools(ctx)
  return { status: 'ok', detail: `${found.length} tools on PATH` }
}
