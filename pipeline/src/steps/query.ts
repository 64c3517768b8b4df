import fs from 'fs'
import path from 'path'
import { InputMissingError } from '@blastflow/shared'
import type { PipelineContext, StepResult } from '../types.js'

export async function stageQuery(ctx: PipelineContext): Promise<StepResult> {
  const { querySeq } = ctx.settings
  const { querySource, stagedQuery, workdir } = ctx.paths

  if (!fs.existsSync(querySource)) {
    throw new InputMissingError(`Query sequence ${querySeq} not found in ${workdir}`, querySource)
  }

  ctx.log.log(`  Copying query sequence ${querySeq}`)
  fs.mkdirSync(path.dirname(stagedQuery), { recursive: true })
  fs.copyFileSync(querySource, stagedQuery)
  return { status: 'ok', detail: path.relative(workdir, stagedQuery) }
}
