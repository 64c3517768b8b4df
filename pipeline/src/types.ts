import type { Settings, WorkspacePaths } from '@blastflow/config'
import type { CommandRunner } from './exec.js'

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>

export interface PipelineContext {
  readonly settings: Settings
  readonly paths: WorkspacePaths
  readonly runner: CommandRunner
  readonly log: Logger
}

/** Values handed from one step to the ones after it. */
export interface StepCarry {
  accessionQuery?: string
}

export type StepStatus = 'ok' | 'skipped' | 'failed'

export interface StepResult {
  status: Exclude<StepStatus, 'failed'>
  detail?: string
  carry?: StepCarry
}

export type StepId = 'setup' | 'query' | 'references' | 'taxid-map' | 'makeblastdb' | 'verify' | 'blastn'

export interface PipelineStep {
  id: StepId
  name: string
  description: string
  dependencies?: StepId[]
  // steps that stream tool output to the terminal run without a spinner
  streamsOutput?: boolean
  run: (ctx: PipelineContext, carry: Readonly<StepCarry>) => Promise<StepResult>
}

export interface StepReport {
  id: StepId
  name: string
  status: StepStatus
  duration: number
  detail?: string
  error?: Error
}

export interface PipelineReport {
  success: boolean
  duration: number
  steps: StepReport[]
}
