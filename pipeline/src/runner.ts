import chalk from 'chalk'
import ora, { type Ora } from 'ora'
import { isPipelineError } from '@blastflow/shared'
import type { Logger, PipelineContext, PipelineReport, PipelineStep, StepCarry, StepResult } from './types.js'
import { pipelineSteps } from './config.js'

export interface RunnerOptions {
  quiet?: boolean
}

export interface RunSelection {
  only?: readonly string[]
  skip?: readonly string[]
}

/**
 * Narrows the step list to `only` (plus everything those steps depend on),
 * then removes `skip`. The result keeps pipeline order.
 */
export function selectSteps(steps: readonly PipelineStep[], only?: readonly string[], skip?: readonly string[]): PipelineStep[] {
  const known = new Set<string>(steps.map(s => s.id))
  const unknown = [...(only ?? []), ...(skip ?? [])].filter(id => !known.has(id))
  if (unknown.length > 0) {
    throw new RangeError(`Unknown step(s): ${unknown.join(', ')}. Known steps: ${[...known].join(', ')}`)
  }

  let selected = new Set<string>(steps.map(s => s.id))
  if (only && only.length > 0) {
    selected = new Set<string>(steps.filter(s => only.includes(s.id)).map(s => s.id))

    // Add dependencies for selected steps
    const pending = [...selected]
    while (pending.length > 0) {
      const id = pending.pop()
      const step = steps.find(s => s.id === id)
      for (const dep of step?.dependencies ?? []) {
        if (!selected.has(dep)) {
          selected.add(dep)
          pending.push(dep)
        }
      }
    }
  }
  if (skip && skip.length > 0) {
    for (const id of skip) selected.delete(id)
  }

  return steps.filter(s => selected.has(s.id))
}

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)

export class PipelineRunner {
  private readonly quiet: boolean

  constructor(
    private readonly ctx: PipelineContext,
    private readonly steps: readonly PipelineStep[] = pipelineSteps,
    options: RunnerOptions = {}
  ) {
    this.quiet = options.quiet ?? false
  }

  async run(selection: RunSelection = {}): Promise<PipelineReport> {
    const startTime = Date.now()
    const report: PipelineReport = { success: false, duration: 0, steps: [] }
    const { log } = this.ctx

    log.log(chalk.cyan('🧬 Local BLAST pipeline'))
    log.log(chalk.cyan('='.repeat(50)))
    log.log(`📂 Working directory: ${this.ctx.paths.workdir}`)
    log.log()

    const steps = selectSteps(this.steps, selection.only, selection.skip)
    let carry: StepCarry = {}

    for (const [index, step] of steps.entries()) {
      const stepStartTime = Date.now()
      const label = `Step ${index + 1}/${steps.length}: ${step.name}`
      const spinner = this.spinner(label, step)

      try {
        const result = await step.run(this.stepContext(spinner), carry)
        carry = { ...carry, ...result.carry }
        report.steps.push({
          id: step.id,
          name: step.name,
          status: result.status,
          duration: Date.now() - stepStartTime,
          detail: result.detail,
        })
        this.settle(spinner, step, result)
      } catch (error) {
        spinner.fail(chalk.red(`❌ ${step.name}`))
        report.steps.push({
          id: step.id,
          name: step.name,
          status: 'failed',
          duration: Date.now() - stepStartTime,
          error: error instanceof Error ? error : new Error(String(error)),
        })
        this.printFailure(error)
        report.duration = Date.now() - startTime
        return report
      }
    }

    report.success = true
    report.duration = Date.now() - startTime

    log.log()
    log.log(chalk.cyan('📊 PIPELINE SUMMARY'))
    log.log(chalk.cyan('='.repeat(50)))
    for (const s of report.steps) {
      const mark = s.status === 'ok' ? chalk.green('✅') : chalk.yellow('⏭️ ')
      log.log(`${mark} ${s.name}${s.detail ? chalk.gray(` (${s.detail})`) : ''}`)
    }
    log.log(`⏱️  Execution time: ${(report.duration / 1000).toFixed(2)}s`)
    log.log(chalk.green('🎉 Pipeline completed successfully!'))

    return report
  }

  private spinner(text: string, step: PipelineStep): Ora {
    const spinner = ora({
      text,
      color: 'cyan',
      isSilent: this.quiet,
      isEnabled: !step.streamsOutput && Boolean(process.stderr.isTTY),
    })
    if (step.streamsOutput && !this.quiet) {
      this.ctx.log.log(chalk.cyan(text))
      return spinner
    }
    return spinner.start()
  }

  // Step output is written between spinner frames so the two do not interleave
  private stepContext(spinner: Ora): PipelineContext {
    const around = (write: (...args: unknown[]) => void) => (...args: unknown[]) => {
      const spinning = spinner.isSpinning
      if (spinning) spinner.clear()
      write(...args)
      if (spinning) spinner.render()
    }
    const { log } = this.ctx
    const wrapped: Logger = {
      log: around(log.log.bind(log)),
      warn: around(log.warn.bind(log)),
      error: around(log.error.bind(log)),
    }
    return { ...this.ctx, log: wrapped }
  }

  private settle(spinner: Ora, step: PipelineStep, result: StepResult): void {
    if (result.status === 'skipped') {
      spinner.info(chalk.yellow(`⏭️  ${step.name}${result.detail ? ` (${result.detail})` : ''}`))
    } else {
      spinner.succeed(chalk.green(`✅ ${step.name}`))
    }
  }

  private printFailure(error: unknown): void {
    const { log } = this.ctx
    log.error(chalk.red(`Error: ${errorMessage(error)}`))
    if (isPipelineError(error) && error.hint) {
      log.error(error.hint)
    }
  }
}
