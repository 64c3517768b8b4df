/**
 * Error kinds raised by the pipeline. Every step either succeeds or throws
 * one of these; the runner turns them into a failed report entry.
 */

export type PipelineErrorCode =
  | 'TOOL_MISSING'
  | 'INPUT_MISSING'
  | 'COMMAND_FAILED'
  | 'CONFIG_INVALID'

export class PipelineError extends Error {
  constructor(
    message: string,
    public readonly code: PipelineErrorCode,
    public readonly hint?: string
  ) {
    super(message)
    this.name = 'PipelineError'
  }

  override toString(): string {
    return this.hint ? `${this.name}: ${this.message}\n${this.hint}` : `${this.name}: ${this.message}`
  }
}

export const INSTALL_HINT = 'Try this command: conda install -c bioconda entrez-direct blast'
export const ACTIVATE_HINT = "If it's already installed, maybe you didn't activate the conda environment?"

export class ToolMissingError extends PipelineError {
  constructor(
    public readonly tool: string,
    public readonly searchPath: string
  ) {
    super(`${tool} not found in ${searchPath}`, 'TOOL_MISSING', `${INSTALL_HINT}\n${ACTIVATE_HINT}`)
    this.name = 'ToolMissingError'
  }
}

export class InputMissingError extends PipelineError {
  constructor(
    message: string,
    public readonly file: string
  ) {
    super(message, 'INPUT_MISSING')
    this.name = 'InputMissingError'
  }
}

export class ExternalCommandError extends PipelineError {
  constructor(
    public readonly commandLine: string,
    public readonly exitCode: number | null,
    public readonly signal: NodeJS.Signals | null,
    public readonly stderr: string
  ) {
    const status = signal ? `signal ${signal}` : `exit code ${exitCode}`
    const tail = stderr.trim().split('\n').slice(-5).join('\n')
    super(`${commandLine} failed with ${status}${tail ? `\n${tail}` : ''}`, 'COMMAND_FAILED')
    this.name = 'ExternalCommandError'
  }
}

export class ConfigError extends PipelineError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  • ${i}`).join('\n')}`, 'CONFIG_INVALID')
    this.name = 'ConfigError'
  }
}

export const isPipelineError = (error: unknown): error is PipelineError =>
  error instanceof PipelineError
