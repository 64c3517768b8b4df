import { spawn, type ChildProcess } from 'child_process'
import { accessSync, constants, createWriteStream, statSync } from 'fs'
import path from 'path'
import { pipeline } from 'stream/promises'
import { ExternalCommandError, ToolMissingError } from '@blastflow/shared'

export interface CommandSpec {
  command: string
  args: string[]
  cwd?: string
}

/**
 * Where the last command's stdout goes: collected into the result,
 * passed through to the terminal, or streamed into a file.
 */
export type StdoutTarget = 'capture' | 'inherit' | { file: string }

export interface RunOptions {
  stdout?: StdoutTarget
}

export interface CommandResult {
  stdout: string
  stderr: string
}

export interface CommandRunner {
  readonly searchPath: string
  resolve(name: string): Promise<string | null>
  run(spec: CommandSpec, options?: RunOptions): Promise<CommandResult>
  /** Runs the commands as a shell pipeline, stdout of each feeding stdin of the next. */
  pipe(specs: readonly CommandSpec[], options?: RunOptions): Promise<CommandResult>
}

const quote = (arg: string): string =>
  /^[\w@%+=:,./-]+$/.test(arg) ? arg : `'${arg.replace(/'/g, `'\\''`)}'`

export const formatCommand = (spec: CommandSpec): string =>
  [spec.command, ...spec.args].map(quote).join(' ')

function isExecutable(file: string): boolean {
  try {
    if (!statSync(file).isFile()) return false
    accessSync(file, constants.X_OK)
    return true
  } catch {
    return false
  }
}

export function resolveExecutable(name: string, searchPath: string): string | null {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue
    const candidate = path.join(dir, name)
    if (isExecutable(candidate)) return candidate
  }
  return null
}

interface Exit {
  code: number | null
  signal: NodeJS.Signals | null
}

function waitForExit(child: ChildProcess, spec: CommandSpec, searchPath: string): Promise<Exit> {
  return new Promise((resolve, reject) => {
    child.once('error', (error: NodeJS.ErrnoException) => {
      reject(error.code === 'ENOENT' ? new ToolMissingError(spec.command, searchPath) : error)
    })
    child.once('close', (code, signal) => resolve({ code, signal }))
  })
}

export class SpawnCommandRunner implements CommandRunner {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  get searchPath(): string {
    return this.env.PATH ?? ''
  }

  async resolve(name: string): Promise<string | null> {
    return resolveExecutable(name, this.searchPath)
  }

  run(spec: CommandSpec, options?: RunOptions): Promise<CommandResult> {
    return this.pipe([spec], options)
  }

  async pipe(specs: readonly CommandSpec[], options: RunOptions = {}): Promise<CommandResult> {
    if (specs.length === 0) throw new RangeError('pipe needs at least one command')
    const target = options.stdout ?? 'capture'

    const children: ChildProcess[] = []
    const exits: Promise<Exit>[] = []
    const stderr: string[] = specs.map(() => '')
    const streamErrors: Error[] = []

    specs.forEach((spec, i) => {
      const last = i === specs.length - 1
      const child = spawn(spec.command, spec.args, {
        cwd: spec.cwd,
        env: this.env,
        stdio: [i === 0 ? 'inherit' : 'pipe', last && target === 'inherit' ? 'inherit' : 'pipe', 'pipe'],
      })
      exits.push(waitForExit(child, spec, this.searchPath))

      child.stderr?.on('data', (chunk: Buffer) => {
        stderr[i] += chunk.toString()
      })

      const upstream = children[i - 1]
      if (upstream?.stdout && child.stdin) {
        // a stage that exits early closes its stdin under the previous one
        child.stdin.on('error', (error: NodeJS.ErrnoException) => {
          if (error.code !== 'EPIPE') streamErrors.push(error)
        })
        upstream.stdout.pipe(child.stdin)
      }
      children.push(child)
    })

    const tail = children[children.length - 1]
    let stdout = ''
    let output: Promise<void> = Promise.resolve()
    if (tail?.stdout) {
      if (typeof target === 'object') {
        output = pipeline(tail.stdout, createWriteStream(target.file))
      } else {
        tail.stdout.setEncoding('utf8')
        tail.stdout.on('data', (chunk: string) => {
          stdout += chunk
        })
      }
    }

    const [results, writeError] = await Promise.all([
      Promise.allSettled(exits),
      output.then(
        () => null,
        (error: unknown) => error
      ),
    ])

    for (const [i, result] of results.entries()) {
      if (result.status === 'rejected') throw result.reason
      const { code, signal } = result.value
      if (code !== 0) {
        throw new ExternalCommandError(formatCommand(specs[i]), code, signal, stderr[i])
      }
    }
    if (writeError) throw writeError
    const [streamError] = streamErrors
    if (streamError) throw streamError

    return { stdout, stderr: stderr.join('') }
  }
}
