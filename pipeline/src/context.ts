import { resolveWorkspacePaths, type Settings } from '@blastflow/config'
import { SpawnCommandRunner, type CommandRunner } from './exec.js'
import type { Logger, PipelineContext } from './types.js'

export function createContext(
  settings: Settings,
  runner: CommandRunner = new SpawnCommandRunner(),
  log: Logger = console
): PipelineContext {
  return Object.freeze({
    settings,
    paths: resolveWorkspacePaths(settings),
    runner,
    log,
  })
}
