import { z } from 'zod'
import os from 'os'
import path from 'path'
import { ConfigError } from '@blastflow/shared'

const envSchema = z.object({
  BLAST_WORKDIR: z.string().min(1).default(path.join(os.homedir(), 'test', 'BLAST')),
  BLAST_QUERY_SEQ: z.string().min(1).default('Bacillus_Cereus.fsa'),
  // CSV with the GenBank assembly accessions, one per row after the header
  BLAST_ACCESSIONS: z.string().min(1).default('Bacillus_strains.csv'),
  BLAST_ACCESSION_COLUMN: z.coerce.number().default(3),
  BLAST_DB_NAME: z.string().min(1).default('22_Bacillus_strains'),
  // The dump lists every record, can be very long
  BLAST_VERIFY_DB: z.enum(['true', 'false']).default('true'),
})

const fileName = z
  .string()
  .min(1)
  .refine(name => path.basename(name) === name, 'must be a file name inside the working directory')

const settingsSchema = z.object({
  workdir: z.string().min(1).transform(p => path.resolve(p)),
  querySeq: fileName,
  accessions: fileName,
  accessionColumn: z.number().int().positive(),
  dbName: z.string().min(1).regex(/^[^\s/\\]+$/, 'must not contain whitespace or path separators'),
  verifyDb: z.boolean(),
})

export type Settings = Readonly<z.output<typeof settingsSchema>>
export type SettingsOverrides = Partial<z.input<typeof settingsSchema>>

const formatIssues = (issues: z.ZodIssue[]): string[] =>
  issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)

/**
 * Resolves settings from the environment, then applies overrides (CLI flags).
 * Undefined overrides are ignored so unset flags fall back to the environment.
 */
export function loadSettings(
  source: Record<string, string | undefined> = process.env,
  overrides: SettingsOverrides = {}
): Settings {
  const env = envSchema.safeParse(source)
  if (!env.success) throw new ConfigError(formatIssues(env.error.issues))

  const defined = Object.fromEntries(Object.entries(overrides).filter(([, v]) => v !== undefined))
  const result = settingsSchema.safeParse({
    workdir: env.data.BLAST_WORKDIR,
    querySeq: env.data.BLAST_QUERY_SEQ,
    accessions: env.data.BLAST_ACCESSIONS,
    accessionColumn: env.data.BLAST_ACCESSION_COLUMN,
    dbName: env.data.BLAST_DB_NAME,
    verifyDb: env.data.BLAST_VERIFY_DB === 'true',
    ...defined,
  })
  if (!result.success) throw new ConfigError(formatIssues(result.error.issues))

  return Object.freeze(result.data)
}

export { LAYOUT, WORKSPACE_DIRS, resolveWorkspacePaths } from './paths.js'
export type { WorkspaceInput, WorkspacePaths } from './paths.js'
