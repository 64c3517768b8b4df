import path from 'path'

// Subdirectories and cache files created under the working directory
export const LAYOUT = {
  blastdb: 'blastdb',
  queries: 'queries',
  fasta: 'fasta',
  results: 'results',
  customDb: 'blastdb_custom',
  taxidMap: 'taxid_map.txt',
} as const

export const WORKSPACE_DIRS = [
  LAYOUT.blastdb,
  LAYOUT.queries,
  LAYOUT.fasta,
  LAYOUT.results,
  LAYOUT.customDb,
] as const

export interface WorkspaceInput {
  workdir: string
  querySeq: string
  accessions: string
  dbName: string
}

export interface WorkspacePaths {
  workdir: string
  dirs: string[]
  querySource: string
  stagedQuery: string
  accessionCsv: string
  referenceFasta: string
  taxidMap: string
  customDbDir: string
  database: string
  htmlReport: string
  textReport: string
}

export const resolveWorkspacePaths = ({ workdir, querySeq, accessions, dbName }: WorkspaceInput): WorkspacePaths => {
  const root = path.resolve(workdir)
  const at = (...parts: string[]) => path.join(root, ...parts)
  return {
    workdir: root,
    dirs: WORKSPACE_DIRS.map(d => at(d)),
    querySource: at(querySeq),
    stagedQuery: at(LAYOUT.queries, querySeq),
    accessionCsv: at(accessions),
    referenceFasta: at(LAYOUT.fasta, `${dbName}.fsa`),
    taxidMap: at(LAYOUT.taxidMap),
    customDbDir: at(LAYOUT.customDb),
    database: at(LAYOUT.customDb, dbName),
    htmlReport: at(LAYOUT.results, `${querySeq}.html`),
    textReport: at(LAYOUT.results, `${querySeq}.out`),
  }
}
