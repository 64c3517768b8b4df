import type { PipelineStep } from './types.js'
import { setup } from './steps/environment.js'
import { stageQuery } from './steps/query.js'
import { fetchReferences } from './steps/references.js'
import { taxidMapStep } from './steps/taxid-map.js'
import { buildDatabase } from './steps/database.js'
import { verifyDatabase } from './steps/verify.js'
import { runSearch } from './steps/search.js'

export const pipelineSteps: readonly PipelineStep[] = [
  {
    id: 'setup',
    name: 'Check environment',
    description: 'Create the working directories and check the Entrez Direct and BLAST+ executables',
    run: ctx => setup(ctx),
  },
  {
    id: 'query',
    name: 'Stage query sequence',
    description: 'Copy the query FASTA into queries/',
    dependencies: ['setup'],
    run: ctx => stageQuery(ctx),
  },
  {
    id: 'references',
    name: 'Retrieve database sequences',
    description: 'Fetch reference sequences for the accession list with esearch | elink | efetch',
    dependencies: ['setup'],
    run: ctx => fetchReferences(ctx),
  },
  {
    id: 'taxid-map',
    name: 'Generate taxid map',
    description: 'Look up the taxonomy id of every accession',
    dependencies: ['setup'],
    run: (ctx, carry) => taxidMapStep(ctx, carry.accessionQuery),
  },
  {
    id: 'makeblastdb',
    name: 'Make BLAST database',
    description: 'Index the reference sequences with makeblastdb',
    dependencies: ['references', 'taxid-map'],
    run: ctx => buildDatabase(ctx),
  },
  {
    id: 'verify',
    name: 'Verify BLAST database',
    description: 'List accession and length of every database record',
    dependencies: ['makeblastdb'],
    streamsOutput: true,
    run: ctx => verifyDatabase(ctx),
  },
  {
    id: 'blastn',
    name: 'Run BLAST+',
    description: 'Search the query against the local database, HTML and text reports',
    dependencies: ['query', 'makeblastdb'],
    run: ctx => runSearch(ctx),
  },
]

export const STEP_IDS = pipelineSteps.map(s => s.id)
