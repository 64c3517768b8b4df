export {
  PipelineError,
  ToolMissingError,
  InputMissingError,
  ExternalCommandError,
  ConfigError,
  isPipelineError,
  INSTALL_HINT,
  ACTIVATE_HINT,
} from './errors.js'
export type { PipelineErrorCode } from './errors.js'

export {
  QUERY_SEPARATOR,
  readAccessions,
  composeAccessionQuery,
  splitAccessionQuery,
  formatTaxidLine,
} from './accessions.js'

export { parseGenBank, parseLocation, qualifier } from './genbank.js'
export type { GenBankRecord, GenBankFeature, FeatureLocation, Span } from './genbank.js'

export { formatFasta } from './fasta.js'
export type { FastaRecord } from './fasta.js'
