export const QUERY_SEPARATOR = ' OR '

const unquote = (field: string): string => {
  const value = field.trim()
  return value.length >= 2 && value.startsWith('"') && value.endsWith('"')
    ? value.slice(1, -1).trim()
    : value
}

/**
 * Reads the accession identifiers from one comma separated column.
 * The first line is a header. Rows without the column, or with an empty
 * value in it, are skipped.
 */
export function readAccessions(csvText: string, column: number): string[] {
  if (!Number.isInteger(column) || column < 1) {
    throw new RangeError(`column must be a positive integer, got ${column}`)
  }

  const out: string[] = []
  csvText.split(/\r?\n/).forEach((line, i) => {
    if (i === 0) return
    const fields = line.split(',')
    if (fields.length < column) return
    const value = unquote(fields[column - 1] ?? '')
    if (value) out.push(value)
  })
  return out
}

export function composeAccessionQuery(accessions: readonly string[]): string {
  return accessions.join(QUERY_SEPARATOR)
}

// Inverse of composeAccessionQuery. Order and duplicates are preserved.
export function splitAccessionQuery(query: string): string[] {
  return query
    .split(QUERY_SEPARATOR)
    .map(term => term.trim())
    .filter(Boolean)
}

/**
 * One line of the makeblastdb taxid map. Several ids returned for the same
 * accession share the line, separated by single spaces.
 */
export function formatTaxidLine(accession: string, lookupOutput: string): string {
  const ids = lookupOutput.split(/\s+/).filter(Boolean)
  return `${accession} ${ids.join(' ')}\n`
}
