/**
 * Minimal GenBank flat file reader. Only what the CDS extraction needs is
 * read: the LOCUS name and the FEATURES table with its qualifiers.
 */

export interface Span {
  /** 0-based, inclusive */
  start: number
  /** 0-based, exclusive */
  end: number
}

export interface FeatureLocation extends Span {
  strand: 1 | -1
  parts: Span[]
}

export interface GenBankFeature {
  type: string
  location: FeatureLocation
  qualifiers: Record<string, string[]>
}

export interface GenBankRecord {
  name: string
  accession?: string
  features: GenBankFeature[]
}

const FEATURE_INDENT = 5
const QUALIFIER_INDENT = 21

/**
 * Parses an INSDC location string such as `complement(join(<1..20,30..>45))`
 * into 0-based half-open coordinates.
 */
export function parseLocation(raw: string): FeatureLocation {
  let text = raw.replace(/\s+/g, '')
  let strand: 1 | -1 = 1

  const complement = /^complement\((.*)\)$/.exec(text)
  if (complement?.[1] !== undefined) {
    strand = -1
    text = complement[1]
  }
  const joined = /^(?:join|order)\((.*)\)$/.exec(text)
  if (joined?.[1] !== undefined) text = joined[1]

  const parts: Span[] = text.split(',').map(part => {
    const inner = /^complement\((.*)\)$/.exec(part)
    const bare = (inner?.[1] ?? part).replace(/[<>]/g, '')
    // accession-qualified parts (other records) are not resolvable here
    const local = bare.includes(':') ? bare.slice(bare.indexOf(':') + 1) : bare
    const m = /^(\d+)(?:(?:\.\.|\^)(\d+))?$/.exec(local) ?? /^(\d+)\.(\d+)$/.exec(local)
    if (!m?.[1]) throw new SyntaxError(`Unsupported location: ${raw}`)
    const first = Number(m[1])
    const last = m[2] ? Number(m[2]) : first
    return { start: Math.min(first, last) - 1, end: Math.max(first, last) }
  })

  return {
    start: Math.min(...parts.map(p => p.start)),
    end: Math.max(...parts.map(p => p.end)),
    strand,
    parts,
  }
}

function unquoteQualifier(value: string): string {
  if (value.startsWith('"')) {
    return value.replace(/^"/, '').replace(/"$/, '').replace(/""/g, '"')
  }
  return value
}

function parseFeatureBlock(lines: string[]): GenBankFeature {
  const [head = '', ...rest] = lines
  const type = head.slice(FEATURE_INDENT, QUALIFIER_INDENT).trim()
  let locationText = head.slice(QUALIFIER_INDENT).trim()

  const qualifierLines: string[] = []
  for (const line of rest) {
    const body = line.slice(QUALIFIER_INDENT)
    if (body.startsWith('/')) {
      qualifierLines.push(body)
    } else if (qualifierLines.length === 0) {
      locationText += body.trim()
    } else {
      const i = qualifierLines.length - 1
      const prev = qualifierLines[i] ?? ''
      // translations wrap without a space, free text wraps on one
      const glue = /^\/translation=/.test(prev) ? '' : ' '
      qualifierLines[i] = `${prev}${glue}${body.trim()}`
    }
  }

  const qualifiers: Record<string, string[]> = {}
  for (const q of qualifierLines) {
    const eq = q.indexOf('=')
    const key = eq === -1 ? q.slice(1) : q.slice(1, eq)
    const value = eq === -1 ? '' : unquoteQualifier(q.slice(eq + 1).trim())
    ;(qualifiers[key] ??= []).push(value)
  }

  return { type, location: parseLocation(locationText), qualifiers }
}

export function parseGenBank(text: string): GenBankRecord[] {
  const records: GenBankRecord[] = []
  let current: GenBankRecord | null = null
  let inFeatures = false
  let block: string[] = []

  const flush = () => {
    if (current && block.length > 0) current.features.push(parseFeatureBlock(block))
    block = []
  }

  for (const line of text.split(/\r?\n/)) {
    if (line.startsWith('LOCUS')) {
      current = { name: line.slice(5).trim().split(/\s+/)[0] ?? '', features: [] }
      records.push(current)
      inFeatures = false
      continue
    }
    if (!current) continue

    if (line.startsWith('ACCESSION')) {
      current.accession = line.slice(9).trim().split(/\s+/)[0]
      continue
    }
    if (line.startsWith('FEATURES')) {
      inFeatures = true
      continue
    }
    if (line.startsWith('//')) {
      flush()
      inFeatures = false
      current = null
      continue
    }
    if (!inFeatures) continue

    // any unindented keyword (ORIGIN, CONTIG, BASE COUNT) ends the table
    if (line.length > 0 && line[0] !== ' ') {
      flush()
      inFeatures = false
      continue
    }
    if (line.length > FEATURE_INDENT && line[FEATURE_INDENT] !== ' ') {
      flush()
    }
    if (line.trim()) block.push(line)
  }
  flush()

  return records
}

export const qualifier = (feature: GenBankFeature, key: string): string | undefined =>
  feature.qualifiers[key]?.[0]
