export interface FastaRecord {
  id: string
  description?: string
  sequence: string
}

function wrap(text: string, width: number): string {
  if (width <= 0) return text
  const lines: string[] = []
  for (let i = 0; i < text.length; i += width) {
    lines.push(text.slice(i, i + width))
  }
  return lines.join('\n')
}

export function formatFasta(records: readonly FastaRecord[], lineWidth = 60): string {
  return records
    .map(r => {
      const header = r.description ? `>${r.id} ${r.description}` : `>${r.id}`
      return `${header}\n${wrap(r.sequence, lineWidth)}\n`
    })
    .join('')
}
