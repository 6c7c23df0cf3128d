// Reads FASTA records into a set of sequences. Headers (">") only separate
// records, their text is discarded. Lines starting with ";" are comments.
export function parseFastaLines(lines: string[]): Set<string> {
  const sequences = new Set<string>()
  let current = ''

  for (const raw of lines) {
    const line = raw.trimEnd()
    if (line === '' || line.startsWith(';')) {
      continue
    }
    if (line.startsWith('>')) {
      if (current) {
        sequences.add(current)
        current = ''
      }
      continue
    }
    current += line
  }

  if (current) {
    sequences.add(current)
  }
  return sequences
}
