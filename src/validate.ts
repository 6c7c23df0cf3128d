// Fragments that do not occur anywhere in the chromosome, in input order
export function findMissingFragments(
  fragments: Iterable<string>,
  chromosome: string,
) {
  const missing: string[] = []
  for (const fragment of fragments) {
    if (!chromosome.includes(fragment)) {
      missing.push(fragment)
    }
  }
  return missing
}

// Necessary but not sufficient: a chromosome that contains every fragment
// may still be assembled in the wrong order.
export function validateChromosome(
  fragments: Iterable<string> | undefined,
  chromosome: string | undefined,
) {
  if (!fragments || chromosome === undefined) {
    return false
  }
  return findMissingFragments(fragments, chromosome).length === 0
}
