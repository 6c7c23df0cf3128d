// Index of `base` at which `candidate` can be laid over it, such that the
// shared region covers more than half of `base`. The shortest qualifying
// overlap wins. Returns undefined when the two do not glue together.
//
//   base       ATTAGACCTG
//   candidate     AGACCTGCCG   -> 3
export function getSequenceOverlapIndex(base: string, candidate: string) {
  const half = Math.floor(base.length / 2)
  if (candidate.length <= half) {
    return undefined
  }

  // a shared region longer than base can never be a suffix of it
  const longest = Math.min(candidate.length, base.length)
  for (let length = half + 1; length <= longest; length++) {
    if (base.endsWith(candidate.slice(0, length))) {
      return base.length - length
    }
  }
  return undefined
}
