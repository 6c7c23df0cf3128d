import type { SequenceGraph } from './types.ts'
import { getSequenceOverlapIndex } from './overlap.ts'
import { addOverlap, addSequence, createSequenceGraph } from './sequenceGraph.ts'

// Build the overlap graph: one node per distinct fragment and an edge
// base -> candidate wherever candidate glues onto the end of base.
// Returns undefined when there is nothing to build from.
export function buildSequenceGraph(
  fragments: Iterable<string> | undefined,
): SequenceGraph | undefined {
  if (!fragments) {
    return undefined
  }
  const sequences = [...new Set(fragments)]
  if (sequences.length === 0) {
    return undefined
  }

  const graph = createSequenceGraph()

  // Check all ordered pairs
  for (const base of sequences) {
    addSequence(graph, base)
    for (const candidate of sequences) {
      if (candidate === base) {
        continue
      }
      const overlap = getSequenceOverlapIndex(base, candidate)
      if (overlap !== undefined) {
        addOverlap(graph, base, candidate, overlap)
      }
    }
  }

  return graph
}
