import type {
  FragmentPlacement,
  Reconstruction,
  SequenceGraph,
  SequenceNode,
} from './types.ts'
import { buildSequenceGraph } from './buildGraph.ts'
import { findHamiltonianPath } from './hamiltonianPath.ts'
import { getRoot, getTerminalNode } from './sequenceGraph.ts'

function overlapIndexFor(parent: SequenceNode, child: SequenceNode) {
  const index = parent.children.get(child)
  if (index === undefined) {
    throw new Error(
      `path steps from ${parent.sequence} to ${child.sequence} without an edge`,
    )
  }
  return index
}

// Where each fragment of the path lands in the assembled chromosome
export function placeFragments(path: SequenceNode[]): FragmentPlacement[] {
  const placements: FragmentPlacement[] = []
  let start = 0
  let previous: SequenceNode | undefined
  for (const node of path) {
    if (previous) {
      start += overlapIndexFor(previous, node)
    }
    placements.push({
      sequence: node.sequence,
      start,
      end: start + node.sequence.length,
    })
    previous = node
  }
  return placements
}

// Glue the path together: each parent contributes the part before its
// child's overlap, the last node contributes all of itself
export function assemblePath(path: SequenceNode[]) {
  const pieces: string[] = []
  for (let i = 0; i < path.length - 1; i++) {
    const parent = path[i]!
    const child = path[i + 1]!
    pieces.push(parent.sequence.slice(0, overlapIndexFor(parent, child)))
  }
  const last = path[path.length - 1]
  if (last) {
    pieces.push(last.sequence)
  }
  return pieces.join('')
}

export function reconstructFromGraph(graph: SequenceGraph): Reconstruction {
  const root = getRoot(graph)
  if (!root) {
    return { ok: false, reason: 'NO_UNIQUE_ROOT' }
  }
  if (!getTerminalNode(graph)) {
    return { ok: false, reason: 'NO_UNIQUE_TERMINAL' }
  }

  const path = findHamiltonianPath(graph, root)
  if (!path) {
    return { ok: false, reason: 'NO_HAMILTONIAN_PATH' }
  }

  return {
    ok: true,
    chromosome: assemblePath(path),
    path: path.map(node => node.sequence),
    placements: placeFragments(path),
  }
}

export function reconstructChromosome(
  fragments: Iterable<string> | undefined,
): Reconstruction {
  const graph = buildSequenceGraph(fragments)
  if (!graph) {
    return { ok: false, reason: 'EMPTY_INPUT' }
  }
  return reconstructFromGraph(graph)
}

// Same as reconstructChromosome but only reports whether it worked
export function assembleChromosome(fragments: Iterable<string> | undefined) {
  const result = reconstructChromosome(fragments)
  return result.ok ? result.chromosome : undefined
}
