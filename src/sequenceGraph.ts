import type { SequenceGraph, SequenceNode } from './types.ts'

export function createSequenceGraph(): SequenceGraph {
  return { nodes: new Map() }
}

// Returns the node for the sequence, creating it if needed
export function addSequence(graph: SequenceGraph, sequence: string) {
  let node = graph.nodes.get(sequence)
  if (!node) {
    node = { sequence, parents: new Set(), children: new Map() }
    graph.nodes.set(sequence, node)
  }
  return node
}

// Adds the edge parent -> child on both endpoints at once. A second call for
// the same pair keeps the first offset.
export function addOverlap(
  graph: SequenceGraph,
  parent: string,
  child: string,
  overlapIndex: number,
) {
  const parentNode = addSequence(graph, parent)
  const childNode = addSequence(graph, child)
  if (parentNode.children.has(childNode)) {
    return
  }
  parentNode.children.set(childNode, overlapIndex)
  childNode.parents.add(parentNode)
}

function findOnlyNode(
  graph: SequenceGraph,
  edgeCount: (node: SequenceNode) => number,
) {
  let found: SequenceNode | undefined
  for (const node of graph.nodes.values()) {
    if (edgeCount(node) === 0) {
      if (found) {
        return undefined
      }
      found = node
    }
  }
  return found
}

// The unique node without parents, if there is exactly one
export function getRoot(graph: SequenceGraph) {
  return findOnlyNode(graph, node => node.parents.size)
}

// The unique node without children, if there is exactly one
export function getTerminalNode(graph: SequenceGraph) {
  return findOnlyNode(graph, node => node.children.size)
}
