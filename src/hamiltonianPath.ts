import type { SequenceGraph, SequenceNode } from './types.ts'

interface Frame {
  node: SequenceNode
  children: SequenceNode[]
  nextChild: number
}

// Depth-first search for a path that starts at `start`, follows child edges,
// visits every node of the graph exactly once and ends on a node with no
// children. Uses an explicit stack so long fragment chains do not exhaust
// the call stack.
export function findHamiltonianPath(
  graph: SequenceGraph,
  start: SequenceNode,
): SequenceNode[] | undefined {
  const total = graph.nodes.size
  const visited = new Set<SequenceNode>()
  const path: SequenceNode[] = []
  const stack: Frame[] = []

  let next: SequenceNode | undefined = start
  while (true) {
    if (next) {
      const node: SequenceNode = next
      next = undefined

      // revisiting a node on the current path means a cycle
      if (!visited.has(node)) {
        visited.add(node)
        path.push(node)

        if (node.children.size === 0) {
          if (path.length === total) {
            return path
          }
          // dead end before every node was used
          path.pop()
          visited.delete(node)
        } else {
          stack.push({ node, children: [...node.children.keys()], nextChild: 0 })
        }
      }
    }

    const frame = stack[stack.length - 1]
    if (!frame) {
      return undefined
    }

    const child = frame.children[frame.nextChild]
    if (child) {
      frame.nextChild++
      next = child
    } else {
      // every child failed, so this node cannot be at this spot in the path
      stack.pop()
      path.pop()
      visited.delete(frame.node)
    }
  }
}
