export interface SequenceNode {
  readonly sequence: string
  parents: Set<SequenceNode>
  // child -> index into this sequence where the child's sequence starts
  children: Map<SequenceNode, number>
}

export interface SequenceGraph {
  nodes: Map<string, SequenceNode>
}

export interface FragmentPlacement {
  sequence: string
  start: number
  end: number
}

export type AssemblyFailure =
  | 'EMPTY_INPUT'
  | 'NO_UNIQUE_ROOT'
  | 'NO_UNIQUE_TERMINAL'
  | 'NO_HAMILTONIAN_PATH'

export type Reconstruction =
  | {
      ok: true
      chromosome: string
      path: string[]
      placements: FragmentPlacement[]
    }
  | {
      ok: false
      reason: AssemblyFailure
    }
