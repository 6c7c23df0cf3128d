export type {
  AssemblyFailure,
  FragmentPlacement,
  Reconstruction,
  SequenceGraph,
  SequenceNode,
} from './types.ts'

export { parseFastaLines } from './parseFasta.ts'
export { getSequenceOverlapIndex } from './overlap.ts'
export {
  addOverlap,
  addSequence,
  createSequenceGraph,
  getRoot,
  getTerminalNode,
} from './sequenceGraph.ts'
export { buildSequenceGraph } from './buildGraph.ts'
export { findHamiltonianPath } from './hamiltonianPath.ts'
export {
  assembleChromosome,
  assemblePath,
  placeFragments,
  reconstructChromosome,
  reconstructFromGraph,
} from './reconstruct.ts'
export { findMissingFragments, validateChromosome } from './validate.ts'
