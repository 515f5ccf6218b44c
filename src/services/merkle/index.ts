export { taggedHash, serializeRecord } from './taggedHash.js';
export { MerkleTree } from './tree.js';
export { computeMerkleRoot } from './computeRoot.js';
export { renderMermaidDiagram } from './diagram.js';
export { Direction } from './types.js';
export type {
  BalanceRecord,
  BranchNode,
  LeafNode,
  MerkleNode,
  RecordPredicate,
  SearchResult,
  TraversePath,
  TraverseStep,
} from './types.js';
