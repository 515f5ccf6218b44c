/**
 * One user's entry in the reserve snapshot. Both fields are unsigned
 * 32-bit integers.
 */
export interface BalanceRecord {
  id: number;
  balance: number;
}

export interface LeafNode {
  readonly kind: 'leaf';
  /** Lowercase hex of the 32-byte tagged digest. */
  readonly hash: string;
  readonly record: Readonly<BalanceRecord>;
}

/**
 * `left` and `right` index into the tree's node arena. A branch produced by
 * odd-node duplication has `left === right`.
 */
export interface BranchNode {
  readonly kind: 'branch';
  readonly hash: string;
  readonly left: number;
  readonly right: number;
}

export type MerkleNode = LeafNode | BranchNode;

export const Direction = {
  Left: 0,
  Right: 1,
} as const;

export type Direction = (typeof Direction)[keyof typeof Direction];

export interface TraverseStep {
  /** Hash of the ancestor the step starts from, not of its sibling. */
  readonly hash: string;
  readonly direction: Direction;
}

export type TraversePath = readonly TraverseStep[];

export type RecordPredicate = (record: Readonly<BalanceRecord>) => boolean;

export interface SearchResult {
  leaf: LeafNode;
  path: TraversePath;
}
