import { reduceLevel } from './reduceLevel.js';
import { serializeRecord, taggedHash } from './taggedHash.js';
import {
  Direction,
  type BalanceRecord,
  type BranchNode,
  type LeafNode,
  type MerkleNode,
  type RecordPredicate,
  type SearchResult,
  type TraverseStep,
} from './types.js';

type LevelEntry = {
  index: number;
  digest: Buffer;
};

function assertTag(name: string, tag: string): void {
  if (tag.length === 0) {
    throw new TypeError(`${name} must be a non-empty string`);
  }
}

/**
 * Tagged-hash Merkle tree over balance records.
 *
 * Nodes are kept in a flat arena where every child is pushed before its parent,
 * so the root is always the last node. The tree is frozen once built and can be
 * read by any number of callers.
 *
 * ```ts
 * const tree = MerkleTree.build('ProofOfReserve_Leaf', 'ProofOfReserve_Branch', records);
 * tree.root();                           // hex digest or null
 * tree.search((r) => r.id === 3);        // { leaf, path } or null
 * ```
 */
export class MerkleTree {
  private readonly nodes: readonly MerkleNode[];
  private readonly levelIndices: readonly (readonly number[])[];
  private readonly members: ReadonlySet<MerkleNode>;

  private constructor(nodes: readonly MerkleNode[], levelIndices: readonly (readonly number[])[]) {
    this.nodes = nodes;
    this.levelIndices = levelIndices;
    this.members = new Set(nodes);
  }

  /** Leaves are hashed in input order, then reduced level by level to one root. */
  static build(leafTag: string, branchTag: string, records: readonly BalanceRecord[]): MerkleTree {
    assertTag('leafTag', leafTag);
    assertTag('branchTag', branchTag);

    const nodes: MerkleNode[] = [];
    const levels: number[][] = [];

    if (records.length === 0) {
      return new MerkleTree(Object.freeze(nodes), Object.freeze(levels));
    }

    let level: LevelEntry[] = records.map((record) => {
      const digest = taggedHash(leafTag, serializeRecord(record));
      const leaf: LeafNode = {
        kind: 'leaf',
        hash: digest.toString('hex'),
        record: Object.freeze({ id: record.id, balance: record.balance }),
      };
      return { index: nodes.push(Object.freeze(leaf)) - 1, digest };
    });
    levels.push(level.map((entry) => entry.index));

    while (level.length > 1) {
      level = reduceLevel(level, (left, right) => {
        const digest = taggedHash(branchTag, Buffer.concat([left.digest, right.digest]));
        const branch: BranchNode = {
          kind: 'branch',
          hash: digest.toString('hex'),
          left: left.index,
          right: right.index,
        };
        return { index: nodes.push(Object.freeze(branch)) - 1, digest };
      });
      levels.push(level.map((entry) => entry.index));
    }

    return new MerkleTree(Object.freeze(nodes), Object.freeze(levels.map((indices) => Object.freeze(indices))));
  }

  /** Number of leaves. */
  get size(): number {
    return this.levelIndices.length === 0 ? 0 : this.levelIndices[0].length;
  }

  /** Number of branch levels above the leaves. */
  get height(): number {
    return Math.max(this.levelIndices.length - 1, 0);
  }

  root(): string | null {
    return this.rootNode()?.hash ?? null;
  }

  rootNode(): MerkleNode | null {
    return this.nodes.length === 0 ? null : this.nodes[this.nodes.length - 1];
  }

  /** Nodes grouped by level, leaves first and the root last. */
  levels(): MerkleNode[][] {
    return this.levelIndices.map((indices) => indices.map((index) => this.nodes[index]));
  }

  /** Throws a RangeError for a branch that was not built by this tree. */
  children(branch: BranchNode): [MerkleNode, MerkleNode] {
    if (!this.members.has(branch)) {
      throw new RangeError('Branch does not belong to this tree');
    }
    return [this.nodes[branch.left], this.nodes[branch.right]];
  }

  /**
   * Depth-first, pre-order, left before right. The path lists every ancestor of
   * the matched leaf from the root down, with the direction taken below it.
   * Returns null when the tree is empty or no record satisfies the predicate.
   */
  search(predicate: RecordPredicate): SearchResult | null {
    if (this.nodes.length === 0) {
      return null;
    }
    return this.descend(this.nodes.length - 1, predicate, []);
  }

  private descend(index: number, predicate: RecordPredicate, path: TraverseStep[]): SearchResult | null {
    const node = this.nodes[index];

    if (node.kind === 'leaf') {
      return predicate(node.record) ? { leaf: node, path: [...path] } : null;
    }

    path.push({ hash: node.hash, direction: Direction.Left });
    const fromLeft = this.descend(node.left, predicate, path);
    if (fromLeft) {
      return fromLeft;
    }
    path.pop();

    // A self-paired branch repeats its left subtree, which has already missed.
    if (node.right === node.left) {
      return null;
    }

    path.push({ hash: node.hash, direction: Direction.Right });
    const fromRight = this.descend(node.right, predicate, path);
    if (fromRight) {
      return fromRight;
    }
    path.pop();

    return null;
  }
}
