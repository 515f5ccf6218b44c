import { reduceLevel } from './reduceLevel.js';
import { taggedHash } from './taggedHash.js';

/**
 * Root over raw string items, without keeping a tree around. Uses the same
 * tagging and odd-node pairing as `MerkleTree.build`, but hashes each item as
 * given instead of serializing a balance record.
 */
export function computeMerkleRoot(leafTag: string, branchTag: string, items: readonly string[]): string | null {
  if (items.length === 0) {
    return null;
  }

  let hashes = items.map((item) => taggedHash(leafTag, item));

  while (hashes.length > 1) {
    hashes = reduceLevel(hashes, (left, right) => taggedHash(branchTag, Buffer.concat([left, right])));
  }

  return hashes[0].toString('hex');
}
