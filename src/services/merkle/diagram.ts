import type { MerkleTree } from './tree.js';
import type { MerkleNode } from './types.js';

const HASH_PREVIEW_LENGTH = 8;

function nodeLabel(node: MerkleNode): string {
  const preview = `${node.hash.slice(0, HASH_PREVIEW_LENGTH)}...`;
  if (node.kind === 'branch') {
    return preview;
  }
  return `${preview}<br>User ID: ${node.record.id}<br>Balance: ${node.record.balance}`;
}

// Mermaid flowchart, root at the top. Node ids follow level order from the root
// down; a self-paired branch gets two edges to the same child.
export function renderMermaidDiagram(tree: MerkleTree): string {
  const topDown = tree.levels().reverse();
  const ids = new Map<MerkleNode, string>();
  const lines = ['graph TD'];

  for (const level of topDown) {
    for (const node of level) {
      const id = `n${ids.size}`;
      ids.set(node, id);
      lines.push(`  ${id}["${nodeLabel(node)}"]`);
    }
  }

  for (const level of topDown) {
    for (const node of level) {
      if (node.kind !== 'branch') {
        continue;
      }
      for (const child of tree.children(node)) {
        lines.push(`  ${ids.get(node)} --> ${ids.get(child)}`);
      }
    }
  }

  return lines.join('\n');
}
