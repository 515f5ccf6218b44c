import { createHash } from 'node:crypto';

/**
 * SHA-256(tag || tag || input), all in one digest. Separates leaf hashes from
 * branch hashes (or one application's hashes from another's) even when the
 * raw inputs collide.
 */
export function taggedHash(tag: string, input: Uint8Array | string): Buffer {
  return createHash('sha256').update(tag).update(tag).update(input).digest();
}

export function serializeRecord(record: { id: number; balance: number }): string {
  return `(${record.id},${record.balance})`;
}
