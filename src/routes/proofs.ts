import { Router } from 'express';
import { z } from 'zod';
import { U32_MAX } from '../repositories/balances.js';
import { type Direction, type MerkleTree, renderMermaidDiagram } from '../services/merkle/index.js';
import { createHttpError } from '../utils/httpError.js';

type InclusionProofResponse = {
  user_balance: number;
  proof: [hash: string, direction: Direction][];
};

const userIdParamSchema = z
  .string()
  .regex(/^\+?\d+$/)
  .transform(Number)
  .refine((id) => id <= U32_MAX);

function parseUserIdParam(userId: string): number {
  const parsed = userIdParamSchema.safeParse(userId);
  if (!parsed.success) {
    throw createHttpError(400, 'INVALID_USER_ID', 'User id must be an unsigned 32-bit integer');
  }
  return parsed.data;
}

function emptyTreeError() {
  return createHttpError(404, 'EMPTY_TREE', 'No balance records have been committed');
}

export function createProofRouter(tree: MerkleTree): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const root = tree.root();
    if (root === null) {
      throw emptyTreeError();
    }
    res.status(200).type('text/plain').send(root);
  });

  router.get('/mermaid', (_req, res) => {
    res.status(200).type('text/plain').send(renderMermaidDiagram(tree));
  });

  router.get('/:userId', (req, res) => {
    const userId = parseUserIdParam(req.params.userId);

    if (tree.size === 0) {
      throw emptyTreeError();
    }

    const found = tree.search((record) => record.id === userId);
    if (!found) {
      throw createHttpError(404, 'USER_NOT_FOUND', `No balance record for user ${userId}`);
    }

    const body: InclusionProofResponse = {
      user_balance: found.leaf.record.balance,
      proof: found.path.map((step): [string, Direction] => [step.hash, step.direction]),
    };
    res.status(200).json(body);
  });

  return router;
}
