import express from "express";
import cors from "cors";
import { env } from "./config/env.js";
import { errorHandler } from "./middleware/errorHandler.js";
import { createBalanceRepository } from "./repositories/balances.js";
import { healthRouter } from "./routes/health.js";
import { createProofRouter } from "./routes/proofs.js";
import { MerkleTree } from "./services/merkle/index.js";
import { logger } from "./utils/logger.js";

export function createApp(tree: MerkleTree) {
  const app = express();

  app.use(cors({ origin: env.corsOrigin }));

  app.use('/api/health', healthRouter)
  app.use('/api/proof', createProofRouter(tree))

  app.use(errorHandler);

  return app;
}

const balances = createBalanceRepository(env.balancesFile);

// Built once at startup; every request reads the same immutable tree.
export const tree = MerkleTree.build(env.leafTag, env.branchTag, balances.getAll());
export const app = createApp(tree);

logger.info({ records: tree.size, root: tree.root() }, "Committed balance records");

if (env.nodeEnv !== "test") {
  app.listen(env.port, () => {
    logger.info(`Proof-of-reserve API listening on http://localhost:${env.port}`);
  });
}
