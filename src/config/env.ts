import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const DEFAULT_BALANCES_FILE = fileURLToPath(new URL('../../data/balances.json', import.meta.url));

const envSchema = z
  .object({
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
    CORS_ORIGIN: z.string().min(1).default('*'),
    MERKLE_LEAF_TAG: z.string().min(1).default('ProofOfReserve_Leaf'),
    MERKLE_BRANCH_TAG: z.string().min(1).default('ProofOfReserve_Branch'),
    BALANCES_FILE: z.string().min(1).default(DEFAULT_BALANCES_FILE),
  })
  .refine((raw) => raw.MERKLE_LEAF_TAG !== raw.MERKLE_BRANCH_TAG, {
    message: 'MERKLE_LEAF_TAG and MERKLE_BRANCH_TAG must differ',
    path: ['MERKLE_BRANCH_TAG'],
  })
  .transform((raw) => ({
    port: raw.PORT,
    nodeEnv: raw.NODE_ENV,
    corsOrigin: raw.CORS_ORIGIN,
    leafTag: raw.MERKLE_LEAF_TAG,
    branchTag: raw.MERKLE_BRANCH_TAG,
    balancesFile: raw.BALANCES_FILE,
  }));

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

export const env = loadEnv();
