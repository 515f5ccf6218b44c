import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { BalanceRecord } from '../services/merkle/index.js';

export const U32_MAX = 0xffffffff;

const u32 = z.number().int().min(0).max(U32_MAX);

const balanceRecordSchema = z.object({
  id: u32,
  balance: u32,
});

const balancesSchema = z.array(balanceRecordSchema);

export function parseBalanceRecords(raw: unknown): BalanceRecord[] {
  const parsed = balancesSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `[${issue.path.join('.')}] ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid balance records: ${details}`);
  }
  return parsed.data;
}

function readBalancesFile(file: string): unknown {
  try {
    return JSON.parse(readFileSync(file, 'utf8'));
  } catch (error) {
    throw new Error(`Could not read balances file ${file}`, { cause: error });
  }
}

// Snapshot of user balances, read from disk once and frozen.
export function createBalanceRepository(file: string) {
  let records: readonly BalanceRecord[] | null = null;

  return {
    getAll: (): readonly BalanceRecord[] => {
      if (records === null) {
        records = Object.freeze(parseBalanceRecords(readBalancesFile(file)));
      }
      return records;
    },
  };
}
