import { pino, type LevelWithSilent } from 'pino';
import { env, type Env } from '../config/env.js';

export function logLevelFor(nodeEnv: Env['nodeEnv']): LevelWithSilent {
  switch (nodeEnv) {
    case 'test':
      return 'silent';
    case 'development':
      return 'debug';
    default:
      return 'info';
  }
}

export const logger = pino({ name: 'proof-of-reserve', level: logLevelFor(env.nodeEnv) });
