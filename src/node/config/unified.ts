/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a frozen
 * config object that all host code should use.
 *
 * Architecture:
 * - `env.ts` defines the raw environment variable schema
 * - `unified.ts` (this file) assembles the typed application config
 * - `index.ts` re-exports everything for convenient imports
 */

import dotenv from 'dotenv';
import {
  getEffectiveNodeEnv,
  loadEnvOrExit,
  type LogFormat,
  type LogLevel,
  type NodeEnv,
} from './env';

// Load .env into process.env before we read anything from it.
// Skip in test mode so a developer's .env cannot leak into test runs.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const env = loadEnvOrExit(process.env);
const nodeEnv = getEffectiveNodeEnv(env);

export interface AppConfig {
  nodeEnv: NodeEnv;
  isProduction: boolean;
  isTest: boolean;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file: string | undefined;
  };
  solver: {
    /** Infinity when unbounded */
    maxPlies: number;
    puzzleFile: string;
  };
}

export const config: Readonly<AppConfig> = Object.freeze({
  nodeEnv,
  isProduction: nodeEnv === 'production',
  isTest: nodeEnv === 'test',
  logging: {
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  },
  solver: {
    maxPlies: env.SOLVER_MAX_PLIES ?? Infinity,
    puzzleFile: env.PUZZLE_FILE,
  },
});
