/**
 * Runtime Configuration
 *
 * Process-wide defaults for experiment execution, loaded once from the
 * environment.
 *
 * Environment variables:
 * - PARLEY_OUTPUT_DIR: Root directory for experiment directories (default: ./parley-output)
 * - PARLEY_DB_PATH: Analytical store file (default: <output>/parley.sqlite)
 * - PARLEY_MAX_PARALLEL: Conversations run concurrently per experiment (default: 1)
 * - PARLEY_CALL_TIMEOUT_MS: Per agent call timeout (default: 60000)
 * - PARLEY_MAX_RETRIES: Retries after the first attempt of an agent call (default: 3)
 * - PARLEY_DEFAULT_MAX_TURNS: Turn ceiling when a config omits one (default: 20)
 * - PARLEY_AUTO_IMPORT: Import experiments into the analytical store when they finish (default: true)
 */

import { join } from 'node:path';
import { getEnvBoolean, getEnvNumber, getEnvOptional, getEnvWithDefault } from '../utils/env.js';

export interface RuntimeConfig {
  outputDir: string;
  dbPath: string;
  maxParallel: number;
  callTimeoutMs: number;
  maxRetries: number;
  defaultMaxTurns: number;
  autoImport: boolean;
}

export const RUNTIME_DEFAULTS = {
  OUTPUT_DIR: './parley-output',
  DB_FILENAME: 'parley.sqlite',
  MAX_PARALLEL: 1,
  CALL_TIMEOUT_MS: 60_000,
  MAX_RETRIES: 3,
  DEFAULT_MAX_TURNS: 20,
  /** Longest a rate limiter wait may be before it fails instead */
  RATE_LIMIT_WAIT_THRESHOLD_MS: 5_000,
  /** Default agent sampling temperature */
  TEMPERATURE: 0.7,
  /** Default completion length for agent replies */
  MAX_TOKENS: 1024,
} as const;

function positiveOrDefault(value: number, defaultValue: number): number {
  return Number.isInteger(value) && value > 0 ? value : defaultValue;
}

/**
 * Read runtime configuration from the environment
 */
export function loadRuntimeConfig(): RuntimeConfig {
  const outputDir = getEnvWithDefault('PARLEY_OUTPUT_DIR', RUNTIME_DEFAULTS.OUTPUT_DIR);

  return {
    outputDir,
    dbPath: getEnvOptional('PARLEY_DB_PATH') || join(outputDir, RUNTIME_DEFAULTS.DB_FILENAME),
    maxParallel: positiveOrDefault(
      getEnvNumber('PARLEY_MAX_PARALLEL', RUNTIME_DEFAULTS.MAX_PARALLEL),
      RUNTIME_DEFAULTS.MAX_PARALLEL
    ),
    callTimeoutMs: positiveOrDefault(
      getEnvNumber('PARLEY_CALL_TIMEOUT_MS', RUNTIME_DEFAULTS.CALL_TIMEOUT_MS),
      RUNTIME_DEFAULTS.CALL_TIMEOUT_MS
    ),
    maxRetries: Math.max(0, getEnvNumber('PARLEY_MAX_RETRIES', RUNTIME_DEFAULTS.MAX_RETRIES)),
    defaultMaxTurns: positiveOrDefault(
      getEnvNumber('PARLEY_DEFAULT_MAX_TURNS', RUNTIME_DEFAULTS.DEFAULT_MAX_TURNS),
      RUNTIME_DEFAULTS.DEFAULT_MAX_TURNS
    ),
    autoImport: getEnvBoolean('PARLEY_AUTO_IMPORT', true),
  };
}
