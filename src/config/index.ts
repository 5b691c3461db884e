/**
 * Configuration Module
 *
 * Loads and validates environment variables for circlescan.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * @module config
 */

import 'dotenv/config';
import { z } from 'zod';

// Environment schema with optional values and defaults
const envSchema = z.object({
  // Engine executables
  CIRCLESCAN_INTERVALS_BIN: z.string().min(1).default('ecc-intervals'),
  CIRCLESCAN_REALIGN_BIN: z.string().min(1).default('ecc-realign'),
  CIRCLESCAN_COVERAGE_BIN: z.string().min(1).default('samtools'),
  CIRCLESCAN_MERGE_BIN: z.string().min(1).default('ecc-merge'),
  CIRCLESCAN_EXTRACT_BIN: z.string().min(1).default('ecc-extract'),

  // Alignment decoding for non-SAM inputs
  CIRCLESCAN_SAMTOOLS_BIN: z.string().min(1).default('samtools'),

  // Runtime options
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment object. Exposed for tests; the module-level config
 * below is built from `process.env`.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

// Parse environment
const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment variables:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env: Env = parseResult.data;

/**
 * Engine names that map to an executable.
 */
export type EngineName = 'intervals' | 'realign' | 'coverage' | 'merge' | 'extract';

/**
 * Executable per engine, from an environment object.
 */
export function engineBinariesFrom(parsed: Env): Record<EngineName, string> {
  return {
    intervals: parsed.CIRCLESCAN_INTERVALS_BIN,
    realign: parsed.CIRCLESCAN_REALIGN_BIN,
    coverage: parsed.CIRCLESCAN_COVERAGE_BIN,
    merge: parsed.CIRCLESCAN_MERGE_BIN,
    extract: parsed.CIRCLESCAN_EXTRACT_BIN,
  };
}

/**
 * Application configuration singleton
 */
export const config = {
  // Environment
  nodeEnv: env.NODE_ENV,
  isProduction: env.NODE_ENV === 'production',
  isDevelopment: env.NODE_ENV === 'development',
  isTest: env.NODE_ENV === 'test',

  // External executables
  engines: engineBinariesFrom(env),
  samtoolsBin: env.CIRCLESCAN_SAMTOOLS_BIN,
} as const;

// Re-export types
export type Config = typeof config;

// Re-export pipeline defaults
export * from './defaults.js';
