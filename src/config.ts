/**
 * PAIRWISE ARENA - Configuration
 *
 * Reads settings from the environment. Entry points load `.env` through
 * `dotenv/config` before calling `loadConfig()`; library code only ever
 * receives the parsed object.
 */

import path from 'path';
import { z } from 'zod';

export const ConfigSchema = z.object({
  ARCHIVE_DIR: z.string().min(1).default('test_archive'),
  LEADERBOARD_DIR: z.string().min(1).default('leaderboard'),
  PROMPTSET_DIR: z.string().min(1).default('promptsets'),
  DEFAULT_PROMPTSET: z.string().min(1).default('basic1'),
  ELO_K_FACTOR: z.coerce.number().int().positive().default(32),
  ELO_STARTING_RATING: z.coerce.number().finite().default(1400),
  BT_MAX_ITERATIONS: z.coerce.number().int().positive().default(100),
  BT_CONVERGENCE_THRESHOLD: z.coerce.number().positive().default(1e-6),
  FOCUS_MAX_DEPTH: z.coerce.number().int().min(1).default(3),
  PORT: z.coerce.number().int().min(1).max(65535).default(8787),
});

export interface ArenaConfig {
  archiveDir: string;
  leaderboardDir: string;
  promptsetDir: string;
  defaultPromptset: string;
  elo: {
    kFactor: number;
    startingRating: number;
  };
  bradleyTerry: {
    maxIterations: number;
    convergenceThreshold: number;
  };
  focusMaxDepth: number;
  port: number;
}

/**
 * Parse configuration from an env-like record.
 * Throws with every zod issue listed when a variable is malformed.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): ArenaConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    archiveDir: e.ARCHIVE_DIR,
    leaderboardDir: e.LEADERBOARD_DIR,
    promptsetDir: e.PROMPTSET_DIR,
    defaultPromptset: e.DEFAULT_PROMPTSET,
    elo: {
      kFactor: e.ELO_K_FACTOR,
      startingRating: e.ELO_STARTING_RATING,
    },
    bradleyTerry: {
      maxIterations: e.BT_MAX_ITERATIONS,
      convergenceThreshold: e.BT_CONVERGENCE_THRESHOLD,
    },
    focusMaxDepth: e.FOCUS_MAX_DEPTH,
    port: e.PORT,
  };
}

/** Location of the persisted ELO store for a promptset. */
export function eloStorePath(config: ArenaConfig, promptset: string): string {
  return path.join(config.leaderboardDir, `${promptset}_elo_ratings.json`);
}
