/**
 * PAIRWISE ARENA
 *
 * Rating and ranking engine for language models compared pairwise.
 * Consumes win/loss/tie outcomes; never calls a model or a judge itself.
 */

export * from './errors';
export { loadConfig, eloStorePath, ConfigSchema } from './config';
export type { ArenaConfig } from './config';
export * from './outcomes';
export * from './ranking';
export * from './analysis';
export * from './promptsets';
export { createApiRouter, serializeRatio } from './api';
export type { ApiDeps } from './api';
