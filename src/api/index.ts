/**
 * PAIRWISE ARENA - API Module
 *
 * Read-only REST surface over the ranking engine.
 * Routes: /promptsets/:promptset/{leaderboard,bradley-terry,direct,focus,suggestions}
 */

export { createApiRouter, serializeRatio } from './routes';
export type { ApiDeps } from './routes';
