#!/usr/bin/env tsx
/**
 * PAIRWISE ARENA - HTTP Server
 *
 * Serves the read-only ranking API over the on-disk comparison archive.
 *
 * Usage:
 *   npm run serve
 *
 * Environment variables: see src/config.ts (ARCHIVE_DIR, LEADERBOARD_DIR, PORT, ...)
 */

import 'dotenv/config';

import { serve } from '@hono/node-server';
import { createApiRouter } from './api';
import { loadConfig } from './config';
import { FileOutcomeStore } from './outcomes';

const config = loadConfig();
const app = createApiRouter({ store: new FileOutcomeStore(config.archiveDir), config });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  console.log(`[Server] Listening on http://localhost:${info.port} (archive: ${config.archiveDir})`);
});
