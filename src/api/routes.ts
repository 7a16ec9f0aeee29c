/**
 * PAIRWISE ARENA - API Routes
 *
 * Read-only REST endpoints over the ranking engine. Every route is scoped to
 * a promptset and recomputes from the outcome store on each request; the
 * only persisted state read here is the ELO store.
 * Uses Hono for routing with CORS middleware.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { z } from 'zod';
import { ConfidenceAnalyzer } from '../analysis';
import { eloStorePath, type ArenaConfig } from '../config';
import { UsageError } from '../errors';
import { buildWinMatrix, loadCorpus, type ModelId, type OutcomeStore, type Scope } from '../outcomes';
import { getPromptCategories } from '../promptsets';
import {
  BradleyTerryModel,
  DirectComparisonRanking,
  FocusRanking,
  buildLeaderboard,
  loadOrRebuildRatings,
} from '../ranking';

export interface ApiDeps {
  store: OutcomeStore;
  config: ArenaConfig;
}

// ─── Query Schemas ─────────────────────────────────────────────

const ModelListSchema = z
  .string()
  .transform((raw) => raw.split(',').map((m) => m.trim()).filter((m) => m.length > 0))
  .pipe(z.array(z.string()).min(2, 'models must name at least two models'));

const FocusQuerySchema = z.object({
  maxDepth: z.coerce.number().int().min(1).max(10).optional(),
});

const SuggestionQuerySchema = z.object({
  maxSuggestions: z.coerce.number().int().min(1).max(100).optional(),
  minComparisons: z.coerce.number().int().min(1).optional(),
  minPerCategory: z.coerce.number().int().min(1).optional(),
  maxRatingDiff: z.coerce.number().min(0).optional(),
});

function firstIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'Invalid query';
  return issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

/** JSON has no Infinity; ratios where the focus model never won go out as a string. */
export function serializeRatio(ratio: number): number | 'Infinity' {
  return Number.isFinite(ratio) ? ratio : 'Infinity';
}

// ─── Router ────────────────────────────────────────────────────

export function createApiRouter({ store, config }: ApiDeps): Hono {
  const app = new Hono();

  app.use(
    '*',
    cors({
      origin: '*',
      allowMethods: ['GET', 'OPTIONS'],
      allowHeaders: ['Content-Type'],
    }),
  );

  /** Models named in `?models=`, or every model with a stored outcome. */
  async function resolveModels(raw: string | undefined, scope: Scope): Promise<ModelId[]> {
    if (raw !== undefined) {
      const parsed = ModelListSchema.safeParse(raw);
      if (!parsed.success) throw new UsageError(firstIssue(parsed.error));
      return parsed.data;
    }
    const corpus = await loadCorpus(store, scope);
    return corpus.models;
  }

  function failure(label: string, error: unknown): { body: { error: string; detail?: string }; status: 400 | 500 } {
    if (error instanceof UsageError) {
      return { body: { error: error.message }, status: 400 };
    }
    console.error(`[API] ${label}:`, error);
    return { body: { error: label, detail: String(error) }, status: 500 };
  }

  // ─── Health / Root ───────────────────────────────────────────

  app.get('/health', (c) => {
    return c.json({
      status: 'ok',
      service: 'pairwise-arena',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/', (c) => {
    return c.json({
      name: 'pairwise-arena',
      version: '0.1.0',
      defaultPromptset: config.defaultPromptset,
      endpoints: {
        health: '/health',
        leaderboard: 'GET /promptsets/:promptset/leaderboard',
        bradleyTerry: 'GET /promptsets/:promptset/bradley-terry?models=a,b',
        direct: 'GET /promptsets/:promptset/direct?models=a,b',
        focus: 'GET /promptsets/:promptset/focus/:model?maxDepth=3',
        suggestions: 'GET /promptsets/:promptset/suggestions?maxSuggestions=10',
      },
    });
  });

  // ─── Rankings ────────────────────────────────────────────────

  /**
   * GET /promptsets/:promptset/leaderboard
   *
   * ELO leaderboard, overall and per category.
   */
  app.get('/promptsets/:promptset/leaderboard', async (c) => {
    try {
      const scope: Scope = { promptset: c.req.param('promptset') };
      const filePath = eloStorePath(config, scope.promptset);
      const { elo, source } = await loadOrRebuildRatings(store, scope, filePath, config.elo);
      return c.json({ source, ...buildLeaderboard(elo) });
    } catch (error) {
      const { body, status } = failure('Failed to build leaderboard', error);
      return c.json(body, status);
    }
  });

  /**
   * GET /promptsets/:promptset/bradley-terry?models=a,b,c
   *
   * Fitted strengths and the implied win-probability matrix.
   */
  app.get('/promptsets/:promptset/bradley-terry', async (c) => {
    try {
      const scope: Scope = { promptset: c.req.param('promptset') };
      const models = await resolveModels(c.req.query('models'), scope);
      if (models.length === 0) {
        return c.json({ error: `No comparisons found for promptset '${scope.promptset}'` }, 404);
      }

      const bt = new BradleyTerryModel(config.bradleyTerry);
      bt.fit(await buildWinMatrix(models, store, scope));

      return c.json({
        promptset: scope.promptset,
        models,
        iterations: bt.iterations,
        converged: bt.converged,
        rankings: bt.getRankings(),
        probabilities: bt.probabilityMatrix(),
      });
    } catch (error) {
      const { body, status } = failure('Failed to fit Bradley-Terry model', error);
      return c.json(body, status);
    }
  });

  /**
   * GET /promptsets/:promptset/direct?models=a,b,c
   *
   * Round-robin ranking. Incomplete subsets list the comparisons still needed.
   */
  app.get('/promptsets/:promptset/direct', async (c) => {
    try {
      const scope: Scope = { promptset: c.req.param('promptset') };
      const models = await resolveModels(c.req.query('models'), scope);

      const direct = new DirectComparisonRanking(store);
      const complete = await direct.computeRankings(models, scope);
      if (!complete) {
        return c.json({
          promptset: scope.promptset,
          models,
          complete,
          missing: direct.getMissingComparisonCommands(),
        });
      }

      return c.json({
        promptset: scope.promptset,
        models,
        complete,
        rankings: direct.getRankings(),
        probabilities: direct.probabilityMatrix,
        headToHead: direct.getHeadToHead(),
      });
    } catch (error) {
      const { body, status } = failure('Failed to compute direct ranking', error);
      return c.json(body, status);
    }
  });

  /**
   * GET /promptsets/:promptset/focus/:model?maxDepth=3
   *
   * Win-rate ratios of every reachable model relative to :model.
   */
  app.get('/promptsets/:promptset/focus/:model', async (c) => {
    try {
      const scope: Scope = { promptset: c.req.param('promptset') };
      const focusModel = c.req.param('model');

      const query = FocusQuerySchema.safeParse({ maxDepth: c.req.query('maxDepth') });
      if (!query.success) {
        return c.json({ error: firstIssue(query.error) }, 400);
      }
      const maxDepth = query.data.maxDepth ?? config.focusMaxDepth;

      const focus = new FocusRanking(focusModel, store);
      const ratios = await focus.computeRankings(scope, maxDepth);
      if (ratios.size === 0) {
        return c.json({ error: `Focus model '${focusModel}' not found in any comparisons` }, 404);
      }

      return c.json({
        promptset: scope.promptset,
        focusModel,
        maxDepth,
        rankings: focus.getRankingTable(ratios).map((row) => ({ ...row, ratio: serializeRatio(row.ratio) })),
        paths: Object.fromEntries(focus.getTransitivePaths()),
        comparisons: Object.fromEntries(focus.getRawComparisonData()),
      });
    } catch (error) {
      const { body, status } = failure('Failed to compute focus ranking', error);
      return c.json(body, status);
    }
  });

  // ─── Coverage ────────────────────────────────────────────────

  /**
   * GET /promptsets/:promptset/suggestions
   *
   * Query (all optional): maxSuggestions, minComparisons, minPerCategory, maxRatingDiff
   */
  app.get('/promptsets/:promptset/suggestions', async (c) => {
    try {
      const scope: Scope = { promptset: c.req.param('promptset') };

      const query = SuggestionQuerySchema.safeParse({
        maxSuggestions: c.req.query('maxSuggestions'),
        minComparisons: c.req.query('minComparisons'),
        minPerCategory: c.req.query('minPerCategory'),
        maxRatingDiff: c.req.query('maxRatingDiff'),
      });
      if (!query.success) {
        return c.json({ error: firstIssue(query.error) }, 400);
      }

      const filePath = eloStorePath(config, scope.promptset);
      const { elo } = await loadOrRebuildRatings(store, scope, filePath, config.elo);
      const categories = await getPromptCategories(config.promptsetDir, scope.promptset);
      const analyzer = await ConfidenceAnalyzer.create(store, scope, { elo, categories });

      return c.json({
        promptset: scope.promptset,
        summary: analyzer.getModelSummary(),
        suggestions: analyzer.generateSuggestions(query.data),
      });
    } catch (error) {
      const { body, status } = failure('Failed to generate suggestions', error);
      return c.json(body, status);
    }
  });

  // ─── 404 Catch-All ───────────────────────────────────────────

  app.all('*', (c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  return app;
}
