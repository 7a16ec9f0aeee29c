#!/usr/bin/env tsx
/**
 * PAIRWISE ARENA - CLI
 *
 * Prints rankings and coverage reports for the on-disk comparison archive.
 *
 * Usage:
 *   npm run rank -- leaderboard             [--promptset NAME]
 *   npm run rank -- rebuild                 [--promptset NAME]
 *   npm run rank -- bradley-terry <model…>  [--promptset NAME]
 *   npm run rank -- direct <model…>         [--promptset NAME]
 *   npm run rank -- focus <model>           [--promptset NAME] [--depth N]
 *   npm run rank -- suggest                 [--promptset NAME] [--max N]
 *
 * Environment variables: see src/config.ts
 */

import 'dotenv/config';

import path from 'path';
import { parseArgs } from 'util';
import { ConfidenceAnalyzer } from '../src/analysis';
import { eloStorePath, loadConfig, type ArenaConfig } from '../src/config';
import { UsageError } from '../src/errors';
import { FileOutcomeStore, loadCorpus, type Scope } from '../src/outcomes';
import { getPromptCategories } from '../src/promptsets';
import {
  buildLeaderboard,
  generateBradleyTerryRankings,
  loadOrRebuildRatings,
  rebuildEloRatings,
  saveLeaderboard,
  saveRatings,
  DirectComparisonRanking,
  FocusRanking,
  type EloRatingSystem,
} from '../src/ranking';

// ═══════════════════════════════════════════════════════════════════════════════
// ANSI Color Utilities
// ═══════════════════════════════════════════════════════════════════════════════

const C = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
  gray: '\x1b[90m',
} as const;

function c(color: keyof typeof C, text: string): string {
  return `${C[color]}${text}${C.reset}`;
}

function heading(text: string): void {
  console.log(`\n${c('bold', c('green', text))}`);
}

/** Left-aligned columns, header in magenta. */
function table(headers: string[], rows: string[][]): void {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const line = (cells: string[]): string => cells.map((cell, i) => cell.padEnd(widths[i])).join('  ');
  console.log(c('magenta', line(headers)));
  console.log(c('gray', widths.map((w) => '─'.repeat(w)).join('  ')));
  for (const row of rows) console.log(line(row));
}

function formatRatio(ratio: number): string {
  return Number.isFinite(ratio) ? ratio.toFixed(3) : '∞';
}

// ═══════════════════════════════════════════════════════════════════════════════
// Commands
// ═══════════════════════════════════════════════════════════════════════════════

function printElo(elo: EloRatingSystem): void {
  const board = buildLeaderboard(elo);
  heading(`ELO Leaderboard (${board.promptset})`);
  table(
    ['Rank', 'Model', 'Rating'],
    board.overall.map((r, i) => [String(i + 1), r.model, r.rating.toFixed(0)]),
  );
  for (const [category, rows] of Object.entries(board.categories)) {
    heading(`${category} Rankings`);
    table(
      ['Rank', 'Model', 'Rating'],
      rows.map((r, i) => [String(i + 1), r.model, r.rating.toFixed(0)]),
    );
  }
}

async function leaderboard(config: ArenaConfig, store: FileOutcomeStore, scope: Scope): Promise<void> {
  const { elo } = await loadOrRebuildRatings(store, scope, eloStorePath(config, scope.promptset), config.elo);
  printElo(elo);
}

async function rebuild(config: ArenaConfig, store: FileOutcomeStore, scope: Scope): Promise<void> {
  const elo = await rebuildEloRatings(store, scope, config.elo);
  await saveRatings(elo, eloStorePath(config, scope.promptset));
  await saveLeaderboard(
    buildLeaderboard(elo),
    path.join(config.leaderboardDir, `${scope.promptset}_leaderboard.json`),
  );
  printElo(elo);
}

async function bradleyTerry(config: ArenaConfig, store: FileOutcomeStore, scope: Scope, models: string[]): Promise<void> {
  const subset = models.length > 0 ? models : (await loadCorpus(store, scope)).models;
  const bt = await generateBradleyTerryRankings(subset, store, scope, config.bradleyTerry);

  heading(`Bradley-Terry Strengths (${scope.promptset})`);
  table(
    ['Rank', 'Model', 'Strength'],
    bt.getRankings().map((r, i) => [String(i + 1), r.model, r.strength.toFixed(4)]),
  );
  console.log(c('dim', `${bt.converged ? 'Converged' : 'Stopped'} after ${bt.iterations} iterations`));
}

async function direct(store: FileOutcomeStore, scope: Scope, models: string[]): Promise<boolean> {
  if (models.length < 2) throw new UsageError('direct needs at least two models');

  const ranking = new DirectComparisonRanking(store);
  if (!(await ranking.computeRankings(models, scope))) {
    heading('Missing Comparisons');
    for (const { modelA, modelB, promptset } of ranking.getMissingComparisonCommands()) {
      console.log(`  ${c('yellow', modelA)} vs ${c('yellow', modelB)} ${c('gray', `(promptset ${promptset})`)}`);
    }
    return false;
  }

  heading(`Direct Comparison (${scope.promptset})`);
  table(
    ['Rank', 'Model', 'Avg Win Rate'],
    ranking.getRankings().map((r, i) => [String(i + 1), r.model, r.score.toFixed(3)]),
  );
  heading('Head-to-Head');
  for (const h of ranking.getHeadToHead()) {
    console.log(`  ${h.modelA} ${c('cyan', `${h.winsA}-${h.winsB}-${h.ties}`)} ${h.modelB}`);
  }
  return true;
}

async function focus(store: FileOutcomeStore, scope: Scope, model: string | undefined, depth: number): Promise<boolean> {
  if (!model) throw new UsageError('focus needs a model');

  const ranking = new FocusRanking(model, store);
  const ratios = await ranking.computeRankings(scope, depth);
  if (ratios.size === 0) return false;

  heading(`Focus Ranking: ${model} (${scope.promptset}, depth ${depth})`);
  const paths = ranking.getTransitivePaths();
  table(
    ['Rank', 'Model', 'Ratio', 'Type', 'Path'],
    ranking.getRankingTable(ratios).map((r, i) => [
      String(i + 1),
      r.model,
      formatRatio(r.ratio),
      r.kind,
      paths.get(r.model)?.join(' → ') ?? '',
    ]),
  );
  return true;
}

async function suggest(config: ArenaConfig, store: FileOutcomeStore, scope: Scope, max: number): Promise<void> {
  const { elo } = await loadOrRebuildRatings(store, scope, eloStorePath(config, scope.promptset), config.elo);
  const categories = await getPromptCategories(config.promptsetDir, scope.promptset);
  const analyzer = await ConfidenceAnalyzer.create(store, scope, { elo, categories });

  const summary = analyzer.getModelSummary();
  heading(`Model Comparison Summary (${scope.promptset})`);
  console.log(`Total Models: ${summary.totalModels}`);
  console.log(`Total Comparisons: ${summary.totalComparisons}`);

  heading('Suggested Additional Comparisons');
  const suggestions = analyzer.generateSuggestions({ maxSuggestions: max });
  if (suggestions.length === 0) {
    console.log('No additional comparisons needed at this time.');
    return;
  }
  table(
    ['#', 'Model A', 'Model B', 'Reason', 'Category'],
    suggestions.map((s, i) => [String(i + 1), s.modelA, s.modelB, s.reason, s.category ?? 'All']),
  );
}

// ═══════════════════════════════════════════════════════════════════════════════
// Main
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      promptset: { type: 'string' },
      depth: { type: 'string' },
      max: { type: 'string' },
    },
  });

  const config = loadConfig();
  const store = new FileOutcomeStore(config.archiveDir);
  const scope: Scope = { promptset: values.promptset ?? config.defaultPromptset };
  const [command, ...args] = positionals;

  switch (command) {
    case 'leaderboard':
      await leaderboard(config, store, scope);
      return 0;
    case 'rebuild':
      await rebuild(config, store, scope);
      return 0;
    case 'bradley-terry':
      await bradleyTerry(config, store, scope, args);
      return 0;
    case 'direct':
      return (await direct(store, scope, args)) ? 0 : 1;
    case 'focus':
      return (await focus(store, scope, args[0], parseCount(values.depth, config.focusMaxDepth))) ? 0 : 1;
    case 'suggest':
      await suggest(config, store, scope, parseCount(values.max, 10));
      return 0;
    default:
      throw new UsageError(
        `Unknown command '${command ?? ''}'. Expected leaderboard, rebuild, bradley-terry, direct, focus or suggest.`,
      );
  }
}

function parseCount(raw: string | undefined, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new UsageError(`Expected a positive integer, got '${raw}'`);
  }
  return value;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error(c('red', `Error: ${err instanceof Error ? err.message : String(err)}`));
    process.exit(1);
  });
