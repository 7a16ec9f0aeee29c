#!/usr/bin/env tsx
/**
 * PAIRWISE ARENA - Confidence Analyzer Tests
 *
 * Run: npx tsx tests/confidence.test.ts
 */

import { ConfidenceAnalyzer } from '../src/analysis';
import { InMemoryOutcomeStore } from '../src/outcomes';
import { EloRatingSystem } from '../src/ranking';
import { assert, assertApprox, makeRecord, report, section, tally } from './harness';

const scope = { promptset: 'basic1' };

/**
 * A-B: 8 games over two categories. B-C: 2 games in Programming.
 * D only appears in an empty record, so it is known but never compared.
 */
function coverageStore(): InMemoryOutcomeStore {
  return new InMemoryOutcomeStore([
    makeRecord('A', 'B', { Programming: tally(3, 1, 0), Reasoning: tally(2, 1, 1) }),
    makeRecord('B', 'C', { Programming: tally(1, 1, 0) }),
    makeRecord('D', 'A', { Reasoning: tally(0, 0, 0) }),
  ]);
}

function ratings(): EloRatingSystem {
  const elo = new EloRatingSystem();
  elo.setRating('A', 1500);
  elo.setRating('B', 1480);
  elo.setRating('C', 1400);
  elo.setRating('D', 1390);
  return elo;
}

function keys(pairs: { first: string; second: string }[]): string {
  return pairs.map((p) => `${p.first}-${p.second}`).join(',');
}

// ─── Gap Sources ─────────────────────────────────────────────────────────────

async function testMissingAndLowConfidence(): Promise<void> {
  section('Confidence: Missing and Low-Confidence Pairs');

  const analyzer = await ConfidenceAnalyzer.create(coverageStore(), scope);
  assert(analyzer.models.join(',') === 'A,B,C,D', 'Every model in a record is known');
  assert(keys(analyzer.getMissingComparisons()) === 'A-C,A-D,B-D,C-D', 'Empty record counts as missing');

  const low = analyzer.getLowConfidencePairs(5);
  assert(low.length === 1 && keys([low[0].pair]) === 'B-C' && low[0].count === 2, 'B-C has only two games');
  assert(analyzer.getLowConfidencePairs(9).map((e) => e.count).join(',') === '2,8', 'Fewest games first');
}

async function testCloseRatings(): Promise<void> {
  section('Confidence: Close Ratings');

  const withElo = await ConfidenceAnalyzer.create(coverageStore(), scope, { elo: ratings() });
  const close = withElo.getCloseRatingPairs(50);
  assert(keys(close.map((e) => e.pair)) === 'C-D,A-B', 'Pairs within 50 points, closest first');
  assert(close[0].diff === 10 && close[1].diff === 20, 'Absolute rating differences');

  const withoutElo = await ConfidenceAnalyzer.create(coverageStore(), scope);
  assert(withoutElo.getCloseRatingPairs(50).length === 0, 'No ratings means no close pairs');
}

async function testCategoryGaps(): Promise<void> {
  section('Confidence: Category Gaps');

  const analyzer = await ConfidenceAnalyzer.create(coverageStore(), scope);
  assert(analyzer.categories.join(',') === 'Programming,Reasoning', 'Categories observed in the corpus');

  const gaps = analyzer.getCategoryGaps(3);
  const programming = gaps.get('Programming') ?? [];
  const reasoning = gaps.get('Reasoning') ?? [];
  assert(programming.length === 1 && programming[0].count === 2, 'B-C thin in Programming');
  assert(reasoning.length === 1 && keys([reasoning[0].pair]) === 'B-C' && reasoning[0].count === 0, 'B-C absent from Reasoning');

  const explicit = await ConfidenceAnalyzer.create(coverageStore(), scope, {
    categories: ['Programming', 'Summarization'],
  });
  const summarization = explicit.getCategoryGaps(1).get('Summarization') ?? [];
  assert(summarization.length === 2, 'Unplayed category lists every compared pair');
  assert(!explicit.getCategoryGaps(1).has('Reasoning'), 'Only requested categories checked');
}

// ─── Suggestions ─────────────────────────────────────────────────────────────

async function testSuggestions(): Promise<void> {
  section('Confidence: Suggestions');

  const analyzer = await ConfidenceAnalyzer.create(coverageStore(), scope, { elo: ratings() });
  const suggestions = analyzer.generateSuggestions();

  assert(
    suggestions.map((s) => `${s.modelA}-${s.modelB}`).join(',') === 'A-C,A-D,B-D,C-D,B-C,A-B',
    'Deduplicated and ordered by priority',
  );
  assert(suggestions.map((s) => s.priority).join(',') === '1,1,1,1,2,3', 'Priorities attached');
  assert(suggestions[0].reason === 'These models have never been compared', 'Missing pair reason');
  assert(suggestions[4].reason === 'Only 2 comparisons (recommended: 5)', 'Low-confidence reason');
  assert(suggestions[5].reason === 'Close ELO ratings (diff: 20.0)', 'Close-rating reason');
  assert(suggestions.every((s) => s.promptset === 'basic1'), 'Promptset attached');

  const capped = analyzer.generateSuggestions({ maxSuggestions: 3 });
  assert(capped.map((s) => `${s.modelA}-${s.modelB}`).join(',') === 'A-C,A-D,B-D', 'Capped at maxSuggestions');
}

async function testCategorySuggestions(): Promise<void> {
  section('Confidence: Category Suggestions');

  const store = new InMemoryOutcomeStore([
    makeRecord('A', 'B', { Programming: tally(5, 0, 0), Reasoning: tally(1, 0, 0) }),
  ]);
  const analyzer = await ConfidenceAnalyzer.create(store, scope, {
    categories: ['Programming', 'Reasoning', 'Summarization'],
  });
  const suggestions = analyzer.generateSuggestions();

  assert(suggestions.length === 1, 'Pair suggested once across categories');
  assert(suggestions[0].priority === 4 && suggestions[0].category === 'Reasoning', 'First thin category wins');
  assert(suggestions[0].reason === "Only 1 comparisons in 'Reasoning' category", 'Category reason');
}

// ─── Summaries ───────────────────────────────────────────────────────────────

async function testSummaries(): Promise<void> {
  section('Confidence: Model Summaries');

  const analyzer = await ConfidenceAnalyzer.create(coverageStore(), scope, { elo: ratings() });

  const under = analyzer.getUnderrepresentedModels();
  assert(under.map((m) => `${m.model}:${m.count}`).join(',') === 'D:0,C:2,A:8,B:10', 'Fewest games first');

  const summary = analyzer.getModelSummary();
  assert(summary.totalModels === 4 && summary.totalComparisons === 10, 'Totals');
  assert(summary.modelComparisonCounts['D'] === 0, 'Uncompared model listed with zero');
  assertApprox(summary.modelCategoryDistribution['B']['Programming'], 60, 1e-9, 'B plays 6 of 10 in Programming');
  assertApprox(summary.modelCategoryDistribution['A']['Reasoning'], 50, 1e-9, 'A split evenly');
  assert(summary.modelRatings['A'] === 1500, 'Ratings included with a rating store');

  const bare = await ConfidenceAnalyzer.create(coverageStore(), scope);
  assert(Object.keys(bare.getModelSummary().modelRatings).length === 0, 'No ratings without a rating store');
}

// ═══════════════════════════════════════════════════════════════════════════════

async function runAllTests(): Promise<void> {
  console.log('PAIRWISE ARENA - Confidence Analyzer Tests');
  console.log('==========================================');

  await testMissingAndLowConfidence();
  await testCloseRatings();
  await testCategoryGaps();
  await testSuggestions();
  await testCategorySuggestions();
  await testSummaries();

  report('Confidence Analyzer');
}

runAllTests().catch((err) => {
  console.error('Test runner failed:', err);
  process.exit(1);
});
