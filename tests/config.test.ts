#!/usr/bin/env tsx
/**
 * PAIRWISE ARENA - Config & Promptset Tests
 *
 * Run: npx tsx tests/config.test.ts
 */

import { promises as fs } from 'fs';
import path from 'path';
import { eloStorePath, loadConfig } from '../src/config';
import { BASIC1_CATEGORIES, getPromptCategories, readPromptset } from '../src/promptsets';
import { assert, assertThrows, makeTempDir, removeDir, report, section } from './harness';

const PROMPTSET_DIR = path.join(__dirname, '..', 'promptsets');

// ─── Config ──────────────────────────────────────────────────────────────────

function testDefaults(): void {
  section('Config: Defaults');

  const config = loadConfig({});
  assert(config.archiveDir === 'test_archive', 'Default archive dir');
  assert(config.defaultPromptset === 'basic1', 'Default promptset');
  assert(config.elo.kFactor === 32 && config.elo.startingRating === 1400, 'Default ELO settings');
  assert(config.bradleyTerry.maxIterations === 100, 'Default iteration cap');
  assert(config.focusMaxDepth === 3 && config.port === 8787, 'Default depth and port');
  assert(
    eloStorePath(config, 'coding') === path.join('leaderboard', 'coding_elo_ratings.json'),
    'ELO store path per promptset',
  );
}

function testOverrides(): void {
  section('Config: Overrides');

  const config = loadConfig({ ELO_K_FACTOR: '24', FOCUS_MAX_DEPTH: '5', LEADERBOARD_DIR: '/tmp/boards' });
  assert(config.elo.kFactor === 24, 'Numeric strings coerced');
  assert(config.focusMaxDepth === 5, 'Depth override');
  assert(config.leaderboardDir === '/tmp/boards', 'Directory override');

  assertThrows(() => loadConfig({ ELO_K_FACTOR: 'fast' }), Error, 'Non-numeric K-factor rejected');
  assertThrows(() => loadConfig({ FOCUS_MAX_DEPTH: '0' }), Error, 'Depth below 1 rejected');
}

// ─── Promptsets ──────────────────────────────────────────────────────────────

async function testBundledPromptset(): Promise<void> {
  section('Promptsets: Bundled basic1');

  const result = await readPromptset(PROMPTSET_DIR, 'basic1');
  assert(result.ok, 'basic1 parses');
  if (result.ok) {
    assert(Object.keys(result.value).join(',') === BASIC1_CATEGORIES.join(','), 'Categories match the built-in list');
    assert(Object.values(result.value).every((prompts) => prompts.length > 0), 'Every category has prompts');
  }
}

async function testCategoryFallback(): Promise<void> {
  section('Promptsets: Category Fallback');

  const dir = await makeTempDir('promptsets');
  try {
    await fs.writeFile(path.join(dir, 'mini.json'), JSON.stringify({ Math: ['p1'], Logic: ['p2'] }), 'utf8');
    await fs.writeFile(path.join(dir, 'broken.json'), JSON.stringify({ Math: 'p1' }), 'utf8');

    assert((await getPromptCategories(dir, 'mini')).join(',') === 'Math,Logic', 'Categories read from file');

    const fallback = (await getPromptCategories(dir, 'absent')).join(',');
    assert(fallback === BASIC1_CATEGORIES.join(','), 'Missing promptset falls back to basic1');

    const invalid = await readPromptset(dir, 'broken');
    assert(!invalid.ok && invalid.error.kind === 'invalid', 'Non-list prompts rejected');
  } finally {
    await removeDir(dir);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════

async function runAllTests(): Promise<void> {
  console.log('PAIRWISE ARENA - Config & Promptset Tests');
  console.log('=========================================');

  testDefaults();
  testOverrides();
  await testBundledPromptset();
  await testCategoryFallback();

  report('Config & Promptsets');
}

runAllTests().catch((err) => {
  console.error('Test runner failed:', err);
  process.exit(1);
});
