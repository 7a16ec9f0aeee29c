#!/usr/bin/env tsx
/**
 * PAIRWISE ARENA - Outcome Store Tests
 *
 * Pair keys, record aggregation, the in-memory and file-backed stores,
 * and the win matrix / corpus views built on top of them.
 *
 * Run: npx tsx tests/outcomes.test.ts
 */

import { promises as fs } from 'fs';
import path from 'path';
import { UsageError } from '../src/errors';
import {
  FileOutcomeStore,
  InMemoryOutcomeStore,
  buildWinMatrix,
  comparisonFilename,
  createWinMatrix,
  loadCorpus,
  matchCounts,
  orient,
  outcomeSetFromRecord,
  parseComparisonFilename,
  unorderedPair,
  winRate,
} from '../src/outcomes';
import {
  assert,
  assertApprox,
  assertThrows,
  makeRecord,
  makeTempDir,
  removeDir,
  report,
  section,
  tally,
} from './harness';

const scope = { promptset: 'basic1' };

function scenarioStore(): InMemoryOutcomeStore {
  return new InMemoryOutcomeStore([
    makeRecord('A', 'B', { General: tally(7, 3, 0) }),
    makeRecord('B', 'C', { General: tally(6, 2, 2) }),
  ]);
}

// ─── Pairs ───────────────────────────────────────────────────────────────────

function testUnorderedPair(): void {
  section('Pairs: Canonical Ordering');

  const ab = unorderedPair('beta', 'alpha');
  const ba = unorderedPair('alpha', 'beta');
  assert(ab.key === ba.key, '(a,b) and (b,a) share one key');
  assert(ab.first === 'alpha' && ab.second === 'beta', 'First member sorts lowest');

  const tricky = unorderedPair('a,b', 'c');
  const other = unorderedPair('a', 'b,c');
  assert(tricky.key !== other.key, 'Ids containing commas do not collide');
}

function testOrientAndWinRate(): void {
  section('Pairs: Orientation and Win Rate');

  const outcome = { modelA: 'A', modelB: 'B', category: null, winsA: 7, winsB: 3, ties: 0 };
  const fromB = orient(outcome, 'B');
  assert(fromB !== null && fromB.own === 3 && fromB.other === 7 && fromB.total === 10, 'B sees 3 wins against 7');
  assert(orient(outcome, 'Z') === null, 'Non-participant gets null');

  const withTies = { modelA: 'B', modelB: 'C', category: null, winsA: 6, winsB: 2, ties: 2 };
  const fromC = orient(withTies, 'C');
  assertApprox(fromC ? winRate(fromC) : -1, 0.3, 1e-12, 'Ties count as half a win');
  assert(winRate({ own: 0, other: 0, ties: 0, total: 0 }) === 0, 'Empty pairing has win rate 0');
}

// ─── Record Aggregation ──────────────────────────────────────────────────────

function testOutcomeSetFromRecord(): void {
  section('Records: Category Aggregation');

  const record = makeRecord('A', 'B', {
    Programming: tally(3, 1, 0),
    Reasoning: tally(2, 2, 1),
  });

  const all = outcomeSetFromRecord(record, scope);
  assert(all.overall.winsA === 5, 'Overall winsA sums categories');
  assert(all.overall.winsB === 3, 'Overall winsB sums categories');
  assert(all.overall.ties === 1, 'Overall ties sum categories');
  assert(all.overall.category === null, 'Overall aggregate has no category');
  assert(all.byCategory.size === 2, 'Both categories kept');

  const filtered = outcomeSetFromRecord(record, { promptset: 'basic1', categories: ['Reasoning'] });
  assert(filtered.overall.winsA === 2 && filtered.overall.winsB === 2, 'Scope categories limit the overall sum');
  assert(filtered.byCategory.size === 1 && filtered.byCategory.has('Reasoning'), 'Only scoped category remains');
}

// ─── In-Memory Store ─────────────────────────────────────────────────────────

async function testInMemoryStore(): Promise<void> {
  section('InMemoryOutcomeStore');

  const store = scenarioStore();

  const forward = await store.load('A', 'B', scope);
  const reverse = await store.load('B', 'A', scope);
  assert(forward !== null && reverse !== null, 'Load works in both argument orders');
  assert(reverse?.overall.modelA === 'A', 'Outcome keeps stored orientation');
  assert((await store.load('A', 'C', scope)) === null, 'Never-compared pair is null');
  assert((await store.load('A', 'B', { promptset: 'other' })) === null, 'Other promptset is separate');
  assert((await store.load('A', 'A', scope)) === null, 'Self pair is null');

  store.save(makeRecord('B', 'A', { General: tally(4, 1, 0) }));
  const superseded = await store.load('A', 'B', scope);
  assert(superseded?.overall.modelA === 'B' && superseded.overall.winsA === 4, 'Re-run supersedes, not merges');

  const pairs = await store.listAll(scope);
  assert(pairs.length === 2, 'Superseded pair listed once');

  assertThrows(
    () => store.save(makeRecord('A', 'A', { General: tally(1, 0, 0) })),
    UsageError,
    'Self comparison record is rejected',
  );
}

// ─── File Store ──────────────────────────────────────────────────────────────

function testFilenames(): void {
  section('FileOutcomeStore: Filenames');

  assert(comparisonFilename('org/m:1', 'alpha') === 'alpha__vs__org_m_1.json', 'Sorted and sanitised');
  assert(comparisonFilename('alpha', 'org/m:1') === 'alpha__vs__org_m_1.json', 'Argument order does not matter');

  const [a, b] = parseComparisonFilename('m1__vs__m2.json');
  assert(a === 'm1' && b === 'm2', 'Filename splits into two names');
  assertThrows(() => parseComparisonFilename('notes.json'), UsageError, 'Missing separator is a usage error');
  assertThrows(() => parseComparisonFilename('a__vs__b__vs__c.json'), UsageError, 'Two separators is a usage error');
  assertThrows(() => parseComparisonFilename('a__vs__b.txt'), UsageError, 'Non-json name is a usage error');
}

async function testFileStore(): Promise<void> {
  section('FileOutcomeStore: Round Trip');

  const dir = await makeTempDir('outcomes');
  try {
    const store = new FileOutcomeStore(dir);
    const written = await store.save(makeRecord('model-b', 'model-a', { General: tally(2, 5, 1) }));
    assert(
      written === path.join(dir, 'basic1', 'comparisons', 'model-a__vs__model-b.json'),
      'Record written under promptset/comparisons',
    );

    const loaded = await store.load('model-a', 'model-b', scope);
    assert(loaded?.overall.modelA === 'model-b' && loaded.overall.winsB === 5, 'Loaded record matches');
    assert((await store.load('model-a', 'model-c', scope)) === null, 'Missing file is null');

    const listed = await store.listAll(scope);
    assert(listed.length === 1 && listed[0][0] === 'model-b', 'Ids come from the record body');

    const comparisons = store.comparisonsDir('basic1');
    await fs.writeFile(path.join(comparisons, 'broken__vs__pair.json'), '{not json', 'utf8');
    assert((await store.load('broken', 'pair', scope)) === null, 'Corrupt record loads as null');
    assert((await store.listAll(scope)).length === 1, 'Corrupt record skipped when listing');

    await store.save(makeRecord('x:1', 'y', { General: tally(1, 0, 0) }));
    assert((await store.load('x_1', 'y', scope)) === null, 'Filename collision does not return the wrong pair');
    assert((await store.load('x:1', 'y', scope)) !== null, 'Original ids still load');

    assert((await store.listAll({ promptset: 'empty' })).length === 0, 'Unknown promptset lists nothing');

    await store.save(makeRecord('m1', 'm2', { General: tally(1, 1, 0) }, 'junk'));
    await fs.writeFile(path.join(store.comparisonsDir('junk'), 'stray.json'), '{}', 'utf8');
    const junkPairs = await store.listAll({ promptset: 'junk' });
    assert(
      junkPairs.length === 1 && junkPairs[0][0] === 'm1' && junkPairs[0][1] === 'm2',
      'File without a pair name is skipped, valid records still listed',
    );
  } finally {
    await removeDir(dir);
  }
}

// ─── Aggregates ──────────────────────────────────────────────────────────────

async function testWinMatrix(): Promise<void> {
  section('Aggregates: Win Matrix');

  const store = scenarioStore();
  const matrix = await buildWinMatrix(['A', 'B', 'C'], store, scope);

  assert(matrix.wins[0][1] === 7 && matrix.wins[1][0] === 3, 'A-B wins in both directions');
  assert(matrix.wins[1][2] === 6 && matrix.wins[2][1] === 2, 'B-C wins in both directions');
  assert(matrix.ties[1][2] === 2 && matrix.ties[2][1] === 2, 'Ties are symmetric');
  assert(matrix.wins[0][2] === 0 && matrix.wins[2][0] === 0, 'Uncompared pair stays zero');

  const counts = matchCounts(matrix);
  assert(counts[0][1] === 10 && counts[1][0] === 10, 'Match counts symmetric');
  assert(counts[1][2] === 8, 'Match counts exclude ties');

  const reversed = await buildWinMatrix(['C', 'B'], store, scope);
  assert(reversed.wins[0][1] === 2 && reversed.wins[1][0] === 6, 'Orientation follows the model list');

  assertThrows(() => createWinMatrix(['A', 'A'], [[0, 0], [0, 0]]), UsageError, 'Duplicate models rejected');
  assertThrows(() => createWinMatrix(['A', 'B'], [[0, 1]]), UsageError, 'Wrong dimensions rejected');
}

async function testCorpus(): Promise<void> {
  section('Aggregates: Corpus Snapshot');

  const corpus = await loadCorpus(scenarioStore(), scope);
  assert(corpus.models.join(',') === 'A,B,C', 'Models sorted and unique');
  assert(corpus.outcomes.size === 2, 'One entry per stored pair');
  assert(corpus.outcomes.has(unorderedPair('C', 'B').key), 'Keyed by unordered pair');
}

// ═══════════════════════════════════════════════════════════════════════════════

async function runAllTests(): Promise<void> {
  console.log('PAIRWISE ARENA - Outcome Store Tests');
  console.log('====================================');

  testUnorderedPair();
  testOrientAndWinRate();
  testOutcomeSetFromRecord();
  await testInMemoryStore();
  testFilenames();
  await testFileStore();
  await testWinMatrix();
  await testCorpus();

  report('Outcome Store');
}

runAllTests().catch((err) => {
  console.error('Test runner failed:', err);
  process.exit(1);
});
