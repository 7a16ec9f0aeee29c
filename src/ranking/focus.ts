/**
 * PAIRWISE ARENA - Focus Ranking
 *
 * Ranks every known model relative to one reference ("focus") model by
 * win-rate ratio. Win rates count ties as half a win.
 *
 *   direct:      ratio(m) = winrate_m / winrate_focus   in the m-vs-focus pairing
 *   transitive:  product of edge weights along the first BFS path from focus
 *
 * The win-ratio graph has an edge u → v with weight winrate_v / winrate_u
 * (both taken from the u-vs-v pairing) whenever winrate_u > 0. Multiplying
 * u's ratio by that weight gives v's. A missing edge means no usable signal.
 *
 * Direct ratios always beat transitive ones. A focus model that never won a
 * pairing gives that opponent a ratio of Infinity.
 */

import {
  loadCorpus,
  orient,
  pairKey,
  winRate,
  type Category,
  type ModelId,
  type OutcomeSet,
  type OutcomeStore,
  type Scope,
} from '../outcomes';

// ─── Types ────────────────────────────────────────────────────────────────────

export const DEFAULT_MAX_DEPTH = 3;

/** Adjacency map: graph.get(u)?.get(v) is the u → v weight. */
export type WinRatioGraph = Map<ModelId, Map<ModelId, number>>;

export type RatioKind = 'direct' | 'focus' | 'transitive';

export interface FocusRankingRow {
  model: ModelId;
  ratio: number;
  kind: RatioKind;
}

export interface FocusTally {
  focusWins: number;
  otherWins: number;
  ties: number;
  total: number;
}

export interface FocusComparison extends FocusTally {
  categories: Record<Category, FocusTally>;
}

// ─── Ranking ──────────────────────────────────────────────────────────────────

export class FocusRanking {
  readonly graph: WinRatioGraph = new Map();
  readonly directRatios = new Map<ModelId, number>();
  readonly transitiveRatios = new Map<ModelId, number>();

  private models = new Set<ModelId>();
  private comparisons = new Map<string, OutcomeSet>();
  private paths = new Map<ModelId, ModelId[]>();

  constructor(
    readonly focusModel: ModelId,
    private readonly store: OutcomeStore,
  ) {}

  /**
   * Ratio of every reachable model to the focus model. `maxDepth` of 1 keeps
   * direct comparisons only. Empty when the focus model has no outcomes.
   */
  async computeRankings(scope: Scope, maxDepth: number = DEFAULT_MAX_DEPTH): Promise<Map<ModelId, number>> {
    this.reset();
    await this.loadComparisons(scope);

    if (!this.models.has(this.focusModel)) {
      console.error(`[FocusRank] Focus model '${this.focusModel}' not found in any comparisons`);
      return new Map();
    }

    this.computeDirectRatios();
    if (maxDepth > 1) this.computeTransitiveRatios(maxDepth);

    const ratios = new Map<ModelId, number>(this.directRatios);
    for (const [model, ratio] of this.transitiveRatios) {
      if (!ratios.has(model)) ratios.set(model, ratio);
    }
    ratios.set(this.focusModel, 1.0);
    return ratios;
  }

  /** Ratios tagged by origin, highest first with Infinity on top. */
  getRankingTable(ratios: ReadonlyMap<ModelId, number>): FocusRankingRow[] {
    const rows: FocusRankingRow[] = [];
    for (const [model, ratio] of ratios) {
      const kind: RatioKind = this.directRatios.has(model)
        ? 'direct'
        : model === this.focusModel
          ? 'focus'
          : 'transitive';
      rows.push({ model, ratio, kind });
    }
    // Compare rather than subtract: Infinity - Infinity is NaN.
    return rows.sort((a, b) => (a.ratio === b.ratio ? 0 : a.ratio < b.ratio ? 1 : -1));
  }

  /** Raw tallies of every model against the focus model, focus side first. */
  getRawComparisonData(): Map<ModelId, FocusComparison> {
    const data = new Map<ModelId, FocusComparison>();

    for (const model of this.models) {
      if (model === this.focusModel) continue;
      const outcomes = this.comparisons.get(pairKey(this.focusModel, model));
      if (!outcomes) continue;

      const overall = orient(outcomes.overall, this.focusModel);
      if (!overall) continue;

      const categories: Record<Category, FocusTally> = {};
      for (const [category, outcome] of outcomes.byCategory) {
        const view = orient(outcome, this.focusModel);
        if (!view) continue;
        categories[category] = { focusWins: view.own, otherWins: view.other, ties: view.ties, total: view.total };
      }

      data.set(model, {
        focusWins: overall.own,
        otherWins: overall.other,
        ties: overall.ties,
        total: overall.total,
        categories,
      });
    }
    return data;
  }

  /** Path from the focus model used for each transitively ranked model. */
  getTransitivePaths(): Map<ModelId, ModelId[]> {
    const out = new Map<ModelId, ModelId[]>();
    for (const model of this.transitiveRatios.keys()) {
      const path = this.paths.get(model);
      if (path) out.set(model, [...path]);
    }
    return out;
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private reset(): void {
    this.graph.clear();
    this.directRatios.clear();
    this.transitiveRatios.clear();
    this.models.clear();
    this.comparisons.clear();
    this.paths.clear();
  }

  private async loadComparisons(scope: Scope): Promise<void> {
    const corpus = await loadCorpus(this.store, scope);
    console.log(`[FocusRank] Loaded ${corpus.outcomes.size} comparisons for promptset '${scope.promptset}'`);

    for (const [key, outcomes] of corpus.outcomes) {
      const { modelA, modelB } = outcomes.overall;
      this.models.add(modelA);
      this.models.add(modelB);
      this.comparisons.set(key, outcomes);

      const viewA = orient(outcomes.overall, modelA);
      const viewB = orient(outcomes.overall, modelB);
      if (!viewA || !viewB || viewA.total === 0) continue;

      const rateA = winRate(viewA);
      const rateB = winRate(viewB);
      if (rateA > 0) this.addEdge(modelA, modelB, rateB / rateA);
      if (rateB > 0) this.addEdge(modelB, modelA, rateA / rateB);
    }
  }

  private addEdge(from: ModelId, to: ModelId, weight: number): void {
    let edges = this.graph.get(from);
    if (!edges) {
      edges = new Map();
      this.graph.set(from, edges);
    }
    edges.set(to, weight);
  }

  private computeDirectRatios(): void {
    for (const model of this.models) {
      if (model === this.focusModel) continue;
      const outcomes = this.comparisons.get(pairKey(this.focusModel, model));
      const view = outcomes ? orient(outcomes.overall, this.focusModel) : null;
      if (!view || view.total === 0) continue;

      const focusRate = winRate(view);
      const otherRate = winRate({ own: view.other, other: view.own, ties: view.ties, total: view.total });
      this.directRatios.set(model, focusRate > 0 ? otherRate / focusRate : Infinity);
    }
  }

  /**
   * Level-by-level BFS from the focus model. The first path that reaches a
   * model is kept; neighbours are visited in graph insertion order.
   */
  private computeTransitiveRatios(maxDepth: number): void {
    this.paths.set(this.focusModel, [this.focusModel]);
    const visited = new Set<ModelId>([this.focusModel]);
    let frontier: ModelId[] = [this.focusModel];

    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: ModelId[] = [];
      for (const current of frontier) {
        const currentPath = this.paths.get(current) ?? [current];
        for (const neighbour of this.graph.get(current)?.keys() ?? []) {
          if (visited.has(neighbour)) continue;
          visited.add(neighbour);
          next.push(neighbour);
          this.paths.set(neighbour, [...currentPath, neighbour]);
        }
      }
      frontier = next;
    }

    for (const [model, path] of this.paths) {
      if (model === this.focusModel || this.directRatios.has(model)) continue;

      let ratio = 1.0;
      for (let i = 0; i < path.length - 1; i++) {
        ratio *= this.graph.get(path[i])?.get(path[i + 1]) ?? 0;
      }
      this.transitiveRatios.set(model, ratio);
    }
  }
}
