/**
 * Constrained Selection
 *
 * Picks the final recipes for a session: scoring, veto and negative-score
 * filtering, greedy budget packing, then the variety pass.
 *
 * Pipeline order is fixed; changing it changes results.
 */

import { Candidate, ScoredCandidate, SelectionOptions, Vote } from '../../types';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../../config';
import { UNKNOWN_CUISINE } from './constants';
import { eligibleScored, scoreCandidates } from './scoring';

export interface SelectionPlan<C extends Candidate> {
  selected: C[];
  /** Every input candidate, in scoring order */
  scored: ScoredCandidate<C>[];
  /** Variety bonus per candidate id that went through the variety pass */
  varietyBonuses: Map<string, number>;
  totalCostCents: number;
}

function byScoreDescending(a: ScoredCandidate, b: ScoredCandidate): number {
  if (b.score !== a.score) return b.score - a.score;
  return a.index - b.index;
}

export function candidateCost(candidate: Candidate): number {
  return candidate.costCents ?? 0;
}

/**
 * Greedy budget packing.
 *
 * Walks candidates by score and accepts each one whose cost still fits,
 * skipping the ones that don't and continuing with cheaper ones further
 * down. Stops once `count` are accepted.
 *
 * Known limitation: this is score-first, not cost-optimal. It does not
 * search for the cheapest combination.
 */
export function filterByBudget<C extends Candidate>(
  scored: ScoredCandidate<C>[],
  budgetLimit: number,
  count: number
): ScoredCandidate<C>[] {
  const selected: ScoredCandidate<C>[] = [];
  let totalCost = 0;

  for (const item of [...scored].sort(byScoreDescending)) {
    const cost = candidateCost(item.candidate);
    if (totalCost + cost <= budgetLimit) {
      selected.push(item);
      totalCost += cost;
      if (selected.length >= count) break;
    }
  }

  return selected;
}

class VarietyTracker {
  private cuisines = new Map<string, number>();
  private difficulties = new Map<string, number>();

  constructor(private config: EngineConfig['variety']) {}

  bonus(candidate: Candidate): number {
    const cuisine = candidate.cuisine ?? UNKNOWN_CUISINE;
    let bonus = 0;
    if (!this.cuisines.has(cuisine)) bonus += this.config.unseenCuisineBonus;
    if (!this.difficulties.has(candidate.difficulty)) bonus += this.config.unseenDifficultyBonus;
    return bonus;
  }

  record(candidate: Candidate): void {
    const cuisine = candidate.cuisine ?? UNKNOWN_CUISINE;
    this.cuisines.set(cuisine, (this.cuisines.get(cuisine) ?? 0) + 1);
    this.difficulties.set(
      candidate.difficulty,
      (this.difficulties.get(candidate.difficulty) ?? 0) + 1
    );
  }
}

/**
 * Variety pass over score-ordered candidates.
 *
 * Bonus: +10 for a cuisine not yet picked, +5 for a difficulty not yet
 * picked (defaults).
 *
 * In 'track' mode the bonus is recorded but the order is plain score
 * order, so the output matches a run without the variety pass.
 * In 'weighted' mode each step takes the remaining candidate with the
 * highest score + bonus; ties go to the higher score order.
 */
export function applyVariety<C extends Candidate>(
  scored: ScoredCandidate<C>[],
  count: number,
  config: EngineConfig['variety'] = DEFAULT_ENGINE_CONFIG.variety
): { selected: ScoredCandidate<C>[]; bonuses: Map<string, number> } {
  const tracker = new VarietyTracker(config);
  const bonuses = new Map<string, number>();
  const selected: ScoredCandidate<C>[] = [];
  const remaining = [...scored].sort(byScoreDescending);

  if (config.mode === 'track') {
    for (const item of remaining) {
      if (selected.length >= count) break;
      bonuses.set(item.candidate.id, tracker.bonus(item.candidate));
      selected.push(item);
      tracker.record(item.candidate);
    }
    return { selected, bonuses };
  }

  while (selected.length < count && remaining.length > 0) {
    let bestAt = 0;
    let bestValue = -Infinity;
    let bestBonus = 0;

    remaining.forEach((item, at) => {
      const bonus = tracker.bonus(item.candidate);
      if (item.score + bonus > bestValue) {
        bestAt = at;
        bestValue = item.score + bonus;
        bestBonus = bonus;
      }
    });

    const [picked] = remaining.splice(bestAt, 1);
    bonuses.set(picked.candidate.id, bestBonus);
    selected.push(picked);
    tracker.record(picked.candidate);
  }

  return { selected, bonuses };
}

/**
 * Run the full selection pipeline and keep the intermediate results.
 */
export function planSelection<C extends Candidate>(
  candidates: C[],
  votes: Vote[],
  count: number,
  options: SelectionOptions = {},
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): SelectionPlan<C> {
  const scored = scoreCandidates(candidates, votes);
  const varietyBonuses = new Map<string, number>();

  if (count <= 0) {
    return { selected: [], scored, varietyBonuses, totalCostCents: 0 };
  }

  let pool = eligibleScored(scored);

  if (options.budgetLimit !== undefined && options.budgetLimit !== null) {
    pool = filterByBudget(pool, options.budgetLimit, count);
  }

  if (options.preferVariety ?? true) {
    const variety = applyVariety(pool, count, config.variety);
    pool = variety.selected;
    variety.bonuses.forEach((bonus, id) => varietyBonuses.set(id, bonus));
  }

  const selected = pool.slice(0, count).map((s) => s.candidate);
  const totalCostCents = selected.reduce((sum, c) => sum + candidateCost(c), 0);

  return { selected, scored, varietyBonuses, totalCostCents };
}

/**
 * Select up to `count` recipes honoring vetoes, negative scores, an
 * optional budget (in cents) and the variety preference.
 */
export function smartSelect<C extends Candidate>(
  candidates: C[],
  votes: Vote[],
  count: number,
  options: SelectionOptions = {},
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): C[] {
  return planSelection(candidates, votes, count, options, config).selected;
}
