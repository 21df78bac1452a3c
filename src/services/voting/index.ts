/**
 * Voting Engine - Round Orchestrator
 *
 * Entry point for deciding one voting round. It coordinates:
 * - Session window filtering
 * - Scoring and constrained selection
 * - Schulze ranking of the eligible recipes
 * - Consensus metrics, budget status and explanations
 *
 * Everything below the orchestrator is pure. The orchestrator itself only
 * adds a generated decision id (when none is given) and a warning log.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  Candidate,
  CandidateTrace,
  ConsensusMetrics,
  RoundDecision,
  VotingRoundInput,
} from '../../types';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../../config';
import { ENGINE_VERSION } from './constants';
import { eligibleScored } from './scoring';
import { schulzeRank } from './schulze';
import { consensusMetrics } from './consensus';
import { planSelection } from './selection';
import { budgetStatus, remainingBudget } from './budget';
import { votesWithinWindow } from './session';
import { generateWhy } from './explanations';

export { ENGINE_VERSION, VOTE_POINTS } from './constants';
export * from './votes';
export { scoreCandidates, selectTop, eligibleScored, compareScored } from './scoring';
export { buildPairwiseMatrix } from './pairwise';
export { computeStrongestPaths, schulzeWins, schulzeRank } from './schulze';
export {
  consensusMetrics,
  recommendationStrength,
  filterByMinimumConsensus,
  describeMetrics,
} from './consensus';
export { smartSelect, planSelection, filterByBudget, applyVariety } from './selection';
export type { SelectionPlan } from './selection';
export {
  totalCost,
  remainingBudget,
  budgetStatus,
  formatCents,
  describeBudgetStatus,
} from './budget';
export {
  isVotingComplete,
  pendingCandidatesForVoter,
  votingProgress,
  votesWithinWindow,
  sessionDurationDays,
} from './session';
export { generateWhy } from './explanations';

/**
 * Decide a voting round.
 *
 * Algorithm:
 * 1. Keep votes cast inside the session window (when given)
 * 2. Score, filter, budget-pack and variety-pass the candidates
 * 3. Rank the eligible candidates with the Schulze method
 * 4. Compute consensus metrics and budget status
 * 5. Build explanations and the reasoning trace
 */
export function decideRound<C extends Candidate>(
  input: VotingRoundInput<C>,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): RoundDecision<C> {
  const { candidates, count } = input;
  const budgetLimit = input.budgetLimit ?? null;
  const now = input.now ?? new Date();
  const warnings: string[] = [];

  // ─────────────────────────────────────────────────────────────
  // STEP 1: Session window
  // ─────────────────────────────────────────────────────────────
  const votes = input.window ? votesWithinWindow(input.votes, input.window) : input.votes;
  const votesOutsideWindow = input.votes.length - votes.length;

  const knownIds = new Set(candidates.map((c) => c.id));
  const unknownVotes = votes.filter((v) => !knownIds.has(v.candidateId)).length;
  if (unknownVotes > 0) {
    warnings.push(`${unknownVotes} vote(s) reference recipes outside this round and were ignored`);
  }

  if (candidates.length > config.schulzeWarnAt) {
    const message =
      `Schulze ranking over ${candidates.length} candidates is O(N³); ` +
      `consider narrowing the round below ${config.schulzeWarnAt}`;
    warnings.push(message);
    console.warn(`[Consensus] ${message}`);
  }

  // ─────────────────────────────────────────────────────────────
  // STEP 2: Constrained selection
  // ─────────────────────────────────────────────────────────────
  const plan = planSelection(
    candidates,
    votes,
    count,
    { budgetLimit, preferVariety: input.preferVariety ?? true },
    config
  );

  // ─────────────────────────────────────────────────────────────
  // STEP 3: Schulze ranking over eligible candidates
  // ─────────────────────────────────────────────────────────────
  const eligibleIds = new Set(eligibleScored(plan.scored).map((s) => s.candidate.id));
  const ranking = schulzeRank(
    candidates.filter((c) => eligibleIds.has(c.id)),
    votes
  );

  // ─────────────────────────────────────────────────────────────
  // STEP 4: Metrics and budget
  // ─────────────────────────────────────────────────────────────
  const metrics = new Map<string, ConsensusMetrics>();
  for (const candidate of candidates) {
    metrics.set(candidate.id, consensusMetrics(candidate, votes, config));
  }

  const status = budgetStatus(budgetLimit, plan.selected, config.nearLimitRatio);

  // ─────────────────────────────────────────────────────────────
  // STEP 5: Explanations and trace
  // ─────────────────────────────────────────────────────────────
  const why = generateWhy({
    selected: plan.selected,
    scored: plan.scored,
    metrics,
    requestedCount: count,
    budgetLimit,
    totalCostCents: plan.totalCostCents,
    budgetStatus: status,
  });

  const candidateTraces: CandidateTrace[] = plan.scored.map((s) => {
    const m = metrics.get(s.candidate.id);
    return {
      candidate_id: s.candidate.id,
      score: s.score,
      has_veto: s.hasVeto,
      eligible: eligibleIds.has(s.candidate.id),
      total_votes: m?.totalVotes ?? 0,
      consensus_level: m?.consensusLevel ?? 0,
      positive_percentage: m?.positivePercentage ?? 0,
      recommendation_strength: m?.recommendationStrength ?? 0,
      vote_counts: m?.voteCounts ?? {},
      variety_bonus: plan.varietyBonuses.get(s.candidate.id) ?? null,
    };
  });

  return {
    decisionId: input.decisionId ?? uuidv4(),
    selected: plan.selected,
    ranking,
    metrics,
    totalCostCents: plan.totalCostCents,
    budgetStatus: status,
    remainingBudgetCents: remainingBudget(budgetLimit, plan.selected),
    why,
    warnings,
    trace: {
      version: ENGINE_VERSION,
      generated_at: now.toISOString(),
      candidate_count: candidates.length,
      vote_count: votes.length,
      votes_outside_window: votesOutsideWindow,
      votes_for_unknown_candidates: unknownVotes,
      candidates: candidateTraces,
      schulze_order: ranking.map((c) => c.id),
      variety_mode: config.variety.mode,
      selected: plan.selected.map((c) => c.id),
    },
  };
}
