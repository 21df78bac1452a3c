/**
 * Round Intake
 *
 * Validates round requests arriving as snake_case JSON from the host app
 * and renders decisions back to the same wire format.
 */

import { ZodError } from 'zod';
import { parseISO } from 'date-fns';
import {
  Candidate,
  CandidateInput,
  ConsensusMetrics,
  RoundDecision,
  RoundRequestSchema,
  RoundTrace,
  Vote,
  VoteCounts,
  VoteInput,
  VotingRoundInput,
} from '../types';
import { InvalidInputError } from '../utils/errors';

function toCandidate(input: CandidateInput): Candidate {
  return {
    id: input.id,
    title: input.title,
    costCents: input.cost_cents ?? null,
    cuisine: input.cuisine ?? null,
    difficulty: input.difficulty,
  };
}

function toVote(input: VoteInput): Vote {
  return {
    voterId: input.voter_id,
    candidateId: input.candidate_id,
    category: input.category,
    comment: input.comment ?? null,
    castAt: parseISO(input.cast_at),
  };
}

/**
 * Parse and validate a round request.
 *
 * @throws InvalidInputError with the zod issues when validation fails
 */
export function parseRoundRequest(raw: unknown): VotingRoundInput {
  try {
    const data = RoundRequestSchema.parse(raw);

    return {
      decisionId: data.decision_id,
      candidates: data.candidates.map(toCandidate),
      votes: data.votes.map(toVote),
      count: data.count,
      budgetLimit: data.budget_limit ?? null,
      preferVariety: data.prefer_variety,
      window: data.window
        ? { start: parseISO(data.window.start), end: parseISO(data.window.end) }
        : undefined,
    };
  } catch (err) {
    if (err instanceof ZodError) {
      throw new InvalidInputError('Validation failed', { issues: err.issues });
    }
    throw err;
  }
}

export interface SerializedMetrics {
  total_votes: number;
  score: number;
  consensus_level: number;
  positive_percentage: number;
  has_veto: boolean;
  vote_counts: VoteCounts;
  recommendation_strength: number;
}

export interface SerializedDecision {
  decision_id: string;
  selected: string[];
  ranking: string[];
  metrics: Record<string, SerializedMetrics>;
  total_cost_cents: number;
  budget_status: string;
  over_budget_by_cents: number | null;
  remaining_budget_cents: number | null;
  why: string[];
  warnings: string[];
  trace: RoundTrace;
}

function serializeMetrics(m: ConsensusMetrics): SerializedMetrics {
  return {
    total_votes: m.totalVotes,
    score: m.score,
    consensus_level: m.consensusLevel,
    positive_percentage: m.positivePercentage,
    has_veto: m.hasVeto,
    vote_counts: m.voteCounts,
    recommendation_strength: m.recommendationStrength,
  };
}

/**
 * Render a decision as JSON-safe snake_case output.
 * Vetoes appear only as `has_veto` booleans.
 */
export function serializeDecision(decision: RoundDecision): SerializedDecision {
  const metrics: Record<string, SerializedMetrics> = {};
  decision.metrics.forEach((m, id) => {
    metrics[id] = serializeMetrics(m);
  });

  return {
    decision_id: decision.decisionId,
    selected: decision.selected.map((c) => c.id),
    ranking: decision.ranking.map((c) => c.id),
    metrics,
    total_cost_cents: decision.totalCostCents,
    budget_status: decision.budgetStatus.kind,
    over_budget_by_cents:
      decision.budgetStatus.kind === 'over_budget' ? decision.budgetStatus.overBy : null,
    remaining_budget_cents: decision.remainingBudgetCents,
    why: decision.why,
    warnings: decision.warnings,
    trace: decision.trace,
  };
}
