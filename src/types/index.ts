import { z } from 'zod';

// Wire-format schemas (snake_case, as exchanged with the host app)

export const VoteCategoryEnum = z.enum(['super_like', 'like', 'ok', 'dislike', 'veto']);
export type VoteCategory = z.infer<typeof VoteCategoryEnum>;

export const VOTE_CATEGORIES: readonly VoteCategory[] = VoteCategoryEnum.options;

// Older clients still send the camelCase raw value for super likes
const LEGACY_CATEGORY_NAMES = new Map<string, VoteCategory>([['superLike', 'super_like']]);

export const WireVoteCategorySchema = z.preprocess(
  (value) => (typeof value === 'string' ? LEGACY_CATEGORY_NAMES.get(value) ?? value : value),
  VoteCategoryEnum
);

export const DifficultyEnum = z.enum(['easy', 'medium', 'hard']);
export type Difficulty = z.infer<typeof DifficultyEnum>;

export const CandidateInputSchema = z.object({
  id: z.string().min(1),
  title: z.string().optional(),
  cost_cents: z.number().int().safe().min(0).nullable().optional(),
  cuisine: z.string().min(1).nullable().optional(),
  difficulty: DifficultyEnum,
});

export const VoteInputSchema = z.object({
  voter_id: z.string().min(1),
  candidate_id: z.string().min(1),
  category: WireVoteCategorySchema,
  comment: z.string().nullable().optional(),
  cast_at: z.string().datetime({ offset: true }),
});

export const VotingWindowSchema = z.object({
  start: z.string().datetime({ offset: true }),
  end: z.string().datetime({ offset: true }),
}).refine(
  (window) => Date.parse(window.start) <= Date.parse(window.end),
  { message: 'window.start must not be after window.end' }
);

export const RoundRequestSchema = z.object({
  decision_id: z.string().min(1).optional(),
  candidates: z.array(CandidateInputSchema),
  votes: z.array(VoteInputSchema).default([]),
  count: z.number().int().safe().min(0),
  budget_limit: z.number().int().safe().min(0).nullable().optional(),
  prefer_variety: z.boolean().default(true),
  window: VotingWindowSchema.optional(),
});

export type CandidateInput = z.infer<typeof CandidateInputSchema>;
export type VoteInput = z.infer<typeof VoteInputSchema>;
export type RoundRequest = z.infer<typeof RoundRequestSchema>;

// Engine Internal Types

/**
 * An item being voted on. Hosts usually pass their full recipe objects;
 * the engine only reads these fields.
 */
export interface Candidate {
  id: string;
  title?: string;
  costCents?: number | null; // integer cents
  cuisine?: string | null;
  difficulty: Difficulty;
}

export interface Vote {
  voterId: string;
  candidateId: string;
  category: VoteCategory;
  comment?: string | null;
  castAt: Date;
}

export type VoteOutcome =
  | { kind: 'scored'; points: number }
  | { kind: 'veto' };

export interface ScoredCandidate<C extends Candidate = Candidate> {
  candidate: C;
  score: number;
  hasVeto: boolean;
  index: number; // position in the caller's candidate list
}

export type VoteCounts = Partial<Record<VoteCategory, number>>;

export interface ConsensusMetrics {
  totalVotes: number;
  score: number;
  consensusLevel: number;      // 0-100, share of the most common category
  positivePercentage: number;  // 0-100, like + super_like
  hasVeto: boolean;
  voteCounts: VoteCounts;
  recommendationStrength: number; // 0-100
}

export type PairwiseMatrix = number[][];

export interface VotingWindow {
  start: Date;
  end: Date;
}

export interface SelectionOptions {
  budgetLimit?: number | null;
  preferVariety?: boolean;
}

export type BudgetStatus =
  | { kind: 'no_budget' }
  | { kind: 'under_budget' }
  | { kind: 'near_limit' }
  | { kind: 'over_budget'; overBy: number };

// Round Orchestration Types

export interface VotingRoundInput<C extends Candidate = Candidate> {
  decisionId?: string;
  candidates: C[];
  votes: Vote[];
  count: number;
  budgetLimit?: number | null;
  preferVariety?: boolean;
  window?: VotingWindow;
  now?: Date;
}

export interface CandidateTrace {
  candidate_id: string;
  score: number;
  has_veto: boolean;
  eligible: boolean;
  total_votes: number;
  consensus_level: number;
  positive_percentage: number;
  recommendation_strength: number;
  vote_counts: VoteCounts;
  variety_bonus: number | null; // null when the candidate never reached the variety pass
}

/**
 * Reasoning trace for one voting round.
 * Explains how the selection was reached.
 */
export interface RoundTrace {
  version: string;
  generated_at: string;

  // Input state
  candidate_count: number;
  vote_count: number;
  votes_outside_window: number;
  votes_for_unknown_candidates: number;

  // Decision process
  candidates: CandidateTrace[];
  schulze_order: string[];
  variety_mode: 'track' | 'weighted';

  // Output
  selected: string[];
}

export interface RoundDecision<C extends Candidate = Candidate> {
  decisionId: string;
  selected: C[];
  ranking: C[]; // Schulze order over eligible candidates
  metrics: Map<string, ConsensusMetrics>;
  totalCostCents: number;
  budgetStatus: BudgetStatus;
  remainingBudgetCents: number | null;
  why: string[];
  warnings: string[];
  trace: RoundTrace;
}

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_CONFIG: 'INVALID_CONFIG',
} as const;
