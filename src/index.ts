export * from './services/voting';
export { parseRoundRequest, serializeDecision } from './services/intake';
export type { SerializedDecision, SerializedMetrics } from './services/intake';
export {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  resolveEngineConfig,
  loadEngineConfig,
} from './config';
export type { EngineConfig, EngineConfigOverrides, VarietyMode } from './config';
export { AppError, InvalidInputError, InvalidConfigError } from './utils/errors';
export {
  VoteCategoryEnum,
  VOTE_CATEGORIES,
  DifficultyEnum,
  RoundRequestSchema,
  ErrorCodes,
} from './types';
export type {
  Candidate,
  Vote,
  VoteCategory,
  VoteOutcome,
  Difficulty,
  ScoredCandidate,
  ConsensusMetrics,
  VoteCounts,
  PairwiseMatrix,
  VotingWindow,
  SelectionOptions,
  BudgetStatus,
  VotingRoundInput,
  RoundDecision,
  RoundTrace,
  CandidateTrace,
  ErrorBody,
} from './types';
