/**
 * Consensus Metrics
 *
 * How strongly, and how unanimously, the family feels about a recipe.
 */

import { Candidate, ConsensusMetrics, Vote } from '../../types';
import { DEFAULT_ENGINE_CONFIG, EngineConfig } from '../../config';
import {
  consensusLevel,
  countByCategory,
  positivePercentage,
  sumScore,
  votesForCandidate,
} from './votes';

/**
 * Overall recommendation strength (0-100).
 *
 * Formula (defaults):
 *   0.4 × normalizedScore + 0.3 × consensusLevel + 0.3 × positivePercentage
 * where normalizedScore = clamp(score, 0, 20) / 20 × 100.
 * Any veto gives 0.
 */
export function recommendationStrength(
  metrics: Omit<ConsensusMetrics, 'recommendationStrength'>,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): number {
  if (metrics.hasVeto) return 0;

  const { scoreWeight, consensusWeight, positiveWeight, normalizationCap } = config.recommendation;
  const clamped = Math.min(Math.max(metrics.score, 0), normalizationCap);
  const normalizedScore = (clamped / normalizationCap) * 100;

  return (
    normalizedScore * scoreWeight +
    metrics.consensusLevel * consensusWeight +
    metrics.positivePercentage * positiveWeight
  );
}

/**
 * Compute consensus metrics for one candidate.
 * A candidate nobody voted on gets all-zero metrics.
 */
export function consensusMetrics(
  candidate: Candidate,
  votes: Vote[],
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): ConsensusMetrics {
  const candidateVotes = votesForCandidate(votes, candidate.id);

  if (candidateVotes.length === 0) {
    return {
      totalVotes: 0,
      score: 0,
      consensusLevel: 0,
      positivePercentage: 0,
      hasVeto: false,
      voteCounts: {},
      recommendationStrength: 0,
    };
  }

  const { score, hasVeto } = sumScore(candidateVotes);
  const base = {
    totalVotes: candidateVotes.length,
    score,
    consensusLevel: consensusLevel(candidateVotes),
    positivePercentage: positivePercentage(candidateVotes),
    hasVeto,
    voteCounts: countByCategory(candidateVotes),
  };

  return { ...base, recommendationStrength: recommendationStrength(base, config) };
}

/**
 * Keep candidates whose consensus level reaches the threshold and that
 * nobody vetoed. Without an explicit threshold, `config.minimumConsensus`
 * applies.
 */
export function filterByMinimumConsensus<C extends Candidate>(
  candidates: C[],
  votes: Vote[],
  threshold?: number,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): C[] {
  const minimum = threshold ?? config.minimumConsensus;
  return candidates.filter((candidate) => {
    const metrics = consensusMetrics(candidate, votes, config);
    return !metrics.hasVeto && metrics.consensusLevel >= minimum;
  });
}

/**
 * Multi-line summary, e.g.
 *
 *   Total Votes: 4
 *   Score: -97
 *   Consensus Level: 25.0%
 *   Positive: 50.0%
 *   Vetoed: false
 */
export function describeMetrics(metrics: ConsensusMetrics): string {
  return [
    `Total Votes: ${metrics.totalVotes}`,
    `Score: ${metrics.score}`,
    `Consensus Level: ${metrics.consensusLevel.toFixed(1)}%`,
    `Positive: ${metrics.positivePercentage.toFixed(1)}%`,
    `Vetoed: ${metrics.hasVeto}`,
  ].join('\n');
}
