/**
 * Vote Model
 *
 * Maps vote categories to outcomes and aggregates vote lists.
 * All functions are pure and deterministic.
 */

import { Vote, VoteCategory, VoteCounts, VoteOutcome } from '../../types';
import { POSITIVE_CATEGORIES, VOTE_POINTS } from './constants';

/**
 * Outcome of a single vote.
 *
 * | Category   | Outcome     |
 * |------------|-------------|
 * | super_like | scored +2   |
 * | like       | scored +1   |
 * | ok         | scored 0    |
 * | dislike    | scored -100 |
 * | veto       | veto        |
 */
export function voteOutcome(category: VoteCategory): VoteOutcome {
  if (category === 'veto') return { kind: 'veto' };
  return { kind: 'scored', points: VOTE_POINTS[category] };
}

export function isVeto(category: VoteCategory): boolean {
  return category === 'veto';
}

export function isPositive(category: VoteCategory): boolean {
  return POSITIVE_CATEGORIES.includes(category);
}

/**
 * Strict preference between two outcomes.
 * A veto ranks below every scored outcome; two vetoes tie.
 */
export function prefers(a: VoteOutcome, b: VoteOutcome): boolean {
  if (a.kind === 'veto') return false;
  if (b.kind === 'veto') return true;
  return a.points > b.points;
}

/**
 * Sum scored points and collect the veto flag.
 * Duplicate votes are all counted.
 */
export function sumScore(votes: Vote[]): { score: number; hasVeto: boolean } {
  let score = 0;
  let hasVeto = false;

  for (const vote of votes) {
    const outcome = voteOutcome(vote.category);
    if (outcome.kind === 'veto') {
      hasVeto = true;
    } else {
      score += outcome.points;
    }
  }

  return { score, hasVeto };
}

export function votesForCandidate(votes: Vote[], candidateId: string): Vote[] {
  return votes.filter((v) => v.candidateId === candidateId);
}

/**
 * Distinct voter ids in first-seen order.
 */
export function distinctVoters(votes: Vote[]): string[] {
  return [...new Set(votes.map((v) => v.voterId))];
}

export function countByCategory(votes: Vote[]): VoteCounts {
  const counts: VoteCounts = {};
  for (const vote of votes) {
    counts[vote.category] = (counts[vote.category] ?? 0) + 1;
  }
  return counts;
}

/**
 * Percentage (0-100) of like + super_like votes. 0 for no votes.
 */
export function positivePercentage(votes: Vote[]): number {
  if (votes.length === 0) return 0;
  const positive = votes.filter((v) => isPositive(v.category)).length;
  return (positive / votes.length) * 100;
}

/**
 * Share (0-100) of votes in the single most common category.
 * Higher means more agreement, whatever the shared opinion is.
 */
export function consensusLevel(votes: Vote[]): number {
  if (votes.length === 0) return 0;
  const counts = countByCategory(votes);
  let maxCount = 0;
  for (const count of Object.values(counts)) {
    if (count !== undefined && count > maxCount) maxCount = count;
  }
  return (maxCount / votes.length) * 100;
}
