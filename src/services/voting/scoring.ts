/**
 * Scoring Functions
 *
 * Modified Borda count: fixed points per vote category, summed per
 * candidate, with the veto kept apart as a flag.
 */

import { Candidate, ScoredCandidate, Vote } from '../../types';
import { sumScore } from './votes';

/**
 * Ordering of scored candidates:
 * 1. Non-vetoed before vetoed
 * 2. Highest score
 * 3. Earliest position in the caller's list
 */
export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.hasVeto !== b.hasVeto) return a.hasVeto ? 1 : -1;
  if (b.score !== a.score) return b.score - a.score;
  return a.index - b.index;
}

/**
 * Score every candidate from the votes that reference it.
 *
 * Votes whose candidate id is not in `candidates` are ignored.
 * Never throws: no candidates gives an empty list, no votes gives
 * every candidate a score of 0.
 *
 * @returns Scored candidates, non-vetoed first, then by score
 */
export function scoreCandidates<C extends Candidate>(
  candidates: C[],
  votes: Vote[]
): ScoredCandidate<C>[] {
  const byCandidate = new Map<string, Vote[]>();
  for (const vote of votes) {
    const bucket = byCandidate.get(vote.candidateId);
    if (bucket) {
      bucket.push(vote);
    } else {
      byCandidate.set(vote.candidateId, [vote]);
    }
  }

  const scored = candidates.map((candidate, index) => {
    const { score, hasVeto } = sumScore(byCandidate.get(candidate.id) ?? []);
    return { candidate, score, hasVeto, index };
  });

  return scored.sort(compareScored);
}

/**
 * Drop vetoed candidates and those with a negative score.
 */
export function eligibleScored<C extends Candidate>(
  scored: ScoredCandidate<C>[]
): ScoredCandidate<C>[] {
  return scored.filter((s) => !s.hasVeto && s.score >= 0);
}

/**
 * Select the top `count` candidates by score, excluding vetoed and
 * negatively scored ones. Returns fewer when fewer survive.
 */
export function selectTop<C extends Candidate>(
  candidates: C[],
  votes: Vote[],
  count: number
): C[] {
  if (count <= 0) return [];

  return eligibleScored(scoreCandidates(candidates, votes))
    .slice(0, count)
    .map((s) => s.candidate);
}
