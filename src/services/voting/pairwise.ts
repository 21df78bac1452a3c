/**
 * Pairwise Preference Matrix
 *
 * matrix[i][j] = number of voters who strictly prefer candidates[i]
 * over candidates[j]. Indices follow the caller's candidate order.
 */

import { Candidate, PairwiseMatrix, Vote, VoteOutcome } from '../../types';
import { distinctVoters, prefers, voteOutcome } from './votes';

const NEUTRAL: VoteOutcome = { kind: 'scored', points: 0 };

export function emptyMatrix(n: number): PairwiseMatrix {
  return Array.from({ length: n }, () => new Array<number>(n).fill(0));
}

/**
 * Build the pairwise preference matrix.
 *
 * A candidate the voter did not vote on counts as 'ok'. When a voter
 * voted more than once on a candidate, their first vote is used.
 *
 * Cost is O(V · N²) for V distinct voters and N candidates.
 */
export function buildPairwiseMatrix(candidates: Candidate[], votes: Vote[]): PairwiseMatrix {
  const n = candidates.length;
  const matrix = emptyMatrix(n);

  for (const voter of distinctVoters(votes)) {
    const firstVotes = new Map<string, VoteOutcome>();
    for (const vote of votes) {
      if (vote.voterId === voter && !firstVotes.has(vote.candidateId)) {
        firstVotes.set(vote.candidateId, voteOutcome(vote.category));
      }
    }

    const outcomes = candidates.map((c) => firstVotes.get(c.id) ?? NEUTRAL);

    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        if (i === j) continue;
        if (prefers(outcomes[i], outcomes[j])) {
          matrix[i][j] += 1;
        }
      }
    }
  }

  return matrix;
}
