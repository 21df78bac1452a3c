/**
 * Schulze Method
 *
 * Condorcet-consistent ranking from strongest paths in the pairwise
 * preference graph.
 *
 * Cost is O(N³) in the number of candidates. Fine for a voting round of
 * 15-20 recipes; noticeably slow past ~50.
 */

import { Candidate, PairwiseMatrix, Vote } from '../../types';
import { buildPairwiseMatrix } from './pairwise';

/**
 * Strongest-path strengths via a Floyd-Warshall style closure.
 * The input matrix is not modified.
 */
export function computeStrongestPaths(pairwise: PairwiseMatrix): PairwiseMatrix {
  const n = pairwise.length;
  const paths = pairwise.map((row) => [...row]);

  for (let k = 0; k < n; k++) {
    for (let i = 0; i < n; i++) {
      if (i === k) continue;
      for (let j = 0; j < n; j++) {
        if (j === i || j === k) continue;
        paths[i][j] = Math.max(paths[i][j], Math.min(paths[i][k], paths[k][j]));
      }
    }
  }

  return paths;
}

/**
 * wins[i] = number of candidates j that i beats on strongest paths.
 */
export function schulzeWins(paths: PairwiseMatrix): number[] {
  const n = paths.length;
  const wins = new Array<number>(n).fill(0);

  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      if (i !== j && paths[i][j] > paths[j][i]) {
        wins[i] += 1;
      }
    }
  }

  return wins;
}

/**
 * Rank candidates by Schulze wins, most wins first. Ties keep the
 * caller's order.
 *
 * Vetoes are not consulted: filter vetoed candidates out first if they
 * must not appear.
 */
export function schulzeRank<C extends Candidate>(candidates: C[], votes: Vote[]): C[] {
  if (candidates.length === 0) return [];

  const paths = computeStrongestPaths(buildPairwiseMatrix(candidates, votes));
  const wins = schulzeWins(paths);

  return candidates
    .map((candidate, index) => ({ candidate, index, wins: wins[index] }))
    .sort((a, b) => {
      if (b.wins !== a.wins) return b.wins - a.wins;
      return a.index - b.index;
    })
    .map((entry) => entry.candidate);
}
