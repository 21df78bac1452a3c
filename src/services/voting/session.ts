/**
 * Voting Session Progress
 *
 * Who still has to vote, and which votes belong to the session.
 */

import { differenceInDays, isWithinInterval } from 'date-fns';
import { Candidate, Vote, VotingWindow } from '../../types';

/**
 * Voting is complete once the session holds at least one vote per member
 * per candidate. Votes on other recipes don't count.
 */
export function isVotingComplete(
  candidates: Candidate[],
  votes: Vote[],
  memberCount: number
): boolean {
  const ids = new Set(candidates.map((c) => c.id));
  const relevant = votes.filter((v) => ids.has(v.candidateId)).length;
  return relevant >= memberCount * candidates.length;
}

/**
 * Candidates the voter has not voted on yet, in session order.
 */
export function pendingCandidatesForVoter<C extends Candidate>(
  candidates: C[],
  votes: Vote[],
  voterId: string
): C[] {
  const voted = new Set(votes.filter((v) => v.voterId === voterId).map((v) => v.candidateId));
  return candidates.filter((c) => !voted.has(c.id));
}

/**
 * Fraction (0-1) of the session's candidates the voter has voted on.
 */
export function votingProgress(candidates: Candidate[], votes: Vote[], voterId: string): number {
  if (candidates.length === 0) return 0;
  const pending = pendingCandidatesForVoter(candidates, votes, voterId).length;
  return (candidates.length - pending) / candidates.length;
}

/**
 * Votes cast inside the session window (both ends inclusive).
 */
export function votesWithinWindow(votes: Vote[], window: VotingWindow): Vote[] {
  return votes.filter((v) => isWithinInterval(v.castAt, window));
}

export function sessionDurationDays(window: VotingWindow): number {
  return differenceInDays(window.end, window.start);
}
