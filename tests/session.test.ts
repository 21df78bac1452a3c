import { describe, it, expect } from 'vitest';
import {
  isVotingComplete,
  pendingCandidatesForVoter,
  sessionDurationDays,
  votesWithinWindow,
  votingProgress,
} from '../src/services/voting/session';
import { createTestCandidates, createVote } from './helpers';

describe('Voting Session Progress', () => {
  const [a, b] = createTestCandidates(2);
  const [outsider] = createTestCandidates(1);

  describe('isVotingComplete', () => {
    it('needs one vote per member per recipe', () => {
      const votes = [
        createVote('like', a, 'm1'),
        createVote('like', b, 'm1'),
        createVote('ok', a, 'm2'),
      ];

      expect(isVotingComplete([a, b], votes, 2)).toBe(false);
      expect(isVotingComplete([a, b], [...votes, createVote('ok', b, 'm2')], 2)).toBe(true);
    });

    it('ignores votes on recipes outside the session', () => {
      const votes = [
        createVote('like', a, 'm1'),
        createVote('like', b, 'm1'),
        createVote('ok', a, 'm2'),
        createVote('ok', outsider, 'm2'),
      ];

      expect(isVotingComplete([a, b], votes, 2)).toBe(false);
    });
  });

  it('lists recipes the voter still has to vote on', () => {
    const votes = [createVote('like', a, 'm1'), createVote('like', b, 'm2')];

    expect(pendingCandidatesForVoter([a, b], votes, 'm1')).toEqual([b]);
    expect(votingProgress([a, b], votes, 'm1')).toBe(0.5);
    expect(votingProgress([a, b], votes, 'm3')).toBe(0);
  });

  it('reports no progress for an empty session', () => {
    expect(votingProgress([], [], 'm1')).toBe(0);
  });

  it('keeps votes inside the window, inclusive', () => {
    const window = {
      start: new Date('2026-01-12T00:00:00Z'),
      end: new Date('2026-01-19T00:00:00Z'),
    };
    const onStart = createVote('like', a, 'm1', new Date('2026-01-12T00:00:00Z'));
    const inside = createVote('like', a, 'm2', new Date('2026-01-15T09:30:00Z'));
    const onEnd = createVote('like', a, 'm3', new Date('2026-01-19T00:00:00Z'));
    const late = createVote('veto', a, 'm4', new Date('2026-01-19T00:00:01Z'));

    expect(votesWithinWindow([onStart, inside, onEnd, late], window)).toEqual([onStart, inside, onEnd]);
    expect(sessionDurationDays(window)).toBe(7);
  });
});
