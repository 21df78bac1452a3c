import { afterEach, describe, it, expect, vi } from 'vitest';
import { decideRound } from '../src/services/voting';
import { resolveEngineConfig } from '../src/config';
import { Candidate, Vote } from '../src/types';
import { createTestCandidates, createVote } from './helpers';

const NOW = new Date('2026-01-15T18:00:00Z');

function weekRound() {
  const lasagna: Candidate = { id: 'lasagna', title: 'Lasagna', cuisine: 'italian', difficulty: 'medium', costCents: 1200 };
  const padThai: Candidate = { id: 'pad-thai', title: 'Pad Thai', cuisine: 'thai', difficulty: 'medium', costCents: 900 };
  const tacos: Candidate = { id: 'tacos', title: 'Tacos', cuisine: 'mexican', difficulty: 'easy', costCents: 700 };
  const liver: Candidate = { id: 'liver', title: 'Liver', cuisine: 'french', difficulty: 'hard', costCents: 500 };
  const ghost: Candidate = { id: 'ghost', difficulty: 'easy' };

  const votes: Vote[] = [
    createVote('super_like', lasagna, 'm1'),
    createVote('like', padThai, 'm1'),
    createVote('ok', tacos, 'm1'),
    createVote('veto', liver, 'm1'),
    createVote('like', lasagna, 'm2'),
    createVote('like', padThai, 'm2'),
    createVote('like', tacos, 'm2'),
    createVote('like', liver, 'm2'),
    createVote('like', ghost, 'm1'),
  ];

  return { candidates: [lasagna, padThai, tacos, liver], votes };
}

describe('Round Orchestrator', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('selects, ranks and explains a round', () => {
    const { candidates, votes } = weekRound();

    const decision = decideRound({
      decisionId: 'week-3',
      candidates,
      votes,
      count: 2,
      budgetLimit: 2500,
      now: NOW,
    });

    expect(decision.decisionId).toBe('week-3');
    expect(decision.selected.map((c) => c.id)).toEqual(['lasagna', 'pad-thai']);
    expect(decision.ranking.map((c) => c.id)).toEqual(['lasagna', 'pad-thai', 'tacos']);
    expect(decision.totalCostCents).toBe(2100);
    expect(decision.remainingBudgetCents).toBe(400);
    expect(decision.budgetStatus).toEqual({ kind: 'under_budget' });
    expect(decision.why).toEqual([
      'Lasagna: score 3, 50% agreement, 100% positive',
      'Pad Thai: score 2, 100% agreement, 100% positive',
      '1 recipe excluded by veto',
      'Estimated cost $21.00 of $25.00 (Under budget)',
    ]);
    expect(decision.warnings).toEqual([
      '1 vote(s) reference recipes outside this round and were ignored',
    ]);
  });

  it('records a reasoning trace', () => {
    const { candidates, votes } = weekRound();

    const { trace, metrics } = decideRound({
      decisionId: 'week-3',
      candidates,
      votes,
      count: 2,
      budgetLimit: 2500,
      now: NOW,
    });

    expect(trace.version).toBe('v1.0');
    expect(trace.generated_at).toBe('2026-01-15T18:00:00.000Z');
    expect(trace.candidate_count).toBe(4);
    expect(trace.vote_count).toBe(9);
    expect(trace.votes_outside_window).toBe(0);
    expect(trace.votes_for_unknown_candidates).toBe(1);
    expect(trace.schulze_order).toEqual(['lasagna', 'pad-thai', 'tacos']);
    expect(trace.selected).toEqual(['lasagna', 'pad-thai']);
    expect(trace.variety_mode).toBe('track');

    expect(trace.candidates.map((c) => c.candidate_id)).toEqual([
      'lasagna',
      'pad-thai',
      'tacos',
      'liver',
    ]);
    expect(trace.candidates.map((c) => c.variety_bonus)).toEqual([15, 10, null, null]);
    expect(trace.candidates[3]).toMatchObject({
      score: 1,
      has_veto: true,
      eligible: false,
      recommendation_strength: 0,
      vote_counts: { veto: 1, like: 1 },
    });

    // 0.4 × 15 + 0.3 × 50 + 0.3 × 100
    expect(metrics.get('lasagna')?.recommendationStrength).toBeCloseTo(51, 6);
  });

  it('explains an empty selection', () => {
    const [only] = createTestCandidates(1, { title: 'Soup' });

    const decision = decideRound({
      candidates: [only],
      votes: [createVote('dislike', only, 'm1')],
      count: 3,
      now: NOW,
    });

    expect(decision.selected).toEqual([]);
    expect(decision.budgetStatus).toEqual({ kind: 'no_budget' });
    expect(decision.remainingBudgetCents).toBeNull();
    expect(decision.why).toEqual([
      'No recipe survived veto, score and budget filtering',
      '1 recipe excluded for a negative score',
    ]);
  });

  it('explains a partially filled selection', () => {
    const [a, b] = createTestCandidates(2, { costCents: 0 });

    const decision = decideRound({
      candidates: [a, b],
      votes: [createVote('like', a, 'm1'), createVote('veto', b, 'm1')],
      count: 3,
      now: NOW,
    });

    expect(decision.why[0]).toBe('Only 1 of 3 meals could be filled');
  });

  it('drops votes cast outside the session window', () => {
    const { candidates, votes } = weekRound();
    const lateVeto = createVote('veto', candidates[0], 'm3', new Date('2026-01-25T09:00:00Z'));

    const decision = decideRound({
      decisionId: 'week-3',
      candidates,
      votes: [...votes, lateVeto],
      count: 2,
      window: { start: new Date('2026-01-12T00:00:00Z'), end: new Date('2026-01-19T00:00:00Z') },
      now: NOW,
    });

    expect(decision.trace.votes_outside_window).toBe(1);
    expect(decision.selected.map((c) => c.id)).toEqual(['lasagna', 'pad-thai']);
  });

  it('warns when the round is too large for Schulze', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const config = resolveEngineConfig({ schulzeWarnAt: 2 });

    const decision = decideRound(
      { candidates: createTestCandidates(3), votes: [], count: 1, now: NOW },
      config
    );

    const message = 'Schulze ranking over 3 candidates is O(N³); consider narrowing the round below 2';
    expect(decision.warnings).toEqual([message]);
    expect(warn).toHaveBeenCalledWith(`[Consensus] ${message}`);
  });

  it('generates a decision id when none is given', () => {
    const decision = decideRound({ candidates: [], votes: [], count: 0, now: NOW });

    expect(decision.decisionId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
    expect(decision.selected).toEqual([]);
    expect(decision.why).toEqual([]);
  });
});
