/**
 * Round Explanations
 *
 * Rule-based "why" lines for a round's selection.
 */

import { BudgetStatus, Candidate, ConsensusMetrics, ScoredCandidate } from '../../types';
import { describeBudgetStatus, formatCents } from './budget';

export interface WhyInput {
  selected: Candidate[];
  scored: ScoredCandidate[];
  metrics: Map<string, ConsensusMetrics>;
  requestedCount: number;
  budgetLimit: number | null;
  totalCostCents: number;
  budgetStatus: BudgetStatus;
}

function label(candidate: Candidate): string {
  return candidate.title ?? candidate.id;
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/**
 * Generate the explanation lines shown with a round's result.
 */
export function generateWhy(input: WhyInput): string[] {
  const reasons: string[] = [];
  const { selected, scored, metrics, requestedCount } = input;

  if (requestedCount > 0 && selected.length === 0) {
    reasons.push('No recipe survived veto, score and budget filtering');
  } else if (selected.length < requestedCount) {
    reasons.push(`Only ${selected.length} of ${plural(requestedCount, 'meal')} could be filled`);
  }

  for (const candidate of selected) {
    const m = metrics.get(candidate.id);
    if (!m) continue;
    reasons.push(
      `${label(candidate)}: score ${m.score}, ${m.consensusLevel.toFixed(0)}% agreement, ` +
      `${m.positivePercentage.toFixed(0)}% positive`
    );
  }

  const vetoed = scored.filter((s) => s.hasVeto).length;
  if (vetoed > 0) {
    reasons.push(`${plural(vetoed, 'recipe')} excluded by veto`);
  }

  const disliked = scored.filter((s) => !s.hasVeto && s.score < 0).length;
  if (disliked > 0) {
    reasons.push(`${plural(disliked, 'recipe')} excluded for a negative score`);
  }

  if (input.budgetLimit !== null) {
    reasons.push(
      `Estimated cost ${formatCents(input.totalCostCents)} of ${formatCents(input.budgetLimit)} ` +
      `(${describeBudgetStatus(input.budgetStatus)})`
    );
  }

  return reasons;
}
