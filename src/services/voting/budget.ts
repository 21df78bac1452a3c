/**
 * Session Budget
 *
 * Cost roll-ups for a set of selected recipes. Amounts are integer cents.
 */

import { BudgetStatus, Candidate } from '../../types';
import { DEFAULT_ENGINE_CONFIG } from '../../config';
import { candidateCost } from './selection';

export function totalCost(candidates: Candidate[]): number {
  return candidates.reduce((sum, c) => sum + candidateCost(c), 0);
}

/**
 * Budget left after the given recipes, or null when there is no budget.
 * Negative when over budget.
 */
export function remainingBudget(
  budgetLimit: number | null | undefined,
  candidates: Candidate[]
): number | null {
  if (budgetLimit === null || budgetLimit === undefined) return null;
  return budgetLimit - totalCost(candidates);
}

/**
 * | Estimated cost          | Status       |
 * |-------------------------|--------------|
 * | no limit                | no_budget    |
 * | > limit                 | over_budget  |
 * | > limit × nearLimitRatio | near_limit   |
 * | otherwise               | under_budget |
 */
export function budgetStatus(
  budgetLimit: number | null | undefined,
  candidates: Candidate[],
  nearLimitRatio: number = DEFAULT_ENGINE_CONFIG.nearLimitRatio
): BudgetStatus {
  if (budgetLimit === null || budgetLimit === undefined) return { kind: 'no_budget' };

  const estimated = totalCost(candidates);
  if (estimated > budgetLimit) return { kind: 'over_budget', overBy: estimated - budgetLimit };
  if (estimated > budgetLimit * nearLimitRatio) return { kind: 'near_limit' };
  return { kind: 'under_budget' };
}

export function formatCents(cents: number): string {
  const sign = cents < 0 ? '-' : '';
  return `${sign}$${(Math.abs(cents) / 100).toFixed(2)}`;
}

export function describeBudgetStatus(status: BudgetStatus): string {
  switch (status.kind) {
    case 'no_budget':
      return 'No budget set';
    case 'under_budget':
      return 'Under budget';
    case 'near_limit':
      return 'Near budget limit';
    case 'over_budget':
      return `Over budget by ${formatCents(status.overBy)}`;
  }
}
