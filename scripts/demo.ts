/**
 * Voting Round Demo
 *
 * Walks through one family voting round in-process:
 * 1. Load and validate the round request
 * 2. Show scores and consensus metrics per recipe
 * 3. Show the Schulze ranking
 * 4. Show the selection, budget and explanations
 *
 * Run with: npm run demo [path/to/round.json]
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import {
  decideRound,
  describeBudgetStatus,
  describeMetrics,
  formatCents,
  loadEngineConfig,
  parseRoundRequest,
} from '../src';

const DEFAULT_FIXTURE = fileURLToPath(new URL('./fixtures/week-round.json', import.meta.url));

function printSection(title: string): void {
  console.log('\n' + '='.repeat(60));
  console.log(title);
  console.log('='.repeat(60));
}

function main(): void {
  const path = process.argv[2] ?? DEFAULT_FIXTURE;
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'));

  printSection('STEP 1: Load round');
  const input = parseRoundRequest(raw);
  console.log(`Candidates: ${input.candidates.length}, votes: ${input.votes.length}`);
  console.log(`Meals wanted: ${input.count}`);
  if (input.budgetLimit !== null && input.budgetLimit !== undefined) {
    console.log(`Budget: ${formatCents(input.budgetLimit)}`);
  }

  const decision = decideRound(input, loadEngineConfig());
  const titles = new Map(input.candidates.map((c) => [c.id, c.title ?? c.id]));

  printSection('STEP 2: Scores and consensus');
  for (const entry of decision.trace.candidates) {
    const metrics = decision.metrics.get(entry.candidate_id);
    console.log(`\n${titles.get(entry.candidate_id)} (${entry.eligible ? 'eligible' : 'excluded'})`);
    if (metrics) {
      console.log(describeMetrics(metrics));
      console.log(`Recommendation: ${metrics.recommendationStrength.toFixed(1)}`);
    }
  }

  printSection('STEP 3: Schulze ranking');
  decision.ranking.forEach((c, i) => console.log(`${i + 1}. ${titles.get(c.id)}`));

  printSection('STEP 4: Selection');
  for (const c of decision.selected) {
    console.log(`- ${titles.get(c.id)} (${formatCents(c.costCents ?? 0)})`);
  }
  console.log(`Total: ${formatCents(decision.totalCostCents)} - ${describeBudgetStatus(decision.budgetStatus)}`);

  console.log('\nWhy:');
  decision.why.forEach((line) => console.log(`  ${line}`));
  decision.warnings.forEach((line) => console.log(`  ! ${line}`));
}

try {
  main();
} catch (err) {
  console.error('[Demo] Failed:', err);
  process.exitCode = 1;
}
