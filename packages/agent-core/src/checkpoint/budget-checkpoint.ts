/**
 * Budget Checkpoint: pure classification of budget fit.
 *
 *   estimatedTotal > userBudget × tooLowRatio        → tooLow / needsUserInput
 *   userBudget     > estimatedTotal × excessRatio    → excess / needsUserInput
 *   otherwise                                        → reasonable / proceed
 *
 * No memory and no I/O: the same arguments always give the same assessment.
 */

import type {
  BudgetAssessment,
  BudgetReport,
  BudgetScenario,
  BudgetThresholds,
  CostBreakdown,
  ResumeOption,
} from '@itinera/agent-contracts';

export const DEFAULT_BUDGET_THRESHOLDS: Readonly<BudgetThresholds> = Object.freeze({
  tooLowRatio: 1.5,
  excessRatio: 2.0,
});

const usd = new Intl.NumberFormat('en-US', {
  style: 'currency',
  currency: 'USD',
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

export function formatMoney(amount: number): string {
  return usd.format(amount);
}

function assertAmount(name: string, value: number): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new RangeError(`${name} must be a finite, non-negative number (got ${value})`);
  }
}

function assertThresholds(thresholds: BudgetThresholds): void {
  if (!Number.isFinite(thresholds.tooLowRatio) || thresholds.tooLowRatio < 1) {
    throw new RangeError(`tooLowRatio must be >= 1 (got ${thresholds.tooLowRatio})`);
  }
  if (!Number.isFinite(thresholds.excessRatio) || thresholds.excessRatio < 1) {
    throw new RangeError(`excessRatio must be >= 1 (got ${thresholds.excessRatio})`);
  }
}

export function assess(
  userBudget: number,
  costComponents: readonly number[],
  thresholds: BudgetThresholds = DEFAULT_BUDGET_THRESHOLDS,
): BudgetAssessment {
  assertAmount('userBudget', userBudget);
  costComponents.forEach((cost, i) => assertAmount(`costComponents[${i}]`, cost));
  assertThresholds(thresholds);

  const estimatedTotal = costComponents.reduce((sum, cost) => sum + cost, 0);
  const delta = userBudget - estimatedTotal;

  let scenario: BudgetScenario = 'reasonable';
  if (estimatedTotal > userBudget * thresholds.tooLowRatio) {
    scenario = 'tooLow';
  } else if (userBudget > estimatedTotal * thresholds.excessRatio) {
    scenario = 'excess';
  }

  return {
    scenario,
    estimatedTotal,
    userBudget,
    delta,
    status: scenario === 'reasonable' ? 'proceed' : 'needsUserInput',
  };
}

/**
 * Assessment over a named breakdown, with a message for the human.
 */
export function assessBreakdown(
  userBudget: number,
  breakdown: CostBreakdown,
  thresholds: BudgetThresholds = DEFAULT_BUDGET_THRESHOLDS,
): BudgetReport {
  for (const [category, cost] of Object.entries(breakdown)) {
    assertAmount(category, cost);
  }
  const assessment = assess(userBudget, Object.values(breakdown), thresholds);
  return {
    ...assessment,
    breakdown: { ...breakdown },
    message: describeAssessment(assessment),
  };
}

export function describeAssessment(assessment: BudgetAssessment): string {
  const total = formatMoney(assessment.estimatedTotal);
  const budget = formatMoney(assessment.userBudget);
  const gap = formatMoney(Math.abs(assessment.delta));

  switch (assessment.scenario) {
    case 'tooLow':
      return `Estimated costs (${total}) exceed your budget (${budget}) by ${gap}.`;
    case 'excess':
      return `Your ${budget} budget exceeds estimated costs (${total}) by ${gap}.`;
    case 'reasonable':
      return assessment.delta >= 0
        ? `Estimated costs (${total}) fit your budget (${budget}) with ${gap} to spare.`
        : `Estimated costs (${total}) are ${gap} over your budget (${budget}), within the acceptable range.`;
  }
}

/**
 * Choices offered when the checkpoint halts, in display order.
 */
export function budgetOptions(scenario: BudgetScenario): ResumeOption[] {
  switch (scenario) {
    case 'tooLow':
      return [
        { choice: 'proceed', label: 'Proceed anyway with the current estimate' },
        { choice: 'optimize', label: 'Look for savings (shorter stay, cheaper flights, simpler hotel)' },
        { choice: 'setBudget', label: 'Adjust the budget' },
        { choice: 'cancel', label: 'Cancel planning' },
      ];
    case 'excess':
      return [
        { choice: 'proceed', label: 'Keep the current plan and save the difference' },
        { choice: 'setBudget', label: 'Adjust the budget' },
        { choice: 'cancel', label: 'Cancel planning' },
      ];
    case 'reasonable':
      return [];
  }
}
