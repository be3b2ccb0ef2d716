/**
 * @module @itinera/agent-contracts/budget
 * Budget checkpoint types.
 */

export type BudgetScenario = 'tooLow' | 'excess' | 'reasonable';

export type BudgetStatus = 'proceed' | 'needsUserInput';

export interface BudgetAssessment {
  scenario: BudgetScenario;
  estimatedTotal: number;
  userBudget: number;
  /** userBudget - estimatedTotal */
  delta: number;
  status: BudgetStatus;
}

export interface BudgetThresholds {
  /** Estimated total above userBudget * tooLowRatio is too low */
  tooLowRatio: number;
  /** userBudget above estimatedTotal * excessRatio is excess */
  excessRatio: number;
}

/**
 * Cost per category, used for the human-readable report.
 */
export type CostBreakdown = Record<string, number>;

/**
 * Assessment with everything a human needs to decide.
 */
export interface BudgetReport extends BudgetAssessment {
  breakdown: CostBreakdown;
  message: string;
}
