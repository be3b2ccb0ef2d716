/**
 * @module @itinera/agent-contracts/optimization
 * Iterative budget optimizer types.
 */

export type StrategyId = string;

export type OptimizerPhase =
  | 'ready'
  | 'selecting'
  | 'pendingApproval'
  | 'applying'
  | 'done'
  | 'exhausted'
  | 'capped'
  | 'stopped';

/**
 * Terminal (or not yet started) optimizer status.
 */
export type OptimizationStatus = Extract<OptimizerPhase, 'ready' | 'done' | 'exhausted' | 'capped' | 'stopped'>;

export interface StrategyRecord {
  strategyId: StrategyId;
  description: string;
  savingsAmount: number;
  /** Cost estimate after this strategy was applied */
  newCost: number;
  approvedBy: 'auto' | 'human';
  /** ISO timestamp */
  timestampApplied: string;
}

/**
 * What a strategy would do, computed without committing.
 */
export interface StrategyProposal<TComposition> {
  strategyId: StrategyId;
  description: string;
  savingsAmount: number;
  currentCost: number;
  newCost: number;
  composition: TComposition;
}

/**
 * Cost-reduction strategy over a booking composition.
 */
export interface Strategy<TComposition> {
  id: StrategyId;
  label: string;
  /** Compatible with the current booking composition */
  isViable(composition: TComposition): boolean;
  propose(composition: TComposition): { composition: TComposition; savingsAmount: number; description: string };
}

export interface ApprovalDecision {
  approved: boolean;
  approvedBy: 'auto' | 'human';
  /** End the loop now, keeping what was applied so far */
  stop?: boolean;
  note?: string;
}

/**
 * Suspension point: resolves once a decision exists.
 */
export type ApprovalGate<TComposition> = (proposal: StrategyProposal<TComposition>) => Promise<ApprovalDecision>;

export interface OptimizationState<TComposition> {
  status: OptimizationStatus;
  initialCostEstimate: number;
  currentCostEstimate: number;
  targetBudget: number;
  iteration: number;
  maxIterations: number;
  appliedStrategies: StrategyRecord[];
  remainingStrategies: Set<StrategyId>;
  /** Rejected by the approval gate */
  rejectedStrategies: StrategyId[];
  /** Passed over as not viable or yielding no saving */
  skippedStrategies: StrategyId[];
  composition: TComposition;
}
