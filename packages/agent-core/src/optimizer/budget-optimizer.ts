/**
 * BudgetOptimizer: iterative cost reduction with an approval gate.
 *
 * Each round picks the highest-ranked remaining strategy that is viable
 * and saves something, asks the gate, and commits on approval:
 *
 *   ready → selecting → pendingApproval → applying → selecting → …
 *
 * Terminal states:
 *   - done:      cost ≤ target
 *   - exhausted: nothing viable remains
 *   - capped:    iteration == maxIterations while still over
 *   - stopped:   the gate asked to stop
 *
 * A rejected strategy is removed without counting an iteration. Strategies
 * ranked above the pick that are not viable (or save nothing) are removed
 * and recorded as skipped.
 */

import type {
  ApprovalDecision,
  ApprovalGate,
  ILogger,
  OptimizationState,
  OptimizationSummary,
  OptimizerPhase,
  Strategy,
  StrategyId,
  StrategyProposal,
  StrategyRecord,
} from '@itinera/agent-contracts';
import { errorMessage } from '@itinera/agent-contracts';
import { createNoopLogger } from '@itinera/agent-sdk';
import { PhaseStateMachine } from '../execution/phase-state-machine.js';
import type { TransitionTable } from '../execution/phase-state-machine.js';

const OPTIMIZER_TRANSITIONS: TransitionTable<OptimizerPhase> = {
  ready: ['selecting', 'done', 'capped'],
  selecting: ['pendingApproval', 'done', 'exhausted', 'capped'],
  pendingApproval: ['applying', 'selecting', 'stopped'],
  applying: ['selecting', 'done', 'capped'],
  done: [],
  exhausted: [],
  capped: [],
  stopped: [],
};

export type OptimizerEvent<T> =
  | { type: 'proposed'; iteration: number; proposal: StrategyProposal<T> }
  | { type: 'applied'; iteration: number; record: StrategyRecord }
  | { type: 'rejected'; iteration: number; strategyId: StrategyId }
  | { type: 'skipped'; iteration: number; strategyId: StrategyId; reason: 'notViable' | 'noSavings' };

export interface BudgetOptimizerOptions<T> {
  logger?: ILogger;
  now?: () => Date;
  onEvent?: (event: OptimizerEvent<T>) => void;
}

export interface InitialOptimizationInput<T> {
  currentCost: number;
  targetBudget: number;
  maxIterations: number;
  composition: T;
  strategies: readonly Strategy<T>[];
}

/**
 * Fresh state with every strategy remaining.
 */
export function createOptimizationState<T>(input: InitialOptimizationInput<T>): OptimizationState<T> {
  if (!Number.isInteger(input.maxIterations) || input.maxIterations < 0) {
    throw new RangeError(`maxIterations must be a non-negative integer (got ${input.maxIterations})`);
  }
  return {
    status: 'ready',
    initialCostEstimate: input.currentCost,
    currentCostEstimate: input.currentCost,
    targetBudget: input.targetBudget,
    iteration: 0,
    maxIterations: input.maxIterations,
    appliedStrategies: [],
    remainingStrategies: new Set(input.strategies.map((s) => s.id)),
    rejectedStrategies: [],
    skippedStrategies: [],
    composition: input.composition,
  };
}

export class BudgetOptimizer<T> {
  private readonly logger: ILogger;
  private readonly now: () => Date;
  private readonly onEvent?: (event: OptimizerEvent<T>) => void;

  constructor(options: BudgetOptimizerOptions<T> = {}) {
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? (() => new Date());
    this.onEvent = options.onEvent;
  }

  async optimize(
    initial: OptimizationState<T>,
    strategies: readonly Strategy<T>[],
    approvalGate: ApprovalGate<T>,
  ): Promise<OptimizationState<T>> {
    const state: OptimizationState<T> = {
      ...initial,
      appliedStrategies: [...initial.appliedStrategies],
      remainingStrategies: new Set(initial.remainingStrategies),
      rejectedStrategies: [...initial.rejectedStrategies],
      skippedStrategies: [...initial.skippedStrategies],
    };
    const machine = new PhaseStateMachine<OptimizerPhase>(OPTIMIZER_TRANSITIONS, 'ready');

    this.logger.info(
      `[optimizer] Starting: cost ${state.currentCostEstimate.toFixed(2)}, target ${state.targetBudget.toFixed(2)}`,
      { maxIterations: state.maxIterations },
    );

    for (;;) {
      if (state.currentCostEstimate <= state.targetBudget) {
        return this.finish(state, machine, 'done');
      }
      if (state.iteration >= state.maxIterations) {
        return this.finish(state, machine, 'capped');
      }

      machine.transition('selecting');
      const proposal = this.select(state, strategies);
      if (!proposal) {
        return this.finish(state, machine, 'exhausted');
      }

      machine.transition('pendingApproval');
      this.emit({ type: 'proposed', iteration: state.iteration, proposal });
      const decision: ApprovalDecision = await approvalGate(proposal);

      if (!decision.approved) {
        state.remainingStrategies.delete(proposal.strategyId);
        if (decision.stop) {
          this.logger.info(`[optimizer] Stopped at ${proposal.strategyId}`, { note: decision.note });
          return this.finish(state, machine, 'stopped');
        }
        state.rejectedStrategies.push(proposal.strategyId);
        this.emit({ type: 'rejected', iteration: state.iteration, strategyId: proposal.strategyId });
        this.logger.info(`[optimizer] Rejected ${proposal.strategyId}`, { note: decision.note });
        machine.transition('selecting');
        continue;
      }

      machine.transition('applying');
      const record: StrategyRecord = {
        strategyId: proposal.strategyId,
        description: proposal.description,
        savingsAmount: proposal.savingsAmount,
        newCost: proposal.newCost,
        approvedBy: decision.approvedBy,
        timestampApplied: this.now().toISOString(),
      };
      state.currentCostEstimate = proposal.newCost;
      state.composition = proposal.composition;
      state.appliedStrategies.push(record);
      state.remainingStrategies.delete(proposal.strategyId);
      state.iteration += 1;

      this.emit({ type: 'applied', iteration: state.iteration, record });
      this.logger.info(
        `[optimizer] Applied ${proposal.strategyId}: saved ${proposal.savingsAmount.toFixed(2)}, now ${proposal.newCost.toFixed(2)}`,
        { iteration: state.iteration, approvedBy: decision.approvedBy },
      );

      if (state.currentCostEstimate > state.targetBudget && state.iteration < state.maxIterations) {
        machine.transition('selecting');
      }
    }
  }

  /**
   * First viable remaining strategy in rank order, evaluated without
   * committing. Passed-over strategies leave `remainingStrategies`.
   */
  private select(state: OptimizationState<T>, strategies: readonly Strategy<T>[]): StrategyProposal<T> | undefined {
    for (const strategy of strategies) {
      if (!state.remainingStrategies.has(strategy.id)) {
        continue;
      }

      if (!strategy.isViable(state.composition)) {
        this.skip(state, strategy.id, 'notViable');
        continue;
      }

      const outcome = strategy.propose(state.composition);
      if (!(outcome.savingsAmount > 0)) {
        this.skip(state, strategy.id, 'noSavings');
        continue;
      }

      return {
        strategyId: strategy.id,
        description: outcome.description,
        savingsAmount: outcome.savingsAmount,
        currentCost: state.currentCostEstimate,
        newCost: state.currentCostEstimate - outcome.savingsAmount,
        composition: outcome.composition,
      };
    }
    return undefined;
  }

  private skip(state: OptimizationState<T>, strategyId: StrategyId, reason: 'notViable' | 'noSavings'): void {
    state.remainingStrategies.delete(strategyId);
    state.skippedStrategies.push(strategyId);
    this.emit({ type: 'skipped', iteration: state.iteration, strategyId, reason });
    this.logger.debug(`[optimizer] Skipped ${strategyId} (${reason})`);
  }

  private finish(
    state: OptimizationState<T>,
    machine: PhaseStateMachine<OptimizerPhase>,
    status: 'done' | 'exhausted' | 'capped' | 'stopped',
  ): OptimizationState<T> {
    machine.transition(status);
    state.status = status;
    this.logger.info(`[optimizer] Finished: ${status}`, {
      iterations: state.iteration,
      finalCost: Number(state.currentCostEstimate.toFixed(2)),
    });
    return state;
  }

  private emit(event: OptimizerEvent<T>): void {
    try {
      this.onEvent?.(event);
    } catch (error) {
      this.logger.error(`[optimizer] onEvent callback failed: ${errorMessage(error)}`);
    }
  }
}

/**
 * Flattened report of an optimizer run.
 */
export function summarizeOptimization<T>(state: OptimizationState<T>): OptimizationSummary {
  return {
    status: state.status,
    initialCost: state.initialCostEstimate,
    finalCost: state.currentCostEstimate,
    targetBudget: state.targetBudget,
    totalSavings: state.initialCostEstimate - state.currentCostEstimate,
    iterations: state.iteration,
    maxIterations: state.maxIterations,
    applied: state.appliedStrategies.map((r) => ({ ...r })),
    rejected: [...state.rejectedStrategies],
    skipped: [...state.skippedStrategies],
    remaining: [...state.remainingStrategies],
  };
}
