/**
 * @module @itinera/trip-orchestrator/analytics
 * Analytics tracking for trip planning runs.
 *
 * Tracks:
 * - Run outcomes and duration
 * - Phase timings and parallel speedup
 * - Checkpoint halts and the decisions that resolved them
 * - Optimizer strategy outcomes and savings
 */

import type {
  CheckpointKind,
  FinalReport,
  IAnalytics,
  ILogger,
  PhaseLogEntry,
  ResumeChoice,
  StrategyRecord,
} from '@itinera/agent-contracts';
import { errorMessage } from '@itinera/agent-contracts';

/**
 * Analytics event names for trip planning.
 */
export const ORCHESTRATION_EVENTS = {
  RUN_STARTED: 'itinera.run.started',
  RUN_COMPLETED: 'itinera.run.completed',
  RUN_ABORTED: 'itinera.run.aborted',
  RUN_CANCELLED: 'itinera.run.cancelled',
  PHASE_COMPLETED: 'itinera.phase.completed',
  CHECKPOINT_HALTED: 'itinera.checkpoint.halted',
  CHECKPOINT_RESUMED: 'itinera.checkpoint.resumed',
  STRATEGY_APPLIED: 'itinera.strategy.applied',
  STRATEGY_REJECTED: 'itinera.strategy.rejected',
} as const;

/**
 * Track orchestration analytics. Every method is a no-op without a sink.
 */
export class OrchestrationAnalytics {
  constructor(
    private analytics?: IAnalytics,
    private logger?: ILogger,
    private now: () => number = Date.now,
  ) {}

  trackRunStarted(sessionId: string, trip: { city: string; nights: number; travelers: number; budget: number }): void {
    this.track(ORCHESTRATION_EVENTS.RUN_STARTED, {
      session_id: sessionId,
      destination: trip.city,
      nights: trip.nights,
      travelers: trip.travelers,
      budget: trip.budget,
    });
  }

  /**
   * Track the final report. Completed runs also report cost against budget.
   */
  trackRunFinished(report: FinalReport): void {
    const base = {
      session_id: report.sessionId,
      duration_ms: report.totalTimeMs,
      phase_count: report.phases.length,
      warning_count: report.warnings.length,
    };

    switch (report.status) {
      case 'completed':
        this.track(ORCHESTRATION_EVENTS.RUN_COMPLETED, {
          ...base,
          final_cost: report.plan.finalCost,
          within_budget: report.plan.withinBudget,
          strategies_applied: report.plan.optimization?.applied.length ?? 0,
        });
        break;
      case 'aborted':
        this.track(ORCHESTRATION_EVENTS.RUN_ABORTED, {
          ...base,
          phase: report.abort.phase,
          agent: report.abort.agent,
          triggered_by_message: report.abort.message !== undefined,
        });
        break;
      case 'cancelled':
        this.track(ORCHESTRATION_EVENTS.RUN_CANCELLED, { ...base, checkpoint: report.checkpoint });
        break;
    }
  }

  trackPhase(sessionId: string, entry: PhaseLogEntry): void {
    this.track(ORCHESTRATION_EVENTS.PHASE_COMPLETED, {
      session_id: sessionId,
      phase: entry.phase,
      status: entry.status,
      duration_ms: entry.elapsedMs,
      ...(entry.speedup !== undefined ? { speedup: entry.speedup } : {}),
    });
  }

  trackCheckpoint(sessionId: string, checkpoint: CheckpointKind): void {
    this.track(ORCHESTRATION_EVENTS.CHECKPOINT_HALTED, { session_id: sessionId, checkpoint });
  }

  trackDecision(sessionId: string, checkpoint: CheckpointKind, choice: ResumeChoice): void {
    this.track(ORCHESTRATION_EVENTS.CHECKPOINT_RESUMED, { session_id: sessionId, checkpoint, choice });
  }

  trackStrategyApplied(sessionId: string, record: StrategyRecord): void {
    this.track(ORCHESTRATION_EVENTS.STRATEGY_APPLIED, {
      session_id: sessionId,
      strategy_id: record.strategyId,
      amount_saved: record.savingsAmount,
      new_cost: record.newCost,
      approved_by: record.approvedBy,
    });
  }

  trackStrategyRejected(sessionId: string, strategyId: string): void {
    this.track(ORCHESTRATION_EVENTS.STRATEGY_REJECTED, { session_id: sessionId, strategy_id: strategyId });
  }

  private track(event: string, properties: Record<string, unknown>): void {
    if (!this.analytics) {
      return;
    }
    try {
      this.analytics.track(event, { ...properties, timestamp: this.now() });
    } catch (error) {
      this.logger?.warn(`[analytics] Failed to track ${event}: ${errorMessage(error)}`);
    }
  }
}
