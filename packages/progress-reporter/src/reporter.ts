/**
 * @module @itinera/progress-reporter/reporter
 * Progress reporter for trip orchestration.
 *
 * UX-only component - events are NOT visible to the orchestrator.
 * Used for real-time progress feedback in CLI and Web UI.
 */

import type { CheckpointKind, ILogger, PhaseName, WorkerStatus } from '@itinera/agent-contracts';
import { errorMessage } from '@itinera/agent-contracts';
import type {
  ProgressEvent,
  ProgressCallback,
  PhaseCompletedEvent,
  RunFinishedEvent,
  StrategyEvent,
} from './types.js';

const STRATEGY_EVENT_TYPES = {
  proposed: 'strategy_proposed',
  applied: 'strategy_applied',
  rejected: 'strategy_rejected',
} as const satisfies Record<string, StrategyEvent['type']>;

/**
 * Progress reporter - emits UX-only progress events.
 *
 * Key design principles:
 * - **UX-only**: Events are invisible to orchestrator logic
 * - **Real-time**: Immediate feedback for user experience
 * - **Visual**: Status emoji (✅🟡❌) for quick status understanding
 *
 * @example
 * ```typescript
 * import { ProgressReporter } from '@itinera/progress-reporter';
 * import { createLogger } from '@itinera/agent-sdk';
 *
 * const reporter = new ProgressReporter(createLogger('progress'), (event) => {
 *   // Stream to Web UI via WebSocket/SSE
 *   ws.send(JSON.stringify(event));
 * });
 *
 * reporter.start('session-1', { destination: 'Lisbon', nights: 5, budget: 3000 });
 * reporter.phaseStarted('session-1', 'research');
 * // ... rest of orchestration
 * reporter.finished('session-1', 'completed', { finalCost: 2875 });
 * ```
 */
export class ProgressReporter {
  private events: ProgressEvent[] = [];
  private readonly startTimes = new Map<string, number>();

  constructor(
    private logger: ILogger,
    private onProgress?: ProgressCallback,
    private now: () => number = Date.now,
  ) {}

  /**
   * Start tracking a new run.
   */
  start(sessionId: string, trip: { destination: string; nights: number; budget: number }): void {
    const timestamp = this.now();
    this.startTimes.set(sessionId, timestamp);
    this.emit({ type: 'run_started', timestamp, sessionId, data: trip });
    this.logger.info(`🧭 Planning ${trip.nights} nights in ${trip.destination} (budget ${trip.budget})`);
  }

  phaseStarted(sessionId: string, phase: PhaseName): void {
    this.emit({ type: 'phase_started', timestamp: this.now(), sessionId, data: { phase } });
    this.logger.info(`▶️  Phase ${phase} started`);
  }

  phaseCompleted(sessionId: string, data: PhaseCompletedEvent['data']): void {
    this.emit({ type: 'phase_completed', timestamp: this.now(), sessionId, data });

    const elapsed = `${(data.elapsedMs / 1000).toFixed(1)}s`;
    switch (data.status) {
      case 'completed':
        this.logger.info(
          data.speedup === undefined
            ? `✅ Phase ${data.phase} completed in ${elapsed}`
            : `✅ Phase ${data.phase} completed in ${elapsed} (${data.speedup.toFixed(1)}x speedup)`,
        );
        break;
      case 'aborted':
        this.logger.error(`❌ Phase ${data.phase} aborted after ${elapsed}`);
        break;
      case 'skipped':
        this.logger.info(`⏭️  Phase ${data.phase} skipped`);
        break;
    }
  }

  /**
   * Report a single worker result.
   */
  agent(
    sessionId: string,
    phase: PhaseName,
    agent: string,
    status: WorkerStatus,
    elapsedMs: number,
    error?: string,
  ): void {
    const emoji = this.getStatusEmoji(status);
    this.emit({
      type: 'agent_completed',
      timestamp: this.now(),
      sessionId,
      data: { phase, agent, status, elapsedMs, ...(error ? { error } : {}) },
    });

    if (status === 'failure') {
      this.logger.warn(`${emoji} [${agent}] Failed: ${error || 'Unknown error'}`);
    } else {
      this.logger.debug(`${emoji} [${agent}] ${status} in ${elapsedMs.toFixed(0)}ms`);
    }
  }

  /**
   * Report a halt waiting for a human decision.
   */
  checkpoint(sessionId: string, checkpoint: CheckpointKind, message: string): void {
    this.emit({ type: 'checkpoint_reached', timestamp: this.now(), sessionId, data: { checkpoint, message } });
    this.logger.info(`✋ Checkpoint ${checkpoint}: ${message}`);
  }

  strategy(
    sessionId: string,
    phase: 'proposed' | 'applied' | 'rejected',
    strategyId: string,
    iteration: number,
    amounts?: { savingsAmount: number; newCost: number },
  ): void {
    this.emit({
      type: STRATEGY_EVENT_TYPES[phase],
      timestamp: this.now(),
      sessionId,
      data: { strategyId, iteration, ...(amounts || {}) },
    });

    switch (phase) {
      case 'proposed':
        this.logger.info(`💡 Proposed ${strategyId}: save ${amounts?.savingsAmount.toFixed(2) ?? '0.00'}`);
        break;
      case 'applied':
        this.logger.info(`💰 Applied ${strategyId}: new cost ${amounts?.newCost.toFixed(2) ?? '?'}`);
        break;
      case 'rejected':
        this.logger.info(`🚫 Rejected ${strategyId}`);
        break;
    }
  }

  /**
   * Report run completion. The callback still receives `run_finished`;
   * the session's events are then dropped from the history.
   */
  finished(
    sessionId: string,
    status: RunFinishedEvent['data']['status'],
    extra: { finalCost?: number; reason?: string } = {},
  ): void {
    const timestamp = this.now();
    const totalDuration = timestamp - (this.startTimes.get(sessionId) ?? timestamp);
    this.startTimes.delete(sessionId);
    const emoji = status === 'completed' ? '✅' : status === 'cancelled' ? '🛑' : '❌';

    this.emit({ type: 'run_finished', timestamp, sessionId, data: { status, totalDuration, ...extra } });

    this.logger.info(`${emoji} Run ${status} in ${(totalDuration / 1000).toFixed(1)}s`);
    if (extra.finalCost !== undefined) {
      this.logger.info(`💵 Final cost: ${extra.finalCost.toFixed(2)}`);
    }
    if (extra.reason) {
      this.logger.info(`   Reason: ${extra.reason}`);
    }

    this.events = this.events.filter((event) => event.sessionId !== sessionId);
  }

  /**
   * Events of runs that have not finished yet (for debugging/testing).
   */
  getEvents(): readonly ProgressEvent[] {
    return [...this.events];
  }

  /**
   * Clear all events.
   */
  clear(): void {
    this.events = [];
    this.startTimes.clear();
  }

  /**
   * Emit event to callback and store in history.
   */
  private emit(event: ProgressEvent): void {
    this.events.push(event);
    if (!this.onProgress) {
      return;
    }
    try {
      this.onProgress(event);
    } catch (error) {
      this.logger.error(`Progress callback failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Get emoji for worker status.
   */
  private getStatusEmoji(status: WorkerStatus): string {
    switch (status) {
      case 'success':
        return '✅';
      case 'partial':
        return '🟡';
      case 'failure':
        return '❌';
    }
  }
}
