/**
 * @module @itinera/progress-reporter
 * UX-only progress feedback for trip orchestration.
 *
 * Provides real-time progress events for CLI and Web UI.
 * Events are invisible to orchestrator logic.
 *
 * @example
 * ```typescript
 * import { ProgressReporter } from '@itinera/progress-reporter';
 * import { createLogger } from '@itinera/agent-sdk';
 *
 * // CLI usage
 * const reporter = new ProgressReporter(createLogger('progress'));
 * reporter.start('s-1', { destination: 'Lisbon', nights: 5, budget: 3000 });
 * reporter.phaseStarted('s-1', 'booking');
 * reporter.phaseCompleted('s-1', { phase: 'booking', status: 'completed', elapsedMs: 420, speedup: 3.1 });
 * reporter.finished('s-1', 'completed', { finalCost: 2875 });
 *
 * // Web UI usage (with callback)
 * const reporter = new ProgressReporter(logger, (event) => {
 *   ws.send(JSON.stringify(event));
 * });
 * ```
 */

export { ProgressReporter } from './reporter.js';

export type {
  ProgressEvent,
  ProgressEventType,
  ProgressCallback,
  RunStartedEvent,
  PhaseStartedEvent,
  PhaseCompletedEvent,
  AgentCompletedEvent,
  CheckpointReachedEvent,
  StrategyEvent,
  RunFinishedEvent,
} from './types.js';
