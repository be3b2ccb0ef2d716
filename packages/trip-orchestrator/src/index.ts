/**
 * @module @itinera/trip-orchestrator
 * Vacation planning orchestrator with budget checkpoints and an
 * approval-gated cost optimizer.
 *
 * @example
 * ```typescript
 * import { createVacationPlanner, loadPlannerConfig } from '@itinera/trip-orchestrator';
 *
 * const config = await loadPlannerConfig('planner.yaml');
 * const planner = createVacationPlanner({ config });
 *
 * const outcome = await planner.run({
 *   origin: 'Boston',
 *   city: 'Kyoto',
 *   country: 'Japan',
 *   departureDate: '2026-04-01',
 *   nights: 6,
 *   budget: 4000,
 * });
 *
 * if (outcome.kind === 'halted') {
 *   console.log(outcome.message, outcome.options);
 * }
 * ```
 */

export { TripOrchestrator, ORCHESTRATOR_AGENT } from './orchestrator.js';
export type { TripOrchestratorOptions } from './orchestrator.js';
export { createVacationPlanner } from './factory.js';
export type { VacationPlannerOptions } from './factory.js';
export { loadPlannerConfig, resolvePlannerConfig, mergeConfig } from './config.js';
export { OrchestrationAnalytics, ORCHESTRATION_EVENTS } from './analytics.js';
export { SessionStore, createDeferred } from './session-store.js';
export type { Deferred, PendingHalt, PlanningSession } from './session-store.js';
export { buildComposition, costBreakdown, foodCost, BOOKING_TASKS } from './booking.js';
export type { BookedComposition, BookingTask } from './booking.js';
export { buildHighlights, MAX_DESTINATION_HIGHLIGHTS } from './highlights.js';
export type { HighlightInput } from './highlights.js';
