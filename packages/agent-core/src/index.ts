/**
 * @itinera/agent-core
 *
 * Workflow orchestration primitives: message bus, composers, budget
 * checkpoint and iterative optimizer.
 */

// Messaging
export { MessageBus, createMessage } from './messaging/message-bus.js';
export type { BusListener, MessageBusOptions } from './messaging/message-bus.js';
export { KeyedMutex } from './messaging/keyed-mutex.js';

// Execution primitives
export { PhaseStateMachine, COMPOSITION_TRANSITIONS } from './execution/phase-state-machine.js';
export type { TransitionTable, StateTransition, CompositionState } from './execution/phase-state-machine.js';

// Composers
export { SequentialComposer, WARNINGS_KEY, assertUniqueNames } from './composers/sequential-composer.js';
export type { SequentialComposerOptions } from './composers/sequential-composer.js';
export { ParallelComposer } from './composers/parallel-composer.js';
export type { ParallelComposerConfig, ParallelComposerOptions } from './composers/parallel-composer.js';

// Budget checkpoint
export {
  assess,
  assessBreakdown,
  describeAssessment,
  budgetOptions,
  formatMoney,
  DEFAULT_BUDGET_THRESHOLDS,
} from './checkpoint/budget-checkpoint.js';

// Optimizer
export { BudgetOptimizer, createOptimizationState, summarizeOptimization } from './optimizer/budget-optimizer.js';
export type { BudgetOptimizerOptions, InitialOptimizationInput, OptimizerEvent } from './optimizer/budget-optimizer.js';
