// ============================================
// Itinera - Type Contracts
// ============================================

// Messages
export type {
  AgentName,
  MessageType,
  MessagePriority,
  PayloadExtensions,
  SecurityAlertPayload,
  WeatherAdvisoryPayload,
  BudgetUpdatePayload,
  TravelBlockedPayload,
  CustomPayload,
  MessagePayloads,
  MessageMap,
  Message,
  MessageOf,
  MessageDraft,
  MessageFilter,
  HandlerResult,
  MessageHandler,
  ProcessedMessage,
  ReceiveOptions,
  IMessageBus,
} from './messages.js';

// Worker contract
export type {
  StructuredMap,
  WorkerStatus,
  WorkerResult,
  WorkerResultMetadata,
  Worker,
  WorkerMetrics,
  MeasuredWorker,
} from './worker.js';

// Composers
export type {
  StepWarning,
  StepFailureMarker,
  StepTiming,
  StepInput,
  SequentialStep,
  SequentialCompleted,
  SequentialAborted,
  SequentialResult,
  ParallelTask,
  ParallelResult,
} from './composition.js';

// Budget
export type {
  BudgetScenario,
  BudgetStatus,
  BudgetAssessment,
  BudgetThresholds,
  CostBreakdown,
  BudgetReport,
} from './budget.js';

// Optimization
export type {
  StrategyId,
  OptimizerPhase,
  OptimizationStatus,
  StrategyRecord,
  StrategyProposal,
  Strategy,
  ApprovalDecision,
  ApprovalGate,
  OptimizationState,
} from './optimization.js';

// Orchestrator
export type {
  BookingComposition,
  PhaseName,
  PhaseLogEntry,
  CheckpointKind,
  ResumeChoice,
  ResumeOption,
  ResumeDecision,
  OptimizationSummary,
  HaltedAtCheckpoint,
  TripPlan,
  CriticalAbort,
  FinalReport,
  OrchestratorOutcome,
  AgentMetricsMap,
} from './orchestrator.js';

// Logging and analytics
export type { LogLevel, LogMeta, ILogger, IAnalytics } from './logger.js';

// Errors
export {
  ItineraError,
  TripRequestError,
  ResumeTokenError,
  InvalidDecisionError,
  ConfigError,
  MessageError,
  errorMessage,
} from './errors.js';
export type { ItineraErrorCode } from './errors.js';

// Schemas
export {
  BudgetThresholdsSchema,
  StrategyFractionsSchema,
  StrategyIdSchema,
  OptimizerConfigSchema,
  CostAssumptionsSchema,
  CheckpointConfigSchema,
  PlannerConfigSchema,
} from './config-schemas.js';
export type {
  PlannerConfig,
  PlannerConfigInput,
  OptimizerConfig,
  StrategyFractions,
  CostAssumptions,
  BookingStrategyId,
} from './config-schemas.js';

export { TripRequestSchema } from './trip-schemas.js';
export type { TripRequest, TripRequestInput } from './trip-schemas.js';
