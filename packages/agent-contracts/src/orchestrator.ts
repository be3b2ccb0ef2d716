/**
 * @module @itinera/agent-contracts/orchestrator
 * Entry-point types: halts, decisions and final reports.
 */

import type { BudgetReport } from './budget.js';
import type { Message } from './messages.js';
import type { OptimizationStatus, StrategyProposal, StrategyRecord } from './optimization.js';
import type { TripRequest } from './trip-schemas.js';
import type { StructuredMap, WorkerMetrics } from './worker.js';

/**
 * Booking components the optimizer works on.
 */
export type BookingComposition = {
  flights: { total: number; airline: string; cabinClass: string };
  hotel: { total: number; nights: number; stars: number; name: string };
  car: { included: boolean; total: number };
  activities: { total: number; count: number };
  food: { total: number };
  travelers: number;
};

export type PhaseName = 'research' | 'booking' | 'budgetCheckpoint' | 'optimization' | 'suggestions' | 'organization';

export interface PhaseLogEntry {
  phase: PhaseName;
  status: 'completed' | 'aborted' | 'halted' | 'resumed' | 'skipped';
  elapsedMs: number;
  speedup?: number;
  iterations?: number;
  note?: string;
}

export type CheckpointKind = 'budget' | 'strategyApproval' | 'optimizationIncomplete' | 'suggestions';

export type ResumeChoice = 'proceed' | 'optimize' | 'setBudget' | 'approve' | 'reject' | 'cancel';

export interface ResumeOption {
  choice: ResumeChoice;
  label: string;
}

export type ResumeDecision =
  | { resumeToken: string; choice: Exclude<ResumeChoice, 'setBudget'>; note?: string }
  | { resumeToken: string; choice: 'setBudget'; budget: number; note?: string };

/**
 * Optimizer report with sets flattened for transport.
 */
export interface OptimizationSummary {
  status: OptimizationStatus;
  initialCost: number;
  finalCost: number;
  targetBudget: number;
  totalSavings: number;
  iterations: number;
  maxIterations: number;
  applied: StrategyRecord[];
  rejected: string[];
  skipped: string[];
  remaining: string[];
}

interface HaltBase {
  kind: 'halted';
  sessionId: string;
  /** Opaque; pass back in the ResumeDecision */
  resumeToken: string;
  message: string;
  options: ResumeOption[];
}

export type HaltedAtCheckpoint =
  | (HaltBase & { checkpoint: 'budget'; assessment: BudgetReport })
  | (HaltBase & { checkpoint: 'strategyApproval'; proposal: StrategyProposal<BookingComposition> })
  | (HaltBase & { checkpoint: 'optimizationIncomplete'; optimization: OptimizationSummary })
  | (HaltBase & { checkpoint: 'suggestions'; highlights: string[] });

export interface TripPlan {
  destination: string;
  departureDate: string;
  nights: number;
  travelers: number;
  research: StructuredMap;
  bookings: Record<string, StructuredMap>;
  composition: BookingComposition;
  assessment: BudgetReport;
  optimization?: OptimizationSummary;
  finalCost: number;
  withinBudget: boolean;
  itinerary: StructuredMap;
  documents: StructuredMap;
}

interface ReportBase {
  kind: 'final';
  sessionId: string;
  request: TripRequest;
  phases: PhaseLogEntry[];
  warnings: string[];
  totalTimeMs: number;
}

export interface CriticalAbort {
  phase: PhaseName;
  agent: string;
  reason: string;
  /** The critical message, verbatim, when one triggered the abort */
  message?: Message;
}

export type FinalReport =
  | (ReportBase & { status: 'completed'; plan: TripPlan })
  | (ReportBase & { status: 'aborted'; abort: CriticalAbort; partialContext: StructuredMap })
  | (ReportBase & { status: 'cancelled'; checkpoint: CheckpointKind; partialContext: StructuredMap });

export type OrchestratorOutcome = FinalReport | HaltedAtCheckpoint;

export type AgentMetricsMap = Record<string, WorkerMetrics>;
