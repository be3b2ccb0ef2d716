/**
 * @module @itinera/progress-reporter/types
 * Type definitions for progress feedback system.
 */

import type { CheckpointKind, PhaseName, WorkerStatus } from "@itinera/agent-contracts";

/**
 * Progress event types.
 */
export type ProgressEventType =
  | "run_started"
  | "phase_started"
  | "phase_completed"
  | "agent_completed"
  | "checkpoint_reached"
  | "strategy_proposed"
  | "strategy_applied"
  | "strategy_rejected"
  | "run_finished";

/**
 * Base progress event.
 */
export interface BaseProgressEvent {
  type: ProgressEventType;
  timestamp: number;
  sessionId: string;
}

/**
 * Run started event.
 */
export interface RunStartedEvent extends BaseProgressEvent {
  type: "run_started";
  data: {
    destination: string;
    nights: number;
    budget: number;
  };
}

/**
 * Phase lifecycle event.
 */
export interface PhaseStartedEvent extends BaseProgressEvent {
  type: "phase_started";
  data: {
    phase: PhaseName;
  };
}

export interface PhaseCompletedEvent extends BaseProgressEvent {
  type: "phase_completed";
  data: {
    phase: PhaseName;
    status: "completed" | "aborted" | "skipped";
    elapsedMs: number;
    speedup?: number; // Only for parallel phases
  };
}

/**
 * One worker finished inside a phase.
 */
export interface AgentCompletedEvent extends BaseProgressEvent {
  type: "agent_completed";
  data: {
    phase: PhaseName;
    agent: string;
    status: WorkerStatus;
    elapsedMs: number;
    error?: string; // Only for 'failure'
  };
}

/**
 * Run halted for a human decision.
 */
export interface CheckpointReachedEvent extends BaseProgressEvent {
  type: "checkpoint_reached";
  data: {
    checkpoint: CheckpointKind;
    message: string;
  };
}

/**
 * Optimizer strategy event.
 */
export interface StrategyEvent extends BaseProgressEvent {
  type: "strategy_proposed" | "strategy_applied" | "strategy_rejected";
  data: {
    strategyId: string;
    iteration: number;
    savingsAmount?: number; // Not set for 'rejected'
    newCost?: number;
  };
}

/**
 * Run finished event.
 */
export interface RunFinishedEvent extends BaseProgressEvent {
  type: "run_finished";
  data: {
    status: "completed" | "aborted" | "cancelled";
    totalDuration: number;
    finalCost?: number; // Only for 'completed'
    reason?: string;
  };
}

/**
 * Union of all progress events.
 */
export type ProgressEvent =
  | RunStartedEvent
  | PhaseStartedEvent
  | PhaseCompletedEvent
  | AgentCompletedEvent
  | CheckpointReachedEvent
  | StrategyEvent
  | RunFinishedEvent;

/**
 * Progress callback function.
 */
export type ProgressCallback = (event: ProgressEvent) => void;
