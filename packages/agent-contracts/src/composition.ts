/**
 * @module @itinera/agent-contracts/composition
 * Result shapes produced by the sequential and parallel composers.
 */

import type { StructuredMap, Worker, WorkerResult } from './worker.js';

/**
 * Recorded when a non-critical step fails or returns partial data.
 */
export interface StepWarning {
  step: string;
  status: 'partial' | 'failure';
  errors: string[];
}

/**
 * Marker stored under a critical step's name when it aborts the run.
 */
export interface StepFailureMarker {
  status: 'failure';
  errors: string[];
}

export interface StepTiming {
  step: string;
  status: WorkerResult['status'];
  elapsedMs: number;
}

/**
 * Input for a single step: a static override map, or one derived from
 * the accumulated context.
 */
export type StepInput = StructuredMap | ((context: Readonly<StructuredMap>) => StructuredMap);

export interface SequentialStep {
  name: string;
  worker: Worker;
  /** Failure of a critical step aborts the run */
  critical?: boolean;
  input?: StepInput;
}

export interface SequentialCompleted {
  status: 'completed';
  context: StructuredMap;
  stepResults: Record<string, WorkerResult>;
  timings: StepTiming[];
  totalMs: number;
}

export interface SequentialAborted {
  status: 'aborted';
  failedAt: string;
  errors: string[];
  /** Steps before the failed one plus its failure marker */
  context: StructuredMap;
  stepResults: Record<string, WorkerResult>;
  timings: StepTiming[];
  totalMs: number;
}

export type SequentialResult = SequentialCompleted | SequentialAborted;

export interface ParallelTask {
  name: string;
  worker: Worker;
}

export interface ParallelResult {
  /** Exactly one entry per submitted task */
  perTaskResults: Record<string, WorkerResult>;
  speedup: number;
  sequentialTimeEstimateMs: number;
  actualParallelTimeMs: number;
  succeededCount: number;
  failedCount: number;
}
