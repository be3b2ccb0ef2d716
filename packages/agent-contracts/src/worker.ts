/**
 * @module @itinera/agent-contracts/worker
 * Uniform execution contract shared by every worker.
 *
 * Workers never throw past `execute()`. Internal errors, invalid input and
 * timeouts all come back as a `WorkerResult` with `status: 'failure'`.
 */

/**
 * Structured input/output map exchanged between workers.
 */
export type StructuredMap = Record<string, unknown>;

export type WorkerStatus = 'success' | 'partial' | 'failure';

/**
 * Result of one worker invocation.
 */
export interface WorkerResult<TData extends StructuredMap = StructuredMap> {
  readonly status: WorkerStatus;
  /** Empty or partial when `status` is 'failure' */
  readonly data: TData | Partial<TData>;
  readonly errors: readonly string[];
  /** Always >= 0 */
  readonly elapsedMs: number;
  readonly metadata: Readonly<WorkerResultMetadata>;
}

export interface WorkerResultMetadata {
  worker: string;
  /** ISO timestamp of when execution started */
  startedAt: string;
  /** Inbox messages handled before the body ran */
  messagesProcessed: number;
  timedOut?: boolean;
  [key: string]: unknown;
}

/**
 * Anything the composers can run.
 */
export interface Worker<TData extends StructuredMap = StructuredMap> {
  readonly name: string;
  execute(input: StructuredMap): Promise<WorkerResult<TData>>;
}

/**
 * Per-agent execution counters.
 */
export interface WorkerMetrics {
  executions: number;
  totalTimeMs: number;
  errors: number;
}

/**
 * A worker that also exposes its counters.
 */
export interface MeasuredWorker<TData extends StructuredMap = StructuredMap> extends Worker<TData> {
  getMetrics(): WorkerMetrics;
}
