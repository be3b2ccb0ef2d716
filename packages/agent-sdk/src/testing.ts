/**
 * @itinera/agent-sdk/testing
 *
 * Mock helpers for tests of workers, composers and the orchestrator.
 * Import from this sub-path, never from the main index.
 *
 * @example
 *   import { createMockLogger, StubWorker } from '@itinera/agent-sdk/testing';
 *
 * All helpers use vitest's `vi.fn()`; vitest must be available in the test env.
 */

import { vi } from 'vitest';
import type {
  ILogger,
  MeasuredWorker,
  StructuredMap,
  WorkerMetrics,
  WorkerResult,
  WorkerResultMetadata,
  WorkerStatus,
} from '@itinera/agent-contracts';

// ─── Logger mock ──────────────────────────────────────────────────────────────

export type MockLogger = ILogger & {
  debug: ReturnType<typeof vi.fn>;
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
};

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

// ─── Manual clock ─────────────────────────────────────────────────────────────

export interface ManualClock {
  now: () => number;
  advance(ms: number): void;
}

/** Clock that only moves when told to */
export function createManualClock(start = 0): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
  };
}

// ─── WorkerResult mock ────────────────────────────────────────────────────────

export function makeWorkerResult<TData extends StructuredMap = StructuredMap>(
  overrides: Omit<Partial<WorkerResult<TData>>, 'metadata'> & { metadata?: Partial<WorkerResultMetadata> } = {},
): WorkerResult<TData> {
  const { metadata, ...rest } = overrides;
  return {
    status: 'success',
    data: {},
    errors: [],
    elapsedMs: 0,
    ...rest,
    metadata: { worker: 'stub', startedAt: '2026-01-01T00:00:00.000Z', messagesProcessed: 0, ...metadata },
  };
}

// ─── Stub worker ──────────────────────────────────────────────────────────────

export interface StubWorkerOptions {
  status?: WorkerStatus;
  data?: StructuredMap;
  errors?: string[];
  /** Reported elapsed time */
  elapsedMs?: number;
  /** Real wait before resolving */
  delayMs?: number;
  /** Throw instead of returning, breaking the contract on purpose */
  throws?: string;
  /** Called with every input the stub receives */
  onExecute?: (input: StructuredMap) => void;
}

/**
 * Worker with a canned result. `calls` keeps every input it received.
 */
export class StubWorker implements MeasuredWorker {
  readonly calls: StructuredMap[] = [];
  readonly execute = vi.fn(async (input: StructuredMap): Promise<WorkerResult> => {
    this.calls.push(input);
    this.options.onExecute?.(input);
    if (this.options.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, this.options.delayMs));
    }
    if (this.options.throws !== undefined) {
      throw new Error(this.options.throws);
    }
    const status = this.options.status ?? 'success';
    return makeWorkerResult({
      status,
      data: this.options.data ?? (status === 'failure' ? {} : { ok: true }),
      errors: this.options.errors ?? (status === 'failure' ? [`${this.name} failed`] : []),
      elapsedMs: this.options.elapsedMs ?? 0,
      metadata: { worker: this.name },
    });
  });

  constructor(
    readonly name: string,
    private readonly options: StubWorkerOptions = {},
  ) {}

  getMetrics(): WorkerMetrics {
    return { executions: this.calls.length, totalTimeMs: 0, errors: 0 };
  }
}
