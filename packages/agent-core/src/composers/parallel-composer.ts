/**
 * ParallelComposer: fork/join over independent workers.
 *
 * Features:
 * - All tasks receive the same frozen shared input
 * - Concurrency cap: at most `maxConcurrent` tasks run at once (FIFO slot queue)
 * - One result per task; a failing task never fails the composite
 * - A worker that throws despite the contract becomes a failure result
 * - Speedup = Σ task elapsedMs / wall-clock join time
 */

import type { ILogger, ParallelResult, ParallelTask, StructuredMap, WorkerResult } from '@itinera/agent-contracts';
import { errorMessage } from '@itinera/agent-contracts';
import { createNoopLogger } from '@itinera/agent-sdk';
import { assertUniqueNames } from './sequential-composer.js';

export interface ParallelComposerConfig {
  /** Maximum simultaneously running tasks. 0 = unlimited. Default: 0 */
  maxConcurrent: number;
}

export interface ParallelComposerOptions extends Partial<ParallelComposerConfig> {
  logger?: ILogger;
  clock?: () => number;
  onTaskDone?: (task: string, result: WorkerResult) => void;
}

export class ParallelComposer {
  private readonly config: ParallelComposerConfig;
  private readonly logger: ILogger;
  private readonly clock: () => number;
  private readonly onTaskDone?: (task: string, result: WorkerResult) => void;

  /** Currently running slot count */
  private running = 0;
  /** Tasks waiting for a slot */
  private readonly queue: Array<() => void> = [];

  constructor(options: ParallelComposerOptions = {}) {
    this.config = { maxConcurrent: options.maxConcurrent ?? 0 };
    this.logger = options.logger ?? createNoopLogger();
    this.clock = options.clock ?? (() => performance.now());
    this.onTaskDone = options.onTaskDone;
  }

  async run(tasks: readonly ParallelTask[], sharedInput: StructuredMap = {}): Promise<ParallelResult> {
    assertUniqueNames(tasks.map((t) => t.name));
    const input = Object.freeze({ ...sharedInput });
    const start = this.clock();

    this.logger.debug(`[parallel] Forking ${tasks.length} tasks`, { tasks: tasks.map((t) => t.name) });

    const settled = await Promise.all(tasks.map((task) => this.enqueue(task, input)));

    const actualParallelTimeMs = Math.max(0, this.clock() - start);
    const perTaskResults: Record<string, WorkerResult> = {};
    let sequentialTimeEstimateMs = 0;
    let failedCount = 0;

    tasks.forEach((task, i) => {
      const result = settled[i];
      perTaskResults[task.name] = result;
      sequentialTimeEstimateMs += result.elapsedMs;
      if (result.status === 'failure') {
        failedCount++;
      }
    });

    const speedup = actualParallelTimeMs > 0 ? sequentialTimeEstimateMs / actualParallelTimeMs : 1;
    this.logger.debug(`[parallel] Joined ${tasks.length} tasks in ${actualParallelTimeMs.toFixed(1)}ms`, {
      speedup: Number(speedup.toFixed(2)),
      failedCount,
    });

    return {
      perTaskResults,
      speedup,
      sequentialTimeEstimateMs,
      actualParallelTimeMs,
      succeededCount: tasks.length - failedCount,
      failedCount,
    };
  }

  /** Current running/queue stats */
  stats(): { running: number; queued: number } {
    return { running: this.running, queued: this.queue.length };
  }

  // ── Private helpers ─────────────────────────────────────────────────

  private enqueue(task: ParallelTask, input: StructuredMap): Promise<WorkerResult> {
    return new Promise((resolve) => {
      const attempt = () => {
        if (this.config.maxConcurrent <= 0 || this.running < this.config.maxConcurrent) {
          this.running++;
          void this.runOne(task, input)
            .then((result) => {
              this.notify(task.name, result);
              resolve(result);
            })
            .finally(() => {
              this.running--;
              this.drainQueue();
            });
        } else {
          this.queue.push(attempt);
        }
      };
      attempt();
    });
  }

  private drainQueue(): void {
    while (this.queue.length > 0 && (this.config.maxConcurrent <= 0 || this.running < this.config.maxConcurrent)) {
      const next = this.queue.shift();
      next?.();
    }
  }

  private notify(task: string, result: WorkerResult): void {
    try {
      this.onTaskDone?.(task, result);
    } catch (error) {
      this.logger.error(`[parallel] onTaskDone callback failed: ${errorMessage(error)}`);
    }
  }

  private async runOne(task: ParallelTask, input: StructuredMap): Promise<WorkerResult> {
    const start = this.clock();
    try {
      return await task.worker.execute(input);
    } catch (error) {
      this.logger.warn(`[parallel] Task "${task.name}" threw: ${errorMessage(error)}`);
      return {
        status: 'failure',
        data: {},
        errors: [errorMessage(error)],
        elapsedMs: Math.max(0, this.clock() - start),
        metadata: { worker: task.worker.name, startedAt: new Date().toISOString(), messagesProcessed: 0 },
      };
    }
  }
}
