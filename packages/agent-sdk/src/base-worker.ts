/**
 * BaseWorker: the uniform execute/result contract every agent implements.
 *
 * Guarantees:
 *   - `execute()` never throws; errors become `status: 'failure'` results
 *   - input is validated with the worker's zod schema before the body runs
 *   - `beforeExecute` and `afterExecute` run on every call, failures included
 *   - a body that outlives `timeoutMs` yields a failure result
 *
 * Subclasses implement `perform()` and may override the hooks. The default
 * `beforeExecute` drains the worker's inbox through its registered handlers.
 *
 * @example
 * ```typescript
 * class WeatherWorker extends BaseWorker<WeatherInput, WeatherData> {
 *   protected readonly inputSchema = WeatherInputSchema;
 *   constructor(deps: WorkerDeps) { super('destination', deps); }
 *   protected async perform(input: WeatherInput, ctx: WorkerRunContext) {
 *     return lookupWeather(input.city);
 *   }
 * }
 * ```
 */

import type { ZodType, ZodTypeDef } from 'zod';
import type {
  AgentName,
  ILogger,
  IMessageBus,
  MeasuredWorker,
  MessageDraft,
  MessagePriority,
  MessageType,
  MessagePayloads,
  StructuredMap,
  WorkerMetrics,
  WorkerResult,
  WorkerStatus,
} from '@itinera/agent-contracts';
import { errorMessage } from '@itinera/agent-contracts';
import { createNoopLogger } from './logger.js';
import { createMessage } from './message.js';
import { runWithTimeout } from './timeout.js';

export interface WorkerDeps {
  bus?: IMessageBus;
  logger?: ILogger;
  /** 0 disables the timeout */
  timeoutMs?: number;
  clock?: () => number;
}

/**
 * Outgoing message as seen from inside a worker: `from` is implied.
 */
export type OutgoingMessage = {
  [K in MessageType]: {
    to: AgentName;
    type: K;
    payload: MessagePayloads[K];
    priority?: MessagePriority;
  };
}[MessageType];

/**
 * Per-invocation handle passed to the body and hooks.
 */
export interface WorkerRunContext {
  readonly worker: string;
  /** Session the input belongs to, read from `input.sessionId` */
  readonly correlationId?: string;
  /** Aborted when the worker times out */
  readonly signal: AbortSignal;
  /** Record a non-fatal problem; the result becomes 'partial' */
  warn(message: string): void;
  /** Send a bus message from this worker; no-op without a bus */
  send(message: OutgoingMessage): void;
  setMetadata(key: string, value: unknown): void;
}

class RunContext implements WorkerRunContext {
  readonly warnings: string[] = [];
  readonly metadata: Record<string, unknown> = {};
  signal: AbortSignal = new AbortController().signal;

  constructor(
    readonly worker: string,
    readonly correlationId: string | undefined,
    private readonly bus: IMessageBus | undefined,
    private readonly createDraft: (message: OutgoingMessage) => MessageDraft,
    private readonly deliver: (draft: MessageDraft) => void,
  ) {}

  warn(message: string): void {
    this.warnings.push(message);
  }

  send(message: OutgoingMessage): void {
    if (!this.bus) {
      return;
    }
    this.deliver(this.createDraft(message));
  }

  setMetadata(key: string, value: unknown): void {
    this.metadata[key] = value;
  }
}

type Outcome<TData> = {
  status: WorkerStatus;
  data: TData | Partial<TData>;
  errors: string[];
  timedOut?: boolean;
};

export abstract class BaseWorker<TInput, TData extends StructuredMap> implements MeasuredWorker<TData> {
  protected abstract readonly inputSchema: ZodType<TInput, ZodTypeDef, unknown>;

  protected readonly bus?: IMessageBus;
  protected readonly logger: ILogger;
  protected readonly timeoutMs: number;
  private readonly clock: () => number;
  private readonly metrics: WorkerMetrics = { executions: 0, totalTimeMs: 0, errors: 0 };
  private messagesSent = 0;

  constructor(
    readonly name: string,
    deps: WorkerDeps = {},
  ) {
    this.bus = deps.bus;
    this.logger = deps.logger ?? createNoopLogger();
    this.timeoutMs = deps.timeoutMs ?? 0;
    this.clock = deps.clock ?? (() => performance.now());
  }

  /**
   * Worker body. Throwing is allowed; it becomes a failure result.
   */
  protected abstract perform(input: TInput, ctx: WorkerRunContext): Promise<TData>;

  /**
   * Runs before validation. Returns how many inbox messages were handled.
   */
  protected async beforeExecute(_input: StructuredMap, ctx: WorkerRunContext): Promise<number> {
    if (!this.bus) {
      return 0;
    }
    const correlationId = ctx.correlationId;
    const processed = await this.bus.processMessages(
      this.name,
      (m) => correlationId === undefined || m.correlationId === undefined || m.correlationId === correlationId,
    );
    return processed.filter((p) => p.status === 'processed').length;
  }

  /**
   * Runs after the result is built, on success and failure alike.
   */
  protected async afterExecute(_result: WorkerResult<TData>, _ctx: WorkerRunContext): Promise<void> {}

  async execute(input: StructuredMap): Promise<WorkerResult<TData>> {
    const start = this.clock();
    const startedAt = new Date().toISOString();
    this.metrics.executions += 1;

    const correlationId = typeof input.sessionId === 'string' ? input.sessionId : undefined;
    const ctx = new RunContext(
      this.name,
      correlationId,
      this.bus,
      (message) => ({ ...message, from: this.name, correlationId }),
      (draft) => this.deliver(draft),
    );

    let messagesProcessed = 0;
    let outcome: Outcome<TData>;

    try {
      messagesProcessed = await this.beforeExecute(input, ctx);
      outcome = await this.runBody(input, ctx);
    } catch (error) {
      outcome = { status: 'failure', data: {}, errors: [errorMessage(error)] };
    }

    const elapsedMs = Math.max(0, this.clock() - start);
    this.metrics.totalTimeMs += elapsedMs;
    if (outcome.status === 'failure') {
      this.metrics.errors += 1;
      this.logger.warn(`[${this.name}] failed: ${outcome.errors.join('; ')}`, { elapsedMs });
    } else {
      this.logger.debug(`[${this.name}] ${outcome.status} in ${elapsedMs.toFixed(1)}ms`);
    }

    const result: WorkerResult<TData> = Object.freeze({
      status: outcome.status,
      data: outcome.data,
      errors: Object.freeze([...outcome.errors]),
      elapsedMs,
      metadata: Object.freeze({
        ...ctx.metadata,
        worker: this.name,
        startedAt,
        messagesProcessed,
        ...(outcome.timedOut ? { timedOut: true } : {}),
      }),
    });

    try {
      await this.afterExecute(result, ctx);
    } catch (error) {
      this.logger.warn(`[${this.name}] afterExecute hook failed: ${errorMessage(error)}`);
    }

    return result;
  }

  getMetrics(): WorkerMetrics {
    return { ...this.metrics };
  }

  /** Messages this worker has put on the bus */
  getMessagesSent(): number {
    return this.messagesSent;
  }

  private async runBody(input: StructuredMap, ctx: RunContext): Promise<Outcome<TData>> {
    const parsed = this.inputSchema.safeParse(input);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
      return { status: 'failure', data: {}, errors: [`Invalid input: ${issues.join('; ')}`] };
    }

    const run = await runWithTimeout((signal) => {
      ctx.signal = signal;
      return this.perform(parsed.data, ctx);
    }, this.timeoutMs);

    if (run.timedOut) {
      return { status: 'failure', data: {}, errors: [`Timed out after ${this.timeoutMs}ms`], timedOut: true };
    }

    return {
      status: ctx.warnings.length > 0 ? 'partial' : 'success',
      data: run.value,
      errors: [...ctx.warnings],
    };
  }

  private deliver(draft: MessageDraft): void {
    if (!this.bus) {
      return;
    }
    this.bus.send(createMessage(draft));
    this.messagesSent += 1;
  }
}
