import { describe, it, expect, vi } from 'vitest';
import { z } from 'zod';
import type {
  IMessageBus,
  Message,
  ProcessedMessage,
  StructuredMap,
  WorkerResult,
} from '@itinera/agent-contracts';
import { BaseWorker } from '../base-worker.js';
import type { WorkerDeps, WorkerRunContext } from '../base-worker.js';
import { createManualClock, createMockLogger } from '../testing.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

const EchoInputSchema = z.object({
  city: z.string().min(1),
  sessionId: z.string().optional(),
  mode: z.enum(['ok', 'warn', 'throw', 'hang', 'send']).default('ok'),
});

type EchoInput = z.infer<typeof EchoInputSchema>;
type EchoData = { city: string; upper: string };

class EchoWorker extends BaseWorker<EchoInput, EchoData> {
  protected readonly inputSchema = EchoInputSchema;
  readonly before = vi.fn();
  readonly after = vi.fn();
  afterThrows = false;

  constructor(deps: WorkerDeps = {}) {
    super('echo', deps);
  }

  protected override async beforeExecute(input: StructuredMap, ctx: WorkerRunContext): Promise<number> {
    this.before(input);
    return super.beforeExecute(input, ctx);
  }

  protected override async afterExecute(result: WorkerResult<EchoData>): Promise<void> {
    this.after(result);
    if (this.afterThrows) {
      throw new Error('hook exploded');
    }
  }

  protected async perform(input: EchoInput, ctx: WorkerRunContext): Promise<EchoData> {
    switch (input.mode) {
      case 'throw':
        throw new Error(`no data for ${input.city}`);
      case 'hang':
        await new Promise((resolve) => setTimeout(resolve, 200));
        break;
      case 'warn':
        ctx.warn('weather feed stale');
        break;
      case 'send':
        ctx.send({
          to: 'documents',
          type: 'WeatherAdvisory',
          payload: { location: input.city, severity: 'warning', warnings: ['wind'] },
        });
        break;
      default:
        break;
    }
    ctx.setMetadata('source', 'static');
    return { city: input.city, upper: input.city.toUpperCase() };
  }
}

function makeBus(processed: ProcessedMessage[] = []): IMessageBus & { sent: Message[] } {
  const sent: Message[] = [];
  return {
    sent,
    send: vi.fn((message: Message) => {
      sent.push(message);
    }),
    receive: vi.fn(() => []),
    acknowledge: vi.fn(() => false),
    registerHandler: vi.fn(() => () => {}),
    processMessages: vi.fn(async () => processed),
  };
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('BaseWorker', () => {
  describe('execute', () => {
    it('returns success with data and metadata', async () => {
      const worker = new EchoWorker();

      const result = await worker.execute({ city: 'Lisbon' });

      expect(result.status).toBe('success');
      expect(result.data).toEqual({ city: 'Lisbon', upper: 'LISBON' });
      expect(result.errors).toEqual([]);
      expect(result.metadata.worker).toBe('echo');
      expect(result.metadata.messagesProcessed).toBe(0);
      expect(result.metadata.source).toBe('static');
    });

    it('downgrades to partial when the body warns', async () => {
      const worker = new EchoWorker();

      const result = await worker.execute({ city: 'Lisbon', mode: 'warn' });

      expect(result.status).toBe('partial');
      expect(result.errors).toEqual(['weather feed stale']);
      expect(result.data).toEqual({ city: 'Lisbon', upper: 'LISBON' });
    });

    it('turns a thrown error into a failure result', async () => {
      const worker = new EchoWorker();

      const result = await worker.execute({ city: 'Lisbon', mode: 'throw' });

      expect(result.status).toBe('failure');
      expect(result.data).toEqual({});
      expect(result.errors).toEqual(['no data for Lisbon']);
    });

    it('rejects invalid input without running the body', async () => {
      const worker = new EchoWorker();

      const result = await worker.execute({ city: '' });

      expect(result.status).toBe('failure');
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^Invalid input: city: /);
    });

    it('fails with a timeout when the body does not settle in time', async () => {
      const worker = new EchoWorker({ timeoutMs: 20 });

      const result = await worker.execute({ city: 'Lisbon', mode: 'hang' });

      expect(result.status).toBe('failure');
      expect(result.errors).toEqual(['Timed out after 20ms']);
      expect(result.metadata.timedOut).toBe(true);
    });

    it('freezes the result', async () => {
      const worker = new EchoWorker();

      const result = await worker.execute({ city: 'Lisbon' });

      expect(Object.isFrozen(result)).toBe(true);
      expect(Object.isFrozen(result.errors)).toBe(true);
      expect(Object.isFrozen(result.metadata)).toBe(true);
    });

    it('measures elapsed time with the injected clock', async () => {
      const clock = createManualClock(100);
      const worker = new EchoWorker({
        clock: () => {
          const t = clock.now();
          clock.advance(40);
          return t;
        },
      });

      const result = await worker.execute({ city: 'Lisbon' });

      expect(result.elapsedMs).toBe(40);
    });
  });

  describe('hooks', () => {
    it('runs both hooks on success', async () => {
      const worker = new EchoWorker();

      await worker.execute({ city: 'Lisbon' });

      expect(worker.before).toHaveBeenCalledTimes(1);
      expect(worker.after).toHaveBeenCalledTimes(1);
    });

    it('runs both hooks when the body fails', async () => {
      const worker = new EchoWorker();

      await worker.execute({ city: 'Lisbon', mode: 'throw' });

      expect(worker.before).toHaveBeenCalledTimes(1);
      expect(worker.after).toHaveBeenCalledTimes(1);
      expect(worker.after.mock.calls[0][0].status).toBe('failure');
    });

    it('logs an afterExecute error without propagating it', async () => {
      const logger = createMockLogger();
      const worker = new EchoWorker({ logger });
      worker.afterThrows = true;

      const result = await worker.execute({ city: 'Lisbon' });

      expect(result.status).toBe('success');
      expect(logger.warn).toHaveBeenCalledWith('[echo] afterExecute hook failed: hook exploded');
    });
  });

  describe('inbox', () => {
    it('processes pending messages before running and counts handled ones', async () => {
      const bus = makeBus([
        { messageId: 'm1', type: 'WeatherAdvisory', status: 'processed', result: undefined },
        { messageId: 'm2', type: 'Custom', status: 'error', error: 'boom' },
      ]);
      const worker = new EchoWorker({ bus });

      const result = await worker.execute({ city: 'Lisbon', sessionId: 's-1' });

      expect(bus.processMessages).toHaveBeenCalledWith('echo', expect.any(Function));
      expect(result.metadata.messagesProcessed).toBe(1);
    });

    it('sends messages stamped with sender and session', async () => {
      const bus = makeBus();
      const worker = new EchoWorker({ bus });

      await worker.execute({ city: 'Lisbon', sessionId: 's-1', mode: 'send' });

      expect(bus.sent).toHaveLength(1);
      expect(bus.sent[0].from).toBe('echo');
      expect(bus.sent[0].to).toBe('documents');
      expect(bus.sent[0].correlationId).toBe('s-1');
      expect(bus.sent[0].priority).toBe('normal');
      expect(worker.getMessagesSent()).toBe(1);
    });

    it('drops sends when no bus is attached', async () => {
      const worker = new EchoWorker();

      const result = await worker.execute({ city: 'Lisbon', mode: 'send' });

      expect(result.status).toBe('success');
      expect(worker.getMessagesSent()).toBe(0);
    });
  });

  describe('getMetrics', () => {
    it('counts executions and errors', async () => {
      const worker = new EchoWorker();

      await worker.execute({ city: 'Lisbon' });
      await worker.execute({ city: 'Lisbon', mode: 'throw' });
      await worker.execute({ city: '' });

      const metrics = worker.getMetrics();
      expect(metrics.executions).toBe(3);
      expect(metrics.errors).toBe(2);
      expect(metrics.totalTimeMs).toBeGreaterThanOrEqual(0);
    });
  });
});
