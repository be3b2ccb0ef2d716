import { describe, it, expect, vi } from 'vitest';
import type { Message } from '@itinera/agent-contracts';
import { createMockLogger } from '@itinera/agent-sdk/testing';
import { MessageBus, createMessage } from '../message-bus.js';
import { KeyedMutex } from '../keyed-mutex.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function weather(to = 'documents', correlationId?: string): Message {
  return createMessage({
    from: 'destination',
    to,
    type: 'WeatherAdvisory',
    payload: { location: 'Reykjavik', severity: 'severe', warnings: ['storm'] },
    correlationId,
  });
}

function budgetUpdate(to = 'documents'): Message {
  return createMessage({
    from: 'currency',
    to,
    type: 'BudgetUpdate',
    payload: { budget: 2500, currency: 'ISK' },
  });
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('MessageBus', () => {
  describe('send / receive', () => {
    it('returns messages in arrival order', () => {
      const bus = new MessageBus();
      const first = weather();
      const second = budgetUpdate();

      bus.send(first);
      bus.send(second);

      expect(bus.receive('documents').map((m) => m.id)).toEqual([first.id, second.id]);
    });

    it('creates queues on demand for unknown recipients', () => {
      const bus = new MessageBus();

      expect(bus.receive('nobody')).toEqual([]);
      bus.send(weather('nobody'));
      expect(bus.pendingCount('nobody')).toBe(1);
    });

    it('is idempotent without acknowledge', () => {
      const bus = new MessageBus();
      bus.send(weather());

      expect(bus.receive('documents')).toHaveLength(1);
      expect(bus.receive('documents')).toHaveLength(1);
    });

    it('never returns a message again once drained', () => {
      const bus = new MessageBus();
      bus.send(weather());

      const drained = bus.receive('documents', { acknowledge: true });

      expect(drained).toHaveLength(1);
      expect(drained[0].acknowledged).toBe(true);
      expect(bus.receive('documents')).toEqual([]);
    });

    it('applies the filter', () => {
      const bus = new MessageBus();
      bus.send(weather());
      bus.send(budgetUpdate());

      const onlyBudget = bus.receive('documents', { filter: (m) => m.type === 'BudgetUpdate' });

      expect(onlyBudget).toHaveLength(1);
      expect(onlyBudget[0].type).toBe('BudgetUpdate');
    });
  });

  describe('acknowledge', () => {
    it('marks one message and keeps it in history', () => {
      const bus = new MessageBus();
      const message = weather();
      bus.send(message);
      bus.send(budgetUpdate());

      expect(bus.acknowledge('documents', message.id)).toBe(true);

      expect(bus.pendingCount('documents')).toBe(1);
      expect(bus.history('documents')).toHaveLength(2);
      expect(bus.history('documents')[0].acknowledged).toBe(true);
    });

    it('returns false for unknown or already acknowledged ids', () => {
      const bus = new MessageBus();
      const message = weather();
      bus.send(message);

      expect(bus.acknowledge('documents', 'missing')).toBe(false);
      expect(bus.acknowledge('documents', message.id)).toBe(true);
      expect(bus.acknowledge('documents', message.id)).toBe(false);
    });

    it('does not mutate the original message', () => {
      const bus = new MessageBus();
      const message = weather();
      bus.send(message);

      bus.acknowledge('documents', message.id);

      expect(message.acknowledged).toBe(false);
    });
  });

  describe('processMessages', () => {
    it('runs the handler for each matching type and acknowledges', async () => {
      const bus = new MessageBus();
      const handler = vi.fn((m: Extract<Message, { type: 'WeatherAdvisory' }>) => ({
        location: m.payload.location,
      }));
      bus.registerHandler('documents', 'WeatherAdvisory', handler);
      const message = weather();
      bus.send(message);

      const processed = await bus.processMessages('documents');

      expect(processed).toEqual([
        { messageId: message.id, type: 'WeatherAdvisory', status: 'processed', result: { location: 'Reykjavik' } },
      ]);
      expect(bus.pendingCount('documents')).toBe(0);
    });

    it('leaves messages without a handler pending', async () => {
      const bus = new MessageBus();
      bus.registerHandler('documents', 'WeatherAdvisory', () => undefined);
      bus.send(budgetUpdate());

      const processed = await bus.processMessages('documents');

      expect(processed).toEqual([]);
      expect(bus.pendingCount('documents')).toBe(1);
    });

    it('records handler errors and logs them', async () => {
      const logger = createMockLogger();
      const bus = new MessageBus({ logger });
      bus.registerHandler('documents', 'WeatherAdvisory', () => {
        throw new Error('cannot parse');
      });
      bus.send(weather());

      const processed = await bus.processMessages('documents');

      expect(processed).toHaveLength(1);
      expect(processed[0]).toMatchObject({ status: 'error', error: 'cannot parse' });
      expect(bus.pendingCount('documents')).toBe(0);
      expect(logger.warn).toHaveBeenCalledTimes(1);
    });

    it('only handles messages matching the filter', async () => {
      const bus = new MessageBus();
      const handler = vi.fn(() => undefined);
      bus.registerHandler('documents', 'WeatherAdvisory', handler);
      bus.send(weather('documents', 'run-a'));
      bus.send(weather('documents', 'run-b'));

      await bus.processMessages('documents', (m) => m.correlationId === 'run-a');

      expect(handler).toHaveBeenCalledTimes(1);
      expect(bus.receive('documents').map((m) => m.correlationId)).toEqual(['run-b']);
    });

    it('never handles a message twice under concurrent drains', async () => {
      const bus = new MessageBus();
      const handler = vi.fn(async () => {
        await new Promise((resolve) => setTimeout(resolve, 5));
      });
      bus.registerHandler('documents', 'WeatherAdvisory', handler);
      bus.send(weather());
      bus.send(weather());

      const [a, b] = await Promise.all([bus.processMessages('documents'), bus.processMessages('documents')]);

      expect(handler).toHaveBeenCalledTimes(2);
      expect(a.length + b.length).toBe(2);
    });

    it('unregisters a handler', async () => {
      const bus = new MessageBus();
      const handler = vi.fn(() => undefined);
      const off = bus.registerHandler('documents', 'WeatherAdvisory', handler);
      off();
      bus.send(weather());

      await bus.processMessages('documents');

      expect(handler).not.toHaveBeenCalled();
    });

    it('keeps a replacement handler when the replaced one unregisters', async () => {
      const bus = new MessageBus();
      const first = vi.fn(() => undefined);
      const second = vi.fn(() => ({ seen: true }));
      const offFirst = bus.registerHandler('documents', 'WeatherAdvisory', first);
      bus.registerHandler('documents', 'WeatherAdvisory', second);
      offFirst();
      bus.send(weather());

      const processed = await bus.processMessages('documents');

      expect(first).not.toHaveBeenCalled();
      expect(second).toHaveBeenCalledTimes(1);
      expect(processed.map((p) => (p.status === 'processed' ? p.result : undefined))).toEqual([{ seen: true }]);
    });
  });

  describe('subscribe', () => {
    it('notifies listeners of every send', () => {
      const bus = new MessageBus();
      const seen: string[] = [];
      const off = bus.subscribe((m) => seen.push(m.type));

      bus.send(weather());
      off();
      bus.send(budgetUpdate());

      expect(seen).toEqual(['WeatherAdvisory']);
    });
  });
});

describe('KeyedMutex', () => {
  it('runs same-key sections one after another', async () => {
    const mutex = new KeyedMutex();
    const order: string[] = [];

    await Promise.all([
      mutex.runExclusive('a', async () => {
        order.push('first:start');
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push('first:end');
      }),
      mutex.runExclusive('a', async () => {
        order.push('second');
      }),
    ]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
    expect(mutex.activeKeys()).toEqual([]);
  });

  it('releases the lock when the section throws', async () => {
    const mutex = new KeyedMutex();

    await expect(mutex.runExclusive('a', async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(mutex.runExclusive('a', async () => 'ok')).resolves.toBe('ok');
  });
});
