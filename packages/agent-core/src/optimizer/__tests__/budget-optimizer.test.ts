import { describe, it, expect, vi } from 'vitest';
import type { ApprovalDecision, Strategy, StrategyProposal } from '@itinera/agent-contracts';
import { BudgetOptimizer, createOptimizationState, summarizeOptimization } from '../budget-optimizer.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

type Plan = { hotel: number; flights: number; car: number };

const total = (p: Plan) => p.hotel + p.flights + p.car;

function cut(id: string, key: keyof Plan, fraction: number): Strategy<Plan> {
  return {
    id,
    label: id,
    isViable: (p) => p[key] > 0,
    propose: (p) => {
      const savingsAmount = p[key] * fraction;
      return { composition: { ...p, [key]: p[key] - savingsAmount }, savingsAmount, description: `cut ${key}` };
    },
  };
}

const approveAll = async (): Promise<ApprovalDecision> => ({ approved: true, approvedBy: 'auto' });

function start(plan: Plan, targetBudget: number, strategies: Strategy<Plan>[], maxIterations = 5) {
  return createOptimizationState({ currentCost: total(plan), targetBudget, maxIterations, composition: plan, strategies });
}

const FIXED_NOW = () => new Date('2026-03-01T12:00:00.000Z');

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('BudgetOptimizer', () => {
  it('stops as soon as the cost fits', async () => {
    const plan = { hotel: 1000, flights: 1000, car: 0 };
    const strategies = [cut('hotel', 'hotel', 0.3), cut('flights', 'flights', 0.25)];
    const optimizer = new BudgetOptimizer<Plan>({ now: FIXED_NOW });

    const result = await optimizer.optimize(start(plan, 1800, strategies), strategies, approveAll);

    expect(result.status).toBe('done');
    expect(result.iteration).toBe(1);
    expect(result.currentCostEstimate).toBe(1700);
    expect(result.appliedStrategies).toEqual([
      {
        strategyId: 'hotel',
        description: 'cut hotel',
        savingsAmount: 300,
        newCost: 1700,
        approvedBy: 'auto',
        timestampApplied: '2026-03-01T12:00:00.000Z',
      },
    ]);
    expect(result.composition).toEqual({ hotel: 700, flights: 1000, car: 0 });
    expect(result.remainingStrategies.has('hotel')).toBe(false);
  });

  it('is done immediately when already within budget', async () => {
    const plan = { hotel: 100, flights: 100, car: 0 };
    const gate = vi.fn(approveAll);
    const optimizer = new BudgetOptimizer<Plan>();

    const result = await optimizer.optimize(start(plan, 500, [cut('hotel', 'hotel', 0.3)]), [cut('hotel', 'hotel', 0.3)], gate);

    expect(result.status).toBe('done');
    expect(result.iteration).toBe(0);
    expect(gate).not.toHaveBeenCalled();
  });

  it('ends exhausted when no strategy remains', async () => {
    const plan = { hotel: 1000, flights: 1000, car: 0 };
    const strategies = [cut('hotel', 'hotel', 0.1), cut('flights', 'flights', 0.1)];
    const optimizer = new BudgetOptimizer<Plan>();

    const result = await optimizer.optimize(start(plan, 500, strategies), strategies, approveAll);

    expect(result.status).toBe('exhausted');
    expect(result.appliedStrategies.map((r) => r.strategyId)).toEqual(['hotel', 'flights']);
    expect(result.currentCostEstimate).toBe(1800);
  });

  it('ends capped at maxIterations', async () => {
    const plan = { hotel: 1000, flights: 1000, car: 500 };
    const strategies = [cut('hotel', 'hotel', 0.1), cut('flights', 'flights', 0.1), cut('car', 'car', 0.1)];
    const optimizer = new BudgetOptimizer<Plan>();

    const result = await optimizer.optimize(start(plan, 100, strategies, 2), strategies, approveAll);

    expect(result.status).toBe('capped');
    expect(result.iteration).toBe(2);
    expect([...result.remainingStrategies]).toEqual(['car']);
  });

  it('is capped without asking when maxIterations is 0', async () => {
    const plan = { hotel: 1000, flights: 0, car: 0 };
    const gate = vi.fn(approveAll);
    const strategies = [cut('hotel', 'hotel', 0.5)];

    const result = await new BudgetOptimizer<Plan>().optimize(start(plan, 100, strategies, 0), strategies, gate);

    expect(result.status).toBe('capped');
    expect(gate).not.toHaveBeenCalled();
  });

  it('skips strategies that are not viable or save nothing', async () => {
    const plan = { hotel: 1000, flights: 1000, car: 0 };
    const zero: Strategy<Plan> = {
      id: 'zero',
      label: 'zero',
      isViable: () => true,
      propose: (p) => ({ composition: p, savingsAmount: 0, description: 'nothing' }),
    };
    const strategies = [cut('car', 'car', 1), zero, cut('hotel', 'hotel', 0.5)];
    const optimizer = new BudgetOptimizer<Plan>();

    const result = await optimizer.optimize(start(plan, 1500, strategies), strategies, approveAll);

    expect(result.status).toBe('done');
    expect(result.skippedStrategies).toEqual(['car', 'zero']);
    expect(result.appliedStrategies.map((r) => r.strategyId)).toEqual(['hotel']);
  });

  it('removes a rejected strategy without counting an iteration', async () => {
    const plan = { hotel: 1000, flights: 1000, car: 0 };
    const strategies = [cut('hotel', 'hotel', 0.3), cut('flights', 'flights', 0.25)];
    const gate = vi.fn(
      async (p: StrategyProposal<Plan>): Promise<ApprovalDecision> => ({
        approved: p.strategyId !== 'hotel',
        approvedBy: 'human',
      }),
    );

    const result = await new BudgetOptimizer<Plan>().optimize(start(plan, 1800, strategies), strategies, gate);

    expect(result.status).toBe('done');
    expect(result.rejectedStrategies).toEqual(['hotel']);
    expect(result.iteration).toBe(1);
    expect(result.currentCostEstimate).toBe(1750);
    expect(result.appliedStrategies[0].approvedBy).toBe('human');
  });

  it('hands the gate an uncommitted proposal', async () => {
    const plan = { hotel: 1000, flights: 0, car: 0 };
    const strategies = [cut('hotel', 'hotel', 0.3)];
    const proposals: StrategyProposal<Plan>[] = [];

    await new BudgetOptimizer<Plan>().optimize(start(plan, 100, strategies), strategies, async (p) => {
      proposals.push(p);
      return { approved: false, approvedBy: 'human' };
    });

    expect(proposals).toEqual([
      {
        strategyId: 'hotel',
        description: 'cut hotel',
        savingsAmount: 300,
        currentCost: 1000,
        newCost: 700,
        composition: { hotel: 700, flights: 0, car: 0 },
      },
    ]);
  });

  it('stops when the gate asks to', async () => {
    const plan = { hotel: 1000, flights: 1000, car: 0 };
    const strategies = [cut('hotel', 'hotel', 0.3), cut('flights', 'flights', 0.25)];

    const result = await new BudgetOptimizer<Plan>().optimize(start(plan, 100, strategies), strategies, async () => ({
      approved: false,
      approvedBy: 'human',
      stop: true,
    }));

    expect(result.status).toBe('stopped');
    expect(result.rejectedStrategies).toEqual([]);
    expect(result.iteration).toBe(0);
  });

  it('never applies an id outside the ranked list and keeps cost non-increasing', async () => {
    const plan = { hotel: 1000, flights: 1000, car: 400 };
    const strategies = [cut('hotel', 'hotel', 0.3), cut('flights', 'flights', 0.25), cut('car', 'car', 1)];
    const state = start(plan, 0, strategies);
    state.remainingStrategies.add('ghost');

    const result = await new BudgetOptimizer<Plan>().optimize(state, strategies, approveAll);

    const ids = result.appliedStrategies.map((r) => r.strategyId);
    expect(ids).toEqual(['hotel', 'flights', 'car']);
    const costs = result.appliedStrategies.map((r) => r.newCost);
    expect(costs).toEqual([...costs].sort((a, b) => b - a));
    expect([...result.remainingStrategies]).toEqual(['ghost']);
  });

  it('does not mutate the initial state', async () => {
    const plan = { hotel: 1000, flights: 0, car: 0 };
    const strategies = [cut('hotel', 'hotel', 0.5)];
    const initial = start(plan, 100, strategies);

    await new BudgetOptimizer<Plan>().optimize(initial, strategies, approveAll);

    expect(initial.iteration).toBe(0);
    expect(initial.remainingStrategies.has('hotel')).toBe(true);
  });

  it('emits events in order', async () => {
    const plan = { hotel: 1000, flights: 0, car: 0 };
    const strategies = [cut('hotel', 'hotel', 0.5)];
    const events: string[] = [];

    await new BudgetOptimizer<Plan>({ onEvent: (e) => events.push(e.type) }).optimize(
      start(plan, 600, strategies),
      strategies,
      approveAll,
    );

    expect(events).toEqual(['proposed', 'applied']);
  });
});

describe('createOptimizationState', () => {
  it('rejects a negative iteration cap', () => {
    expect(() =>
      createOptimizationState({ currentCost: 1, targetBudget: 0, maxIterations: -1, composition: {}, strategies: [] }),
    ).toThrow(RangeError);
  });
});

describe('summarizeOptimization', () => {
  it('flattens the state', async () => {
    const plan = { hotel: 1000, flights: 0, car: 0 };
    const strategies = [cut('hotel', 'hotel', 0.5)];
    const state = await new BudgetOptimizer<Plan>().optimize(start(plan, 600, strategies), strategies, approveAll);

    const summary = summarizeOptimization(state);

    expect(summary).toMatchObject({
      status: 'done',
      initialCost: 1000,
      finalCost: 500,
      targetBudget: 600,
      totalSavings: 500,
      iterations: 1,
      rejected: [],
      skipped: [],
      remaining: [],
    });
  });
});
