import { describe, it, expect } from 'vitest';
import { OptimizerConfigSchema } from '@itinera/agent-contracts';
import type { BookingComposition, Strategy } from '@itinera/agent-contracts';
import { BUDGET_AIRLINE, compositionTotal, createBookingStrategies } from '../strategies.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function makeComposition(overrides: Partial<BookingComposition> = {}): BookingComposition {
  return {
    flights: { total: 2000, airline: 'TAP Air Portugal', cabinClass: 'economy' },
    hotel: { total: 1000, nights: 5, stars: 4, name: 'Chiado Grand' },
    car: { included: true, total: 190 },
    activities: { total: 500, count: 5 },
    food: { total: 300 },
    travelers: 2,
    ...overrides,
  };
}

function strategyById(id: string, strategies = createBookingStrategies(OptimizerConfigSchema.parse({}))) {
  const found: Strategy<BookingComposition> | undefined = strategies.find((s) => s.id === id);
  if (!found) {
    throw new Error(`missing strategy ${id}`);
  }
  return found;
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('createBookingStrategies', () => {
  it('follows the configured ranking', () => {
    expect(createBookingStrategies(OptimizerConfigSchema.parse({})).map((s) => s.id)).toEqual([
      'shorter_stay',
      'cheaper_flights',
      'downgrade_hotel',
      'reduce_activities',
      'remove_car',
    ]);

    const custom = OptimizerConfigSchema.parse({ ranking: ['remove_car', 'cheaper_flights'] });
    expect(createBookingStrategies(custom).map((s) => s.id)).toEqual(['remove_car', 'cheaper_flights']);
  });

  it('uses configured savings fractions', () => {
    const config = OptimizerConfigSchema.parse({ fractions: { cheaperFlights: 0.5 } });
    const proposal = strategyById('cheaper_flights', createBookingStrategies(config)).propose(makeComposition());
    expect(proposal.savingsAmount).toBe(1000);
  });
});

describe('shorter_stay', () => {
  const strategy = strategyById('shorter_stay');

  it('removes nights and the hotel, activity and food cost of those nights', () => {
    const proposal = strategy.propose(makeComposition());

    expect(proposal.savingsAmount).toBe(720);
    expect(proposal.description).toBe('Shorten the stay by 2 nights (5 → 3)');
    expect(proposal.composition.hotel).toEqual({ total: 600, nights: 3, stars: 4, name: 'Chiado Grand' });
    expect(proposal.composition.activities).toEqual({ total: 300, count: 3 });
    expect(proposal.composition.food).toEqual({ total: 180 });
  });

  it('never goes below the minimum stay', () => {
    const proposal = strategy.propose(makeComposition({ hotel: { total: 800, nights: 4, stars: 4, name: 'X' } }));

    expect(proposal.description).toBe('Shorten the stay by 1 night (4 → 3)');
    expect(proposal.composition.hotel.nights).toBe(3);
    expect(strategy.isViable(proposal.composition)).toBe(false);
  });
});

describe('cheaper_flights', () => {
  const strategy = strategyById('cheaper_flights');

  it('switches to the budget carrier once', () => {
    const proposal = strategy.propose(makeComposition());

    expect(proposal.savingsAmount).toBe(500);
    expect(proposal.composition.flights).toEqual({ total: 1500, airline: BUDGET_AIRLINE, cabinClass: 'economy' });
    expect(strategy.isViable(proposal.composition)).toBe(false);
  });
});

describe('downgrade_hotel', () => {
  const strategy = strategyById('downgrade_hotel');

  it('drops one star and saves a share of the hotel cost', () => {
    const proposal = strategy.propose(makeComposition());

    expect(proposal.savingsAmount).toBe(300);
    expect(proposal.composition.hotel).toEqual({ total: 700, nights: 5, stars: 3, name: '3-star alternative' });
  });

  it('is not viable at two stars', () => {
    expect(strategy.isViable(makeComposition({ hotel: { total: 500, nights: 5, stars: 2, name: 'Y' } }))).toBe(false);
  });
});

describe('reduce_activities', () => {
  it('keeps fewer paid activities', () => {
    const proposal = strategyById('reduce_activities').propose(makeComposition());

    expect(proposal.savingsAmount).toBe(200);
    expect(proposal.composition.activities).toEqual({ total: 300, count: 3 });
    expect(proposal.description).toBe('Keep 3 of 5 paid activities');
  });
});

describe('remove_car', () => {
  const strategy = strategyById('remove_car');

  it('drops the rental car', () => {
    const proposal = strategy.propose(makeComposition());

    expect(proposal.savingsAmount).toBe(190);
    expect(proposal.composition.car).toEqual({ included: false, total: 0 });
  });

  it('is not viable without a car', () => {
    expect(strategy.isViable(makeComposition({ car: { included: false, total: 0 } }))).toBe(false);
  });
});

describe('compositionTotal', () => {
  it('sums every component', () => {
    expect(compositionTotal(makeComposition())).toBe(3990);
    expect(compositionTotal(makeComposition({ car: { included: false, total: 190 } }))).toBe(3800);
  });
});
