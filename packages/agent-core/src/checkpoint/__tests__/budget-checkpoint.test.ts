import { describe, it, expect } from 'vitest';
import { assess, assessBreakdown, budgetOptions, formatMoney } from '../budget-checkpoint.js';

describe('assess', () => {
  it('treats a close estimate as reasonable', () => {
    const result = assess(1000, [700, 400, 150, 100]);

    expect(result).toEqual({
      scenario: 'reasonable',
      estimatedTotal: 1350,
      userBudget: 1000,
      delta: -350,
      status: 'proceed',
    });
  });

  it('flags a budget that is far too low', () => {
    const result = assess(1000, [2000]);

    expect(result.scenario).toBe('tooLow');
    expect(result.status).toBe('needsUserInput');
    expect(result.delta).toBe(-1000);
  });

  it('flags an excess budget', () => {
    const result = assess(5000, [1000, 1000]);

    expect(result.scenario).toBe('excess');
    expect(result.status).toBe('needsUserInput');
  });

  it('treats an exact match as reasonable', () => {
    expect(assess(1800, [1000, 800]).scenario).toBe('reasonable');
  });

  it('is not triggered exactly at the thresholds', () => {
    expect(assess(1000, [1500]).scenario).toBe('reasonable');
    expect(assess(2000, [1000]).scenario).toBe('reasonable');
  });

  it('honours custom ratios', () => {
    expect(assess(1000, [1200], { tooLowRatio: 1.1, excessRatio: 2 }).scenario).toBe('tooLow');
  });

  it('is deterministic', () => {
    expect(assess(1234, [100, 200])).toEqual(assess(1234, [100, 200]));
  });

  it('rejects invalid numbers', () => {
    expect(() => assess(-1, [100])).toThrow(RangeError);
    expect(() => assess(100, [Number.NaN])).toThrow(RangeError);
    expect(() => assess(100, [100], { tooLowRatio: 0.5, excessRatio: 2 })).toThrow(RangeError);
  });
});

describe('assessBreakdown', () => {
  it('sums categories and explains the gap', () => {
    const report = assessBreakdown(1000, { flights: 1200, hotels: 800 });

    expect(report.estimatedTotal).toBe(2000);
    expect(report.scenario).toBe('tooLow');
    expect(report.breakdown).toEqual({ flights: 1200, hotels: 800 });
    expect(report.message).toBe('Estimated costs ($2,000.00) exceed your budget ($1,000.00) by $1,000.00.');
  });

  it('explains an excess budget', () => {
    const report = assessBreakdown(5000, { flights: 1000, hotels: 1000 });

    expect(report.message).toBe('Your $5,000.00 budget exceeds estimated costs ($2,000.00) by $3,000.00.');
  });

  it('explains a reasonable fit', () => {
    const report = assessBreakdown(3000, { flights: 1000, hotels: 1500 });

    expect(report.message).toBe('Estimated costs ($2,500.00) fit your budget ($3,000.00) with $500.00 to spare.');
  });

  it('names the bad category', () => {
    expect(() => assessBreakdown(1000, { flights: -5 })).toThrow('flights must be a finite, non-negative number');
  });
});

describe('budgetOptions', () => {
  it('offers optimize only when the budget is too low', () => {
    expect(budgetOptions('tooLow').map((o) => o.choice)).toEqual(['proceed', 'optimize', 'setBudget', 'cancel']);
    expect(budgetOptions('excess').map((o) => o.choice)).toEqual(['proceed', 'setBudget', 'cancel']);
    expect(budgetOptions('reasonable')).toEqual([]);
  });
});

describe('formatMoney', () => {
  it('formats dollars with cents', () => {
    expect(formatMoney(1234.5)).toBe('$1,234.50');
  });
});
