/**
 * Zod Schemas for Planner Configuration
 *
 * Business constants (budget ratios, savings fractions, fallback costs) live
 * here as defaults and can be overridden from YAML.
 */

import { z } from 'zod';

/**
 * Budget checkpoint ratios
 */
export const BudgetThresholdsSchema = z
  .object({
    tooLowRatio: z.number().positive().default(1.5),
    excessRatio: z.number().positive().default(2.0),
  })
  .refine((t) => t.excessRatio >= 1 && t.tooLowRatio >= 1, {
    message: 'Budget ratios must be >= 1',
  });

/**
 * Fraction of a booking component each strategy saves
 */
export const StrategyFractionsSchema = z.object({
  shorterStayNights: z.number().int().positive().default(2),
  cheaperFlights: z.number().gt(0).lt(1).default(0.25),
  downgradeHotel: z.number().gt(0).lt(1).default(0.3),
  reduceActivities: z.number().gt(0).lt(1).default(0.4),
});

export const StrategyIdSchema = z.enum([
  'shorter_stay',
  'cheaper_flights',
  'downgrade_hotel',
  'reduce_activities',
  'remove_car',
]);

export const OptimizerConfigSchema = z.object({
  maxIterations: z.number().int().positive().default(5),
  /** Approve every proposal without pausing */
  autoApprove: z.boolean().default(false),
  /** Never shorten a stay below this many nights */
  minNights: z.number().int().positive().default(3),
  /** Ranked, highest first */
  ranking: z
    .array(StrategyIdSchema)
    .min(1)
    .default(['shorter_stay', 'cheaper_flights', 'downgrade_hotel', 'reduce_activities', 'remove_car'])
    .refine((ids) => new Set(ids).size === ids.length, { message: 'Strategy ranking contains duplicates' }),
  fractions: StrategyFractionsSchema.default({}),
});

/**
 * Cost assumptions used when a worker cannot supply a number
 */
export const CostAssumptionsSchema = z.object({
  foodPerTravelerPerDay: z.number().nonnegative().default(30),
  fallback: z
    .object({
      flights: z.number().nonnegative().default(800),
      hotels: z.number().nonnegative().default(1000),
      carRental: z.number().nonnegative().default(0),
      activities: z.number().nonnegative().default(500),
    })
    .default({}),
});

export const CheckpointConfigSchema = z.object({
  /** Pause for approval of the high-level overview before organization */
  suggestions: z.boolean().default(true),
});

export const PlannerConfigSchema = z.object({
  budget: BudgetThresholdsSchema.default({}),
  optimizer: OptimizerConfigSchema.default({}),
  costs: CostAssumptionsSchema.default({}),
  checkpoints: CheckpointConfigSchema.default({}),
  parallel: z
    .object({
      maxConcurrent: z.number().int().positive().default(8),
    })
    .default({}),
  /** Per-worker timeout; 0 disables it */
  workerTimeoutMs: z.number().int().nonnegative().default(10_000),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type PlannerConfig = z.output<typeof PlannerConfigSchema>;
export type PlannerConfigInput = z.input<typeof PlannerConfigSchema>;
export type OptimizerConfig = z.output<typeof OptimizerConfigSchema>;
export type StrategyFractions = z.output<typeof StrategyFractionsSchema>;
export type CostAssumptions = z.output<typeof CostAssumptionsSchema>;
export type BookingStrategyId = z.output<typeof StrategyIdSchema>;
