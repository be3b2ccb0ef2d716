/**
 * Turns booking results into a BookingComposition, substituting configured
 * fallback costs for any task that failed or returned unusable data.
 */

import { z } from 'zod';
import type { BookingComposition, CostAssumptions, CostBreakdown, TripRequest, WorkerResult } from '@itinera/agent-contracts';
import { formatMoney } from '@itinera/agent-core';

/** Booking task names, as used for parallel task and breakdown keys */
export const BOOKING_TASKS = ['flights', 'hotels', 'carRental', 'activities'] as const;

export type BookingTask = (typeof BOOKING_TASKS)[number];

const FlightsSchema = z.object({ total: z.number().nonnegative(), airline: z.string(), cabinClass: z.string() });
const HotelsSchema = z.object({
  total: z.number().nonnegative(),
  nights: z.number().int().positive(),
  stars: z.number().int(),
  name: z.string(),
});
const CarSchema = z.object({ included: z.boolean(), total: z.number().nonnegative() });
const ActivitiesSchema = z.object({ total: z.number().nonnegative(), count: z.number().int().nonnegative() });

export interface BookedComposition {
  composition: BookingComposition;
  /** One entry per task that fell back to a configured cost */
  warnings: string[];
}

function usable<T>(schema: z.ZodType<T>, result: WorkerResult | undefined): T | undefined {
  if (!result || result.status === 'failure') {
    return undefined;
  }
  const parsed = schema.safeParse(result.data);
  return parsed.success ? parsed.data : undefined;
}

function fallbackWarning(task: BookingTask, result: WorkerResult | undefined, amount: number): string {
  const reason = result?.status === 'failure' ? result.errors.join('; ') || 'failed' : 'no usable estimate';
  return `${task}: ${reason}; using fallback estimate ${formatMoney(amount)}`;
}

export function foodCost(request: TripRequest, costs: CostAssumptions, nights = request.nights): number {
  return costs.foodPerTravelerPerDay * request.travelers * nights;
}

export function buildComposition(
  request: TripRequest,
  results: Readonly<Record<string, WorkerResult>>,
  costs: CostAssumptions,
): BookedComposition {
  const warnings: string[] = [];

  const flights = usable(FlightsSchema, results.flights);
  if (!flights) {
    warnings.push(fallbackWarning('flights', results.flights, costs.fallback.flights));
  }

  const hotel = usable(HotelsSchema, results.hotels);
  if (!hotel) {
    warnings.push(fallbackWarning('hotels', results.hotels, costs.fallback.hotels));
  }

  const car = usable(CarSchema, results.carRental);
  if (!car) {
    warnings.push(fallbackWarning('carRental', results.carRental, costs.fallback.carRental));
  }

  const activities = usable(ActivitiesSchema, results.activities);
  if (!activities) {
    warnings.push(fallbackWarning('activities', results.activities, costs.fallback.activities));
  }

  const composition: BookingComposition = {
    flights: flights ?? { total: costs.fallback.flights, airline: 'Unknown', cabinClass: request.cabinClass },
    hotel: hotel ?? { total: costs.fallback.hotels, nights: request.nights, stars: request.starRating, name: 'Unknown' },
    car: car ?? { included: request.needsCar, total: costs.fallback.carRental },
    // One activity per night is what the activities worker would have booked
    activities: activities ?? { total: costs.fallback.activities, count: request.nights },
    food: { total: foodCost(request, costs) },
    travelers: request.travelers,
  };

  return { composition, warnings };
}

/**
 * Per-category costs for the budget checkpoint.
 */
export function costBreakdown(composition: BookingComposition): CostBreakdown {
  return {
    flights: composition.flights.total,
    hotels: composition.hotel.total,
    carRental: composition.car.included ? composition.car.total : 0,
    activities: composition.activities.total,
    food: composition.food.total,
  };
}
