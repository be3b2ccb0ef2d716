/**
 * Cost-reduction strategies over a BookingComposition.
 *
 * Savings fractions come from the optimizer config; `ranking` decides the
 * order the optimizer tries them in. Every amount is rounded to cents.
 */

import type { BookingComposition, BookingStrategyId, OptimizerConfig, Strategy } from '@itinera/agent-contracts';
import { round2 } from './workers/shared.js';

export const BUDGET_AIRLINE = 'Budget Carrier';
export const MIN_HOTEL_STARS = 2;

type BookingStrategy = Strategy<BookingComposition>;
type StrategyFactory = (config: OptimizerConfig) => BookingStrategy;

const shorterStay: StrategyFactory = (config) => ({
  id: 'shorter_stay',
  label: 'Shorter stay',
  isViable: (c) => c.hotel.nights > config.minNights,
  propose: (c) => {
    const cut = Math.min(config.fractions.shorterStayNights, c.hotel.nights - config.minNights);
    const nights = c.hotel.nights - cut;
    const hotelSaving = round2((c.hotel.total / c.hotel.nights) * cut);
    const activitiesSaving = round2((c.activities.total / c.hotel.nights) * cut);
    const foodSaving = round2((c.food.total / c.hotel.nights) * cut);
    return {
      composition: {
        ...c,
        hotel: { ...c.hotel, nights, total: round2(c.hotel.total - hotelSaving) },
        activities: {
          total: round2(c.activities.total - activitiesSaving),
          count: Math.min(c.activities.count, nights),
        },
        food: { total: round2(c.food.total - foodSaving) },
      },
      savingsAmount: round2(hotelSaving + activitiesSaving + foodSaving),
      description: `Shorten the stay by ${cut} night${cut === 1 ? '' : 's'} (${c.hotel.nights} → ${nights})`,
    };
  },
});

const cheaperFlights: StrategyFactory = (config) => ({
  id: 'cheaper_flights',
  label: 'Cheaper flights',
  isViable: (c) => c.flights.total > 0 && c.flights.airline !== BUDGET_AIRLINE,
  propose: (c) => {
    const saving = round2(c.flights.total * config.fractions.cheaperFlights);
    return {
      composition: {
        ...c,
        flights: { ...c.flights, airline: BUDGET_AIRLINE, total: round2(c.flights.total - saving) },
      },
      savingsAmount: saving,
      description: `Switch from ${c.flights.airline} to a budget carrier`,
    };
  },
});

const downgradeHotel: StrategyFactory = (config) => ({
  id: 'downgrade_hotel',
  label: 'Downgrade hotel',
  isViable: (c) => c.hotel.stars > MIN_HOTEL_STARS && c.hotel.total > 0,
  propose: (c) => {
    const saving = round2(c.hotel.total * config.fractions.downgradeHotel);
    const stars = Math.max(c.hotel.stars - 1, MIN_HOTEL_STARS);
    return {
      composition: {
        ...c,
        hotel: { ...c.hotel, stars, name: `${stars}-star alternative`, total: round2(c.hotel.total - saving) },
      },
      savingsAmount: saving,
      description: `Move from ${c.hotel.stars}-star ${c.hotel.name} to a ${stars}-star hotel`,
    };
  },
});

const reduceActivities: StrategyFactory = (config) => ({
  id: 'reduce_activities',
  label: 'Fewer paid activities',
  isViable: (c) => c.activities.total > 0 && c.activities.count > 0,
  propose: (c) => {
    const saving = round2(c.activities.total * config.fractions.reduceActivities);
    const count = Math.max(1, Math.round(c.activities.count * (1 - config.fractions.reduceActivities)));
    return {
      composition: { ...c, activities: { total: round2(c.activities.total - saving), count } },
      savingsAmount: saving,
      description: `Keep ${count} of ${c.activities.count} paid activities`,
    };
  },
});

const removeCar: StrategyFactory = () => ({
  id: 'remove_car',
  label: 'No rental car',
  isViable: (c) => c.car.included,
  propose: (c) => ({
    composition: { ...c, car: { included: false, total: 0 } },
    savingsAmount: round2(c.car.total),
    description: 'Drop the rental car and use public transport',
  }),
});

const FACTORIES: Record<BookingStrategyId, StrategyFactory> = {
  shorter_stay: shorterStay,
  cheaper_flights: cheaperFlights,
  downgrade_hotel: downgradeHotel,
  reduce_activities: reduceActivities,
  remove_car: removeCar,
};

/**
 * Strategies in the configured ranking, highest first.
 */
export function createBookingStrategies(config: OptimizerConfig): BookingStrategy[] {
  return config.ranking.map((id) => FACTORIES[id](config));
}

/** Sum of every component in a composition */
export function compositionTotal(c: BookingComposition): number {
  const carTotal = c.car.included ? c.car.total : 0;
  return round2(c.flights.total + c.hotel.total + carTotal + c.activities.total + c.food.total);
}
