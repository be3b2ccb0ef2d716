/**
 * Short overview lines shown at the suggestions checkpoint.
 */

import { z } from 'zod';
import type { BookingComposition, StructuredMap, TripRequest } from '@itinera/agent-contracts';
import { formatMoney } from '@itinera/agent-core';

const DestinationSchema = z.object({ highlights: z.array(z.string()) });
const ImmigrationSchema = z.object({ visaRequired: z.boolean() });

/** How many destination highlights make it into the overview */
export const MAX_DESTINATION_HIGHLIGHTS = 3;

export interface HighlightInput {
  request: TripRequest;
  research: StructuredMap;
  composition: BookingComposition;
  estimatedCost: number;
  budget: number;
}

export function buildHighlights({ request, research, composition, estimatedCost, budget }: HighlightInput): string[] {
  const { flights, hotel, car, activities } = composition;
  const lines = [
    `${hotel.nights} nights in ${request.city}, ${request.country} for ${composition.travelers} traveler${composition.travelers === 1 ? '' : 's'}`,
    `Flights: ${flights.airline} (${flights.cabinClass}), ${formatMoney(flights.total)}`,
    `Hotel: ${hotel.name} (${hotel.stars}-star), ${formatMoney(hotel.total)}`,
  ];

  if (car.included) {
    lines.push(`Rental car: ${formatMoney(car.total)}`);
  }
  lines.push(`Activities: ${activities.count} booked, ${formatMoney(activities.total)}`);
  lines.push(`Estimated total ${formatMoney(estimatedCost)} against a budget of ${formatMoney(budget)}`);

  const destination = DestinationSchema.safeParse(research.destination);
  if (destination.success) {
    for (const highlight of destination.data.highlights.slice(0, MAX_DESTINATION_HIGHLIGHTS)) {
      lines.push(`Don't miss: ${highlight}`);
    }
  }

  const immigration = ImmigrationSchema.safeParse(research.immigration);
  if (immigration.success && immigration.data.visaRequired) {
    lines.push(`A visa is required for ${request.country}`);
  }

  return lines;
}
