/**
 * Day-by-day itinerary. Arrival and departure days stay light; booked
 * activities fill the days in between, one per day.
 */

import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import { AGENTS, addDays } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const ItineraryActivitySchema = z.object({
  name: z.string(),
  durationHours: z.number().positive().optional(),
});

const ItineraryInputSchema = z.object({
  city: z.string().min(1),
  departureDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  nights: z.number().int().positive(),
  activities: z.array(ItineraryActivitySchema).default([]),
  highlights: z.array(z.string()).default([]),
});

export type ItineraryInput = z.infer<typeof ItineraryInputSchema>;

export type ItineraryDay = {
  day: number;
  date: string;
  title: string;
  plans: string[];
};

export type ItineraryData = {
  totalDays: number;
  days: ItineraryDay[];
};

export class ItineraryWorker extends BaseWorker<ItineraryInput, ItineraryData> {
  protected readonly inputSchema = ItineraryInputSchema;

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.itinerary, deps);
  }

  protected async perform(input: ItineraryInput): Promise<ItineraryData> {
    const totalDays = input.nights + 1;
    const queue = [...input.activities.map((a) => a.name), ...input.highlights];
    const days: ItineraryDay[] = [];

    for (let i = 0; i < totalDays; i++) {
      const date = addDays(input.departureDate, i);
      if (i === 0) {
        days.push({ day: 1, date, title: `Arrive in ${input.city}`, plans: ['Check in', 'Explore the neighbourhood'] });
        continue;
      }
      if (i === totalDays - 1) {
        days.push({ day: i + 1, date, title: 'Departure', plans: ['Check out', 'Transfer to the airport'] });
        continue;
      }
      const next = queue.shift();
      days.push({
        day: i + 1,
        date,
        title: next ?? 'Free day',
        plans: next ? [next] : ['Unplanned time'],
      });
    }

    return { totalDays, days };
  }
}
