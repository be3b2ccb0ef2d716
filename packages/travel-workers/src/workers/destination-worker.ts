/**
 * Destination research: climate for the travel month.
 */

import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import type { WorkerRunContext } from '@itinera/agent-sdk';
import type { DestinationCatalog } from '../catalog.js';
import { AGENTS, catalogFrom, monthName, monthOf } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const DestinationInputSchema = z.object({
  city: z.string().min(1),
  departureDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  sessionId: z.string().optional(),
});

export type DestinationInput = z.infer<typeof DestinationInputSchema>;

export type DestinationData = {
  city: string;
  country: string;
  month: string;
  climate: string;
  avgHighC: number | null;
  severeWeather: boolean;
  bestTimeToVisit: string;
  highlights: string[];
};

export class DestinationWorker extends BaseWorker<DestinationInput, DestinationData> {
  protected readonly inputSchema = DestinationInputSchema;
  private readonly catalog: DestinationCatalog;

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.destination, deps);
    this.catalog = catalogFrom(deps);
  }

  protected async perform(input: DestinationInput, ctx: WorkerRunContext): Promise<DestinationData> {
    const month = monthOf(input.departureDate);
    const destination = this.catalog.find(input.city);

    if (!destination) {
      ctx.warn(`No climate data for ${input.city}`);
      return {
        city: input.city,
        country: 'Unknown',
        month: monthName(month),
        climate: 'Unknown',
        avgHighC: null,
        severeWeather: false,
        bestTimeToVisit: 'Unknown',
        highlights: [],
      };
    }

    const severeWeather = destination.weather.severeMonths.includes(month);
    if (severeWeather) {
      ctx.send({
        to: AGENTS.documents,
        type: 'WeatherAdvisory',
        priority: 'high',
        payload: {
          location: destination.city,
          severity: 'severe',
          warnings: [`Severe weather is common in ${destination.city} in ${monthName(month)}`],
        },
      });
    }

    return {
      city: destination.city,
      country: destination.country,
      month: monthName(month),
      climate: destination.weather.climate,
      avgHighC: destination.weather.avgHighC[month - 1] ?? null,
      severeWeather,
      bestTimeToVisit: destination.weather.bestTimeToVisit,
      highlights: [...destination.highlights],
    };
  }
}
