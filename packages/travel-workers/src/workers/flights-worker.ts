import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import type { DestinationCatalog } from '../catalog.js';
import { AGENTS, catalogFrom, round2 } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const FlightsInputSchema = z.object({
  origin: z.string().min(1),
  city: z.string().min(1),
  travelers: z.number().int().positive(),
  cabinClass: z.enum(['economy', 'premium', 'business']).default('economy'),
});

export type FlightsInput = z.infer<typeof FlightsInputSchema>;

export type FlightsData = {
  total: number;
  perPerson: number;
  airline: string;
  cabinClass: string;
  route: string;
};

/**
 * Round-trip fare estimate: base fare scaled by cabin, per traveler.
 */
export class FlightsWorker extends BaseWorker<FlightsInput, FlightsData> {
  protected readonly inputSchema = FlightsInputSchema;
  private readonly catalog: DestinationCatalog;

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.flights, deps);
    this.catalog = catalogFrom(deps);
  }

  protected async perform(input: FlightsInput): Promise<FlightsData> {
    const destination = this.catalog.find(input.city);
    if (!destination) {
      throw new Error(`No fares on file for ${input.city}`);
    }

    const perPerson = round2(destination.flights.baseFarePerPerson * this.catalog.cabinMultiplier(input.cabinClass));
    const [airline = 'Unknown'] = destination.flights.airlines;

    return {
      total: round2(perPerson * input.travelers),
      perPerson,
      airline,
      cabinClass: input.cabinClass,
      route: `${input.origin} → ${destination.city}`,
    };
  }
}
