import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import type { WorkerRunContext } from '@itinera/agent-sdk';
import type { DestinationCatalog, Destination } from '../catalog.js';
import { AGENTS, catalogFrom, round2 } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const HotelsInputSchema = z.object({
  city: z.string().min(1),
  nights: z.number().int().positive(),
  starRating: z.number().int().min(1).max(5).default(3),
  rooms: z.number().int().positive().default(1),
});

export type HotelsInput = z.infer<typeof HotelsInputSchema>;

export type HotelsData = {
  total: number;
  nightly: number;
  nights: number;
  stars: number;
  rooms: number;
  name: string;
};

/**
 * Closest star rating on file: the requested one, else the nearest
 * below it, else the nearest above.
 */
export function closestStars(hotels: Destination['hotels'], requested: number): number | undefined {
  const available = Object.keys(hotels)
    .map(Number)
    .sort((a, b) => a - b);
  if (available.includes(requested)) {
    return requested;
  }
  const below = available.filter((s) => s < requested);
  if (below.length > 0) {
    return below[below.length - 1];
  }
  return available.find((s) => s > requested);
}

export class HotelsWorker extends BaseWorker<HotelsInput, HotelsData> {
  protected readonly inputSchema = HotelsInputSchema;
  private readonly catalog: DestinationCatalog;

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.hotels, deps);
    this.catalog = catalogFrom(deps);
  }

  protected async perform(input: HotelsInput, ctx: WorkerRunContext): Promise<HotelsData> {
    const destination = this.catalog.find(input.city);
    if (!destination) {
      throw new Error(`No hotels on file for ${input.city}`);
    }

    const stars = closestStars(destination.hotels, input.starRating);
    const hotel = stars === undefined ? undefined : destination.hotels[String(stars)];
    if (stars === undefined || !hotel) {
      throw new Error(`No hotels on file for ${input.city}`);
    }
    if (stars !== input.starRating) {
      ctx.warn(`No ${input.starRating}-star hotel in ${destination.city}; using ${stars}-star`);
    }

    return {
      total: round2(hotel.nightly * input.nights * input.rooms),
      nightly: hotel.nightly,
      nights: input.nights,
      stars,
      rooms: input.rooms,
      name: hotel.name,
    };
  }
}
