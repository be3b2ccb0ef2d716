import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import type { DestinationCatalog } from '../catalog.js';
import { AGENTS, catalogFrom, round2 } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const CarRentalInputSchema = z.object({
  city: z.string().min(1),
  nights: z.number().int().positive(),
  needsCar: z.boolean().default(false),
});

export type CarRentalInput = z.infer<typeof CarRentalInputSchema>;

export type CarRentalData = {
  included: boolean;
  total: number;
  days: number;
  dailyRate: number;
  company: string | null;
};

export class CarRentalWorker extends BaseWorker<CarRentalInput, CarRentalData> {
  protected readonly inputSchema = CarRentalInputSchema;
  private readonly catalog: DestinationCatalog;

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.carRental, deps);
    this.catalog = catalogFrom(deps);
  }

  protected async perform(input: CarRentalInput): Promise<CarRentalData> {
    if (!input.needsCar) {
      return { included: false, total: 0, days: 0, dailyRate: 0, company: null };
    }

    const destination = this.catalog.find(input.city);
    if (!destination) {
      throw new Error(`No car rentals on file for ${input.city}`);
    }

    // Rented for every night of the stay
    const { dailyRate, company } = destination.car;
    return {
      included: true,
      total: round2(dailyRate * input.nights),
      days: input.nights,
      dailyRate,
      company,
    };
  }
}
