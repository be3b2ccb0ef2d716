/**
 * Picks activities matching the traveler's interests, at most one per night.
 */

import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import type { WorkerRunContext } from '@itinera/agent-sdk';
import type { Activity, DestinationCatalog } from '../catalog.js';
import { AGENTS, catalogFrom, round2 } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const ActivitiesInputSchema = z.object({
  city: z.string().min(1),
  nights: z.number().int().positive(),
  travelers: z.number().int().positive(),
  interests: z.array(z.string()).default([]),
});

export type ActivitiesInput = z.infer<typeof ActivitiesInputSchema>;

export type ActivitiesData = {
  total: number;
  count: number;
  activities: Activity[];
};

export class ActivitiesWorker extends BaseWorker<ActivitiesInput, ActivitiesData> {
  protected readonly inputSchema = ActivitiesInputSchema;
  private readonly catalog: DestinationCatalog;

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.activities, deps);
    this.catalog = catalogFrom(deps);
  }

  protected async perform(input: ActivitiesInput, ctx: WorkerRunContext): Promise<ActivitiesData> {
    const destination = this.catalog.find(input.city);
    if (!destination) {
      throw new Error(`No activities on file for ${input.city}`);
    }

    const interests = new Set(input.interests.map((i) => i.toLowerCase()));
    let candidates = destination.activities;
    if (interests.size > 0) {
      const matching = candidates.filter((a) => interests.has(a.category.toLowerCase()));
      if (matching.length === 0) {
        ctx.warn(`No activities in ${destination.city} match: ${input.interests.join(', ')}`);
      } else {
        candidates = matching;
      }
    }

    const activities = candidates.slice(0, input.nights).map((a) => ({ ...a }));
    const total = round2(activities.reduce((sum, a) => sum + a.pricePerPerson * input.travelers, 0));

    return { total, count: activities.length, activities };
  }
}
