/**
 * Travel advisory lookup. A level 4 advisory sends a critical
 * TravelBlocked message to the orchestrator; level 3 warns the
 * documents agent.
 */

import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import type { WorkerRunContext } from '@itinera/agent-sdk';
import type { DestinationCatalog } from '../catalog.js';
import { AGENTS, catalogFrom } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const AdvisoryInputSchema = z.object({
  city: z.string().min(1),
  sessionId: z.string().optional(),
});

export type AdvisoryInput = z.infer<typeof AdvisoryInputSchema>;

export type AdvisoryData = {
  country: string;
  level: number;
  levelDescription: string;
  summary: string;
  found: boolean;
};

export const BLOCKING_ADVISORY_LEVEL = 4;

export class AdvisoryWorker extends BaseWorker<AdvisoryInput, AdvisoryData> {
  protected readonly inputSchema = AdvisoryInputSchema;
  private readonly catalog: DestinationCatalog;

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.advisory, deps);
    this.catalog = catalogFrom(deps);
  }

  protected async perform(input: AdvisoryInput, ctx: WorkerRunContext): Promise<AdvisoryData> {
    const destination = this.catalog.find(input.city);
    if (!destination) {
      ctx.warn(`No advisory on file for ${input.city}; assuming level 1`);
      return {
        country: 'Unknown',
        level: 1,
        levelDescription: this.catalog.advisoryDescription(1),
        summary: 'No specific advisory found',
        found: false,
      };
    }

    const { level, summary } = destination.advisory;
    const levelDescription = this.catalog.advisoryDescription(level);

    if (level >= BLOCKING_ADVISORY_LEVEL) {
      ctx.send({
        to: AGENTS.orchestrator,
        type: 'TravelBlocked',
        priority: 'critical',
        payload: {
          destination: `${destination.city}, ${destination.country}`,
          advisoryLevel: level,
          reason: `Level ${level}: ${levelDescription}. ${summary}`,
        },
      });
    } else if (level === 3) {
      ctx.send({
        to: AGENTS.documents,
        type: 'SecurityAlert',
        priority: 'high',
        payload: { riskLevel: 'high', findings: [summary] },
      });
    }

    return { country: destination.country, level, levelDescription, summary, found: true };
  }
}
