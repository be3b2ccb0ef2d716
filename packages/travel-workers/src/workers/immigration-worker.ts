/**
 * Entry requirements for the traveler's citizenship.
 */

import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import type { DestinationCatalog } from '../catalog.js';
import { AGENTS, catalogFrom } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const ImmigrationInputSchema = z.object({
  city: z.string().min(1),
  citizenship: z.string().length(2),
  nights: z.number().int().positive(),
});

export type ImmigrationInput = z.infer<typeof ImmigrationInputSchema>;

export type ImmigrationData = {
  countryCode: string;
  visaRequired: boolean;
  visaFreeDays: number;
  passportValidityMonths: number;
  notes: string[];
};

export class ImmigrationWorker extends BaseWorker<ImmigrationInput, ImmigrationData> {
  protected readonly inputSchema = ImmigrationInputSchema;
  private readonly catalog: DestinationCatalog;

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.immigration, deps);
    this.catalog = catalogFrom(deps);
  }

  protected async perform(input: ImmigrationInput): Promise<ImmigrationData> {
    const destination = this.catalog.find(input.city);
    if (!destination) {
      throw new Error(`No entry rules on file for ${input.city}`);
    }

    const citizenship = input.citizenship.toUpperCase();
    const { visaFreeDays, visaRequiredFor, passportValidityMonths } = destination.entry;

    if (citizenship === destination.countryCode) {
      return {
        countryCode: destination.countryCode,
        visaRequired: false,
        visaFreeDays: input.nights,
        passportValidityMonths: 0,
        notes: ['Domestic travel: no visa needed'],
      };
    }

    const notes: string[] = [];
    const listed = visaRequiredFor.includes(citizenship);
    const overstay = input.nights > visaFreeDays;
    if (listed) {
      notes.push(`${citizenship} citizens need a visa for ${destination.country}`);
    }
    if (overstay && !listed) {
      notes.push(`Stay of ${input.nights} nights exceeds the ${visaFreeDays}-day visa-free limit`);
    }
    if (passportValidityMonths > 0) {
      notes.push(`Passport must be valid ${passportValidityMonths} months beyond departure`);
    }

    return {
      countryCode: destination.countryCode,
      visaRequired: listed || overstay,
      visaFreeDays: listed ? 0 : visaFreeDays,
      passportValidityMonths,
      notes,
    };
  }
}
