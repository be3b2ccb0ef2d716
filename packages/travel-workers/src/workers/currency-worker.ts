/**
 * Converts the budget into the destination currency and tells the
 * documents agent about it.
 */

import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import type { WorkerRunContext } from '@itinera/agent-sdk';
import type { DestinationCatalog } from '../catalog.js';
import { AGENTS, catalogFrom, round2 } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const CurrencyInputSchema = z.object({
  city: z.string().min(1),
  budget: z.number().positive(),
  currency: z.string().length(3),
  sessionId: z.string().optional(),
});

export type CurrencyInput = z.infer<typeof CurrencyInputSchema>;

export type CurrencyData = {
  homeCurrency: string;
  localCurrency: string;
  rate: number;
  budgetLocal: number;
};

export class CurrencyWorker extends BaseWorker<CurrencyInput, CurrencyData> {
  protected readonly inputSchema = CurrencyInputSchema;
  private readonly catalog: DestinationCatalog;

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.currency, deps);
    this.catalog = catalogFrom(deps);
  }

  protected async perform(input: CurrencyInput, ctx: WorkerRunContext): Promise<CurrencyData> {
    const destination = this.catalog.find(input.city);
    if (!destination) {
      throw new Error(`No currency on file for ${input.city}`);
    }

    const homeCurrency = input.currency.toUpperCase();
    const homeRate = this.catalog.usdRate(homeCurrency);
    const localRate = this.catalog.usdRate(destination.currency);
    if (homeRate === undefined || localRate === undefined) {
      throw new Error(`No exchange rate between ${homeCurrency} and ${destination.currency}`);
    }

    const rate = Math.round((localRate / homeRate) * 10_000) / 10_000;
    const budgetLocal = round2(input.budget * rate);

    ctx.send({
      to: AGENTS.documents,
      type: 'BudgetUpdate',
      payload: {
        budget: budgetLocal,
        currency: destination.currency,
        note: `1 ${homeCurrency} = ${rate} ${destination.currency}`,
      },
    });

    return { homeCurrency, localCurrency: destination.currency, rate, budgetLocal };
  }
}
