/**
 * Travel documents checklist and packing notes.
 *
 * Listens for WeatherAdvisory, SecurityAlert and BudgetUpdate messages from
 * the research agents. They are drained by `beforeExecute` and kept per
 * session until the worker runs for that session.
 */

import { z } from 'zod';
import { BaseWorker } from '@itinera/agent-sdk';
import type { WorkerRunContext } from '@itinera/agent-sdk';
import type { Message } from '@itinera/agent-contracts';
import { AGENTS } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

const DocumentsInputSchema = z.object({
  city: z.string().min(1),
  citizenship: z.string().length(2),
  visaRequired: z.boolean().default(false),
  passportValidityMonths: z.number().int().nonnegative().default(0),
  avgHighC: z.number().nullable().default(null),
  needsCar: z.boolean().default(false),
  sessionId: z.string().optional(),
});

export type DocumentsInput = z.infer<typeof DocumentsInputSchema>;

export type DocumentsData = {
  checklist: string[];
  packing: string[];
  advisories: string[];
  budgetNotes: string[];
};

interface SessionNotices {
  advisories: string[];
  budgetNotes: string[];
}

const NO_SESSION = '';

export class DocumentsWorker extends BaseWorker<DocumentsInput, DocumentsData> {
  protected readonly inputSchema = DocumentsInputSchema;
  private readonly notices = new Map<string, SessionNotices>();
  private readonly unsubscribers: Array<() => void> = [];

  constructor(deps: TravelWorkerDeps = {}) {
    super(AGENTS.documents, deps);
    if (!this.bus) {
      return;
    }
    this.unsubscribers.push(
      this.bus.registerHandler(this.name, 'WeatherAdvisory', (m) => {
        this.noticesFor(m).advisories.push(`Weather (${m.payload.severity}): ${m.payload.warnings.join('; ')}`);
      }),
      this.bus.registerHandler(this.name, 'SecurityAlert', (m) => {
        this.noticesFor(m).advisories.push(`Security (${m.payload.riskLevel}): ${m.payload.findings.join('; ')}`);
      }),
      this.bus.registerHandler(this.name, 'BudgetUpdate', (m) => {
        const note = m.payload.note ? ` (${m.payload.note})` : '';
        this.noticesFor(m).budgetNotes.push(`Local budget: ${m.payload.budget} ${m.payload.currency}${note}`);
      }),
    );
  }

  /** Drop the bus handlers */
  dispose(): void {
    for (const off of this.unsubscribers.splice(0)) {
      off();
    }
  }

  protected async perform(input: DocumentsInput, ctx: WorkerRunContext): Promise<DocumentsData> {
    const key = ctx.correlationId ?? NO_SESSION;
    const notices = this.notices.get(key) ?? { advisories: [], budgetNotes: [] };
    this.notices.delete(key);

    const checklist = ['Passport'];
    if (input.passportValidityMonths > 0) {
      checklist[0] = `Passport valid ${input.passportValidityMonths}+ months past return`;
    }
    if (input.visaRequired) {
      checklist.push(`Visa for ${input.city}`);
    }
    if (input.needsCar) {
      checklist.push("Driver's license and International Driving Permit");
    }
    checklist.push('Travel insurance', 'Booking confirmations');

    return {
      checklist,
      packing: packingFor(input.avgHighC),
      advisories: notices.advisories,
      budgetNotes: notices.budgetNotes,
    };
  }

  private noticesFor(message: Message): SessionNotices {
    const key = message.correlationId ?? NO_SESSION;
    let entry = this.notices.get(key);
    if (!entry) {
      entry = { advisories: [], budgetNotes: [] };
      this.notices.set(key, entry);
    }
    return entry;
  }
}

function packingFor(avgHighC: number | null): string[] {
  if (avgHighC === null) {
    return ['Layers for changeable weather'];
  }
  if (avgHighC < 10) {
    return ['Insulated jacket', 'Thermal layers', 'Waterproof boots'];
  }
  if (avgHighC > 25) {
    return ['Sun protection', 'Light breathable clothing', 'Swimwear'];
  }
  return ['Light jacket', 'Comfortable walking shoes'];
}
