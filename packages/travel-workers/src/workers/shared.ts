import type { WorkerDeps } from '@itinera/agent-sdk';
import type { DestinationCatalog } from '../catalog.js';
import { getDefaultCatalog } from '../catalog.js';

/** Mailbox names used by the reference workers */
export const AGENTS = {
  advisory: 'advisory',
  destination: 'destination',
  immigration: 'immigration',
  currency: 'currency',
  flights: 'flights',
  hotels: 'hotels',
  carRental: 'carRental',
  activities: 'activities',
  itinerary: 'itinerary',
  documents: 'documents',
  orchestrator: 'orchestrator',
} as const;

export type TravelAgentName = (typeof AGENTS)[keyof typeof AGENTS];

export interface TravelWorkerDeps extends WorkerDeps {
  catalog?: DestinationCatalog;
}

export function catalogFrom(deps: TravelWorkerDeps): DestinationCatalog {
  return deps.catalog ?? getDefaultCatalog();
}

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

const MONTHS = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

/** 1-based month number of an ISO date */
export function monthOf(isoDate: string): number {
  return Number(isoDate.slice(5, 7));
}

export function monthName(month: number): string {
  return MONTHS[month - 1] ?? 'Unknown';
}

/** ISO date `days` after `isoDate`, in UTC */
export function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00.000Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}
