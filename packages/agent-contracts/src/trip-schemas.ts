/**
 * Zod Schemas for Trip Requests
 *
 * Requests arrive already structured. Parsing free text into this shape is
 * the caller's job.
 */

import { z } from 'zod';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date');

export const TripRequestSchema = z.object({
  /** Original user wording, kept for the report */
  query: z.string().default(''),
  origin: z.string().min(1),
  city: z.string().min(1),
  country: z.string().min(1),
  departureDate: isoDate,
  nights: z.number().int().positive().max(90),
  travelers: z.number().int().positive().max(20).default(2),
  budget: z.number().positive(),
  /** ISO 4217 code of the budget */
  currency: z.string().length(3).default('USD'),
  /** ISO 3166 alpha-2 code */
  citizenship: z.string().length(2).default('US'),
  interests: z.array(z.string().min(1)).default([]),
  cabinClass: z.enum(['economy', 'premium', 'business']).default('economy'),
  starRating: z.number().int().min(1).max(5).default(3),
  rooms: z.number().int().positive().default(1),
  needsCar: z.boolean().default(false),
});

export type TripRequest = z.output<typeof TripRequestSchema>;
export type TripRequestInput = z.input<typeof TripRequestSchema>;
