/**
 * Static destination catalog backing the reference workers.
 *
 * Loaded once from `data/destinations.json` and validated with zod, so a
 * malformed data file fails at load time instead of inside a worker.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigError } from '@itinera/agent-contracts';

const __dirname = dirname(fileURLToPath(import.meta.url));

export const DEFAULT_CATALOG_PATH = join(__dirname, 'data', 'destinations.json');

const ActivitySchema = z.object({
  name: z.string(),
  category: z.string(),
  pricePerPerson: z.number().nonnegative(),
  durationHours: z.number().positive(),
});

const DestinationSchema = z.object({
  city: z.string(),
  country: z.string(),
  countryCode: z.string().length(2),
  currency: z.string().length(3),
  advisory: z.object({
    level: z.number().int().min(1).max(4),
    summary: z.string(),
  }),
  weather: z.object({
    climate: z.string(),
    avgHighC: z.array(z.number()).length(12),
    severeMonths: z.array(z.number().int().min(1).max(12)),
    bestTimeToVisit: z.string(),
  }),
  entry: z.object({
    visaFreeDays: z.number().int().nonnegative(),
    visaRequiredFor: z.array(z.string().length(2)),
    passportValidityMonths: z.number().int().nonnegative(),
  }),
  flights: z.object({
    baseFarePerPerson: z.number().positive(),
    airlines: z.array(z.string()).min(1),
  }),
  hotels: z.record(
    z.string().regex(/^[1-5]$/),
    z.object({ nightly: z.number().positive(), name: z.string() }),
  ),
  car: z.object({ dailyRate: z.number().positive(), company: z.string() }),
  activities: z.array(ActivitySchema),
  highlights: z.array(z.string()),
});

const CatalogSchema = z.object({
  cabinMultipliers: z.object({ economy: z.number(), premium: z.number(), business: z.number() }),
  exchangeRates: z.record(z.string().length(3), z.number().positive()),
  advisoryLevels: z.record(z.string(), z.string()),
  destinations: z.record(z.string(), DestinationSchema),
});

export type Activity = z.infer<typeof ActivitySchema>;
export type Destination = z.infer<typeof DestinationSchema>;
export type CatalogData = z.infer<typeof CatalogSchema>;

export class DestinationCatalog {
  constructor(private readonly data: CatalogData) {}

  /**
   * Read and validate a catalog file.
   *
   * @throws ConfigError when the file is missing or malformed
   */
  static load(path: string = DEFAULT_CATALOG_PATH): DestinationCatalog {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      throw new ConfigError(`Cannot read destination catalog at ${path}`, {
        cause: error instanceof Error ? error.message : String(error),
      });
    }
    return DestinationCatalog.fromData(raw);
  }

  static fromData(raw: unknown): DestinationCatalog {
    const parsed = CatalogSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigError('Invalid destination catalog', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return new DestinationCatalog(parsed.data);
  }

  /** Case-insensitive lookup by city */
  find(city: string): Destination | undefined {
    return this.data.destinations[city.trim().toLowerCase()];
  }

  cities(): string[] {
    return Object.values(this.data.destinations).map((d) => d.city);
  }

  cabinMultiplier(cabin: keyof CatalogData['cabinMultipliers']): number {
    return this.data.cabinMultipliers[cabin];
  }

  /** Units of `currency` per US dollar */
  usdRate(currency: string): number | undefined {
    return this.data.exchangeRates[currency.toUpperCase()];
  }

  advisoryDescription(level: number): string {
    return this.data.advisoryLevels[String(level)] ?? 'Unknown';
  }
}

let defaultCatalog: DestinationCatalog | undefined;

/** Shared catalog read from the bundled data file */
export function getDefaultCatalog(): DestinationCatalog {
  defaultCatalog ??= DestinationCatalog.load();
  return defaultCatalog;
}
