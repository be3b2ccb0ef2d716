/**
 * @itinera/travel-workers
 *
 * Reference workers backed by a static destination catalog, plus the
 * booking cost-reduction strategies.
 */

export { DestinationCatalog, getDefaultCatalog, DEFAULT_CATALOG_PATH } from './catalog.js';
export type { Activity, Destination, CatalogData } from './catalog.js';

export {
  createTravelWorkers,
  ActivitiesWorker,
  AdvisoryWorker,
  CarRentalWorker,
  CurrencyWorker,
  DestinationWorker,
  DocumentsWorker,
  FlightsWorker,
  HotelsWorker,
  ImmigrationWorker,
  ItineraryWorker,
} from './workers/index.js';
export type { TravelWorkers, TravelWorkerSet } from './workers/index.js';
export { AGENTS } from './workers/shared.js';
export type { TravelAgentName, TravelWorkerDeps } from './workers/shared.js';
export { BLOCKING_ADVISORY_LEVEL } from './workers/advisory-worker.js';
export { closestStars } from './workers/hotels-worker.js';

export type { AdvisoryData } from './workers/advisory-worker.js';
export type { DestinationData } from './workers/destination-worker.js';
export type { ImmigrationData } from './workers/immigration-worker.js';
export type { CurrencyData } from './workers/currency-worker.js';
export type { FlightsData } from './workers/flights-worker.js';
export type { HotelsData } from './workers/hotels-worker.js';
export type { CarRentalData } from './workers/car-rental-worker.js';
export type { ActivitiesData } from './workers/activities-worker.js';
export type { ItineraryData, ItineraryDay } from './workers/itinerary-worker.js';
export type { DocumentsData } from './workers/documents-worker.js';

export { createBookingStrategies, compositionTotal, BUDGET_AIRLINE, MIN_HOTEL_STARS } from './strategies.js';
