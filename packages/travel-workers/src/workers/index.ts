import type { Worker } from '@itinera/agent-contracts';
import { ActivitiesWorker } from './activities-worker.js';
import { AdvisoryWorker } from './advisory-worker.js';
import { CarRentalWorker } from './car-rental-worker.js';
import { CurrencyWorker } from './currency-worker.js';
import { DestinationWorker } from './destination-worker.js';
import { DocumentsWorker } from './documents-worker.js';
import { FlightsWorker } from './flights-worker.js';
import { HotelsWorker } from './hotels-worker.js';
import { ImmigrationWorker } from './immigration-worker.js';
import { ItineraryWorker } from './itinerary-worker.js';
import { catalogFrom } from './shared.js';
import type { TravelWorkerDeps } from './shared.js';

export interface TravelWorkers {
  advisory: AdvisoryWorker;
  destination: DestinationWorker;
  immigration: ImmigrationWorker;
  currency: CurrencyWorker;
  flights: FlightsWorker;
  hotels: HotelsWorker;
  carRental: CarRentalWorker;
  activities: ActivitiesWorker;
  itinerary: ItineraryWorker;
  documents: DocumentsWorker;
}

export type TravelWorkerSet = { [K in keyof TravelWorkers]: Worker };

/**
 * One instance of every reference worker sharing the same bus, logger
 * and catalog.
 */
export function createTravelWorkers(deps: TravelWorkerDeps = {}): TravelWorkers {
  const shared: TravelWorkerDeps = { ...deps, catalog: catalogFrom(deps) };
  return {
    advisory: new AdvisoryWorker(shared),
    destination: new DestinationWorker(shared),
    immigration: new ImmigrationWorker(shared),
    currency: new CurrencyWorker(shared),
    flights: new FlightsWorker(shared),
    hotels: new HotelsWorker(shared),
    carRental: new CarRentalWorker(shared),
    activities: new ActivitiesWorker(shared),
    itinerary: new ItineraryWorker(shared),
    documents: new DocumentsWorker(shared),
  };
}

export {
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
};
