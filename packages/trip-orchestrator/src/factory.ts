/**
 * Wires the default travel workers, a message bus and a console logger
 * into a TripOrchestrator.
 */

import type { IAnalytics, ILogger, PlannerConfig, PlannerConfigInput } from '@itinera/agent-contracts';
import { MessageBus } from '@itinera/agent-core';
import { createLogger } from '@itinera/agent-sdk';
import type { ProgressCallback } from '@itinera/progress-reporter';
import { createTravelWorkers } from '@itinera/travel-workers';
import type { DestinationCatalog } from '@itinera/travel-workers';
import { resolvePlannerConfig } from './config.js';
import { TripOrchestrator } from './orchestrator.js';

export interface VacationPlannerOptions {
  /** Resolved config (e.g. from `loadPlannerConfig`) or overrides on the defaults */
  config?: PlannerConfig | PlannerConfigInput;
  logger?: ILogger;
  analytics?: IAnalytics;
  onProgress?: ProgressCallback;
  catalog?: DestinationCatalog;
}

export function createVacationPlanner(options: VacationPlannerOptions = {}): TripOrchestrator {
  const config = resolvePlannerConfig(options.config ?? {});
  const logger = options.logger ?? createLogger('itinera', { level: config.logLevel });
  const bus = new MessageBus({ logger });

  const workers = createTravelWorkers({
    bus,
    logger,
    timeoutMs: config.workerTimeoutMs,
    catalog: options.catalog,
  });

  return new TripOrchestrator({
    workers,
    bus,
    config,
    logger,
    analytics: options.analytics,
    onProgress: options.onProgress,
  });
}
