/**
 * @itinera/agent-sdk
 *
 * Worker Contract. Contains:
 *   - BaseWorker, the abstract class every worker extends
 *   - createMessage, the only way messages are built
 *   - console logger factory and timeout helper
 *
 * Test helpers live under the `@itinera/agent-sdk/testing` sub-path.
 */

export { BaseWorker } from './base-worker.js';
export type { WorkerDeps, WorkerRunContext, OutgoingMessage } from './base-worker.js';

export { createMessage } from './message.js';

export { createLogger, createNoopLogger } from './logger.js';
export type { LogSink, LoggerOptions } from './logger.js';

export { runWithTimeout } from './timeout.js';
export type { TimedOutcome } from './timeout.js';
