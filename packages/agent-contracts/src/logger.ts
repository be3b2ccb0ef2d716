/**
 * @module @itinera/agent-contracts/logger
 * Logging and analytics capabilities injected into every component.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogMeta = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/**
 * Analytics sink. Tracking is fire-and-forget.
 */
export interface IAnalytics {
  track(event: string, properties?: Record<string, unknown>): void;
}
