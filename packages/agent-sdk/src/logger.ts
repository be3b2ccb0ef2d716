/**
 * Console logger with levels and a component prefix.
 *
 *   const logger = createLogger('orchestrator', { level: 'debug' });
 *   logger.info('Phase started', { phase: 'research' });
 */

import type { ILogger, LogLevel, LogMeta } from '@itinera/agent-contracts';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m',
  info: '\x1b[36m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
};
const RESET = '\x1b[0m';
const DIM = '\x1b[2m';

export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Defaults to the console; tests pass their own */
  sink?: LogSink;
  color?: boolean;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function formatMeta(meta?: LogMeta): string {
  if (!meta || Object.keys(meta).length === 0) {
    return '';
  }
  try {
    return ` ${JSON.stringify(meta)}`;
  } catch {
    return ' [unserializable meta]';
  }
}

export function createLogger(prefix: string, options: LoggerOptions = {}): ILogger {
  const minLevel = LEVELS[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;
  const color = options.color ?? (options.sink === undefined && process.stdout.isTTY === true);

  const log = (level: LogLevel, message: string, meta?: LogMeta): void => {
    if (LEVELS[level] < minLevel) {
      return;
    }
    const ts = new Date().toISOString().slice(11, 23);
    const tag = level.toUpperCase().padEnd(5);
    const line = color
      ? `${DIM}${ts}${RESET} ${COLORS[level]}${tag}${RESET} ${DIM}[${prefix}]${RESET} ${message}${formatMeta(meta)}`
      : `${ts} ${tag} [${prefix}] ${message}${formatMeta(meta)}`;
    sink(level, line);
  };

  return {
    debug: (message, meta) => log('debug', message, meta),
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
  };
}

export function createNoopLogger(): ILogger {
  const noop = (): void => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}
