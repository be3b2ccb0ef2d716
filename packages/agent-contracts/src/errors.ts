/**
 * @module @itinera/agent-contracts/errors
 * Errors thrown at the API boundary when a caller misuses it.
 *
 * Worker failures, critical aborts and checkpoint halts are results, not
 * exceptions. These classes only cover invalid requests, tokens, decisions
 * and configuration.
 */

export type ItineraErrorCode =
  | 'INVALID_TRIP_REQUEST'
  | 'UNKNOWN_RESUME_TOKEN'
  | 'INVALID_DECISION'
  | 'INVALID_CONFIG'
  | 'INVALID_MESSAGE';

export class ItineraError extends Error {
  readonly code: ItineraErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ItineraErrorCode, message: string, details?: Record<string, unknown>) {
    super(`${code}: ${message}`);
    this.name = new.target.name;
    this.code = code;
    this.details = details;
  }
}

export class TripRequestError extends ItineraError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_TRIP_REQUEST', message, details);
  }
}

export class ResumeTokenError extends ItineraError {
  constructor(token: string) {
    super('UNKNOWN_RESUME_TOKEN', `No halted session for resume token "${token}"`, { token });
  }
}

export class InvalidDecisionError extends ItineraError {
  constructor(choice: string, allowed: string[]) {
    super('INVALID_DECISION', `Choice "${choice}" is not offered here (expected one of: ${allowed.join(', ')})`, {
      choice,
      allowed,
    });
  }
}

export class ConfigError extends ItineraError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_CONFIG', message, details);
  }
}

export class MessageError extends ItineraError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_MESSAGE', message, details);
  }
}

/**
 * Normalize anything thrown into a message string.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
