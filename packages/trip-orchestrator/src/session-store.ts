/**
 * In-memory store of runs waiting at a checkpoint.
 *
 * A halted run owns exactly one resume token. The token is consumed when a
 * valid decision arrives; each halt issues a fresh one.
 */

import { randomUUID } from 'node:crypto';
import type {
  CheckpointKind,
  CriticalAbort,
  OrchestratorOutcome,
  PhaseLogEntry,
  PhaseName,
  ResumeDecision,
  ResumeOption,
  TripRequest,
} from '@itinera/agent-contracts';
import { InvalidDecisionError, ItineraError, ResumeTokenError } from '@itinera/agent-contracts';

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export interface PendingHalt {
  token: string;
  checkpoint: CheckpointKind;
  options: ResumeOption[];
  decision: Deferred<ResumeDecision>;
}

export interface PlanningSession {
  readonly id: string;
  readonly request: TripRequest;
  readonly startedAt: number;
  /** Current budget; `setBudget` decisions change it */
  budget: number;
  /** Phase currently running */
  phase: PhaseName;
  phases: PhaseLogEntry[];
  warnings: string[];
  /** Set by a critical message on the orchestrator inbox */
  abort?: CriticalAbort;
  /** Resolves with whatever the run produces next: a halt or the final report */
  outcome: Deferred<OrchestratorOutcome>;
  pending?: PendingHalt;
}

export class SessionStore {
  private readonly sessions = new Map<string, PlanningSession>();
  private readonly tokens = new Map<string, string>();

  create(request: TripRequest, startedAt: number): PlanningSession {
    const session: PlanningSession = {
      id: randomUUID(),
      request,
      startedAt,
      budget: request.budget,
      phase: 'research',
      phases: [],
      warnings: [],
      outcome: createDeferred(),
    };
    this.sessions.set(session.id, session);
    return session;
  }

  get(sessionId: string): PlanningSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Park a session at a checkpoint and hand out its resume token.
   */
  suspend(session: PlanningSession, checkpoint: CheckpointKind, options: ResumeOption[]): PendingHalt {
    const pending: PendingHalt = { token: randomUUID(), checkpoint, options, decision: createDeferred() };
    session.pending = pending;
    this.tokens.set(pending.token, session.id);
    return pending;
  }

  /**
   * Validate a decision against its halt and consume the token.
   * An invalid choice leaves the token usable.
   *
   * @throws ResumeTokenError for unknown or already used tokens
   * @throws InvalidDecisionError for choices the halt did not offer
   * @throws ItineraError (INVALID_DECISION) for a non-positive budget
   */
  claim(decision: ResumeDecision): { session: PlanningSession; pending: PendingHalt } {
    const sessionId = this.tokens.get(decision.resumeToken);
    const session = sessionId === undefined ? undefined : this.sessions.get(sessionId);
    const pending = session?.pending;
    if (!session || !pending || pending.token !== decision.resumeToken) {
      throw new ResumeTokenError(decision.resumeToken);
    }

    const allowed = pending.options.map((o) => o.choice);
    if (!allowed.includes(decision.choice)) {
      throw new InvalidDecisionError(decision.choice, allowed);
    }
    if (decision.choice === 'setBudget' && !(Number.isFinite(decision.budget) && decision.budget > 0)) {
      throw new ItineraError('INVALID_DECISION', `Budget must be a positive number (got ${decision.budget})`, {
        budget: decision.budget,
      });
    }

    this.tokens.delete(decision.resumeToken);
    session.pending = undefined;
    return { session, pending };
  }

  delete(sessionId: string): void {
    const session = this.sessions.get(sessionId);
    if (session?.pending) {
      this.tokens.delete(session.pending.token);
    }
    this.sessions.delete(sessionId);
  }

  /** Ids of sessions still running or halted */
  activeIds(): string[] {
    return [...this.sessions.keys()];
  }
}
