/**
 * Table-driven state machine with transition history and time per state.
 *
 * Used for composer runs (pending → running → completed | aborted) and the
 * optimizer loop. An illegal transition throws; re-entering the current
 * state is a no-op.
 */

export type TransitionTable<S extends string> = Record<S, readonly S[]>;

export interface StateTransition<S extends string> {
  from: S;
  to: S;
  timestamp: string;
  reason?: string;
}

export class PhaseStateMachine<S extends string> {
  private current: S;
  private readonly transitions: StateTransition<S>[] = [];
  private readonly enteredAt = new Map<S, number>();
  private readonly durationsMs = new Map<S, number>();

  constructor(
    private readonly table: TransitionTable<S>,
    initial: S,
    private readonly clock: () => number = Date.now,
  ) {
    this.current = initial;
    this.enteredAt.set(initial, this.clock());
  }

  getCurrent(): S {
    return this.current;
  }

  is(state: S): boolean {
    return this.current === state;
  }

  isTerminal(): boolean {
    return this.table[this.current].length === 0;
  }

  canTransition(to: S): boolean {
    return this.table[this.current].includes(to);
  }

  getTransitions(): StateTransition<S>[] {
    return [...this.transitions];
  }

  transition(to: S, reason?: string): void {
    if (to === this.current) {
      return;
    }
    if (!this.canTransition(to)) {
      throw new Error(`Invalid state transition: ${this.current} -> ${to}`);
    }

    const now = this.clock();
    const entered = this.enteredAt.get(this.current);
    if (entered != null) {
      this.durationsMs.set(this.current, (this.durationsMs.get(this.current) ?? 0) + (now - entered));
    }

    this.transitions.push({ from: this.current, to, timestamp: new Date().toISOString(), reason });
    this.current = to;
    this.enteredAt.set(to, now);
  }

  /** Time spent per visited state, including the open one */
  getDurationsMs(now = this.clock()): Partial<Record<S, number>> {
    const out: Partial<Record<S, number>> = {};
    for (const [state, ms] of this.durationsMs) {
      out[state] = ms;
    }
    const entered = this.enteredAt.get(this.current);
    if (entered != null) {
      out[this.current] = (out[this.current] ?? 0) + (now - entered);
    }
    return out;
  }
}

/** Lifecycle of a sequential composition run */
export type CompositionState = 'pending' | 'running' | 'completed' | 'aborted';

export const COMPOSITION_TRANSITIONS: TransitionTable<CompositionState> = {
  pending: ['running'],
  running: ['completed', 'aborted'],
  completed: [],
  aborted: [],
};
