/**
 * @module @itinera/trip-orchestrator/orchestrator
 * Vacation planning workflow with human checkpoints.
 *
 * Flow:
 * 1. research      sequential: advisory*, destination*, immigration, currency
 * 2. booking       parallel: flights, hotels, carRental, activities
 * 3. budget        checkpoint; halts when the fit is out of bounds
 * 4. optimization  only when the human picks "optimize" at the budget halt
 * 5. suggestions   overview checkpoint (configurable)
 * 6. organization  sequential: itinerary*, documents
 *
 * (* critical: a failure aborts the run)
 *
 * `run()` and `resume()` both resolve with whatever the run produces next:
 * a HaltedAtCheckpoint or the FinalReport. A halted run waits on a promise
 * that `resume()` resolves, so nothing polls.
 */

import { z } from 'zod';
import type {
  AgentMetricsMap,
  ApprovalDecision,
  BookingComposition,
  BudgetReport,
  CheckpointKind,
  CriticalAbort,
  FinalReport,
  HandlerResult,
  HaltedAtCheckpoint,
  IAnalytics,
  ILogger,
  IMessageBus,
  Message,
  MessageType,
  OptimizationState,
  OrchestratorOutcome,
  ParallelResult,
  PhaseName,
  PlannerConfig,
  ResumeDecision,
  ResumeOption,
  SequentialResult,
  SequentialStep,
  Strategy,
  StrategyProposal,
  StructuredMap,
  TripPlan,
  TripRequest,
  TripRequestInput,
  WorkerMetrics,
  WorkerResult,
} from '@itinera/agent-contracts';
import { PlannerConfigSchema, TripRequestError, TripRequestSchema, errorMessage } from '@itinera/agent-contracts';
import {
  BudgetOptimizer,
  ParallelComposer,
  SequentialComposer,
  assessBreakdown,
  budgetOptions,
  createOptimizationState,
  formatMoney,
  summarizeOptimization,
} from '@itinera/agent-core';
import type { OptimizerEvent } from '@itinera/agent-core';
import { createNoopLogger } from '@itinera/agent-sdk';
import { ProgressReporter } from '@itinera/progress-reporter';
import type { ProgressCallback } from '@itinera/progress-reporter';
import { AGENTS, createBookingStrategies } from '@itinera/travel-workers';
import type { TravelWorkerSet } from '@itinera/travel-workers';
import { OrchestrationAnalytics } from './analytics.js';
import { BOOKING_TASKS, buildComposition, costBreakdown } from './booking.js';
import { buildHighlights } from './highlights.js';
import { SessionStore, createDeferred } from './session-store.js';
import type { PlanningSession } from './session-store.js';

export const ORCHESTRATOR_AGENT = AGENTS.orchestrator;

const INBOX_TYPES: readonly MessageType[] = ['SecurityAlert', 'WeatherAdvisory', 'BudgetUpdate', 'TravelBlocked', 'Custom'];

const STRATEGY_OPTIONS: ResumeOption[] = [
  { choice: 'approve', label: 'Apply this saving' },
  { choice: 'reject', label: 'Skip this strategy' },
  { choice: 'cancel', label: 'Cancel planning' },
];

const INCOMPLETE_OPTIONS: ResumeOption[] = [
  { choice: 'proceed', label: 'Continue with the savings found so far' },
  { choice: 'cancel', label: 'Cancel planning' },
];

const SUGGESTION_OPTIONS: ResumeOption[] = [
  { choice: 'approve', label: 'Build the itinerary' },
  { choice: 'cancel', label: 'Cancel planning' },
];

const CHECKPOINT_PHASE: Record<CheckpointKind, PhaseName> = {
  budget: 'budgetCheckpoint',
  strategyApproval: 'optimization',
  optimizationIncomplete: 'optimization',
  suggestions: 'suggestions',
};

const DestinationFactsSchema = z.object({
  highlights: z.array(z.string()).default([]),
  avgHighC: z.number().nullable().default(null),
});
const ImmigrationFactsSchema = z.object({
  visaRequired: z.boolean().default(false),
  passportValidityMonths: z.number().int().nonnegative().default(0),
});
const BookedActivitiesSchema = z.object({
  activities: z.array(z.object({ name: z.string() }).passthrough()),
});

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;
type HaltDetails = DistributiveOmit<HaltedAtCheckpoint, 'kind' | 'sessionId' | 'resumeToken'>;

type BudgetOutcome = { next: 'proceed' | 'optimize' | 'cancel'; report: BudgetReport };

export interface TripOrchestratorOptions {
  workers: TravelWorkerSet;
  bus: IMessageBus;
  config?: PlannerConfig;
  logger?: ILogger;
  analytics?: IAnalytics;
  onProgress?: ProgressCallback;
  /** Ranked cost-reduction strategies; built from `config.optimizer` when omitted */
  strategies?: readonly Strategy<BookingComposition>[];
  now?: () => number;
}

/**
 * Trip orchestrator.
 *
 * @example
 * ```typescript
 * const planner = createVacationPlanner({ config: { optimizer: { autoApprove: true } } });
 *
 * let outcome = await planner.run({ origin: 'Boston', city: 'Lisbon', country: 'Portugal',
 *   departureDate: '2026-05-02', nights: 5, budget: 2500 });
 *
 * while (outcome.kind === 'halted') {
 *   outcome = await planner.resume({ resumeToken: outcome.resumeToken, choice: outcome.options[0].choice });
 * }
 * ```
 */
export class TripOrchestrator {
  private readonly workers: TravelWorkerSet;
  private readonly bus: IMessageBus;
  private readonly config: PlannerConfig;
  private readonly logger: ILogger;
  private readonly reporter: ProgressReporter;
  private readonly analytics: OrchestrationAnalytics;
  private readonly strategies: readonly Strategy<BookingComposition>[];
  private readonly now: () => number;
  private readonly sessions = new SessionStore();
  private readonly metrics = new Map<string, WorkerMetrics>();
  private readonly unsubscribers: Array<() => void>;

  constructor(options: TripOrchestratorOptions) {
    this.workers = options.workers;
    this.bus = options.bus;
    this.config = options.config ?? PlannerConfigSchema.parse({});
    this.logger = options.logger ?? createNoopLogger();
    this.now = options.now ?? Date.now;
    this.reporter = new ProgressReporter(this.logger, options.onProgress, this.now);
    this.analytics = new OrchestrationAnalytics(options.analytics, this.logger, this.now);
    this.strategies = options.strategies ?? createBookingStrategies(this.config.optimizer);

    this.unsubscribers = INBOX_TYPES.map((type) =>
      this.bus.registerHandler(ORCHESTRATOR_AGENT, type, (message: Message) => this.onInboxMessage(message)),
    );
  }

  /**
   * Start planning a trip.
   *
   * @throws TripRequestError when the request fails validation
   */
  async run(input: TripRequestInput): Promise<OrchestratorOutcome> {
    const parsed = TripRequestSchema.safeParse(input);
    if (!parsed.success) {
      throw new TripRequestError('Invalid trip request', {
        issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      });
    }

    const request = parsed.data;
    const session = this.sessions.create(request, this.now());
    this.logger.info(`[orchestrator] Run ${session.id} started`, { city: request.city, nights: request.nights });
    this.reporter.start(session.id, { destination: request.city, nights: request.nights, budget: request.budget });
    this.analytics.trackRunStarted(session.id, request);

    void this.drive(session).then(
      (report) => this.finish(session, report),
      (error: unknown) => {
        this.logger.error(`[orchestrator] Run ${session.id} failed: ${errorMessage(error)}`);
        this.sessions.delete(session.id);
        session.outcome.reject(error);
      },
    );

    return session.outcome.promise;
  }

  /**
   * Continue a halted run with the human's decision.
   *
   * @throws ResumeTokenError for unknown or already used tokens
   * @throws InvalidDecisionError for choices the halt did not offer
   */
  async resume(decision: ResumeDecision): Promise<OrchestratorOutcome> {
    const { session, pending } = this.sessions.claim(decision);
    session.outcome = createDeferred();

    this.logger.info(`[orchestrator] Resuming ${session.id} at ${pending.checkpoint}: ${decision.choice}`);
    this.analytics.trackDecision(session.id, pending.checkpoint, decision.choice);
    pending.decision.resolve(decision);

    return session.outcome.promise;
  }

  /**
   * Per-agent counters over every run of this orchestrator.
   */
  getMetrics(): AgentMetricsMap {
    const snapshot: AgentMetricsMap = {};
    for (const [agent, metrics] of this.metrics) {
      snapshot[agent] = { ...metrics };
    }
    return snapshot;
  }

  /** Sessions still running or waiting at a checkpoint */
  activeSessions(): string[] {
    return this.sessions.activeIds();
  }

  /** Remove the inbox handlers from the bus */
  dispose(): void {
    for (const off of this.unsubscribers.splice(0)) {
      off();
    }
  }

  // ─── Flow ─────────────────────────────────────────────────────────────────

  private async drive(session: PlanningSession): Promise<FinalReport> {
    const { request } = session;
    const input: StructuredMap = { ...request, sessionId: session.id };

    // 1. Research
    const research = await this.runSequential(session, 'research', this.researchSteps(), input);
    if (research.status === 'aborted') {
      return this.aborted(
        session,
        { phase: 'research', agent: research.failedAt, reason: research.errors.join('; ') },
        research.context,
      );
    }
    const researchData = dataOf(research.stepResults);
    const researchAbort = await this.checkInbox(session);
    if (researchAbort) {
      return this.aborted(session, researchAbort, research.context);
    }

    // 2. Booking
    const booking = await this.runBooking(session, input);
    const bookings = dataOf(booking.perTaskResults);
    const bookingAbort = await this.checkInbox(session);
    if (bookingAbort) {
      return this.aborted(session, bookingAbort, { ...research.context, bookings });
    }
    const booked = buildComposition(request, booking.perTaskResults, this.config.costs);
    session.warnings.push(...booked.warnings);
    let composition = booked.composition;

    // 3. Budget checkpoint
    const budget = await this.budgetCheckpoint(session, composition);
    const partial = (): StructuredMap => ({ research: researchData, bookings, composition });
    const budgetAbort = await this.checkInbox(session);
    if (budgetAbort) {
      return this.aborted(session, budgetAbort, partial());
    }
    if (budget.next === 'cancel') {
      return this.cancelled(session, 'budget', partial());
    }
    let estimatedCost = budget.report.estimatedTotal;

    // 4. Optimization
    let optimization: OptimizationState<BookingComposition> | undefined;
    if (budget.next === 'optimize') {
      optimization = await this.optimize(session, composition, estimatedCost);
      const summary = summarizeOptimization(optimization);
      composition = optimization.composition;
      estimatedCost = optimization.currentCostEstimate;

      const optimizationAbort = await this.checkInbox(session);
      if (optimizationAbort) {
        return this.aborted(session, optimizationAbort, { ...partial(), optimization: summary });
      }
      if (optimization.status === 'stopped') {
        return this.cancelled(session, 'strategyApproval', { ...partial(), optimization: summary });
      }
      if (optimization.status === 'exhausted' || optimization.status === 'capped') {
        const decision = await this.halt(session, {
          checkpoint: 'optimizationIncomplete',
          message:
            `Optimization ${optimization.status} after ${summary.applied.length} change(s): ` +
            `${formatMoney(estimatedCost)} against a budget of ${formatMoney(session.budget)}.`,
          options: INCOMPLETE_OPTIONS,
          optimization: summary,
        });
        const incompleteAbort = await this.checkInbox(session);
        if (incompleteAbort) {
          return this.aborted(session, incompleteAbort, { ...partial(), optimization: summary });
        }
        if (decision.choice === 'cancel') {
          return this.cancelled(session, 'optimizationIncomplete', { ...partial(), optimization: summary });
        }
      }
    }

    // 5. Suggestions
    if (this.config.checkpoints.suggestions) {
      session.phase = 'suggestions';
      const decision = await this.halt(session, {
        checkpoint: 'suggestions',
        message: 'Review the trip overview before the itinerary is built.',
        options: SUGGESTION_OPTIONS,
        highlights: buildHighlights({ request, research: researchData, composition, estimatedCost, budget: session.budget }),
      });
      const suggestionsAbort = await this.checkInbox(session);
      if (suggestionsAbort) {
        return this.aborted(session, suggestionsAbort, partial());
      }
      if (decision.choice === 'cancel') {
        return this.cancelled(session, 'suggestions', { ...partial(), composition });
      }
      this.completePhase(session, { phase: 'suggestions', status: 'completed', elapsedMs: 0 });
    } else {
      this.completePhase(session, { phase: 'suggestions', status: 'skipped', elapsedMs: 0 });
    }

    // 6. Organization
    const organization = await this.runSequential(
      session,
      'organization',
      this.organizationSteps(),
      organizationInput(input, researchData, booking.perTaskResults, composition),
    );
    if (organization.status === 'aborted') {
      return this.aborted(
        session,
        { phase: 'organization', agent: organization.failedAt, reason: organization.errors.join('; ') },
        { ...partial(), ...organization.context },
      );
    }
    const organizationAbort = await this.checkInbox(session);
    if (organizationAbort) {
      return this.aborted(session, organizationAbort, { ...partial(), ...organization.context });
    }

    const organized = dataOf(organization.stepResults);
    const finalCost = roundCents(estimatedCost);
    const plan: TripPlan = {
      destination: `${request.city}, ${request.country}`,
      departureDate: request.departureDate,
      nights: composition.hotel.nights,
      travelers: request.travelers,
      research: researchData,
      bookings,
      composition,
      assessment: budget.report,
      ...(optimization ? { optimization: summarizeOptimization(optimization) } : {}),
      finalCost,
      withinBudget: finalCost <= session.budget,
      itinerary: organized.itinerary ?? {},
      documents: organized.documents ?? {},
    };

    return { ...this.reportBase(session), status: 'completed', plan };
  }

  private researchSteps(): SequentialStep[] {
    return [
      { name: 'advisory', worker: this.workers.advisory, critical: true },
      { name: 'destination', worker: this.workers.destination, critical: true },
      { name: 'immigration', worker: this.workers.immigration },
      { name: 'currency', worker: this.workers.currency },
    ];
  }

  private organizationSteps(): SequentialStep[] {
    return [
      { name: 'itinerary', worker: this.workers.itinerary, critical: true },
      { name: 'documents', worker: this.workers.documents },
    ];
  }

  private async runSequential(
    session: PlanningSession,
    phase: PhaseName,
    steps: readonly SequentialStep[],
    input: StructuredMap,
  ): Promise<SequentialResult> {
    session.phase = phase;
    this.reporter.phaseStarted(session.id, phase);

    const composer = new SequentialComposer({
      logger: this.logger,
      onStep: (step, result) => this.recordAgent(session, phase, step, result),
    });
    const result = await composer.run(steps, input);

    this.completePhase(session, {
      phase,
      status: result.status === 'aborted' ? 'aborted' : 'completed',
      elapsedMs: result.totalMs,
    });
    return result;
  }

  private async runBooking(session: PlanningSession, input: StructuredMap): Promise<ParallelResult> {
    session.phase = 'booking';
    this.reporter.phaseStarted(session.id, 'booking');

    const composer = new ParallelComposer({
      maxConcurrent: this.config.parallel.maxConcurrent,
      logger: this.logger,
      onTaskDone: (task, result) => this.recordAgent(session, 'booking', task, result),
    });
    const result = await composer.run(
      BOOKING_TASKS.map((name) => ({ name, worker: this.workers[name] })),
      input,
    );

    this.completePhase(session, {
      phase: 'booking',
      status: 'completed',
      elapsedMs: result.actualParallelTimeMs,
      speedup: roundCents(result.speedup),
    });
    return result;
  }

  /**
   * Assess, halting until the fit is acceptable or the human decides.
   * `setBudget` re-assesses against the new budget.
   */
  private async budgetCheckpoint(session: PlanningSession, composition: BookingComposition): Promise<BudgetOutcome> {
    session.phase = 'budgetCheckpoint';
    const breakdown = costBreakdown(composition);

    for (;;) {
      const report = assessBreakdown(session.budget, breakdown, this.config.budget);
      this.logger.info(`[orchestrator] Budget ${report.scenario}: ${report.message}`);

      if (report.status === 'proceed') {
        this.completePhase(session, { phase: 'budgetCheckpoint', status: 'completed', elapsedMs: 0, note: report.scenario });
        return { next: 'proceed', report };
      }

      const decision = await this.halt(session, {
        checkpoint: 'budget',
        message: report.message,
        options: budgetOptions(report.scenario),
        assessment: report,
      });

      if (await this.checkInbox(session)) {
        return { next: 'cancel', report };
      }
      switch (decision.choice) {
        case 'setBudget':
          session.budget = decision.budget;
          continue;
        case 'optimize':
          return { next: 'optimize', report };
        case 'cancel':
          return { next: 'cancel', report };
        default:
          return { next: 'proceed', report };
      }
    }
  }

  private async optimize(
    session: PlanningSession,
    composition: BookingComposition,
    estimatedCost: number,
  ): Promise<OptimizationState<BookingComposition>> {
    session.phase = 'optimization';
    this.reporter.phaseStarted(session.id, 'optimization');
    const start = this.now();

    const optimizer = new BudgetOptimizer<BookingComposition>({
      logger: this.logger,
      onEvent: (event) => this.onOptimizerEvent(session, event),
    });
    const initial = createOptimizationState({
      currentCost: estimatedCost,
      targetBudget: session.budget,
      maxIterations: this.config.optimizer.maxIterations,
      composition,
      strategies: this.strategies,
    });
    const state = await optimizer.optimize(initial, this.strategies, (proposal) => this.approve(session, proposal));

    this.completePhase(session, {
      phase: 'optimization',
      status: 'completed',
      elapsedMs: Math.max(0, this.now() - start),
      iterations: state.iteration,
      note: state.status,
    });
    return state;
  }

  /** Approval gate: automatic, or a strategyApproval halt */
  private async approve(
    session: PlanningSession,
    proposal: StrategyProposal<BookingComposition>,
  ): Promise<ApprovalDecision> {
    if (this.config.optimizer.autoApprove) {
      return { approved: true, approvedBy: 'auto' };
    }

    const decision = await this.halt(session, {
      checkpoint: 'strategyApproval',
      message:
        `${proposal.description}: save ${formatMoney(proposal.savingsAmount)} ` +
        `(${formatMoney(proposal.currentCost)} → ${formatMoney(proposal.newCost)}).`,
      options: STRATEGY_OPTIONS,
      proposal,
    });

    if (await this.checkInbox(session)) {
      return { approved: false, approvedBy: 'human', stop: true, note: 'critical message received' };
    }
    switch (decision.choice) {
      case 'approve':
        return { approved: true, approvedBy: 'human', note: decision.note };
      case 'cancel':
        return { approved: false, approvedBy: 'human', stop: true, note: decision.note };
      default:
        return { approved: false, approvedBy: 'human', note: decision.note };
    }
  }

  /**
   * Publish a halt and wait for `resume()` to hand back a decision.
   */
  private async halt(session: PlanningSession, details: HaltDetails): Promise<ResumeDecision> {
    const phase = CHECKPOINT_PHASE[details.checkpoint];
    const pending = this.sessions.suspend(session, details.checkpoint, details.options);

    session.phases.push({ phase, status: 'halted', elapsedMs: 0, note: details.checkpoint });
    this.reporter.checkpoint(session.id, details.checkpoint, details.message);
    this.analytics.trackCheckpoint(session.id, details.checkpoint);

    const halted: HaltedAtCheckpoint = {
      ...details,
      kind: 'halted',
      sessionId: session.id,
      resumeToken: pending.token,
    };
    session.outcome.resolve(halted);

    const decision = await pending.decision.promise;
    session.phases.push({ phase, status: 'resumed', elapsedMs: 0, note: decision.choice });
    return decision;
  }

  // ─── Messages ─────────────────────────────────────────────────────────────

  /**
   * Run inbox handlers for this session and for broadcasts sent since it
   * started; returns the abort a critical message set.
   */
  private async checkInbox(session: PlanningSession): Promise<CriticalAbort | undefined> {
    if (!session.abort) {
      await this.bus.processMessages(ORCHESTRATOR_AGENT, (m) =>
        m.correlationId === undefined ? isSentDuring(m, session) : m.correlationId === session.id,
      );
    }
    return session.abort;
  }

  /** Sessions a message concerns; an uncorrelated message reaches every run active when it was sent */
  private sessionsFor(message: Message): PlanningSession[] {
    if (message.correlationId !== undefined) {
      const session = this.sessions.get(message.correlationId);
      return session ? [session] : [];
    }
    return this.sessions
      .activeIds()
      .flatMap((id) => this.sessions.get(id) ?? [])
      .filter((session) => isSentDuring(message, session));
  }

  private onInboxMessage(message: Message): HandlerResult {
    const sessions = this.sessionsFor(message);
    if (sessions.length === 0) {
      return { ignored: true };
    }
    const sessionIds = sessions.map((session) => session.id);

    if (message.priority !== 'critical') {
      this.logger.info(`[orchestrator] ${message.type} from ${message.from}`, { sessionIds });
      return { noted: true };
    }

    const reason = message.type === 'TravelBlocked' ? message.payload.reason : `Critical ${message.type} from ${message.from}`;
    for (const session of sessions) {
      if (!session.abort) {
        session.abort = { phase: session.phase, agent: message.from, reason, message };
        this.logger.warn(`[orchestrator] Critical ${message.type} from ${message.from}, aborting`, { sessionId: session.id });
      }
    }
    return { aborted: true, sessionIds };
  }

  private onOptimizerEvent(session: PlanningSession, event: OptimizerEvent<BookingComposition>): void {
    switch (event.type) {
      case 'proposed':
        this.reporter.strategy(session.id, 'proposed', event.proposal.strategyId, event.iteration, {
          savingsAmount: event.proposal.savingsAmount,
          newCost: event.proposal.newCost,
        });
        break;
      case 'applied':
        this.reporter.strategy(session.id, 'applied', event.record.strategyId, event.iteration, {
          savingsAmount: event.record.savingsAmount,
          newCost: event.record.newCost,
        });
        this.analytics.trackStrategyApplied(session.id, event.record);
        break;
      case 'rejected':
        this.reporter.strategy(session.id, 'rejected', event.strategyId, event.iteration);
        this.analytics.trackStrategyRejected(session.id, event.strategyId);
        break;
      case 'skipped':
        this.logger.debug(`[orchestrator] Strategy ${event.strategyId} skipped (${event.reason})`);
        break;
    }
  }

  // ─── Bookkeeping ──────────────────────────────────────────────────────────

  private recordAgent(session: PlanningSession, phase: PhaseName, agent: string, result: WorkerResult): void {
    const metrics = this.metrics.get(agent) ?? { executions: 0, totalTimeMs: 0, errors: 0 };
    metrics.executions += 1;
    metrics.totalTimeMs += result.elapsedMs;
    if (result.status === 'failure') {
      metrics.errors += 1;
    }
    this.metrics.set(agent, metrics);

    if (result.status !== 'success') {
      session.warnings.push(`${agent}: ${result.errors.join('; ') || result.status}`);
    }
    this.reporter.agent(session.id, phase, agent, result.status, result.elapsedMs, result.errors[0]);
  }

  private completePhase(
    session: PlanningSession,
    entry: { phase: PhaseName; status: 'completed' | 'aborted' | 'skipped'; elapsedMs: number; speedup?: number; iterations?: number; note?: string },
  ): void {
    session.phases.push(entry);
    this.reporter.phaseCompleted(session.id, {
      phase: entry.phase,
      status: entry.status,
      elapsedMs: entry.elapsedMs,
      ...(entry.speedup !== undefined ? { speedup: entry.speedup } : {}),
    });
    this.analytics.trackPhase(session.id, entry);
  }

  private reportBase(session: PlanningSession): {
    kind: 'final';
    sessionId: string;
    request: TripRequest;
    phases: PlanningSession['phases'];
    warnings: string[];
    totalTimeMs: number;
  } {
    return {
      kind: 'final',
      sessionId: session.id,
      request: session.request,
      phases: [...session.phases],
      warnings: [...session.warnings],
      totalTimeMs: Math.max(0, this.now() - session.startedAt),
    };
  }

  private aborted(session: PlanningSession, abort: CriticalAbort, partialContext: StructuredMap): FinalReport {
    this.logger.warn(`[orchestrator] Run ${session.id} aborted in ${abort.phase} by ${abort.agent}: ${abort.reason}`);
    return { ...this.reportBase(session), status: 'aborted', abort, partialContext };
  }

  private cancelled(session: PlanningSession, checkpoint: CheckpointKind, partialContext: StructuredMap): FinalReport {
    this.logger.info(`[orchestrator] Run ${session.id} cancelled at ${checkpoint}`);
    return { ...this.reportBase(session), status: 'cancelled', checkpoint, partialContext };
  }

  private finish(session: PlanningSession, report: FinalReport): void {
    this.sessions.delete(session.id);
    switch (report.status) {
      case 'completed':
        this.reporter.finished(session.id, 'completed', { finalCost: report.plan.finalCost });
        break;
      case 'aborted':
        this.reporter.finished(session.id, 'aborted', { reason: report.abort.reason });
        break;
      case 'cancelled':
        this.reporter.finished(session.id, 'cancelled', { reason: `cancelled at ${report.checkpoint}` });
        break;
    }
    this.analytics.trackRunFinished(report);
    session.outcome.resolve(report);
  }
}

// ─── Helpers ──────────────────────────────────────────────────────────────────

function isSentDuring(message: Message, session: PlanningSession): boolean {
  return Date.parse(message.createdAt) >= session.startedAt;
}

function roundCents(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Data of every step that did not fail, keyed by step name */
function dataOf(results: Readonly<Record<string, WorkerResult>>): Record<string, StructuredMap> {
  const data: Record<string, StructuredMap> = {};
  for (const [name, result] of Object.entries(results)) {
    if (result.status !== 'failure') {
      data[name] = result.data;
    }
  }
  return data;
}

/**
 * Input for the organization phase: the request plus what research and
 * booking found, trimmed to the optimized composition.
 */
function organizationInput(
  base: StructuredMap,
  research: Record<string, StructuredMap>,
  bookings: Readonly<Record<string, WorkerResult>>,
  composition: BookingComposition,
): StructuredMap {
  const destination = DestinationFactsSchema.safeParse(research.destination ?? {});
  const immigration = ImmigrationFactsSchema.safeParse(research.immigration ?? {});
  const booked = BookedActivitiesSchema.safeParse(bookings.activities?.status === 'failure' ? {} : bookings.activities?.data);

  return {
    ...base,
    nights: composition.hotel.nights,
    needsCar: composition.car.included,
    activities: booked.success ? booked.data.activities.slice(0, composition.activities.count) : [],
    highlights: destination.success ? destination.data.highlights : [],
    avgHighC: destination.success ? destination.data.avgHighC : null,
    visaRequired: immigration.success ? immigration.data.visaRequired : false,
    passportValidityMonths: immigration.success ? immigration.data.passportValidityMonths : 0,
  };
}
