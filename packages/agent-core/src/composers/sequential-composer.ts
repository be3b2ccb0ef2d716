/**
 * SequentialComposer: runs dependent steps in order over a shared context.
 *
 * Context rules:
 *   - starts as a copy of the initial input
 *   - each step sees a frozen snapshot merged with its own input overrides
 *   - success and partial data are stored under the step name
 *   - a critical failure stores a failure marker and aborts; later steps
 *     are never invoked
 *   - a non-critical failure (or partial) is appended to `context.warnings`
 */

import type {
  ILogger,
  SequentialResult,
  SequentialStep,
  StepFailureMarker,
  StepTiming,
  StepWarning,
  StructuredMap,
  WorkerResult,
} from '@itinera/agent-contracts';
import { errorMessage } from '@itinera/agent-contracts';
import { createNoopLogger } from '@itinera/agent-sdk';
import { COMPOSITION_TRANSITIONS, PhaseStateMachine } from '../execution/phase-state-machine.js';
import type { CompositionState } from '../execution/phase-state-machine.js';

export interface SequentialComposerOptions {
  logger?: ILogger;
  clock?: () => number;
  /** Called after every step, for progress reporting */
  onStep?: (step: string, result: WorkerResult) => void;
}

/** Key under which non-critical failures accumulate */
export const WARNINGS_KEY = 'warnings';

export class SequentialComposer {
  private readonly logger: ILogger;
  private readonly clock: () => number;
  private readonly onStep?: (step: string, result: WorkerResult) => void;

  constructor(options: SequentialComposerOptions = {}) {
    this.logger = options.logger ?? createNoopLogger();
    this.clock = options.clock ?? (() => performance.now());
    this.onStep = options.onStep;
  }

  async run(steps: readonly SequentialStep[], initialInput: StructuredMap = {}): Promise<SequentialResult> {
    assertUniqueNames(steps.map((s) => s.name));

    const machine = new PhaseStateMachine<CompositionState>(COMPOSITION_TRANSITIONS, 'pending', this.clock);
    const context: StructuredMap = { ...initialInput };
    const warnings: StepWarning[] = readWarnings(initialInput);
    const stepResults: Record<string, WorkerResult> = {};
    const timings: StepTiming[] = [];
    const start = this.clock();

    machine.transition('running');
    this.logger.debug(`[sequential] Running ${steps.length} steps`, { steps: steps.map((s) => s.name) });

    for (const step of steps) {
      const input = this.buildInput(step, context);
      const result = await this.execute(step, input);

      stepResults[step.name] = result;
      timings.push({ step: step.name, status: result.status, elapsedMs: result.elapsedMs });
      this.notify(step.name, result);

      if (result.status === 'failure') {
        if (step.critical) {
          const marker: StepFailureMarker = { status: 'failure', errors: [...result.errors] };
          context[step.name] = marker;
          if (warnings.length > 0) {
            context[WARNINGS_KEY] = warnings;
          }
          machine.transition('aborted', step.name);
          this.logger.warn(`[sequential] Critical step "${step.name}" failed, aborting`, { errors: result.errors });
          return {
            status: 'aborted',
            failedAt: step.name,
            errors: [...result.errors],
            context,
            stepResults,
            timings,
            totalMs: Math.max(0, this.clock() - start),
          };
        }

        warnings.push({ step: step.name, status: 'failure', errors: [...result.errors] });
        this.logger.warn(`[sequential] Step "${step.name}" failed, continuing`, { errors: result.errors });
        continue;
      }

      context[step.name] = result.data;
      if (result.status === 'partial') {
        warnings.push({ step: step.name, status: 'partial', errors: [...result.errors] });
      }
    }

    if (warnings.length > 0) {
      context[WARNINGS_KEY] = warnings;
    }
    machine.transition('completed');

    return {
      status: 'completed',
      context,
      stepResults,
      timings,
      totalMs: Math.max(0, this.clock() - start),
    };
  }

  private notify(step: string, result: WorkerResult): void {
    try {
      this.onStep?.(step, result);
    } catch (error) {
      this.logger.error(`[sequential] onStep callback failed: ${errorMessage(error)}`);
    }
  }

  private buildInput(step: SequentialStep, context: StructuredMap): StructuredMap {
    const snapshot = Object.freeze({ ...context });
    if (!step.input) {
      return snapshot;
    }
    const overrides = typeof step.input === 'function' ? step.input(snapshot) : step.input;
    return Object.freeze({ ...snapshot, ...overrides });
  }

  /** Contract violations (a throwing worker) become failures */
  private async execute(step: SequentialStep, input: StructuredMap): Promise<WorkerResult> {
    const start = this.clock();
    try {
      return await step.worker.execute(input);
    } catch (error) {
      return {
        status: 'failure',
        data: {},
        errors: [errorMessage(error)],
        elapsedMs: Math.max(0, this.clock() - start),
        metadata: { worker: step.worker.name, startedAt: new Date().toISOString(), messagesProcessed: 0 },
      };
    }
  }
}

export function assertUniqueNames(names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new Error(`Duplicate step name: "${name}"`);
    }
    seen.add(name);
  }
}

function readWarnings(input: StructuredMap): StepWarning[] {
  const existing = input[WARNINGS_KEY];
  return Array.isArray(existing) ? existing.filter(isStepWarning) : [];
}

function isStepWarning(value: unknown): value is StepWarning {
  return (
    typeof value === 'object' &&
    value !== null &&
    'step' in value &&
    typeof value.step === 'string' &&
    'errors' in value &&
    Array.isArray(value.errors)
  );
}
