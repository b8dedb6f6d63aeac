import type { CompensationOutcome } from '@cargotrace/domain';
import { StepTimeoutError } from '@cargotrace/domain';

export interface SagaStep<C, N extends string> {
  readonly name: N;
  /** A step whose guard is false is skipped and never compensated. */
  readonly when?: (ctx: C) => boolean;
  readonly run: (ctx: C) => Promise<void>;
  readonly compensate?: (ctx: C) => Promise<void>;
  /**
   * The compensation is harmless when `run` never took effect, so recovery
   * may apply it to a step that was interrupted mid-flight.
   */
  readonly compensateIfInterrupted?: boolean;
}

/** Ledger callbacks; the caller decides how progress is persisted. */
export interface SagaHooks<N extends string> {
  stepStarted(name: N): Promise<void>;
  stepCompleted(name: N): Promise<void>;
  compensating(failedStep: N, cause: unknown): Promise<void>;
}

export type SagaOutcome<N extends string> =
  | { readonly ok: true }
  | {
      readonly ok: false;
      readonly failedStep: N;
      readonly cause: unknown;
      readonly compensation: CompensationOutcome;
    };

/** Rejects with StepTimeoutError when `work` has not settled within `ms`. */
export async function withTimeout<T>(step: string, ms: number, work: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StepTimeoutError(step, ms)), ms);
  });
  try {
    return await Promise.race([work(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Interprets an ordered step list. On failure the completed steps are
 * compensated in strict reverse order; a failing compensation is logged and
 * the remaining ones still run.
 */
export class SagaRunner<C, N extends string> {
  constructor(
    private readonly steps: readonly SagaStep<C, N>[],
    private readonly stepTimeoutMs: number,
  ) {}

  async run(ctx: C, hooks: SagaHooks<N>): Promise<SagaOutcome<N>> {
    const completed: N[] = [];

    for (const step of this.steps) {
      if (step.when && !step.when(ctx)) continue;
      try {
        await hooks.stepStarted(step.name);
        await withTimeout(step.name, this.stepTimeoutMs, () => step.run(ctx));
        // a ledger write that fails after this point still compensates the step
        completed.push(step.name);
        await hooks.stepCompleted(step.name);
      } catch (cause) {
        await hooks.compensating(step.name, cause).catch((err: unknown) => {
          console.error(`[saga] could not record compensation of ${step.name}`, err);
        });
        const compensation = await this.compensate(ctx, completed);
        return { ok: false, failedStep: step.name, cause, compensation };
      }
    }
    return { ok: true };
  }

  /**
   * Compensates from a persisted ledger. `inFlight` is the step that was
   * running when the process stopped; it is undone only when its
   * compensation is safe without knowing whether it ran.
   */
  async compensateLedger(ctx: C, completed: readonly N[], inFlight?: N): Promise<CompensationOutcome> {
    const interrupted = this.steps.find((s) => s.name === inFlight);
    const undo =
      interrupted?.compensateIfInterrupted && !completed.includes(interrupted.name)
        ? [...completed, interrupted.name]
        : completed;
    return this.compensate(ctx, undo);
  }

  private async compensate(ctx: C, completed: readonly N[]): Promise<CompensationOutcome> {
    let clean = true;
    for (const name of [...completed].reverse()) {
      const step = this.steps.find((s) => s.name === name);
      const undo = step?.compensate;
      if (!undo) continue;
      try {
        await withTimeout(`${name} (compensation)`, this.stepTimeoutMs, () => undo(ctx));
      } catch (err) {
        clean = false;
        console.error(`[saga] compensation of ${name} failed`, err);
      }
    }
    return clean ? 'COMPENSATED' : 'PARTIALLY_COMPENSATED';
  }
}
