/**
 * Saga
 *
 * Runs an ordered list of remote steps and records each one in a log. When a
 * step fails, the compensations of every step that was entered (including
 * the failing one, which may have partially applied) run in reverse order.
 * Steps that share a compensation id are compensated once.
 */

import type { Logger } from 'pino';

/**
 * One step of a saga.
 */
export interface SagaStep<T> {
  name: string;
  run: () => Promise<T>;
  /** Undo for this step; omitted for steps that must never be undone */
  compensation?: {
    id: string;
    run: () => Promise<void>;
  };
}

export type SagaLogStatus =
  | 'completed'
  | 'failed'
  | 'compensated'
  | 'compensation_failed';

/**
 * Entry in the saga log.
 */
export interface SagaLogEntry {
  step: string;
  status: SagaLogStatus;
  at: string;
  durationMs: number;
  error?: string;
}

interface EnteredStep {
  name: string;
  compensation: NonNullable<SagaStep<unknown>['compensation']> | undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class Saga {
  private readonly entered: EnteredStep[] = [];
  private readonly entries: SagaLogEntry[] = [];

  constructor(
    readonly name: string,
    private readonly logger: Logger
  ) {}

  get log(): readonly SagaLogEntry[] {
    return this.entries;
  }

  /**
   * Execute a step, recording its outcome.
   * Failures are logged and re-thrown unchanged.
   */
  async run<T>(step: SagaStep<T>): Promise<T> {
    this.entered.push({ name: step.name, compensation: step.compensation });
    const start = Date.now();

    try {
      const result = await step.run();
      this.record(step.name, 'completed', start);
      return result;
    } catch (error) {
      this.record(step.name, 'failed', start, error);
      this.logger.warn({ saga: this.name, step: step.name, err: error }, 'Saga step failed');
      throw error;
    }
  }

  /**
   * Run compensations for entered steps in reverse order.
   * Never throws: compensation failures are logged and recorded.
   */
  async compensate(): Promise<void> {
    const done = new Set<string>();

    for (const step of [...this.entered].reverse()) {
      const compensation = step.compensation;
      if (!compensation || done.has(compensation.id)) {
        continue;
      }
      done.add(compensation.id);

      const start = Date.now();
      try {
        await compensation.run();
        this.record(step.name, 'compensated', start);
        this.logger.info({ saga: this.name, step: step.name }, 'Saga step compensated');
      } catch (error) {
        this.record(step.name, 'compensation_failed', start, error);
        this.logger.error(
          { saga: this.name, step: step.name, err: error },
          'Saga compensation failed'
        );
      }
    }
  }

  private record(step: string, status: SagaLogStatus, start: number, error?: unknown): void {
    const entry: SagaLogEntry = {
      step,
      status,
      at: new Date().toISOString(),
      durationMs: Date.now() - start,
    };
    if (error !== undefined) {
      entry.error = messageOf(error);
    }
    this.entries.push(entry);
  }
}
