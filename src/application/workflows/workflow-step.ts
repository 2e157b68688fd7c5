import { STEP_DEFAULTS, StepStatus } from '../../domain/index.js';
import type { StepData, StepHandler, StepSnapshot, StepSpec } from '../../domain/index.js';
import { InvalidStepTransitionError } from '../errors.js';

/**
 * One unit of workflow work and its retry bookkeeping.
 *
 *   pending ──start──▶ running ──complete──▶ completed
 *                        │
 *                        └──fail──▶ failed ──retry──▶ retrying ──start──▶ running
 *                                     │
 *                                     └──skip──▶ skipped
 *
 * `retry` is only legal while `current_retry < retry_count`, so
 * `current_retry` never exceeds the budget.
 */
export class WorkflowStep {
  readonly step_id: string;
  readonly name: string;
  readonly handler: StepHandler;
  readonly input_data: StepData;
  readonly timeout_seconds: number;
  readonly retry_count: number;
  readonly retry_delay_seconds: number;
  readonly required: boolean;

  private state: StepStatus = StepStatus.PENDING;
  private output: StepData | null = null;
  private error: string | null = null;
  private startedAt: Date | null = null;
  private completedAt: Date | null = null;
  private retries = 0;

  constructor(spec: StepSpec) {
    this.step_id = spec.step_id;
    this.name = spec.name;
    this.handler = spec.handler;
    this.input_data = { ...spec.input_data };
    this.timeout_seconds = spec.timeout_seconds ?? STEP_DEFAULTS.timeout_seconds;
    this.retry_count = spec.retry_count ?? STEP_DEFAULTS.retry_count;
    this.retry_delay_seconds = spec.retry_delay_seconds ?? STEP_DEFAULTS.retry_delay_seconds;
    this.required = spec.required ?? STEP_DEFAULTS.required;
  }

  get status(): StepStatus {
    return this.state;
  }

  get output_data(): StepData | null {
    return this.output;
  }

  get error_message(): string | null {
    return this.error;
  }

  get current_retry(): number {
    return this.retries;
  }

  get canRetry(): boolean {
    return this.state === StepStatus.FAILED && this.retries < this.retry_count;
  }

  start(): void {
    this.transition([StepStatus.PENDING, StepStatus.RETRYING], StepStatus.RUNNING);
    this.startedAt = new Date();
    this.completedAt = null;
    this.error = null;
  }

  complete(output: StepData): void {
    this.transition([StepStatus.RUNNING], StepStatus.COMPLETED);
    this.output = output;
    this.completedAt = new Date();
  }

  fail(message: string): void {
    this.transition([StepStatus.RUNNING], StepStatus.FAILED);
    this.error = message;
    this.completedAt = new Date();
  }

  retry(): void {
    if (!this.canRetry) {
      throw new InvalidStepTransitionError(this.step_id, this.state, StepStatus.RETRYING);
    }
    this.state = StepStatus.RETRYING;
    this.retries++;
  }

  skip(reason: string): void {
    this.transition([StepStatus.PENDING, StepStatus.FAILED], StepStatus.SKIPPED);
    this.error = reason;
    this.completedAt ??= new Date();
  }

  durationSeconds(): number | null {
    if (this.startedAt === null || this.completedAt === null) return null;
    return (this.completedAt.getTime() - this.startedAt.getTime()) / 1000;
  }

  toJSON(): StepSnapshot {
    return {
      step_id: this.step_id,
      name: this.name,
      handler: this.handler,
      status: this.state,
      input_data: { ...this.input_data },
      output_data: this.output === null ? null : { ...this.output },
      error_message: this.error,
      started_at: this.startedAt?.toISOString() ?? null,
      completed_at: this.completedAt?.toISOString() ?? null,
      duration_seconds: this.durationSeconds(),
      timeout_seconds: this.timeout_seconds,
      current_retry: this.retries,
      max_retries: this.retry_count,
      retry_delay_seconds: this.retry_delay_seconds,
      required: this.required,
    };
  }

  private transition(from: readonly StepStatus[], to: StepStatus): void {
    if (!from.includes(this.state)) {
      throw new InvalidStepTransitionError(this.step_id, this.state, to);
    }
    this.state = to;
  }
}
