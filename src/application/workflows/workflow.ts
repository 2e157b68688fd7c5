import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { EventType, StepStatus, WorkflowStatus, createEvent, isTerminalStatus } from '../../domain/index.js';
import type {
  EventData,
  EventType as EventTypeTag,
  StepData,
  WorkflowDefinition,
  WorkflowSnapshot,
} from '../../domain/index.js';
import { InvalidWorkflowTransitionError, errorMessage } from '../errors.js';
import type { EventPublisher } from '../event-bus.js';
import { runWithDeadline, sleep } from './timing.js';
import { WorkflowStep } from './workflow-step.js';

export interface StepExecutionContext {
  workflow_id: string;
  step_id: string;
  user_id: number;
  /** Aborts on step timeout and on workflow cancellation. */
  signal: AbortSignal;
}

export type StepExecutor = (step: WorkflowStep, input: StepData, context: StepExecutionContext) => Promise<StepData>;

export interface WorkflowOptions {
  definition: WorkflowDefinition;
  userId: number;
  executor: StepExecutor;
  publisher: EventPublisher;
  cellId: string;
  logger: Logger;
  initialContext?: StepData;
  workflowId?: string;
  /** Called synchronously after every workflow or step state change. */
  onTransition?: (workflow: Workflow) => void;
}

type StepOutcome = 'completed' | 'skipped' | 'failed' | 'interrupted';

const TERMINAL_EVENTS: Partial<Record<WorkflowStatus, EventTypeTag>> = {
  [WorkflowStatus.COMPLETED]: EventType.WORKFLOW_COMPLETED,
  [WorkflowStatus.FAILED]: EventType.WORKFLOW_FAILED,
  [WorkflowStatus.CANCELLED]: EventType.WORKFLOW_CANCELLED,
};

/**
 * An ordered run of steps on behalf of one user.
 *
 * Steps execute strictly in sequence; each completed step's output is
 * merged into the shared context that later steps receive. The
 * execution path started by `start()` is the only writer of the step
 * states; `pause`, `resume` and `cancel` only flip the workflow status
 * and wake or abort that path.
 */
export class Workflow {
  readonly workflow_id: string;
  readonly workflow_type: string;
  readonly user_id: number;
  readonly created_at = new Date();
  readonly steps: readonly WorkflowStep[];

  private state: WorkflowStatus = WorkflowStatus.PENDING;
  private ctx: StepData;
  private stepIndex = 0;
  private startedAt: Date | null = null;
  private completedAt: Date | null = null;
  private error: string | null = null;

  private readonly executor: StepExecutor;
  private readonly publisher: EventPublisher;
  private readonly cellId: string;
  private readonly log: Logger;
  private readonly onTransition: ((workflow: Workflow) => void) | undefined;
  private readonly abort = new AbortController();
  private readonly inFlightEvents = new Set<Promise<void>>();
  private readonly done: Promise<void>;
  private markDone: () => void = () => {};
  private wake: (() => void) | null = null;

  constructor(options: WorkflowOptions) {
    this.workflow_id = options.workflowId ?? randomUUID();
    this.workflow_type = options.definition.workflow_type;
    this.user_id = options.userId;
    this.steps = options.definition.steps.map((spec) => new WorkflowStep(spec));
    this.ctx = { ...options.initialContext };
    this.executor = options.executor;
    this.publisher = options.publisher;
    this.cellId = options.cellId;
    this.onTransition = options.onTransition;
    this.log = options.logger.child({ component: 'workflow', workflow_id: this.workflow_id });
    this.done = new Promise<void>((resolve) => {
      this.markDone = resolve;
    });
  }

  get status(): WorkflowStatus {
    return this.state;
  }

  get context(): Readonly<StepData> {
    return this.ctx;
  }

  get current_step_index(): number {
    return this.stepIndex;
  }

  get error_message(): string | null {
    return this.error;
  }

  get completed_at(): Date | null {
    return this.completedAt;
  }

  isFinished(): boolean {
    return isTerminalStatus(this.state);
  }

  /** Throws `InvalidWorkflowTransitionError` unless the workflow is pending. */
  start(initialContext: StepData = {}): void {
    if (this.state !== WorkflowStatus.PENDING) {
      throw new InvalidWorkflowTransitionError(this.workflow_id, this.state, 'start');
    }
    this.ctx = { ...this.ctx, ...initialContext };
    this.state = WorkflowStatus.RUNNING;
    this.startedAt = new Date();
    this.log.info({ workflow_type: this.workflow_type, steps: this.steps.length }, 'Workflow started');
    this.emit(EventType.WORKFLOW_STARTED, {
      workflow_type: this.workflow_type,
      total_steps: this.steps.length,
    });
    this.notify();

    void this.run().catch((err: unknown) => {
      this.log.error({ err }, 'Workflow execution crashed');
      this.finish(WorkflowStatus.FAILED, errorMessage(err));
    });
  }

  /** Takes effect between steps. Returns false unless running. */
  pause(): boolean {
    if (this.state !== WorkflowStatus.RUNNING) return false;
    this.state = WorkflowStatus.PAUSED;
    this.log.info('Workflow paused');
    this.notify();
    return true;
  }

  resume(): boolean {
    if (this.state !== WorkflowStatus.PAUSED) return false;
    this.state = WorkflowStatus.RUNNING;
    this.log.info('Workflow resumed');
    this.notify();
    this.wakeLoop();
    return true;
  }

  /**
   * Terminal immediately. An in-flight step sees its signal abort and
   * no further step is scheduled.
   */
  cancel(reason = 'Cancelled by request'): boolean {
    if (this.state !== WorkflowStatus.RUNNING && this.state !== WorkflowStatus.PAUSED) return false;
    this.finish(WorkflowStatus.CANCELLED, reason);
    this.abort.abort();
    this.wakeLoop();
    return true;
  }

  /** Resolves once the workflow reaches a terminal status. Never rejects. */
  waitForCompletion(): Promise<void> {
    return this.done;
  }

  /** Waits for lifecycle events still being published. */
  async flushEvents(): Promise<void> {
    await Promise.all([...this.inFlightEvents]);
  }

  progressPercentage(): number {
    if (this.steps.length === 0) return 100;
    const completed = this.steps.filter((s) => s.status === StepStatus.COMPLETED).length;
    return Math.round((completed / this.steps.length) * 10_000) / 100;
  }

  durationSeconds(): number | null {
    if (this.startedAt === null) return null;
    const end = this.completedAt ?? new Date();
    return (end.getTime() - this.startedAt.getTime()) / 1000;
  }

  toJSON(): WorkflowSnapshot {
    return {
      workflow_id: this.workflow_id,
      workflow_type: this.workflow_type,
      user_id: this.user_id,
      status: this.state,
      created_at: this.created_at.toISOString(),
      started_at: this.startedAt?.toISOString() ?? null,
      completed_at: this.completedAt?.toISOString() ?? null,
      duration_seconds: this.durationSeconds(),
      current_step_index: this.stepIndex,
      total_steps: this.steps.length,
      progress_percentage: this.progressPercentage(),
      context: { ...this.ctx },
      error_message: this.error,
      steps: this.steps.map((s) => s.toJSON()),
    };
  }

  // ─── Execution ──────────────────────────────────────────────────

  private async run(): Promise<void> {
    while (this.stepIndex < this.steps.length) {
      await this.waitWhilePaused();
      if (this.isFinished()) return;

      const step = this.steps[this.stepIndex];
      if (step === undefined) break;

      const outcome = await this.executeStep(step);
      if (outcome === 'interrupted' || this.isFinished()) return;

      if (outcome === 'failed') {
        this.finish(
          WorkflowStatus.FAILED,
          `Required step ${step.step_id} failed: ${step.error_message ?? 'unknown error'}`,
        );
        return;
      }

      if (outcome === 'completed' && step.output_data !== null) {
        this.ctx = { ...this.ctx, ...step.output_data };
      }
      this.stepIndex++;
      this.notify();
    }

    this.finish(WorkflowStatus.COMPLETED, null);
  }

  /** Runs attempts until success, budget exhaustion or cancellation. */
  private async executeStep(step: WorkflowStep): Promise<StepOutcome> {
    for (;;) {
      step.start();
      this.notify();
      this.emitStep(step, 'started');

      const input: StepData = {
        ...step.input_data,
        ...this.ctx,
        workflow_id: this.workflow_id,
        step_id: step.step_id,
      };

      try {
        const output = await runWithDeadline(
          step.step_id,
          step.timeout_seconds * 1000,
          this.abort.signal,
          (signal) => this.executor(step, input, {
            workflow_id: this.workflow_id,
            step_id: step.step_id,
            user_id: this.user_id,
            signal,
          }),
        );
        step.complete(output);
        this.notify();
        this.emitStep(step, 'completed');
        this.log.info({ step_id: step.step_id }, 'Step completed');
        return 'completed';
      } catch (err: unknown) {
        step.fail(errorMessage(err));
        this.notify();
        if (this.isFinished()) return 'interrupted';

        this.emitStep(step, 'failed');
        this.log.warn(
          { err, step_id: step.step_id, attempt: step.current_retry + 1 },
          'Step attempt failed',
        );
      }

      if (step.canRetry) {
        step.retry();
        this.notify();
        const waited = await sleep(step.retry_delay_seconds * 1000, this.abort.signal);
        if (!waited || this.isFinished()) return 'interrupted';
        continue;
      }

      if (step.required) return 'failed';

      step.skip(`Failed but optional: ${step.error_message ?? 'unknown error'}`);
      this.notify();
      this.emitStep(step, 'skipped');
      return 'skipped';
    }
  }

  private async waitWhilePaused(): Promise<void> {
    while (this.state === WorkflowStatus.PAUSED) {
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }
  }

  private wakeLoop(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }

  private finish(status: WorkflowStatus, error: string | null): void {
    if (this.isFinished()) return;
    this.state = status;
    this.error = error;
    this.completedAt = new Date();

    const eventType = TERMINAL_EVENTS[status];
    if (eventType !== undefined) {
      this.emit(eventType, {
        workflow_type: this.workflow_type,
        status,
        error_message: error,
        current_step_index: this.stepIndex,
        duration_seconds: this.durationSeconds(),
      });
    }

    this.log.info({ status, error_message: error }, 'Workflow finished');
    this.notify();
    this.markDone();
  }

  // ─── Lifecycle events ───────────────────────────────────────────

  private emitStep(step: WorkflowStep, transition: 'started' | 'completed' | 'failed' | 'skipped'): void {
    this.emit(EventType.WORKFLOW_STEP_COMPLETED, {
      step_id: step.step_id,
      step_name: step.name,
      step_status: transition,
      current_retry: step.current_retry,
      error_message: step.error_message,
    });
  }

  /** Background publish; failures are logged and never touch workflow state. */
  private emit(eventType: EventTypeTag, data: EventData): void {
    const event = createEvent({
      event_type: eventType,
      user_id: this.user_id,
      cell_id: this.cellId,
      correlation_id: this.workflow_id,
      data: { workflow_id: this.workflow_id, ...data },
      metadata: { component: 'workflow-engine', workflow_type: this.workflow_type },
    });

    const publish = this.publisher.publish(event).then(
      (published) => {
        if (!published) this.log.warn({ event_type: eventType }, 'Lifecycle event was not published');
      },
      (err: unknown) => {
        this.log.warn({ err, event_type: eventType }, 'Failed to publish lifecycle event');
      },
    );
    this.inFlightEvents.add(publish);
    void publish.finally(() => this.inFlightEvents.delete(publish));
  }

  private notify(): void {
    if (this.onTransition === undefined) return;
    try {
      this.onTransition(this);
    } catch (err: unknown) {
      this.log.warn({ err }, 'Workflow transition observer failed');
    }
  }
}
