import type { Logger } from 'pino';
import { WorkflowStatus, isTerminalStatus } from '../../domain/index.js';
import type {
  StepData,
  WorkflowDefinition,
  WorkflowSnapshot,
  WorkflowTemplate,
} from '../../domain/index.js';
import { UnknownStepFunctionError, UnknownWorkflowTypeError } from '../errors.js';
import type { EventPublisher } from '../event-bus.js';
import { DEFAULT_WORKFLOW_DEFINITIONS, WorkflowType, buildCatalog, toTemplate } from './catalog.js';
import { NoopCheckpointStore } from './checkpoint-store.js';
import type { CheckpointStore } from './checkpoint-store.js';
import type { StepDispatcher } from './step-dispatcher.js';
import { Workflow } from './workflow.js';

export const DEFAULT_MAX_COMPLETED_WORKFLOWS = 100;
export const DEFAULT_CLEANUP_INTERVAL_MS = 3_600_000;
const RECENT_WORKFLOWS_LIMIT = 10;

export interface WorkflowEngineOptions {
  publisher: EventPublisher;
  dispatcher: StepDispatcher;
  cellId: string;
  logger: Logger;
  definitions?: readonly WorkflowDefinition[];
  maxCompletedWorkflows?: number;
  cleanupIntervalMs?: number;
  checkpoints?: CheckpointStore;
}

export interface WorkflowFilter {
  user_id?: number;
  status?: WorkflowStatus;
  workflow_type?: string;
}

export interface UserWorkflowSummary {
  user_id: number;
  total_workflows: number;
  /** Not yet terminal: pending, running and paused together. */
  active: number;
  pending: number;
  running: number;
  paused: number;
  completed: number;
  failed: number;
  cancelled: number;
  average_duration_seconds: number;
  recent_workflows: WorkflowSnapshot[];
}

export interface EngineStats {
  cell_id: string;
  active_workflows: number;
  completed_workflows: number;
  total_created: number;
  total_completed: number;
  total_failed: number;
  total_cancelled: number;
  success_rate_percentage: number;
  average_execution_seconds: number;
  active_status_breakdown: Record<WorkflowStatus, number>;
  workflow_templates: string[];
}

interface ArchivedWorkflow {
  workflow: Workflow;
  /** Archive order; breaks ties between equal completion times. */
  seq: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Owns every workflow in the process.
 *
 * Workflows live in the active map until they reach a terminal status,
 * then move to the bounded history. Node runs all of this on one event
 * loop, and every read or write of the two maps is synchronous, so a
 * lookup never sees a workflow halfway between them. Counters only
 * change at that move.
 */
export class WorkflowEngine {
  readonly cellId: string;

  private readonly publisher: EventPublisher;
  private readonly dispatcher: StepDispatcher;
  private readonly log: Logger;
  private readonly catalog: ReadonlyMap<string, WorkflowDefinition>;
  private readonly maxCompleted: number;
  private readonly cleanupIntervalMs: number;
  private readonly checkpoints: CheckpointStore;

  private readonly active = new Map<string, Workflow>();
  private readonly history = new Map<string, ArchivedWorkflow>();
  private archiveSeq = 0;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  private totalCreated = 0;
  private totalCompleted = 0;
  private totalFailed = 0;
  private totalCancelled = 0;
  private totalExecutionSeconds = 0;

  constructor(options: WorkflowEngineOptions) {
    this.publisher = options.publisher;
    this.dispatcher = options.dispatcher;
    this.cellId = options.cellId;
    this.log = options.logger.child({ component: 'workflow-engine' });
    this.catalog = buildCatalog(options.definitions ?? DEFAULT_WORKFLOW_DEFINITIONS);
    this.maxCompleted = options.maxCompletedWorkflows ?? DEFAULT_MAX_COMPLETED_WORKFLOWS;
    this.cleanupIntervalMs = options.cleanupIntervalMs ?? DEFAULT_CLEANUP_INTERVAL_MS;
    this.checkpoints = options.checkpoints ?? new NoopCheckpointStore();

    for (const definition of this.catalog.values()) {
      for (const step of definition.steps) {
        if (step.handler.kind === 'function' && !this.dispatcher.hasFunction(step.handler.name)) {
          throw new UnknownStepFunctionError(step.handler.name, definition.workflow_type);
        }
      }
    }
  }

  // ─── Lifecycle ──────────────────────────────────────────────────

  /** Starts the periodic history sweep. */
  start(): void {
    if (this.sweepTimer !== null) return;
    this.sweepTimer = setInterval(() => this.enforceHistoryCap(), this.cleanupIntervalMs);
    this.sweepTimer.unref();
    this.log.info(
      { max_completed_workflows: this.maxCompleted, cleanup_interval_ms: this.cleanupIntervalMs },
      'Workflow engine started',
    );
  }

  /** Stops the sweep and waits for queued lifecycle events. Running workflows are left as they are. */
  async close(): Promise<void> {
    if (this.sweepTimer !== null) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    await Promise.all([...this.allWorkflows()].map((w) => w.flushEvents()));
    this.log.info('Workflow engine stopped');
  }

  // ─── Commands ───────────────────────────────────────────────────

  /** Instantiates a workflow without starting it. */
  createWorkflow(workflowType: string, userId: number, initialContext: StepData = {}): string {
    const definition = this.catalog.get(workflowType);
    if (definition === undefined) {
      throw new UnknownWorkflowTypeError(workflowType);
    }

    const workflow = new Workflow({
      definition,
      userId,
      executor: this.dispatcher.execute,
      publisher: this.publisher,
      cellId: this.cellId,
      logger: this.log,
      initialContext,
      onTransition: (w) => this.onTransition(w),
    });
    this.active.set(workflow.workflow_id, workflow);
    this.totalCreated++;
    this.log.info({ workflow_id: workflow.workflow_id, workflow_type: workflowType, user_id: userId }, 'Workflow created');
    return workflow.workflow_id;
  }

  /**
   * Returns false when the id is unknown. Throws
   * `InvalidWorkflowTransitionError` when the workflow is not pending.
   */
  startWorkflow(workflowId: string, initialContext: StepData = {}): boolean {
    const workflow = this.active.get(workflowId);
    if (workflow === undefined) {
      this.log.warn({ workflow_id: workflowId }, 'Workflow not found');
      return false;
    }
    workflow.start(initialContext);
    return true;
  }

  /** The single external entry point: returns as soon as the workflow is running. */
  createAndStartWorkflow(workflowType: string, userId: number, initialContext: StepData = {}): string {
    const workflowId = this.createWorkflow(workflowType, userId, initialContext);
    this.startWorkflow(workflowId);
    return workflowId;
  }

  pauseWorkflow(workflowId: string): boolean {
    return this.active.get(workflowId)?.pause() ?? false;
  }

  resumeWorkflow(workflowId: string): boolean {
    return this.active.get(workflowId)?.resume() ?? false;
  }

  cancelWorkflow(workflowId: string, reason?: string): boolean {
    return this.active.get(workflowId)?.cancel(reason) ?? false;
  }

  startJobSearchWorkflow(userId: number, searchTerms: string[], location = 'Remote'): string {
    return this.createAndStartWorkflow(WorkflowType.JOB_APPLICATION, userId, {
      search_terms: searchTerms,
      location,
      workflow_trigger: 'user_initiated',
    });
  }

  startQuickResumeWorkflow(userId: number, jobId: string): string {
    return this.createAndStartWorkflow(WorkflowType.QUICK_RESUME, userId, {
      job_id: jobId,
      workflow_trigger: 'job_specific',
    });
  }

  startOptimizationWorkflow(userId: number): string {
    return this.createAndStartWorkflow(WorkflowType.OPTIMIZATION, userId, {
      workflow_trigger: 'optimization_request',
    });
  }

  // ─── Queries ────────────────────────────────────────────────────

  getWorkflow(workflowId: string): Workflow | null {
    return this.active.get(workflowId) ?? this.history.get(workflowId)?.workflow ?? null;
  }

  getWorkflowStatus(workflowId: string): WorkflowSnapshot | null {
    return this.getWorkflow(workflowId)?.toJSON() ?? null;
  }

  /** Newest first. */
  listWorkflows(filter: WorkflowFilter = {}): WorkflowSnapshot[] {
    return [...this.allWorkflows()]
      .filter((w) =>
        (filter.user_id === undefined || w.user_id === filter.user_id)
        && (filter.status === undefined || w.status === filter.status)
        && (filter.workflow_type === undefined || w.workflow_type === filter.workflow_type))
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map((w) => w.toJSON());
  }

  getUserWorkflows(userId: number): UserWorkflowSummary {
    const workflows = this.listWorkflows({ user_id: userId });
    const count = (status: WorkflowStatus): number => workflows.filter((w) => w.status === status).length;
    const durations = workflows
      .filter((w) => w.status === WorkflowStatus.COMPLETED && w.duration_seconds !== null)
      .map((w) => w.duration_seconds ?? 0);

    return {
      user_id: userId,
      total_workflows: workflows.length,
      active: workflows.filter((w) => !isTerminalStatus(w.status)).length,
      pending: count(WorkflowStatus.PENDING),
      running: count(WorkflowStatus.RUNNING),
      paused: count(WorkflowStatus.PAUSED),
      completed: count(WorkflowStatus.COMPLETED),
      failed: count(WorkflowStatus.FAILED),
      cancelled: count(WorkflowStatus.CANCELLED),
      average_duration_seconds: durations.length === 0
        ? 0
        : round2(durations.reduce((sum, d) => sum + d, 0) / durations.length),
      recent_workflows: workflows.slice(0, RECENT_WORKFLOWS_LIMIT),
    };
  }

  getEngineStats(): EngineStats {
    const breakdown: Record<WorkflowStatus, number> = {
      pending: 0,
      running: 0,
      paused: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
    };
    for (const workflow of this.active.values()) {
      breakdown[workflow.status]++;
    }
    const terminal = this.totalCompleted + this.totalFailed + this.totalCancelled;

    return {
      cell_id: this.cellId,
      active_workflows: this.active.size,
      completed_workflows: this.history.size,
      total_created: this.totalCreated,
      total_completed: this.totalCompleted,
      total_failed: this.totalFailed,
      total_cancelled: this.totalCancelled,
      success_rate_percentage: terminal === 0 ? 0 : round2((this.totalCompleted / terminal) * 100),
      average_execution_seconds: terminal === 0 ? 0 : round2(this.totalExecutionSeconds / terminal),
      active_status_breakdown: breakdown,
      workflow_templates: [...this.catalog.keys()],
    };
  }

  getWorkflowTemplates(): Record<string, WorkflowTemplate> {
    return Object.fromEntries([...this.catalog.values()].map((d) => [d.template_id, toTemplate(d)]));
  }

  // ─── Monitoring ─────────────────────────────────────────────────

  private *allWorkflows(): IterableIterator<Workflow> {
    yield* this.active.values();
    for (const entry of this.history.values()) yield entry.workflow;
  }

  /** Checkpoints every transition and archives workflows once terminal. */
  private onTransition(workflow: Workflow): void {
    const snapshot = workflow.toJSON();
    void this.checkpoints.save(snapshot).catch((err: unknown) => {
      this.log.warn({ err, workflow_id: workflow.workflow_id }, 'Checkpoint save failed');
    });

    if (workflow.isFinished() && this.active.has(workflow.workflow_id)) {
      this.archive(workflow, snapshot.duration_seconds);
    }
  }

  private archive(workflow: Workflow, durationSeconds: number | null): void {
    this.active.delete(workflow.workflow_id);
    this.history.set(workflow.workflow_id, { workflow, seq: this.archiveSeq++ });

    switch (workflow.status) {
      case WorkflowStatus.COMPLETED:
        this.totalCompleted++;
        break;
      case WorkflowStatus.FAILED:
        this.totalFailed++;
        break;
      case WorkflowStatus.CANCELLED:
        this.totalCancelled++;
        break;
      default:
        break;
    }
    this.totalExecutionSeconds += durationSeconds ?? 0;

    this.log.info(
      { workflow_id: workflow.workflow_id, status: workflow.status, duration_seconds: durationSeconds },
      'Workflow archived',
    );
    this.enforceHistoryCap();
  }

  /** Evicts the oldest completions beyond the cap. */
  private enforceHistoryCap(): void {
    const excess = this.history.size - this.maxCompleted;
    if (excess <= 0) return;

    const oldest = [...this.history.entries()]
      .sort(([, a], [, b]) =>
        (a.workflow.completed_at?.getTime() ?? 0) - (b.workflow.completed_at?.getTime() ?? 0) || a.seq - b.seq)
      .slice(0, excess);
    for (const [workflowId] of oldest) {
      this.history.delete(workflowId);
    }
    this.log.debug({ evicted: oldest.length }, 'Workflow history trimmed');
  }
}
