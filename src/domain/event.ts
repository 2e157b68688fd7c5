import { randomUUID } from 'node:crypto';

/**
 * Core domain types for the job-automation event model.
 *
 * These types define the canonical shape of an event as it flows
 * between agents and the workflow engine. They carry no framework
 * dependencies.
 */

/** Bumped whenever a tag is added, renamed or removed. */
export const EVENT_CATALOG_VERSION = 1;

/** Default logical shard label. */
export const DEFAULT_CELL_ID = 'cell-001';

/** Default topic namespace; topic = `<namespace>.<event_type>`. */
export const DEFAULT_EVENT_NAMESPACE = 'resume-automation';

/**
 * Closed catalog of event tags.
 *
 * The tag value doubles as the topic suffix, so renaming a value is a
 * wire-breaking change.
 */
export const EventType = {
  // Discovery
  JOB_DISCOVERY_REQUESTED: 'job.discovery.requested',
  JOB_DISCOVERED: 'job.discovered',

  // Analysis
  JOB_ANALYSIS_REQUESTED: 'job.analysis.requested',
  JOB_ANALYZED: 'job.analyzed',

  // Generation
  RESUME_GENERATION_REQUESTED: 'resume.generation.requested',
  RESUME_GENERATED: 'resume.generated',

  // Optimization
  RESUME_OPTIMIZATION_REQUESTED: 'resume.optimization.requested',
  RESUME_OPTIMIZED: 'resume.optimized',

  // Application status
  APPLICATION_SUBMITTED: 'application.submitted',
  APPLICATION_RESPONSE_RECEIVED: 'application.response.received',
  APPLICATION_STATUS_UPDATED: 'application.status.updated',

  // Workflow lifecycle
  WORKFLOW_STARTED: 'workflow.started',
  WORKFLOW_STEP_COMPLETED: 'workflow.step.completed',
  WORKFLOW_COMPLETED: 'workflow.completed',
  WORKFLOW_FAILED: 'workflow.failed',
  WORKFLOW_CANCELLED: 'workflow.cancelled',

  // Agent task replies
  AGENT_TASK_COMPLETED: 'agent.task.completed',

  // System / health
  AGENT_HEALTH_CHECK: 'agent.health.check',
  CELL_STATUS_UPDATE: 'cell.status.update',
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export type EventGroup =
  | 'discovery'
  | 'analysis'
  | 'generation'
  | 'optimization'
  | 'application_status'
  | 'workflow'
  | 'agent_task'
  | 'system';

export const EVENT_GROUPS: Readonly<Record<EventGroup, readonly EventType[]>> = {
  discovery: [EventType.JOB_DISCOVERY_REQUESTED, EventType.JOB_DISCOVERED],
  analysis: [EventType.JOB_ANALYSIS_REQUESTED, EventType.JOB_ANALYZED],
  generation: [EventType.RESUME_GENERATION_REQUESTED, EventType.RESUME_GENERATED],
  optimization: [EventType.RESUME_OPTIMIZATION_REQUESTED, EventType.RESUME_OPTIMIZED],
  application_status: [
    EventType.APPLICATION_SUBMITTED,
    EventType.APPLICATION_RESPONSE_RECEIVED,
    EventType.APPLICATION_STATUS_UPDATED,
  ],
  workflow: [
    EventType.WORKFLOW_STARTED,
    EventType.WORKFLOW_STEP_COMPLETED,
    EventType.WORKFLOW_COMPLETED,
    EventType.WORKFLOW_FAILED,
    EventType.WORKFLOW_CANCELLED,
  ],
  agent_task: [EventType.AGENT_TASK_COMPLETED],
  system: [EventType.AGENT_HEALTH_CHECK, EventType.CELL_STATUS_UPDATE],
};

export const EVENT_TYPES: readonly EventType[] = Object.values(EventType);

export function isEventType(value: unknown): value is EventType {
  return EVENT_TYPES.some((type) => type === value);
}

/** Free-form key/value payload attached to every event. */
export type EventData = Record<string, unknown>;

/** Optional metadata for routing, tracing, or severity. */
export type EventMetadata = Record<string, unknown>;

/**
 * Canonical Event entity.
 *
 * `event_id` is assigned at construction and never reused. Instances
 * are frozen; a logical update is a new event sharing `correlation_id`.
 */
export interface Event {
  readonly event_id: string;
  readonly event_type: EventType;
  readonly timestamp: string; // ISO-8601
  readonly user_id: number;
  readonly cell_id: string;
  readonly correlation_id: string | null;
  readonly data: Readonly<EventData>;
  readonly metadata: Readonly<EventMetadata>;
}

export interface NewEvent {
  event_type: EventType;
  user_id: number;
  cell_id?: string;
  correlation_id?: string | null;
  data?: EventData;
  metadata?: EventMetadata;
}

/** Builds a frozen event with a fresh id and timestamp. */
export function createEvent(input: NewEvent): Event {
  return freezeEvent({
    event_id: randomUUID(),
    event_type: input.event_type,
    timestamp: new Date().toISOString(),
    user_id: input.user_id,
    cell_id: input.cell_id ?? DEFAULT_CELL_ID,
    correlation_id: input.correlation_id ?? null,
    data: { ...input.data },
    metadata: { ...input.metadata },
  });
}

export function freezeEvent(event: Event): Event {
  return Object.freeze({
    ...event,
    data: Object.freeze({ ...event.data }),
    metadata: Object.freeze({ ...event.metadata }),
  });
}

export function topicFor(namespace: string, eventType: EventType): string {
  return `${namespace}.${eventType}`;
}

/** Partition key; all events of one user land on one partition per topic. */
export function partitionKeyFor(userId: number): string {
  return `user_${userId}`;
}
