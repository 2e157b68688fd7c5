import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { createEvent } from '../../domain/index.js';
import type { AgentRole, Event, EventData, EventMetadata, EventType } from '../../domain/index.js';
import type { EventBus } from '../event-bus.js';
import type { EventConsumer } from '../event-consumer.js';
import { buildAgentErrorEvent, buildTaskCompletedEvent, readStepRequest } from './task-replies.js';

export type AgentHealth = 'initializing' | 'healthy' | 'failed' | 'stopped';

/** Result of `processEvent`; becomes the step output when the event was a step request. */
export type AgentOutput = EventData;

export interface AgentStatus {
  agent_id: string;
  cell_id: string;
  role: AgentRole;
  status: AgentHealth;
  running: boolean;
  consumer_group_id: string;
  events_processed: number;
  events_failed: number;
  last_activity: string | null;
  subscribed_events: EventType[];
}

export interface AgentOptions {
  bus: EventBus;
  cellId: string;
  logger: Logger;
  agentId?: string;
}

export interface DerivedEvent {
  event_type: EventType;
  data: EventData;
  metadata?: EventMetadata;
}

/** Marks facts produced while serving a workflow step; downstream agents don't auto-chain on them. */
export const ORIGIN_WORKFLOW_KEY = 'origin_workflow_id';

/**
 * Base contract for every agent.
 *
 * Subclasses declare the event types they consume and implement
 * `processEvent`. Everything else (consumer lifecycle, counters,
 * failure isolation, diagnostics and step replies) lives here so it
 * behaves the same across agents.
 */
export abstract class BaseAgent {
  abstract readonly role: AgentRole;
  abstract readonly subscribedEvents: readonly EventType[];

  readonly agentId: string;
  readonly cellId: string;

  protected readonly bus: EventBus;
  protected readonly log: Logger;

  private consumer: EventConsumer | null = null;
  private running = false;
  private health: AgentHealth = 'initializing';
  private eventsProcessed = 0;
  private eventsFailed = 0;
  private lastActivity: Date | null = null;
  private release: (() => void) | null = null;

  constructor(options: AgentOptions, defaultRole: AgentRole) {
    this.bus = options.bus;
    this.cellId = options.cellId;
    this.agentId = options.agentId ?? `${defaultRole}-agent-${randomUUID().slice(0, 8)}`;
    this.log = options.logger.child({ component: 'agent', agent_id: this.agentId });
  }

  get consumerGroupId(): string {
    return `${this.cellId}-${this.role}-group`;
  }

  /** Domain logic for one event. Throwing marks the event failed. */
  protected abstract processEvent(event: Event): Promise<AgentOutput>;

  /**
   * Joins the consumer group and blocks in the consume loop until
   * `stop()`. An agent without subscriptions just stays up until then.
   */
  async start(): Promise<void> {
    if (this.running) {
      this.log.warn('Agent already running');
      return;
    }

    const stopped = new Promise<void>((resolve) => {
      this.release = resolve;
    });

    let consumer: EventConsumer | null = null;
    try {
      if (this.subscribedEvents.length > 0) {
        consumer = this.bus.createConsumer(this.consumerGroupId, this.subscribedEvents);
        for (const eventType of this.subscribedEvents) {
          consumer.registerHandler(eventType, (event) => this.dispatch(event));
        }
      }
    } catch (err: unknown) {
      this.health = 'failed';
      this.log.error({ err }, 'Agent failed to start');
      throw err;
    }

    this.consumer = consumer;
    this.running = true;
    this.health = 'healthy';
    this.log.info(
      { group: this.consumerGroupId, subscribed_events: this.subscribedEvents },
      'Agent started',
    );

    try {
      await (consumer === null ? stopped : consumer.consumeEvents());
    } catch (err: unknown) {
      this.running = false;
      this.health = 'failed';
      this.log.error({ err }, 'Agent consume loop failed');
      throw err;
    }
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.consumer?.stop();
    this.consumer = null;
    this.health = 'stopped';
    this.release?.();
    this.release = null;
    this.log.info('Agent stopped');
  }

  /** The only way an agent emits events. Never throws. */
  async publishEvent(event: Event): Promise<boolean> {
    return this.bus.publish(event);
  }

  getHealthStatus(): AgentStatus {
    return {
      agent_id: this.agentId,
      cell_id: this.cellId,
      role: this.role,
      status: this.health,
      running: this.running,
      consumer_group_id: this.consumerGroupId,
      events_processed: this.eventsProcessed,
      events_failed: this.eventsFailed,
      last_activity: this.lastActivity?.toISOString() ?? null,
      subscribed_events: [...this.subscribedEvents],
    };
  }

  /**
   * Wraps `processEvent` for one inbound event: counts it, replies to
   * step requests, and turns a failure into a diagnostic event.
   */
  protected async dispatch(event: Event): Promise<void> {
    this.lastActivity = new Date();
    const stepRequest = readStepRequest(event);

    let output: AgentOutput;
    try {
      output = await this.processEvent(event);
    } catch (err: unknown) {
      this.eventsFailed++;
      this.log.error(
        { err, event_id: event.event_id, event_type: event.event_type },
        'Event processing failed',
      );
      await this.publishErrorEvent(event, err);
      return;
    }

    this.eventsProcessed++;
    this.log.debug({ event_id: event.event_id, event_type: event.event_type }, 'Event processed');

    if (stepRequest !== null) {
      await this.publishEvent(buildTaskCompletedEvent(event, stepRequest, this.agentId, output));
    }
  }

  /**
   * Builds an event caused by `source`: same user and cell, chained by
   * correlation id. Facts produced for a workflow step are tagged with
   * the workflow id so other agents can tell them apart.
   */
  protected deriveEvent(source: Event, derived: DerivedEvent): Event {
    const stepRequest = readStepRequest(source);
    return createEvent({
      event_type: derived.event_type,
      user_id: source.user_id,
      cell_id: source.cell_id,
      correlation_id: source.correlation_id ?? source.event_id,
      data: derived.data,
      metadata: {
        agent_id: this.agentId,
        ...derived.metadata,
        ...(stepRequest === null ? {} : { [ORIGIN_WORKFLOW_KEY]: stepRequest.workflow_id }),
      },
    });
  }

  private async publishErrorEvent(source: Event, err: unknown): Promise<void> {
    try {
      const published = await this.publishEvent(buildAgentErrorEvent(source, this.agentId, err));
      if (!published) {
        this.log.warn({ event_id: source.event_id }, 'Error event was not published');
      }
    } catch (publishErr: unknown) {
      // Error reporting must never cascade into the consume loop.
      this.log.warn({ err: publishErr, event_id: source.event_id }, 'Failed to publish error event');
    }
  }
}
