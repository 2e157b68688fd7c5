import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { z } from 'zod';
import { EventType } from '../../domain/index.js';
import type { Event, StepData } from '../../domain/index.js';
import { AgentTaskError } from '../errors.js';
import type { EventBus } from '../event-bus.js';
import type { EventConsumer } from '../event-consumer.js';

const taskCompletedSchema = z.object({
  request_event_id: z.string().min(1),
  agent_id: z.string().min(1),
  output: z.record(z.unknown()).default({}),
});

const agentFailureSchema = z.object({
  original_event_id: z.string().min(1),
  agent_id: z.string().min(1),
  error: z.string().default('unknown error'),
});

interface PendingReply {
  resolve: (output: StepData) => void;
  reject: (err: unknown) => void;
  detach: () => void;
}

export interface StepCorrelatorOptions {
  bus: EventBus;
  cellId: string;
  logger: Logger;
}

/**
 * Matches agent replies to the step requests that are waiting for them.
 *
 * Requests are keyed by their event id. Success replies arrive as
 * `agent.task.completed`; failures as the agent's error diagnostic,
 * which carries `original_event_id`. The consumer group is unique per
 * instance so every engine process sees every reply and ignores the
 * ones it is not waiting for.
 */
export class StepCorrelator {
  readonly groupId: string;

  private readonly bus: EventBus;
  private readonly log: Logger;
  private readonly pending = new Map<string, PendingReply>();
  private consumer: EventConsumer | null = null;

  constructor(options: StepCorrelatorOptions) {
    this.bus = options.bus;
    this.groupId = `${options.cellId}-workflow-correlator-${randomUUID().slice(0, 8)}`;
    this.log = options.logger.child({ component: 'step-correlator' });
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Subscribes to the reply topics, then blocks in the consume loop
   * until `stop()`. Await `ready()` before publishing requests.
   */
  async start(): Promise<void> {
    if (this.consumer !== null) return;
    const consumer = this.bus.createConsumer(this.groupId, [
      EventType.AGENT_TASK_COMPLETED,
      EventType.AGENT_HEALTH_CHECK,
    ]);
    consumer.registerHandler(EventType.AGENT_TASK_COMPLETED, (event) => this.handleCompleted(event));
    consumer.registerHandler(EventType.AGENT_HEALTH_CHECK, (event) => this.handleFailure(event));
    this.consumer = consumer;
    this.log.info({ group: this.groupId }, 'Step correlator listening');
    await consumer.consumeEvents();
  }

  /**
   * Resolves once the reply group has joined. A new group starts at the
   * log end, so replies published before this point would be missed.
   */
  async ready(): Promise<void> {
    if (this.consumer === null) {
      throw new Error('Step correlator is not started');
    }
    await this.consumer.ready();
  }

  async stop(): Promise<void> {
    await this.consumer?.stop();
    this.consumer = null;
    for (const [requestId, reply] of this.pending) {
      reply.detach();
      reply.reject(new Error(`Correlator stopped before a reply to ${requestId} arrived`));
    }
    this.pending.clear();
  }

  /**
   * Registers interest in the reply to `requestEventId`. Call before
   * publishing the request. Rejects with the signal's reason on abort.
   */
  expect(requestEventId: string, signal: AbortSignal): Promise<StepData> {
    return new Promise<StepData>((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason);
        return;
      }
      const onAbort = (): void => {
        this.pending.delete(requestEventId);
        reject(signal.reason);
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.pending.set(requestEventId, {
        resolve,
        reject,
        detach: () => signal.removeEventListener('abort', onAbort),
      });
    });
  }

  /** Stops waiting without settling; used when the request never went out. */
  discard(requestEventId: string): void {
    this.pending.get(requestEventId)?.detach();
    this.pending.delete(requestEventId);
  }

  private handleCompleted(event: Event): void {
    const parsed = taskCompletedSchema.safeParse(event.data);
    if (!parsed.success) {
      this.log.warn({ event_id: event.event_id, issues: parsed.error.issues }, 'Malformed task reply');
      return;
    }
    const reply = this.take(parsed.data.request_event_id);
    if (reply === undefined) return;
    this.log.debug(
      { request_event_id: parsed.data.request_event_id, agent_id: parsed.data.agent_id },
      'Step reply received',
    );
    reply.resolve(parsed.data.output);
  }

  private handleFailure(event: Event): void {
    const parsed = agentFailureSchema.safeParse(event.data);
    // Health checks without an original event are not replies.
    if (!parsed.success) return;
    const reply = this.take(parsed.data.original_event_id);
    if (reply === undefined) return;
    reply.reject(new AgentTaskError(parsed.data.agent_id, parsed.data.error));
  }

  private take(requestEventId: string): PendingReply | undefined {
    const reply = this.pending.get(requestEventId);
    if (reply === undefined) return undefined;
    this.pending.delete(requestEventId);
    reply.detach();
    return reply;
  }
}
