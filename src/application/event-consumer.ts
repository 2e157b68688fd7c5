import type { Logger } from 'pino';
import type { Event, EventType } from '../domain/index.js';
import type { BrokerClient, BrokerMessage, BrokerSubscription } from '../infrastructure/broker/index.js';
import { parseEventMessage } from './event-schema.js';

export type EventHandler = (event: Event) => Promise<void> | void;

/**
 * A named subscription to a set of topics on behalf of one consumer
 * group.
 *
 * Handlers are registered per event type and invoked in registration
 * order. Each handler has its own error boundary: a throwing handler
 * is logged and the next handler (and the next message) still runs.
 */
export class EventConsumer {
  readonly groupId: string;
  readonly topics: readonly string[];

  private readonly handlers = new Map<EventType, EventHandler[]>();
  private readonly subscription: BrokerSubscription;
  private readonly log: Logger;
  private running: Promise<void> | null = null;

  constructor(broker: BrokerClient, groupId: string, topics: readonly string[], logger: Logger) {
    this.groupId = groupId;
    this.topics = topics;
    this.log = logger.child({ group: groupId });
    this.subscription = broker.subscribe({
      groupId,
      topics,
      onMessage: (message) => this.handleMessage(message),
    });
  }

  registerHandler(eventType: EventType, handler: EventHandler): void {
    const existing = this.handlers.get(eventType) ?? [];
    existing.push(handler);
    this.handlers.set(eventType, existing);
  }

  /** Blocks until `stop()`; calling it again returns the same loop. */
  consumeEvents(): Promise<void> {
    if (this.running === null) {
      this.log.info({ topics: this.topics }, 'Consumer started');
      this.running = this.subscription.run();
    }
    return this.running;
  }

  /** Resolves once the group membership is in place; see `BrokerSubscription.ready`. */
  ready(): Promise<void> {
    return this.subscription.ready();
  }

  async stop(): Promise<void> {
    await this.subscription.stop();
    this.log.info('Consumer stopped');
  }

  /** Parses one broker message and fans it out to the registered handlers. */
  async handleMessage(message: BrokerMessage): Promise<void> {
    let event: Event;
    try {
      event = parseEventMessage(message.value);
    } catch (err: unknown) {
      this.log.warn(
        { err, topic: message.topic, offset: message.offset, valuePreview: message.value.slice(0, 200) },
        'Skipping malformed message',
      );
      return;
    }

    const handlers = this.handlers.get(event.event_type);
    if (handlers === undefined || handlers.length === 0) {
      this.log.warn({ event_type: event.event_type, event_id: event.event_id }, 'No handler registered');
      return;
    }

    for (const handler of handlers) {
      try {
        await handler(event);
      } catch (err: unknown) {
        this.log.error(
          { err, event_id: event.event_id, event_type: event.event_type },
          'Event handler failed',
        );
      }
    }
  }
}
