import type { Logger } from 'pino';
import { partitionKeyFor, topicFor } from '../domain/index.js';
import type { Event, EventType } from '../domain/index.js';
import type { BrokerClient } from '../infrastructure/broker/index.js';
import { EventConsumer } from './event-consumer.js';
import { serializeEvent } from './event-schema.js';

export interface EventBusOptions {
  broker: BrokerClient;
  namespace: string;
  logger: Logger;
}

/** The slice of the bus that only emits. */
export interface EventPublisher {
  publish(event: Event): Promise<boolean>;
}

/**
 * Process-local façade over the broker client.
 *
 * One instance per process, passed explicitly to every agent and to
 * the engine. Publishing never throws; consumers created here are
 * started and stopped together.
 */
export class EventBus implements EventPublisher {
  readonly namespace: string;

  private readonly broker: BrokerClient;
  private readonly log: Logger;
  private readonly consumers: EventConsumer[] = [];

  constructor(options: EventBusOptions) {
    this.broker = options.broker;
    this.namespace = options.namespace;
    this.log = options.logger.child({ component: 'event-bus' });
  }

  /** Connection failures propagate: a component cannot start without its broker. */
  async connect(): Promise<void> {
    await this.broker.connect();
    this.log.info({ transport: this.broker.transport, namespace: this.namespace }, 'Event bus connected');
  }

  async disconnect(): Promise<void> {
    await this.stopConsumers();
    await this.broker.disconnect();
    this.log.info('Event bus disconnected');
  }

  topicFor(eventType: EventType): string {
    return topicFor(this.namespace, eventType);
  }

  /**
   * Serializes and sends the event keyed by `user_<id>`.
   * Returns false on any failure; the error is logged, never thrown.
   */
  async publish(event: Event): Promise<boolean> {
    const topic = this.topicFor(event.event_type);
    try {
      await this.broker.send({
        topic,
        key: partitionKeyFor(event.user_id),
        value: serializeEvent(event),
      });
      this.log.debug({ event_id: event.event_id, topic }, 'Event published');
      return true;
    } catch (err: unknown) {
      this.log.error({ err, event_id: event.event_id, topic }, 'Failed to publish event');
      return false;
    }
  }

  createConsumer(groupId: string, eventTypes: readonly EventType[]): EventConsumer {
    const topics = [...new Set(eventTypes)].map((type) => this.topicFor(type));
    const consumer = new EventConsumer(this.broker, groupId, topics, this.log);
    this.consumers.push(consumer);
    return consumer;
  }

  /** Runs every consumer's loop; resolves once all of them have stopped. */
  async startConsumers(): Promise<void> {
    await Promise.all(this.consumers.map((consumer) => consumer.consumeEvents()));
  }

  async stopConsumers(): Promise<void> {
    const consumers = this.consumers.splice(0);
    await Promise.all(consumers.map((consumer) => consumer.stop()));
  }
}
