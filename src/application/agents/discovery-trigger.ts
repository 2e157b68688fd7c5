import type { Logger } from 'pino';
import { EventType } from '../../domain/index.js';
import type { EventBus } from '../event-bus.js';
import type { EventConsumer } from '../event-consumer.js';
import type { DiscoveryAgent } from './discovery-agent.js';

export interface DiscoveryTriggerOptions {
  bus: EventBus;
  agent: DiscoveryAgent;
  cellId: string;
  logger: Logger;
}

/**
 * Scheduler-side binding for the discovery agent: turns
 * `job.discovery.requested` events into scraping runs.
 *
 * It owns its own consumer group, so the agent itself keeps an empty
 * subscription set.
 */
export class DiscoveryTrigger {
  readonly groupId: string;

  private readonly bus: EventBus;
  private readonly agent: DiscoveryAgent;
  private readonly log: Logger;
  private consumer: EventConsumer | null = null;

  constructor(options: DiscoveryTriggerOptions) {
    this.bus = options.bus;
    this.agent = options.agent;
    this.groupId = `${options.cellId}-discovery-trigger`;
    this.log = options.logger.child({ component: 'discovery-trigger' });
  }

  /** Blocks in the consume loop until `stop()`. */
  async start(): Promise<void> {
    if (this.consumer !== null) return;
    const consumer = this.bus.createConsumer(this.groupId, [EventType.JOB_DISCOVERY_REQUESTED]);
    consumer.registerHandler(EventType.JOB_DISCOVERY_REQUESTED, (event) => this.agent.handleTrigger(event));
    this.consumer = consumer;
    this.log.info({ group: this.groupId }, 'Discovery trigger listening');
    await consumer.consumeEvents();
  }

  async stop(): Promise<void> {
    await this.consumer?.stop();
    this.consumer = null;
  }
}
