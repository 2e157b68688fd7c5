import { Kafka, Partitioners, logLevel } from 'kafkajs';
import type { Consumer, Producer, logCreator } from 'kafkajs';
import type { Logger } from 'pino';
import { BrokerConnectionError, DEFAULT_AUTO_COMMIT_INTERVAL_MS } from './types.js';
import type { BrokerClient, BrokerSubscription, OutboundMessage, SubscribeOptions } from './types.js';

export interface KafkaBrokerOptions {
  brokers: string[];
  clientId: string;
  logger: Logger;
  autoCommitIntervalMs?: number;
}

/** Routes kafkajs' internal logging into the pino logger. */
function pinoLogCreator(logger: Logger): logCreator {
  return () => ({ namespace, level, log }) => {
    const { message, ...extra } = log;
    const fields = { ...extra, namespace };
    switch (level) {
      case logLevel.ERROR:
        logger.error(fields, message);
        break;
      case logLevel.WARN:
        logger.warn(fields, message);
        break;
      case logLevel.INFO:
        logger.info(fields, message);
        break;
      default:
        logger.debug(fields, message);
    }
  };
}

/**
 * Kafka transport backed by kafkajs.
 *
 * One shared producer per process. Every subscription gets its own
 * consumer (one group membership), starts from the latest offset when
 * the group is new, and relies on kafkajs auto-commit.
 */
export class KafkaBroker implements BrokerClient {
  readonly transport = 'kafka' as const;

  private readonly kafka: Kafka;
  private readonly producer: Producer;
  private readonly log: Logger;
  private readonly autoCommitIntervalMs: number;
  private readonly consumers = new Set<Consumer>();

  constructor(options: KafkaBrokerOptions) {
    this.log = options.logger;
    this.autoCommitIntervalMs = options.autoCommitIntervalMs ?? DEFAULT_AUTO_COMMIT_INTERVAL_MS;
    this.kafka = new Kafka({
      clientId: options.clientId,
      brokers: options.brokers,
      logLevel: logLevel.WARN,
      logCreator: pinoLogCreator(options.logger.child({ component: 'kafkajs' })),
    });
    this.producer = this.kafka.producer({
      createPartitioner: Partitioners.DefaultPartitioner,
    });
  }

  async connect(): Promise<void> {
    try {
      await this.producer.connect();
    } catch (err: unknown) {
      throw new BrokerConnectionError('kafka', err);
    }
    this.log.info('Kafka producer connected');
  }

  async disconnect(): Promise<void> {
    await Promise.all([...this.consumers].map((consumer) => consumer.disconnect()));
    this.consumers.clear();
    await this.producer.disconnect();
    this.log.info('Kafka producer disconnected');
  }

  async send(message: OutboundMessage): Promise<void> {
    await this.producer.send({
      topic: message.topic,
      messages: [{ key: message.key, value: message.value }],
    });
  }

  subscribe(options: SubscribeOptions): BrokerSubscription {
    const consumer = this.kafka.consumer({ groupId: options.groupId });
    const log = this.log.child({ group: options.groupId });

    let stopped = false;
    let release: (() => void) | null = null;
    let fail: ((err: Error) => void) | null = null;
    const done = new Promise<void>((resolve, reject) => {
      release = resolve;
      fail = reject;
    });

    let joined: (() => void) | null = null;
    let joinFailed: ((err: Error) => void) | null = null;
    const ready = new Promise<void>((resolve, reject) => {
      joined = resolve;
      joinFailed = reject;
    });
    ready.catch((err: unknown) => log.debug({ err }, 'Group join abandoned'));

    consumer.on(consumer.events.GROUP_JOIN, (event) => {
      log.info(
        { member_id: event.payload.memberId, assignment: event.payload.memberAssignment },
        'Kafka consumer joined group',
      );
      joined?.();
    });

    // kafkajs restarts on retriable errors; anything else ends the membership.
    consumer.on(consumer.events.CRASH, (event) => {
      if (event.payload.restart || stopped) return;
      stopped = true;
      this.consumers.delete(consumer);
      log.error({ err: event.payload.error }, 'Kafka consumer crashed');
      const err = new Error(`Kafka consumer ${options.groupId} crashed: ${event.payload.error.message}`, {
        cause: event.payload.error,
      });
      joinFailed?.(err);
      fail?.(err);
    });

    const stop = async (): Promise<void> => {
      if (stopped) return;
      stopped = true;
      try {
        await consumer.disconnect();
      } finally {
        this.consumers.delete(consumer);
        joinFailed?.(new Error(`Kafka consumer ${options.groupId} stopped before joining`));
        release?.();
      }
    };

    const run = async (): Promise<void> => {
      if (stopped) return;
      this.consumers.add(consumer);
      try {
        await consumer.connect();
        await consumer.subscribe({ topics: [...options.topics], fromBeginning: false });
        await consumer.run({
          autoCommit: true,
          autoCommitInterval: this.autoCommitIntervalMs,
          eachMessage: async ({ topic, partition, message }) => {
            await options.onMessage({
              topic,
              partition,
              offset: message.offset,
              key: message.key?.toString() ?? null,
              value: message.value?.toString() ?? '',
            });
          },
        });
      } catch (err: unknown) {
        this.consumers.delete(consumer);
        const wrapped = new BrokerConnectionError('kafka', err);
        joinFailed?.(wrapped);
        throw wrapped;
      }

      log.info({ topics: options.topics }, 'Kafka consumer running');
      await done;
      log.info('Kafka consumer stopped');
    };

    return { groupId: options.groupId, run, ready: () => ready, stop };
  }
}
