import { randomUUID } from 'node:crypto';
import Redis from 'ioredis';
import type { Logger } from 'pino';
import { BrokerConnectionError, DEFAULT_AUTO_COMMIT_INTERVAL_MS } from './types.js';
import type { BrokerClient, BrokerSubscription, OutboundMessage, SubscribeOptions } from './types.js';

// How long to block waiting for new messages (ms)
const BLOCK_MS = 5000;
// Max messages to read per iteration
const BATCH_SIZE = 100;

export interface RedisStreamBrokerOptions {
  url: string;
  logger: Logger;
  consumerName?: string;
  autoCommitIntervalMs?: number;
}

type StreamEntry = [id: string, fields: string[]];

/**
 * Parses a raw Redis Stream entry into its key/value pair.
 * Stream entries arrive as flat [field, value, field, value, ...] arrays.
 */
function parseStreamFields(fields: string[]): { key: string | null; value: string } {
  const map = new Map<string, string>();
  for (let i = 0; i < fields.length; i += 2) {
    const field = fields[i];
    const value = fields[i + 1];
    if (field !== undefined && value !== undefined) {
      map.set(field, value);
    }
  }
  return { key: map.get('key') ?? null, value: map.get('value') ?? '' };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Redis Streams transport.
 *
 * Each topic is one stream; each consumer group is a stream consumer
 * group created from "$" (new messages only). Acknowledgements are
 * batched and flushed on the auto-commit interval, so delivery is
 * at-least-once like the Kafka transport.
 *
 * Streams have no partitions: per-user ordering holds only while a
 * group has a single member.
 */
export class RedisStreamBroker implements BrokerClient {
  readonly transport = 'redis' as const;

  private readonly redis: Redis;
  private readonly log: Logger;
  private readonly consumerName: string;
  private readonly autoCommitIntervalMs: number;
  private readonly subscriptions = new Set<BrokerSubscription>();

  constructor(options: RedisStreamBrokerOptions) {
    this.log = options.logger;
    this.consumerName = options.consumerName ?? `consumer-${randomUUID().slice(0, 8)}`;
    this.autoCommitIntervalMs = options.autoCommitIntervalMs ?? DEFAULT_AUTO_COMMIT_INTERVAL_MS;
    this.redis = new Redis(options.url, {
      maxRetriesPerRequest: null,   // required for streams (no auto-fail)
      enableReadyCheck: true,
      lazyConnect: true,
    });
  }

  async connect(): Promise<void> {
    try {
      await this.redis.connect();
    } catch (err: unknown) {
      throw new BrokerConnectionError('redis', err);
    }
    this.log.info('Redis connected');
  }

  async disconnect(): Promise<void> {
    await Promise.all([...this.subscriptions].map((sub) => sub.stop()));
    await this.redis.quit();
    this.log.info('Redis disconnected');
  }

  async send(message: OutboundMessage): Promise<void> {
    await this.redis.xadd(
      message.topic,
      '*',
      'key', message.key,
      'value', message.value,
    );
  }

  subscribe(options: SubscribeOptions): BrokerSubscription {
    const { groupId, onMessage } = options;
    const streams = [...new Set(options.topics)];
    const log = this.log.child({ group: groupId, consumer: this.consumerName });
    // XREADGROUP BLOCK ties up its connection, so each subscription reads on its own.
    const reader = this.redis.duplicate();
    const pendingAcks = new Map<string, string[]>();
    let stopped = false;
    let loop: Promise<void> | null = null;

    let joined: (() => void) | null = null;
    let joinFailed: ((err: unknown) => void) | null = null;
    const ready = new Promise<void>((resolve, reject) => {
      joined = resolve;
      joinFailed = reject;
    });
    ready.catch((err: unknown) => log.debug({ err }, 'Group join abandoned'));

    const flushAcks = async (): Promise<void> => {
      const batches = [...pendingAcks.entries()];
      pendingAcks.clear();
      for (const [stream, ids] of batches) {
        if (ids.length === 0) continue;
        try {
          await this.redis.xack(stream, groupId, ...ids);
        } catch (err: unknown) {
          log.error({ err, stream, count: ids.length }, 'Failed to acknowledge entries');
        }
      }
    };

    const handleEntries = async (stream: string, entries: StreamEntry[]): Promise<void> => {
      for (const [streamId, fields] of entries) {
        if (fields.length === 0) continue; // already acked, skip nil entries
        const { key, value } = parseStreamFields(fields);
        try {
          await onMessage({ topic: stream, partition: 0, offset: streamId, key, value });
        } catch (err: unknown) {
          log.error({ err, stream, streamId }, 'Message handler failed');
        }
        const ids = pendingAcks.get(stream) ?? [];
        ids.push(streamId);
        pendingAcks.set(stream, ids);
      }
    };

    const consume = async (): Promise<void> => {
      await reader.connect();
      for (const stream of streams) {
        await this.ensureConsumerGroup(stream, groupId, log);
      }
      joined?.();

      // Recover entries delivered to this consumer but never acknowledged,
      // paging through the pending list one batch at a time.
      for (const stream of streams) {
        let cursor = '0';
        while (!stopped) {
          const pending = await reader.xreadgroup(
            'GROUP', groupId, this.consumerName,
            'COUNT', BATCH_SIZE,
            'STREAMS', stream, cursor,
          );
          const entries = pending?.[0]?.[1] ?? [];
          await handleEntries(stream, entries);
          const last = entries[entries.length - 1];
          if (last === undefined || entries.length < BATCH_SIZE) break;
          cursor = last[0];
        }
      }

      const ackTimer = setInterval(() => {
        flushAcks().catch((err: unknown) => log.error({ err }, 'Ack flush failed'));
      }, this.autoCommitIntervalMs);
      ackTimer.unref();

      log.info({ streams }, 'Stream consumer started');

      try {
        while (!stopped) {
          try {
            const response = await reader.xreadgroup(
              'GROUP', groupId, this.consumerName,
              'COUNT', BATCH_SIZE,
              'BLOCK', BLOCK_MS,
              'STREAMS', ...streams, ...streams.map(() => '>'),
            );

            // null = timeout with no new messages
            if (response === null) continue;

            for (const [stream, entries] of response) {
              await handleEntries(stream, entries);
            }
          } catch (err: unknown) {
            if (stopped) break;
            log.error({ err }, 'Consumer loop error, retrying in 1s');
            await sleep(1000);
          }
        }
      } finally {
        clearInterval(ackTimer);
        await flushAcks();
      }

      log.info('Stream consumer stopped');
    };

    const subscription: BrokerSubscription = {
      groupId,
      run: () => {
        if (loop === null) {
          loop = consume().catch((err: unknown) => {
            const wrapped = new BrokerConnectionError('redis', err);
            joinFailed?.(wrapped);
            throw wrapped;
          });
        }
        return loop;
      },
      ready: () => ready,
      stop: async () => {
        if (stopped) return;
        stopped = true;
        joinFailed?.(new Error(`Stream consumer ${groupId} stopped before joining`));
        this.subscriptions.delete(subscription);
        // Unblocks a pending XREADGROUP; the loop then exits on `stopped`.
        reader.disconnect();
        await loop?.catch((err: unknown) => log.warn({ err }, 'Stream consumer ended with error'));
      },
    };

    this.subscriptions.add(subscription);
    return subscription;
  }

  /**
   * Ensures the consumer group exists on the stream.
   *
   * Start ID "$" = only deliver messages arriving after group creation.
   * Uses MKSTREAM so the stream is created if it doesn't exist yet.
   * Ignores BUSYGROUP errors (group already exists).
   */
  private async ensureConsumerGroup(stream: string, groupId: string, log: Logger): Promise<void> {
    try {
      await this.redis.xgroup('CREATE', stream, groupId, '$', 'MKSTREAM');
      log.info({ stream }, 'Consumer group created (from $)');
    } catch (err: unknown) {
      if (err instanceof Error && err.message.includes('BUSYGROUP')) {
        log.debug({ stream }, 'Consumer group already exists');
        return;
      }
      throw err;
    }
  }
}
