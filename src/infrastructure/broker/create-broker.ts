import type { Logger } from 'pino';
import type { AppConfig } from '../../config.js';
import { InMemoryBroker } from './in-memory-broker.js';
import { KafkaBroker } from './kafka-broker.js';
import { RedisStreamBroker } from './redis-stream-broker.js';
import type { BrokerClient } from './types.js';

/** Picks the transport named by `BROKER_TRANSPORT`. */
export function createBroker(config: AppConfig, logger: Logger): BrokerClient {
  const log = logger.child({ component: 'broker', transport: config.broker.transport });

  switch (config.broker.transport) {
    case 'kafka':
      return new KafkaBroker({
        brokers: config.broker.kafkaBrokers,
        clientId: config.broker.kafkaClientId,
        autoCommitIntervalMs: config.broker.autoCommitIntervalMs,
        logger: log,
      });
    case 'redis':
      return new RedisStreamBroker({
        url: config.broker.redisUrl,
        consumerName: config.broker.consumerName,
        autoCommitIntervalMs: config.broker.autoCommitIntervalMs,
        logger: log,
      });
    case 'memory':
      return new InMemoryBroker({
        partitions: config.broker.partitions,
        autoCommitIntervalMs: config.broker.autoCommitIntervalMs,
        logger: log,
      });
  }
}
