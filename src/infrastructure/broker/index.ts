export { BrokerConnectionError, DEFAULT_AUTO_COMMIT_INTERVAL_MS } from './types.js';
export type {
  BrokerClient,
  BrokerMessage,
  BrokerSubscription,
  BrokerTransport,
  MessageHandler,
  OutboundMessage,
  SubscribeOptions,
} from './types.js';
export { InMemoryBroker, DEFAULT_PARTITION_COUNT } from './in-memory-broker.js';
export type { InMemoryBrokerOptions } from './in-memory-broker.js';
export { KafkaBroker } from './kafka-broker.js';
export type { KafkaBrokerOptions } from './kafka-broker.js';
export { RedisStreamBroker } from './redis-stream-broker.js';
export type { RedisStreamBrokerOptions } from './redis-stream-broker.js';
export { createBroker } from './create-broker.js';
