/**
 * Transport port shared by the Kafka, Redis Streams and in-memory
 * brokers. The event bus only ever talks to this interface.
 */

export type BrokerTransport = 'kafka' | 'redis' | 'memory';

export interface OutboundMessage {
  topic: string;
  key: string;
  value: string;
}

export interface BrokerMessage {
  topic: string;
  partition: number;
  offset: string;
  key: string | null;
  value: string;
}

export type MessageHandler = (message: BrokerMessage) => Promise<void>;

export interface SubscribeOptions {
  groupId: string;
  topics: readonly string[];
  onMessage: MessageHandler;
}

/**
 * One consumer-group membership.
 *
 * `run()` resolves only after `stop()` has been called (or the
 * transport gave up for good). Offsets are committed on the broker's
 * auto-commit interval, so delivery is at-least-once.
 */
export interface BrokerSubscription {
  readonly groupId: string;
  run(): Promise<void>;
  /**
   * Resolves once the membership is in place, so anything published
   * from then on reaches it. Rejects when `run()` fails to join.
   */
  ready(): Promise<void>;
  stop(): Promise<void>;
}

export interface BrokerClient {
  readonly transport: BrokerTransport;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  send(message: OutboundMessage): Promise<void>;
  subscribe(options: SubscribeOptions): BrokerSubscription;
}

/** Raised when the transport cannot be reached at startup. */
export class BrokerConnectionError extends Error {
  constructor(transport: BrokerTransport, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to connect to ${transport} broker: ${detail}`, { cause });
    this.name = 'BrokerConnectionError';
  }
}

/** Default offset auto-commit interval. */
export const DEFAULT_AUTO_COMMIT_INTERVAL_MS = 5000;
