import { createHash } from 'node:crypto';
import type { Logger } from 'pino';
import { DEFAULT_AUTO_COMMIT_INTERVAL_MS } from './types.js';
import type {
  BrokerClient,
  BrokerMessage,
  BrokerSubscription,
  MessageHandler,
  OutboundMessage,
  SubscribeOptions,
} from './types.js';

export const DEFAULT_PARTITION_COUNT = 3;

export interface InMemoryBrokerOptions {
  logger: Logger;
  partitions?: number;
  autoCommitIntervalMs?: number;
}

interface StoredRecord {
  key: string | null;
  value: string;
}

interface Member {
  readonly id: number;
  readonly group: Group;
  readonly topics: readonly string[];
  readonly onMessage: MessageHandler;
  /** `${topic}#${partition}` -> next offset to deliver. */
  positions: Map<string, number>;
  cursor: number;
  stopped: boolean;
  wake: (() => void) | null;
  loop: Promise<void> | null;
}

interface Group {
  readonly id: string;
  /** `${topic}#${partition}` -> committed offset. */
  readonly committed: Map<string, number>;
  members: Member[];
}

function positionKey(topic: string, partition: number): string {
  return `${topic}#${partition}`;
}

function splitPositionKey(key: string): { topic: string; partition: number } {
  const idx = key.lastIndexOf('#');
  return { topic: key.slice(0, idx), partition: Number(key.slice(idx + 1)) };
}

/**
 * In-process partitioned log with consumer groups.
 *
 * Mirrors the broker semantics the rest of the system relies on:
 * - a topic has a fixed number of partitions, chosen by hashing the key;
 * - each partition of a topic is owned by exactly one member of a group,
 *   assigned round-robin and rebalanced when members join or leave;
 * - different groups read every record independently;
 * - a new group starts at the end of the log ("latest");
 * - positions are committed on an interval, and on rebalance/leave.
 *
 * Members block on a waiter that `send()` resolves, never on a poll.
 */
export class InMemoryBroker implements BrokerClient {
  readonly transport = 'memory' as const;

  private readonly log: Logger;
  private readonly partitionCount: number;
  private readonly autoCommitIntervalMs: number;
  private readonly topics = new Map<string, StoredRecord[][]>();
  private readonly groups = new Map<string, Group>();
  private commitTimer: NodeJS.Timeout | null = null;
  private connected = false;
  private nextMemberId = 1;

  constructor(options: InMemoryBrokerOptions) {
    this.log = options.logger;
    this.partitionCount = Math.max(1, options.partitions ?? DEFAULT_PARTITION_COUNT);
    this.autoCommitIntervalMs = options.autoCommitIntervalMs ?? DEFAULT_AUTO_COMMIT_INTERVAL_MS;
  }

  async connect(): Promise<void> {
    if (this.connected) return;
    this.connected = true;
    this.commitTimer = setInterval(() => this.commitAll(), this.autoCommitIntervalMs);
    this.commitTimer.unref();
    this.log.info({ partitions: this.partitionCount }, 'In-memory broker ready');
  }

  async disconnect(): Promise<void> {
    const members = [...this.groups.values()].flatMap((g) => g.members);
    await Promise.all(members.map((member) => this.leave(member)));
    if (this.commitTimer) {
      clearInterval(this.commitTimer);
      this.commitTimer = null;
    }
    this.connected = false;
  }

  async send(message: OutboundMessage): Promise<void> {
    if (!this.connected) {
      throw new Error('In-memory broker is not connected');
    }

    const partitions = this.ensureTopic(message.topic);
    const partition = this.partitionFor(message.key);
    const records = partitions[partition];
    if (records === undefined) {
      throw new Error(`Partition ${partition} missing for topic ${message.topic}`);
    }
    records.push({ key: message.key, value: message.value });

    for (const group of this.groups.values()) {
      for (const member of group.members) {
        if (member.topics.includes(message.topic)) wakeMember(member);
      }
    }
  }

  /**
   * Joins the group immediately, so records sent after this call are
   * visible to the subscription even before `run()` starts.
   */
  subscribe(options: SubscribeOptions): BrokerSubscription {
    const group = this.ensureGroup(options.groupId);
    const member: Member = {
      id: this.nextMemberId++,
      group,
      topics: [...new Set(options.topics)],
      onMessage: options.onMessage,
      positions: new Map(),
      cursor: 0,
      stopped: false,
      wake: null,
      loop: null,
    };

    for (const topic of member.topics) {
      const partitions = this.ensureTopic(topic);
      partitions.forEach((records, partition) => {
        const key = positionKey(topic, partition);
        if (!group.committed.has(key)) group.committed.set(key, records.length);
      });
    }

    group.members.push(member);
    this.rebalance(group);

    return {
      groupId: options.groupId,
      run: () => {
        if (member.loop === null) member.loop = this.consume(member);
        return member.loop;
      },
      // Membership and starting offsets are fixed above.
      ready: async () => {},
      stop: () => this.leave(member),
    };
  }

  /** Partition a key maps to; stable for the broker's lifetime. */
  partitionFor(key: string | null): number {
    if (key === null) return 0;
    const digest = createHash('md5').update(key).digest();
    return digest.readUInt32BE(0) % this.partitionCount;
  }

  /** Committed offset for a group's partition, or undefined if unknown. */
  committedOffset(groupId: string, topic: string, partition: number): number | undefined {
    return this.groups.get(groupId)?.committed.get(positionKey(topic, partition));
  }

  /** Copies every member's delivered position into its group's committed offsets. */
  commitAll(): void {
    for (const group of this.groups.values()) {
      for (const member of group.members) commitMember(member);
    }
  }

  // ─── Internals ─────────────────────────────────────────────

  private ensureTopic(topic: string): StoredRecord[][] {
    let partitions = this.topics.get(topic);
    if (partitions === undefined) {
      partitions = Array.from({ length: this.partitionCount }, () => []);
      this.topics.set(topic, partitions);
    }
    return partitions;
  }

  private ensureGroup(groupId: string): Group {
    let group = this.groups.get(groupId);
    if (group === undefined) {
      group = { id: groupId, committed: new Map(), members: [] };
      this.groups.set(groupId, group);
    }
    return group;
  }

  /**
   * Commits current positions, then hands each partition to one member
   * (round-robin over the members subscribed to that topic). Members
   * resume from the committed offset of whatever they now own.
   */
  private rebalance(group: Group): void {
    for (const member of group.members) commitMember(member);
    for (const member of group.members) {
      member.positions = new Map();
      member.cursor = 0;
    }

    const topics = new Set(group.members.flatMap((m) => m.topics));
    for (const topic of topics) {
      const eligible = group.members.filter((m) => m.topics.includes(topic));
      for (let partition = 0; partition < this.partitionCount; partition++) {
        const owner = eligible[partition % eligible.length];
        if (owner === undefined) continue;
        const key = positionKey(topic, partition);
        owner.positions.set(key, group.committed.get(key) ?? 0);
      }
    }

    this.log.debug(
      { group: group.id, members: group.members.map((m) => m.id) },
      'Consumer group rebalanced',
    );
    for (const member of group.members) wakeMember(member);
  }

  /** Does not wait for the loop, so a handler may stop its own subscription. */
  private async leave(member: Member): Promise<void> {
    if (member.stopped) return;
    member.stopped = true;
    commitMember(member);
    const group = member.group;
    group.members = group.members.filter((m) => m !== member);
    this.rebalance(group);
    wakeMember(member);
  }

  private nextRecord(member: Member): { message: BrokerMessage; key: string } | null {
    const keys = [...member.positions.keys()];
    for (let i = 0; i < keys.length; i++) {
      const key = keys[(member.cursor + i) % keys.length];
      if (key === undefined) continue;
      const offset = member.positions.get(key) ?? 0;
      const { topic, partition } = splitPositionKey(key);
      const record = this.topics.get(topic)?.[partition]?.[offset];
      if (record === undefined) continue;

      member.cursor = (member.cursor + i + 1) % keys.length;
      return {
        key,
        message: { topic, partition, offset: String(offset), key: record.key, value: record.value },
      };
    }
    return null;
  }

  private async consume(member: Member): Promise<void> {
    while (!member.stopped) {
      const next = this.nextRecord(member);
      if (next === null) {
        await new Promise<void>((resolve) => {
          member.wake = resolve;
        });
        continue;
      }

      try {
        await member.onMessage(next.message);
      } catch (err: unknown) {
        this.log.error(
          { err, group: member.group.id, topic: next.message.topic, offset: next.message.offset },
          'Message handler failed',
        );
      }

      // Partition may have moved to another member while the handler ran.
      if (member.positions.has(next.key)) {
        member.positions.set(next.key, Number(next.message.offset) + 1);
      }
    }
  }
}

function wakeMember(member: Member): void {
  const wake = member.wake;
  member.wake = null;
  wake?.();
}

function commitMember(member: Member): void {
  for (const [key, offset] of member.positions) {
    member.group.committed.set(key, offset);
  }
}
