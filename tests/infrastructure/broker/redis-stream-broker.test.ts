import { describe, it, expect, vi, beforeEach } from 'vitest';

const redis = vi.hoisted(() => {
  const client = {
    connect: vi.fn(async () => {}),
    quit: vi.fn(async () => 'OK'),
    xadd: vi.fn(async () => '1-0'),
    xack: vi.fn(async () => 1),
    xgroup: vi.fn(async () => 'OK'),
    duplicate: vi.fn(),
  };
  // Called with `new`, so a function rather than an arrow.
  const Redis = vi.fn(function Redis() {
    return client;
  });
  return { client, Redis };
});

vi.mock('ioredis', () => ({ default: redis.Redis }));

import { BrokerConnectionError, RedisStreamBroker } from '../../../src/infrastructure/broker/index.js';
import type { BrokerMessage } from '../../../src/infrastructure/broker/index.js';
import { asLogger, fakeLogger } from '../../helpers.js';

type StreamEntry = [string, string[]];
type StreamReply = [string, StreamEntry[]][] | null;

/** Reader connection: scripted pending pages, then a blocking read that ends on disconnect. */
function fakeReader(pages: StreamEntry[][]) {
  let unblock: ((err: Error) => void) | null = null;
  const reader = {
    connect: vi.fn(async () => {}),
    disconnect: vi.fn(() => {
      unblock?.(new Error('Connection is closed.'));
    }),
    xreadgroup: vi.fn((...args: Array<string | number>): Promise<StreamReply> => {
      if (args.includes('BLOCK')) {
        return new Promise<StreamReply>((_resolve, reject) => {
          unblock = reject;
        });
      }
      const page = pages.shift() ?? [];
      const stream = String(args[args.length - 2]);
      return Promise.resolve(page.length === 0 ? [[stream, []]] : [[stream, page]]);
    }),
  };
  return reader;
}

function entries(from: number, count: number): StreamEntry[] {
  return Array.from({ length: count }, (_, i): StreamEntry => [`${from + i}-0`, ['key', 'user_1', 'value', `{"n":${from + i}}`]]);
}

function makeBroker(): RedisStreamBroker {
  return new RedisStreamBroker({
    url: 'redis://localhost:6379',
    logger: asLogger(fakeLogger()),
    consumerName: 'worker-1',
  });
}

describe('RedisStreamBroker', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('connects lazily and wraps connection failures', async () => {
    redis.client.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const broker = makeBroker();

    expect(redis.Redis).toHaveBeenCalledWith('redis://localhost:6379', expect.objectContaining({ lazyConnect: true }));
    await expect(broker.connect()).rejects.toBeInstanceOf(BrokerConnectionError);
  });

  it('appends key and value fields to the topic stream', async () => {
    const broker = makeBroker();
    await broker.send({ topic: 'resume-automation.resume.generated', key: 'user_3', value: '{"x":1}' });

    expect(redis.client.xadd).toHaveBeenCalledWith(
      'resume-automation.resume.generated',
      '*',
      'key',
      'user_3',
      'value',
      '{"x":1}',
    );
  });

  it('joins the group before reporting ready and replays every pending page', async () => {
    const reader = fakeReader([entries(1, 100), entries(101, 1)]);
    redis.client.duplicate.mockReturnValueOnce(reader);
    const broker = makeBroker();
    const received: BrokerMessage[] = [];
    const subscription = broker.subscribe({
      groupId: 'cell-001-analysis-group',
      topics: ['resume-automation.job.analysis.requested'],
      onMessage: async (message) => {
        received.push(message);
      },
    });

    const loop = subscription.run();
    await subscription.ready();
    expect(redis.client.xgroup).toHaveBeenCalledWith(
      'CREATE', 'resume-automation.job.analysis.requested', 'cell-001-analysis-group', '$', 'MKSTREAM',
    );

    await vi.waitFor(() => expect(received).toHaveLength(101));
    const pendingCursors = reader.xreadgroup.mock.calls
      .filter((args) => !args.includes('BLOCK'))
      .map((args) => args[args.length - 1]);
    expect(pendingCursors).toEqual(['0', '100-0']);
    expect(received[100]).toMatchObject({ offset: '101-0', key: 'user_1', value: '{"n":101}' });

    await subscription.stop();
    await loop;
    expect(redis.client.xack).toHaveBeenCalledTimes(1);
    expect(redis.client.xack.mock.calls[0]).toHaveLength(2 + 101);
  });

  it('rejects ready() when the group cannot be created', async () => {
    redis.client.duplicate.mockReturnValueOnce(fakeReader([]));
    redis.client.xgroup.mockRejectedValueOnce(new Error('WRONGTYPE'));
    const broker = makeBroker();
    const subscription = broker.subscribe({
      groupId: 'cell-001-generation-group',
      topics: ['resume-automation.job.analyzed'],
      onMessage: async () => {},
    });

    const loop = subscription.run();

    await expect(subscription.ready()).rejects.toThrow('Failed to connect to redis broker: WRONGTYPE');
    await expect(loop).rejects.toBeInstanceOf(BrokerConnectionError);
  });
});
