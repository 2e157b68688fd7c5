import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventType, createEvent } from '../../src/domain/index.js';
import type { Event } from '../../src/domain/index.js';
import { EventBus } from '../../src/application/index.js';
import { InMemoryBroker } from '../../src/infrastructure/broker/index.js';
import { asLogger, fakeLogger, waitFor } from '../helpers.js';
import type { FakeLogger } from '../helpers.js';

describe('EventBus', () => {
  let log: FakeLogger;
  let broker: InMemoryBroker;
  let bus: EventBus;
  let loops: Promise<void>[];

  beforeEach(async () => {
    log = fakeLogger();
    broker = new InMemoryBroker({ logger: asLogger(log), partitions: 3 });
    bus = new EventBus({ broker, namespace: 'test-ns', logger: asLogger(log) });
    loops = [];
    await bus.connect();
  });

  afterEach(async () => {
    await bus.disconnect();
    await Promise.all(loops);
  });

  function listen(groupId: string, eventTypes: readonly EventType[], sink: Event[]): void {
    const consumer = bus.createConsumer(groupId, eventTypes);
    for (const type of eventTypes) {
      consumer.registerHandler(type, (event) => {
        sink.push(event);
      });
    }
    loops.push(consumer.consumeEvents());
  }

  it('publishes to <namespace>.<event_type> and delivers the same envelope', async () => {
    const received: Event[] = [];
    listen('g1', [EventType.JOB_DISCOVERED], received);

    const event = createEvent({ event_type: EventType.JOB_DISCOVERED, user_id: 42, data: { job_id: 'j1' } });
    await expect(bus.publish(event)).resolves.toBe(true);
    await waitFor(() => received.length === 1);

    expect(bus.topicFor(EventType.JOB_DISCOVERED)).toBe('test-ns.job.discovered');
    expect(received[0]).toEqual(event);
  });

  it('keeps the events of one user in publish order', async () => {
    const received: Event[] = [];
    listen('g1', [EventType.JOB_DISCOVERED], received);

    for (let seq = 0; seq < 100; seq++) {
      await bus.publish(createEvent({ event_type: EventType.JOB_DISCOVERED, user_id: 42, data: { seq } }));
    }
    await waitFor(() => received.length === 100);

    expect(received.map((e) => e.data['seq'])).toEqual(Array.from({ length: 100 }, (_, i) => i));
    expect(new Set(received.map((e) => e.event_id)).size).toBe(100);
  });

  it('returns false instead of throwing when the broker refuses', async () => {
    await broker.disconnect();
    const event = createEvent({ event_type: EventType.JOB_DISCOVERED, user_id: 1 });

    await expect(bus.publish(event)).resolves.toBe(false);
    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ event_id: event.event_id, topic: 'test-ns.job.discovered' }),
      'Failed to publish event',
    );
  });

  it('isolates a throwing handler from the next one', async () => {
    const received: Event[] = [];
    const consumer = bus.createConsumer('g1', [EventType.JOB_ANALYZED]);
    consumer.registerHandler(EventType.JOB_ANALYZED, () => {
      throw new Error('boom');
    });
    consumer.registerHandler(EventType.JOB_ANALYZED, (event) => {
      received.push(event);
    });
    loops.push(consumer.consumeEvents());

    await bus.publish(createEvent({ event_type: EventType.JOB_ANALYZED, user_id: 1 }));
    await waitFor(() => received.length === 1);

    expect(log.error).toHaveBeenCalledWith(
      expect.objectContaining({ event_type: EventType.JOB_ANALYZED }),
      'Event handler failed',
    );
  });

  it('skips malformed messages and keeps going', async () => {
    const received: Event[] = [];
    listen('g1', [EventType.JOB_DISCOVERED], received);

    await broker.send({ topic: 'test-ns.job.discovered', key: 'user_1', value: '{not json' });
    await broker.send({ topic: 'test-ns.job.discovered', key: 'user_1', value: JSON.stringify({ event_type: 'job.discovered' }) });
    await bus.publish(createEvent({ event_type: EventType.JOB_DISCOVERED, user_id: 1 }));
    await waitFor(() => received.length === 1);

    const skipped = log.warn.mock.calls.filter((call) => call[1] === 'Skipping malformed message');
    expect(skipped).toHaveLength(2);
  });

  it('warns about events without a handler', async () => {
    const consumer = bus.createConsumer('g1', [EventType.JOB_DISCOVERED, EventType.JOB_ANALYZED]);
    const received: Event[] = [];
    consumer.registerHandler(EventType.JOB_ANALYZED, (event) => {
      received.push(event);
    });
    loops.push(consumer.consumeEvents());

    await bus.publish(createEvent({ event_type: EventType.JOB_DISCOVERED, user_id: 1 }));
    await bus.publish(createEvent({ event_type: EventType.JOB_ANALYZED, user_id: 1 }));
    await waitFor(() => received.length === 1);
    await waitFor(() => log.warn.mock.calls.some((call) => call[1] === 'No handler registered'));

    expect(received[0]?.event_type).toBe(EventType.JOB_ANALYZED);
  });
});
