import { vi } from 'vitest';
import type { Logger } from 'pino';
import { ApplicationStatus, EVENT_TYPES } from '../src/domain/index.js';
import type { Event, EventType, NewJobApplication } from '../src/domain/index.js';
import { EventBus } from '../src/application/index.js';
import { InMemoryBroker } from '../src/infrastructure/broker/index.js';

export interface FakeLogger {
  info: ReturnType<typeof vi.fn>;
  debug: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
  fatal: ReturnType<typeof vi.fn>;
  trace: ReturnType<typeof vi.fn>;
  child: ReturnType<typeof vi.fn>;
}

/**
 * Minimal fake logger. `child()` hands back the same object, so calls
 * made by components through their child loggers land on these spies.
 */
export function fakeLogger(): FakeLogger {
  const log: FakeLogger = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log;
}

export function asLogger(log: FakeLogger): Logger {
  return log as unknown as Logger;
}

/** Polls until `predicate` holds; fails the test after `timeoutMs`. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}

let jobCounter = 0;

/** NewJobApplication factory with a unique URL per call. */
export function makeJob(overrides: Partial<NewJobApplication> = {}): NewJobApplication {
  jobCounter++;
  return {
    user_id: 42,
    company: 'Acme',
    position: 'Backend Engineer',
    url: `https://jobs.example.com/acme/${jobCounter}`,
    job_description: 'We need python and sql with 3+ years of experience.',
    location: 'Remote',
    remote: true,
    salary_min: null,
    salary_max: null,
    status: ApplicationStatus.DISCOVERED,
    source: 'test',
    extra_data: {},
    ...overrides,
  };
}

export interface TestBus {
  bus: EventBus;
  broker: InMemoryBroker;
  log: FakeLogger;
  /** Every event published after creation, in delivery order. */
  seen: Event[];
  ofType(type: EventType): Event[];
  close(): Promise<void>;
}

/** Connected bus over an in-memory broker, with an observer group on every topic. */
export async function createTestBus(): Promise<TestBus> {
  const log = fakeLogger();
  const broker = new InMemoryBroker({ logger: asLogger(log), partitions: 3 });
  const bus = new EventBus({ broker, namespace: 'test-ns', logger: asLogger(log) });
  await bus.connect();

  const seen: Event[] = [];
  const observer = bus.createConsumer('test-observer', EVENT_TYPES);
  for (const type of EVENT_TYPES) {
    observer.registerHandler(type, (event) => {
      seen.push(event);
    });
  }
  const loop = observer.consumeEvents();

  return {
    bus,
    broker,
    log,
    seen,
    ofType: (type) => seen.filter((e) => e.event_type === type),
    close: async () => {
      await bus.disconnect();
      await loop;
    },
  };
}
