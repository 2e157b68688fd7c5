import { describe, it, expect } from 'vitest';
import { EventType, createEvent } from '../../src/domain/index.js';
import { parseEventMessage, serializeEvent } from '../../src/application/index.js';

describe('parseEventMessage', () => {
  it('reads back a serialized event', () => {
    const event = createEvent({
      event_type: EventType.RESUME_GENERATED,
      user_id: 42,
      correlation_id: 'wf-1',
      data: { job_id: 'j1' },
      metadata: { agent_id: 'generation-agent-1' },
    });

    const parsed = parseEventMessage(serializeEvent(event));

    expect(parsed).toEqual(event);
    expect(Object.isFrozen(parsed)).toBe(true);
  });

  it('defaults missing correlation_id, data and metadata', () => {
    const raw = JSON.stringify({
      event_id: '3f0c2a52-5d6e-4c1b-9b9a-0c1d2e3f4a5b',
      event_type: 'job.discovered',
      timestamp: '2026-03-01T10:00:00+02:00',
      user_id: 3,
      cell_id: 'cell-001',
    });

    const parsed = parseEventMessage(raw);

    expect(parsed.correlation_id).toBeNull();
    expect(parsed.data).toEqual({});
    expect(parsed.metadata).toEqual({});
  });

  it('rejects tags outside the catalog', () => {
    const raw = JSON.stringify({
      event_id: '3f0c2a52-5d6e-4c1b-9b9a-0c1d2e3f4a5b',
      event_type: 'job.deleted',
      timestamp: '2026-03-01T10:00:00Z',
      user_id: 3,
      cell_id: 'cell-001',
    });

    expect(() => parseEventMessage(raw)).toThrow();
  });

  it('rejects invalid JSON', () => {
    expect(() => parseEventMessage('{not json')).toThrow(SyntaxError);
  });
});
