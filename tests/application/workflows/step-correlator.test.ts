import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { EventType, createEvent } from '../../../src/domain/index.js';
import { AgentTaskError, StepCorrelator } from '../../../src/application/index.js';
import { asLogger, createTestBus } from '../../helpers.js';
import type { TestBus } from '../../helpers.js';

describe('StepCorrelator', () => {
  let harness: TestBus;
  let correlator: StepCorrelator;
  let loop: Promise<void>;

  beforeEach(async () => {
    harness = await createTestBus();
    correlator = new StepCorrelator({ bus: harness.bus, cellId: 'cell-001', logger: asLogger(harness.log) });
    loop = correlator.start();
  });

  afterEach(async () => {
    await correlator.stop();
    await loop;
    await harness.close();
  });

  function completed(requestEventId: string, output: Record<string, unknown>) {
    return createEvent({
      event_type: EventType.AGENT_TASK_COMPLETED,
      user_id: 1,
      data: { request_event_id: requestEventId, workflow_id: 'wf-1', step_id: 's1', agent_id: 'a1', output },
    });
  }

  it('uses a group of its own per instance', () => {
    const other = new StepCorrelator({ bus: harness.bus, cellId: 'cell-001', logger: asLogger(harness.log) });

    expect(correlator.groupId).toMatch(/^cell-001-workflow-correlator-/);
    expect(other.groupId).not.toBe(correlator.groupId);
  });

  it('is ready once started, and refuses readiness before that', async () => {
    const idle = new StepCorrelator({ bus: harness.bus, cellId: 'cell-001', logger: asLogger(harness.log) });

    await expect(idle.ready()).rejects.toThrow('Step correlator is not started');
    await expect(correlator.ready()).resolves.toBeUndefined();
  });

  it('resolves the waiting request with the agent output', async () => {
    const reply = correlator.expect('req-1', new AbortController().signal);
    expect(correlator.pendingCount).toBe(1);

    await harness.bus.publish(completed('req-1', { analyzed_job_ids: ['j1'] }));

    await expect(reply).resolves.toEqual({ analyzed_job_ids: ['j1'] });
    expect(correlator.pendingCount).toBe(0);
  });

  it('rejects the waiting request when the agent reports a failure', async () => {
    const reply = correlator.expect('req-2', new AbortController().signal);

    await harness.bus.publish(createEvent({
      event_type: EventType.AGENT_HEALTH_CHECK,
      user_id: 1,
      data: { agent_id: 'analysis-1', error: 'Job application j9 not found', original_event_id: 'req-2' },
    }));

    await expect(reply).rejects.toThrow(AgentTaskError);
    await expect(reply).rejects.toThrow('Agent analysis-1 failed: Job application j9 not found');
  });

  it('ignores replies nobody waits for', async () => {
    const reply = correlator.expect('req-3', new AbortController().signal);

    await harness.bus.publish(completed('someone-else', { x: 1 }));
    await harness.bus.publish(completed('req-3', { x: 2 }));

    await expect(reply).resolves.toEqual({ x: 2 });
  });

  it('rejects with the abort reason and forgets the request', async () => {
    const controller = new AbortController();
    const reply = correlator.expect('req-4', controller.signal);
    controller.abort(new Error('step timed out'));

    await expect(reply).rejects.toThrow('step timed out');
    expect(correlator.pendingCount).toBe(0);
  });

  it('drops discarded requests without settling them', () => {
    void correlator.expect('req-5', new AbortController().signal);
    correlator.discard('req-5');

    expect(correlator.pendingCount).toBe(0);
  });

  it('rejects everything still pending when stopped', async () => {
    const reply = correlator.expect('req-6', new AbortController().signal);

    await correlator.stop();

    await expect(reply).rejects.toThrow('Correlator stopped before a reply to req-6 arrived');
  });
});
