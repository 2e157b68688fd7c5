import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Mock } from 'vitest';
import { EventType, StepStatus, WorkflowStatus } from '../../../src/domain/index.js';
import type { Event, StepData, StepSpec, WorkflowDefinition } from '../../../src/domain/index.js';
import { InvalidWorkflowTransitionError, Workflow } from '../../../src/application/index.js';
import type { EventPublisher, StepExecutor } from '../../../src/application/index.js';
import { asLogger, fakeLogger, waitFor } from '../../helpers.js';
import type { FakeLogger } from '../../helpers.js';

function fnStep(stepId: string, overrides: Partial<StepSpec> = {}): StepSpec {
  return {
    step_id: stepId,
    name: stepId,
    handler: { kind: 'function', name: stepId },
    retry_delay_seconds: 0,
    ...overrides,
  };
}

function definition(steps: StepSpec[]): WorkflowDefinition {
  return {
    workflow_type: 'test_flow',
    template_id: 'test_flow',
    name: 'Test flow',
    description: 'Steps for tests',
    estimated_duration: '1 minute',
    steps,
  };
}

interface Deferred {
  promise: Promise<Record<string, unknown>>;
  resolve: (value: Record<string, unknown>) => void;
}

function deferred(): Deferred {
  let resolve: (value: Record<string, unknown>) => void = () => {};
  const promise = new Promise<Record<string, unknown>>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('Workflow', () => {
  let log: FakeLogger;
  let published: Event[];
  let publisher: EventPublisher;

  beforeEach(() => {
    log = fakeLogger();
    published = [];
    publisher = {
      publish: vi.fn(async (event: Event) => {
        published.push(event);
        return true;
      }),
    };
  });

  function build(steps: StepSpec[], executor: StepExecutor, initialContext: StepData = {}): Workflow {
    return new Workflow({
      definition: definition(steps),
      userId: 42,
      executor,
      publisher,
      cellId: 'cell-001',
      logger: asLogger(log),
      initialContext,
    });
  }

  function stepEvents(): Array<[unknown, unknown]> {
    return published
      .filter((e) => e.event_type === EventType.WORKFLOW_STEP_COMPLETED)
      .map((e) => [e.data['step_id'], e.data['step_status']]);
  }

  it('runs every step in order and merges outputs into the context', async () => {
    const inputs: Array<Record<string, unknown>> = [];
    const executor = vi.fn<StepExecutor>(async (step, input) => {
      inputs.push(input);
      return { [`${step.step_id}_done`]: true };
    });
    const workflow = build([fnStep('first'), fnStep('second', { input_data: { mode: 'fast' } }), fnStep('third')], executor, {
      search_terms: ['python'],
    });

    workflow.start();
    await workflow.waitForCompletion();
    await workflow.flushEvents();

    expect(workflow.status).toBe(WorkflowStatus.COMPLETED);
    expect(workflow.progressPercentage()).toBe(100);
    expect(workflow.context).toEqual({
      search_terms: ['python'],
      first_done: true,
      second_done: true,
      third_done: true,
    });
    expect(inputs[1]).toEqual({
      mode: 'fast',
      search_terms: ['python'],
      first_done: true,
      workflow_id: workflow.workflow_id,
      step_id: 'second',
    });

    expect(published[0]?.event_type).toBe(EventType.WORKFLOW_STARTED);
    expect(published.at(-1)?.event_type).toBe(EventType.WORKFLOW_COMPLETED);
    expect(published.every((e) => e.correlation_id === workflow.workflow_id)).toBe(true);
    expect(stepEvents()).toEqual([
      ['first', 'started'], ['first', 'completed'],
      ['second', 'started'], ['second', 'completed'],
      ['third', 'started'], ['third', 'completed'],
    ]);
  });

  it('completes three required steps that all succeed', async () => {
    const workflow = build([fnStep('a'), fnStep('b'), fnStep('c')], vi.fn<StepExecutor>(async () => ({})));

    workflow.start();
    await workflow.waitForCompletion();

    expect(workflow.status).toBe(WorkflowStatus.COMPLETED);
    expect(workflow.current_step_index).toBe(3);
    expect(workflow.progressPercentage()).toBe(100);
    expect(workflow.completed_at).toBeInstanceOf(Date);
    expect(workflow.steps.map((s) => s.status)).toEqual([
      StepStatus.COMPLETED, StepStatus.COMPLETED, StepStatus.COMPLETED,
    ]);
  });

  it('fails on the first step when a required step has no retries', async () => {
    const executor = vi.fn<StepExecutor>(async (step) => {
      if (step.step_id === 'first') throw new Error('always broken');
      return {};
    });
    const workflow = build([fnStep('first', { retry_count: 0 }), fnStep('second')], executor);

    workflow.start();
    await workflow.waitForCompletion();

    expect(workflow.status).toBe(WorkflowStatus.FAILED);
    expect(workflow.current_step_index).toBe(0);
    expect(workflow.steps[0]?.status).toBe(StepStatus.FAILED);
    expect(workflow.steps[1]?.status).toBe(StepStatus.PENDING);
    expect(workflow.error_message).toBe('Required step first failed: always broken');
    expect(executor).toHaveBeenCalledTimes(1);
  });

  it('stops retrying once the retry budget is spent', async () => {
    const executor = vi.fn<StepExecutor>(async () => {
      throw new Error('still down');
    });
    const workflow = build([fnStep('flaky', { retry_count: 2, required: false })], executor);

    workflow.start();
    await workflow.waitForCompletion();

    const step = workflow.steps[0];
    expect(step?.current_retry).toBe(2);
    expect(step?.current_retry).toBe(step?.retry_count);
    expect(step?.status).toBe(StepStatus.SKIPPED);
    expect(executor).toHaveBeenCalledTimes(3);
  });

  it('lets the workflow context override static step input', async () => {
    const executor = vi.fn<StepExecutor>(async () => ({}));
    const workflow = build([fnStep('discover', { input_data: { location: 'Remote', max_jobs: 10 } })], executor, {
      location: 'Berlin',
    });

    workflow.start();
    await workflow.waitForCompletion();

    expect(executor.mock.calls[0]?.[1]).toMatchObject({ location: 'Berlin', max_jobs: 10 });
  });

  it('retries a failing step and succeeds on a later attempt', async () => {
    let attempts = 0;
    const executor = vi.fn<StepExecutor>(async (step) => {
      if (step.step_id === 'flaky' && ++attempts < 3) {
        throw new Error(`attempt ${attempts} failed`);
      }
      return { ok: true };
    });
    const workflow = build([fnStep('flaky', { retry_count: 3 }), fnStep('after')], executor);

    workflow.start();
    await workflow.waitForCompletion();
    await workflow.flushEvents();

    expect(workflow.status).toBe(WorkflowStatus.COMPLETED);
    const flaky = workflow.steps[0];
    expect(flaky?.status).toBe(StepStatus.COMPLETED);
    expect(flaky?.current_retry).toBe(2);
    expect(stepEvents().filter(([id, status]) => id === 'flaky' && status === 'failed')).toHaveLength(2);
  });

  it('fails when a required step exhausts its retries', async () => {
    const executor = vi.fn<StepExecutor>(async (step) => {
      if (step.step_id === 'broken') throw new Error('board offline');
      return {};
    });
    const workflow = build([fnStep('ok'), fnStep('broken', { retry_count: 1 }), fnStep('never')], executor);

    workflow.start();
    await workflow.waitForCompletion();
    await workflow.flushEvents();

    expect(workflow.status).toBe(WorkflowStatus.FAILED);
    expect(workflow.error_message).toBe('Required step broken failed: board offline');
    expect(workflow.current_step_index).toBe(1);
    expect(workflow.steps[1]?.current_retry).toBe(1);
    expect(workflow.steps[2]?.status).toBe(StepStatus.PENDING);
    expect(executor).toHaveBeenCalledTimes(3);
    expect(published.at(-1)).toMatchObject({
      event_type: EventType.WORKFLOW_FAILED,
      data: { status: 'failed', error_message: 'Required step broken failed: board offline' },
    });
  });

  it('skips an optional step that keeps failing', async () => {
    const executor = vi.fn<StepExecutor>(async (step) => {
      if (step.step_id === 'optional') throw new Error('nope');
      return { [step.step_id]: 1 };
    });
    const workflow = build([fnStep('optional', { retry_count: 0, required: false }), fnStep('last')], executor);

    workflow.start();
    await workflow.waitForCompletion();

    expect(workflow.status).toBe(WorkflowStatus.COMPLETED);
    expect(workflow.steps[0]?.status).toBe(StepStatus.SKIPPED);
    expect(workflow.steps[0]?.error_message).toBe('Failed but optional: nope');
    expect(workflow.context).toEqual({ last: 1 });
    expect(workflow.progressPercentage()).toBe(50);
  });

  it('times out a step that never answers', async () => {
    const seen: { signal?: AbortSignal } = {};
    const executor = vi.fn<StepExecutor>((_step, _input, context) => {
      seen.signal = context.signal;
      return new Promise(() => {});
    });
    const workflow = build([fnStep('slow', { timeout_seconds: 0.02, retry_count: 0 })], executor);

    workflow.start();
    await workflow.waitForCompletion();

    expect(workflow.status).toBe(WorkflowStatus.FAILED);
    expect(workflow.error_message).toBe('Required step slow failed: Step slow timed out after 0.02s');
    expect(seen.signal?.aborted).toBe(true);
  });

  it('pauses between steps and resumes where it stopped', async () => {
    const gate = deferred();
    const executor = vi.fn<StepExecutor>(async (step) => (step.step_id === 'first' ? gate.promise : { second: true }));
    const workflow = build([fnStep('first'), fnStep('second')], executor);

    workflow.start();
    expect(workflow.pause()).toBe(true);
    expect(workflow.pause()).toBe(false);

    gate.resolve({ first: true });
    await waitFor(() => workflow.steps[0]?.status === StepStatus.COMPLETED);
    await new Promise((resolve) => setTimeout(resolve, 20));

    expect(workflow.status).toBe(WorkflowStatus.PAUSED);
    expect(workflow.current_step_index).toBe(1);
    expect(workflow.steps[1]?.status).toBe(StepStatus.PENDING);

    expect(workflow.resume()).toBe(true);
    expect(workflow.resume()).toBe(false);
    await workflow.waitForCompletion();

    expect(workflow.status).toBe(WorkflowStatus.COMPLETED);
    expect(workflow.context).toEqual({ first: true, second: true });
  });

  it('cancels an in-flight step and schedules nothing after it', async () => {
    const executor = vi.fn<StepExecutor>((_step, _input, context) => new Promise((_resolve, reject) => {
      context.signal.addEventListener('abort', () => reject(context.signal.reason));
    }));
    const workflow = build([fnStep('waiting'), fnStep('never')], executor);

    workflow.start();
    await waitFor(() => executor.mock.calls.length === 1);
    expect(workflow.cancel('User changed their mind')).toBe(true);
    expect(workflow.cancel()).toBe(false);
    await workflow.flushEvents();
    await new Promise((resolve) => setTimeout(resolve, 10));

    expect(workflow.status).toBe(WorkflowStatus.CANCELLED);
    expect(workflow.error_message).toBe('User changed their mind');
    expect(workflow.steps[0]?.status).toBe(StepStatus.FAILED);
    expect(workflow.steps[0]?.error_message).toBe('Step waiting cancelled');
    expect(workflow.steps[1]?.status).toBe(StepStatus.PENDING);
    expect(executor).toHaveBeenCalledTimes(1);
    expect(published.filter((e) => e.event_type === EventType.WORKFLOW_CANCELLED)).toHaveLength(1);
  });

  it('cancels a paused workflow', async () => {
    const workflow = build([fnStep('first')], vi.fn<StepExecutor>(async () => ({})));

    workflow.start();
    workflow.pause();
    expect(workflow.cancel()).toBe(true);
    await workflow.waitForCompletion();

    expect(workflow.status).toBe(WorkflowStatus.CANCELLED);
    expect(workflow.error_message).toBe('Cancelled by request');
    expect(workflow.resume()).toBe(false);
  });

  it('starts only once', () => {
    const workflow = build([fnStep('first')], vi.fn<StepExecutor>(async () => ({})));
    workflow.start();

    expect(() => workflow.start()).toThrow(InvalidWorkflowTransitionError);
  });

  it('completes an empty workflow', async () => {
    const workflow = build([], vi.fn<StepExecutor>(async () => ({})));

    workflow.start();
    await workflow.waitForCompletion();

    expect(workflow.status).toBe(WorkflowStatus.COMPLETED);
    expect(workflow.progressPercentage()).toBe(100);
  });

  it('keeps running when lifecycle events cannot be published', async () => {
    const failing: Mock<EventPublisher['publish']> = vi.fn(async () => {
      throw new Error('broker down');
    });
    publisher = { publish: failing };
    const workflow = build([fnStep('only')], vi.fn<StepExecutor>(async () => ({})));

    workflow.start();
    await workflow.waitForCompletion();
    await workflow.flushEvents();

    expect(workflow.status).toBe(WorkflowStatus.COMPLETED);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ event_type: EventType.WORKFLOW_STARTED }),
      'Failed to publish lifecycle event',
    );
  });

  it('reports its state as a snapshot', async () => {
    const workflow = build([fnStep('only')], vi.fn<StepExecutor>(async () => ({ done: 1 })));
    expect(workflow.toJSON()).toMatchObject({ status: 'pending', started_at: null, duration_seconds: null, total_steps: 1 });

    workflow.start();
    await workflow.waitForCompletion();

    expect(workflow.toJSON()).toMatchObject({
      workflow_type: 'test_flow',
      user_id: 42,
      status: 'completed',
      current_step_index: 1,
      progress_percentage: 100,
      error_message: null,
      context: { done: 1 },
    });
  });
});
