import { describe, it, expect } from 'vitest';
import { StepStatus } from '../../../src/domain/index.js';
import { InvalidStepTransitionError, WorkflowStep } from '../../../src/application/index.js';

function analysisStep(retryCount = 2): WorkflowStep {
  return new WorkflowStep({
    step_id: 'analyze_job',
    name: 'Analyze job',
    handler: { kind: 'agent', role: 'analysis' },
    input_data: { job_id: 'j1' },
    retry_count: retryCount,
  });
}

describe('WorkflowStep', () => {
  it('fills catalog defaults', () => {
    const step = new WorkflowStep({
      step_id: 'finalize',
      name: 'Finalize',
      handler: { kind: 'function', name: 'finalize' },
    });

    expect(step.toJSON()).toMatchObject({
      status: 'pending',
      input_data: {},
      output_data: null,
      timeout_seconds: 300,
      max_retries: 3,
      retry_delay_seconds: 5,
      required: true,
      current_retry: 0,
      duration_seconds: null,
    });
  });

  it('records output and timing on completion', () => {
    const step = analysisStep();
    step.start();
    step.complete({ analyzed: true });

    const snapshot = step.toJSON();
    expect(snapshot.status).toBe(StepStatus.COMPLETED);
    expect(snapshot.output_data).toEqual({ analyzed: true });
    expect(snapshot.started_at).not.toBeNull();
    expect(snapshot.duration_seconds).toBeGreaterThanOrEqual(0);
  });

  it('retries until the budget is spent', () => {
    const step = analysisStep(2);

    for (let attempt = 1; attempt <= 2; attempt++) {
      step.start();
      step.fail(`boom ${attempt}`);
      expect(step.canRetry).toBe(true);
      step.retry();
      expect(step.status).toBe(StepStatus.RETRYING);
      expect(step.current_retry).toBe(attempt);
    }

    step.start();
    expect(step.error_message).toBeNull();
    step.fail('boom 3');

    expect(step.canRetry).toBe(false);
    expect(() => step.retry()).toThrow(InvalidStepTransitionError);
    expect(step.current_retry).toBe(2);
  });

  it('skips a failed step and keeps the reason', () => {
    const step = analysisStep(0);
    step.start();
    step.fail('board offline');
    step.skip('Optional step failed: board offline');

    expect(step.status).toBe(StepStatus.SKIPPED);
    expect(step.error_message).toBe('Optional step failed: board offline');
  });

  it('rejects illegal moves', () => {
    const step = analysisStep();

    expect(() => step.complete({})).toThrow('Step analyze_job cannot move from pending to completed');
    step.start();
    expect(() => step.start()).toThrow(InvalidStepTransitionError);
    expect(() => step.skip('late')).toThrow(InvalidStepTransitionError);
  });

  it('copies input data', () => {
    const input = { job_id: 'j1' };
    const step = new WorkflowStep({
      step_id: 's',
      name: 's',
      handler: { kind: 'function', name: 'f' },
      input_data: input,
    });
    input.job_id = 'changed';

    expect(step.input_data).toEqual({ job_id: 'j1' });
  });
});
