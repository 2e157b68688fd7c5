import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Mock } from 'vitest';
import { EventType, createEvent } from '../../../src/domain/index.js';
import { AnalysisAgent, KeywordJobAnalyzer, readStoredAnalysis } from '../../../src/application/index.js';
import type { JobAnalyzer } from '../../../src/application/index.js';
import { InMemoryApplicationRepository } from '../../../src/infrastructure/index.js';
import { asLogger, createTestBus, makeJob, waitFor } from '../../helpers.js';
import type { TestBus } from '../../helpers.js';

describe('AnalysisAgent', () => {
  let harness: TestBus;
  let repository: InMemoryApplicationRepository;
  let analyzer: JobAnalyzer;
  let analyze: Mock<JobAnalyzer['analyze']>;
  let agent: AnalysisAgent;
  let loop: Promise<void>;

  beforeEach(async () => {
    harness = await createTestBus();
    repository = new InMemoryApplicationRepository();
    const keywords = new KeywordJobAnalyzer();
    analyze = vi.fn<JobAnalyzer['analyze']>((input) => keywords.analyze(input));
    analyzer = { analyze };
    agent = new AnalysisAgent({
      bus: harness.bus,
      cellId: 'cell-001',
      logger: asLogger(harness.log),
      agentId: 'analysis-1',
      repository,
      analyzer,
    });
    loop = agent.start();
  });

  afterEach(async () => {
    await agent.stop();
    await loop;
    await harness.close();
  });

  it('stores the analysis on the job and announces it', async () => {
    const job = await repository.createJobApplication(makeJob({
      position: 'Senior Backend Engineer',
      job_description: 'We use python and sql.',
    }));

    await harness.bus.publish(createEvent({
      event_type: EventType.JOB_ANALYSIS_REQUESTED,
      user_id: 42,
      data: { job_id: job.id },
    }));
    await waitFor(() => harness.ofType(EventType.JOB_ANALYZED).length === 1);

    const stored = await repository.findJobApplication(job.id);
    const analysis = stored === null ? null : readStoredAnalysis(stored);
    expect(analysis).toMatchObject({
      required_skills: ['python', 'sql', 'backend'],
      experience_level: 'senior',
      job_type: 'backend',
      analysis_method: 'analyzer',
    });
    expect(harness.ofType(EventType.JOB_ANALYZED)[0]?.data).toEqual({ job_id: job.id, analysis_result: analysis });
  });

  it('serves repeated descriptions from the cache', async () => {
    const job = await repository.createJobApplication(makeJob());
    for (let i = 0; i < 2; i++) {
      await harness.bus.publish(createEvent({
        event_type: EventType.JOB_ANALYSIS_REQUESTED,
        user_id: 42,
        data: { job_id: job.id },
      }));
    }
    await waitFor(() => harness.ofType(EventType.JOB_ANALYZED).length === 2);

    expect(analyze).toHaveBeenCalledTimes(1);
  });

  it('falls back to keyword analysis when the analyzer fails', async () => {
    analyze.mockRejectedValueOnce(new Error('model unavailable'));
    const job = await repository.createJobApplication(makeJob());

    await harness.bus.publish(createEvent({
      event_type: EventType.JOB_ANALYSIS_REQUESTED,
      user_id: 42,
      data: { job_id: job.id },
    }));
    await waitFor(() => harness.ofType(EventType.JOB_ANALYZED).length === 1);

    const data = harness.ofType(EventType.JOB_ANALYZED)[0]?.data;
    expect(data?.['analysis_result']).toMatchObject({ analysis_method: 'keyword_fallback' });
  });

  it('answers a batch step request with every analysis', async () => {
    const first = await repository.createJobApplication(makeJob());
    const second = await repository.createJobApplication(makeJob({ position: 'Frontend Developer' }));

    await harness.bus.publish(createEvent({
      event_type: EventType.JOB_ANALYSIS_REQUESTED,
      user_id: 42,
      correlation_id: 'wf-9',
      data: { job_ids: [first.id, second.id] },
      metadata: { workflow_id: 'wf-9', step_id: 'analyze_jobs' },
    }));
    await waitFor(() => harness.ofType(EventType.AGENT_TASK_COMPLETED).length === 1);

    const output = harness.ofType(EventType.AGENT_TASK_COMPLETED)[0]?.data['output'];
    expect(output).toMatchObject({ analyzed_job_ids: [first.id, second.id] });
  });

  it('reports an unknown job as a failure', async () => {
    await harness.bus.publish(createEvent({
      event_type: EventType.JOB_ANALYSIS_REQUESTED,
      user_id: 42,
      data: { job_id: 'missing' },
    }));
    await waitFor(() => harness.ofType(EventType.AGENT_HEALTH_CHECK).length === 1);

    expect(harness.ofType(EventType.AGENT_HEALTH_CHECK)[0]?.data['error']).toBe('Job application missing not found');
  });

  it('rejects a request without job ids', async () => {
    await harness.bus.publish(createEvent({
      event_type: EventType.JOB_ANALYSIS_REQUESTED,
      user_id: 42,
      data: {},
    }));
    await waitFor(() => harness.ofType(EventType.AGENT_HEALTH_CHECK).length === 1);

    expect(agent.getHealthStatus().events_failed).toBe(1);
  });
});
