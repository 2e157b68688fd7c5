import { z } from 'zod';
import { ApplicationStatus, EventType, createEvent } from '../../domain/index.js';
import type { JobApplication, StepData } from '../../domain/index.js';
import type { ApplicationRepository } from '../agents/collaborators.js';
import type { EventPublisher } from '../event-bus.js';
import { StepCancelledError } from '../errors.js';
import type { LocalStepRegistry } from './step-dispatcher.js';
import type { StepExecutionContext } from './workflow.js';
import { sleep } from './timing.js';

const DAY_MS = 86_400_000;
const STAGED_BATCH_SIZE = 5;

const jobIdsField = z.array(z.string().min(1)).default([]);

const submitSchema = z.object({
  job_ids: jobIdsField,
  auto_submit: z.boolean().default(false),
  /** Seconds between two submissions. */
  submission_delay: z.number().min(0).default(300),
});

const trackingSchema = z.object({
  job_ids: jobIdsField,
  follow_up_schedule: z.enum(['daily', 'weekly', 'biweekly']).default('weekly'),
  /** Days until the first status check. */
  status_check_interval: z.number().positive().default(3),
});

const stagedSchema = z.object({
  job_ids: jobIdsField,
  daily_limit: z.number().int().positive().default(20),
  /** Seconds between batches. */
  submission_spacing: z.number().min(0).default(900),
});

export interface LocalStepsDeps {
  repository: ApplicationRepository;
  publisher: EventPublisher;
  cellId: string;
}

/**
 * Step functions that run inside the engine process: submission and
 * tracking have no dedicated agent, they only touch the repository
 * and announce what they did.
 */
export function createLocalSteps(deps: LocalStepsDeps): LocalStepRegistry {
  const { repository, publisher, cellId } = deps;

  async function loadJobs(jobIds: readonly string[]): Promise<JobApplication[]> {
    const jobs: JobApplication[] = [];
    for (const id of jobIds) {
      const job = await repository.findJobApplication(id);
      if (job === null) throw new Error(`Job application ${id} not found`);
      jobs.push(job);
    }
    return jobs;
  }

  async function submitApplications(input: StepData, context: StepExecutionContext): Promise<StepData> {
    const request = submitSchema.parse(input);
    const jobs = await loadJobs(request.job_ids);

    if (!request.auto_submit) {
      for (const job of jobs) {
        await repository.updateJobApplication(job.id, { status: ApplicationStatus.QUEUED });
      }
      return { submitted_job_ids: [], queued_job_ids: jobs.map((j) => j.id), requires_approval: true };
    }

    const submitted: string[] = [];
    for (const [i, job] of jobs.entries()) {
      if (i > 0 && !(await sleep(request.submission_delay * 1000, context.signal))) {
        throw new StepCancelledError(context.step_id);
      }
      await repository.updateJobApplication(job.id, { status: ApplicationStatus.APPLIED });
      await publisher.publish(createEvent({
        event_type: EventType.APPLICATION_SUBMITTED,
        user_id: context.user_id,
        cell_id: cellId,
        correlation_id: context.workflow_id,
        data: { job_id: job.id, company: job.company, position: job.position, url: job.url },
        metadata: { component: 'workflow-engine', step_id: context.step_id },
      }));
      submitted.push(job.id);
    }
    return { submitted_job_ids: submitted, queued_job_ids: [], requires_approval: false };
  }

  async function setupTracking(input: StepData): Promise<StepData> {
    const request = trackingSchema.parse(input);
    const nextCheckAt = new Date(Date.now() + request.status_check_interval * DAY_MS).toISOString();
    const tracking = { follow_up_schedule: request.follow_up_schedule, next_check_at: nextCheckAt };

    for (const job of await loadJobs(request.job_ids)) {
      await repository.updateJobApplication(job.id, { extra_data: { ...job.extra_data, tracking } });
    }
    return { tracked_job_ids: request.job_ids, tracking };
  }

  async function stagedSubmission(input: StepData): Promise<StepData> {
    const request = stagedSchema.parse(input);
    const today = request.job_ids.slice(0, request.daily_limit);
    const deferred = request.job_ids.slice(request.daily_limit);
    const jobs = await loadJobs(today);
    const now = Date.now();

    const batches: Array<{ batch: number; job_ids: string[]; scheduled_at: string }> = [];
    for (let start = 0; start < jobs.length; start += STAGED_BATCH_SIZE) {
      const batch = batches.length;
      const scheduledAt = new Date(now + batch * request.submission_spacing * 1000).toISOString();
      const members = jobs.slice(start, start + STAGED_BATCH_SIZE);
      for (const job of members) {
        await repository.updateJobApplication(job.id, {
          status: ApplicationStatus.QUEUED,
          extra_data: { ...job.extra_data, scheduled_submission_at: scheduledAt },
        });
      }
      batches.push({ batch, job_ids: members.map((j) => j.id), scheduled_at: scheduledAt });
    }

    return { queued_job_ids: jobs.map((j) => j.id), deferred_job_ids: deferred, batches };
  }

  return {
    submit_applications: submitApplications,
    setup_tracking: setupTracking,
    staged_submission: stagedSubmission,
  };
}
