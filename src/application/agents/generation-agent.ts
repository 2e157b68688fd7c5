import { z } from 'zod';
import { EventType, ExperienceLevel } from '../../domain/index.js';
import type { Event, JobAnalysis, JobApplication, ResumeVersion } from '../../domain/index.js';
import { BaseAgent, ORIGIN_WORKFLOW_KEY } from './base-agent.js';
import type { AgentOptions, AgentOutput } from './base-agent.js';
import type { ApplicationRepository, DocumentStore, ResumeRenderer } from './collaborators.js';
import { readStoredAnalysis } from './job-analysis.js';

export const RESUME_TEMPLATES = ['modern_professional', 'senior_professional', 'executive_professional'] as const;

export type ResumeTemplate = (typeof RESUME_TEMPLATES)[number];

const generationRequestSchema = z
  .object({
    job_id: z.string().min(1).optional(),
    job_ids: z.array(z.string().min(1)).optional(),
    template: z.enum(RESUME_TEMPLATES).optional(),
    generate_multiple_versions: z.boolean().default(false),
    improvement_mode: z.boolean().default(false),
  })
  .refine((v) => v.job_id !== undefined || v.job_ids !== undefined || v.improvement_mode, {
    message: 'job_id or job_ids is required',
  });

const analyzedSchema = z.object({
  job_id: z.string().min(1),
  auto_generate: z.boolean().default(true),
});

/** Picks a template from the analyzed seniority. */
export function selectTemplate(analysis: JobAnalysis | null): ResumeTemplate {
  switch (analysis?.experience_level) {
    case ExperienceLevel.MANAGEMENT:
      return 'executive_professional';
    case ExperienceLevel.SENIOR:
    case ExperienceLevel.LEAD:
      return 'senior_professional';
    default:
      return 'modern_professional';
  }
}

function slugify(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '') || 'job';
}

export interface GenerationAgentOptions extends AgentOptions {
  repository: ApplicationRepository;
  renderer: ResumeRenderer;
  documents: DocumentStore;
}

/**
 * Produces tailored resume documents.
 *
 * Handles explicit generation requests, and generates automatically for
 * every analyzed job that was not analyzed on behalf of a workflow.
 */
export class GenerationAgent extends BaseAgent {
  readonly role = 'generation' as const;
  readonly subscribedEvents = [EventType.RESUME_GENERATION_REQUESTED, EventType.JOB_ANALYZED] as const;

  private readonly repository: ApplicationRepository;
  private readonly renderer: ResumeRenderer;
  private readonly documents: DocumentStore;

  constructor(options: GenerationAgentOptions) {
    super(options, 'generation');
    this.repository = options.repository;
    this.renderer = options.renderer;
    this.documents = options.documents;
  }

  protected async processEvent(event: Event): Promise<AgentOutput> {
    if (event.event_type === EventType.JOB_ANALYZED) {
      return this.handleAnalyzed(event);
    }
    if (event.event_type === EventType.RESUME_GENERATION_REQUESTED) {
      return this.handleRequest(event);
    }
    throw new Error(`Unsupported event type: ${event.event_type}`);
  }

  private async handleAnalyzed(event: Event): Promise<AgentOutput> {
    if (typeof event.metadata[ORIGIN_WORKFLOW_KEY] === 'string') {
      return { skipped: true, reason: 'workflow_driven' };
    }
    const { job_id, auto_generate } = analyzedSchema.parse(event.data);
    if (!auto_generate) {
      return { skipped: true, reason: 'auto_generate_disabled' };
    }

    const job = await this.loadJob(job_id);
    const version = await this.generate(event, job, selectTemplate(readStoredAnalysis(job)));
    return { generated_job_ids: [job.id], resume_versions: [versionSummary(version)] };
  }

  private async handleRequest(event: Event): Promise<AgentOutput> {
    const request = generationRequestSchema.parse(event.data);
    let jobIds = [...new Set([...(request.job_ids ?? []), ...(request.job_id === undefined ? [] : [request.job_id])])];
    if (jobIds.length === 0 && request.improvement_mode) {
      // Regenerate every resume the user already has.
      const jobs = await this.repository.listJobApplications({ user_id: event.user_id });
      jobIds = jobs.filter((job) => job.resume_version !== null).map((job) => job.id);
    }

    const versions: ResumeVersion[] = [];
    for (const jobId of jobIds) {
      const job = await this.loadJob(jobId);
      const primary = request.template ?? selectTemplate(readStoredAnalysis(job));
      const templates = request.generate_multiple_versions
        ? [primary, ...RESUME_TEMPLATES.filter((t) => t !== primary)]
        : [primary];

      for (const template of templates) {
        versions.push(await this.generate(event, job, template));
      }
    }

    return {
      generated_job_ids: jobIds,
      resume_versions: versions.map(versionSummary),
    };
  }

  private async loadJob(jobId: string): Promise<JobApplication> {
    const job = await this.repository.findJobApplication(jobId);
    if (job === null) {
      throw new Error(`Job application ${jobId} not found`);
    }
    return job;
  }

  /** Render → store → record version → announce. */
  private async generate(event: Event, job: JobApplication, template: ResumeTemplate): Promise<ResumeVersion> {
    const existing = await this.repository.listResumeVersions(job.id);
    const versionName = `${slugify(job.company)}-${template}-v${existing.length + 1}`;

    const document = await this.renderer.render({
      user_id: job.user_id,
      template,
      job,
      analysis: readStoredAnalysis(job),
    });
    const key = `resumes/user_${job.user_id}/${job.id}/${versionName}.${document.extension}`;
    const uri = await this.documents.put(key, document.content, document.content_type);

    const version = await this.repository.createResumeVersion({
      user_id: job.user_id,
      job_id: job.id,
      version_name: versionName,
      template,
      document_uri: uri,
      extra_data: { content_type: document.content_type },
    });
    await this.repository.updateJobApplication(job.id, { resume_version: versionName });

    await this.publishEvent(this.deriveEvent(event, {
      event_type: EventType.RESUME_GENERATED,
      data: {
        job_id: job.id,
        resume_url: uri,
        version_name: versionName,
        resume_version_id: version.id,
        template,
      },
    }));

    this.log.info({ job_id: job.id, version_name: versionName }, 'Resume generated');
    return version;
  }
}

function versionSummary(version: ResumeVersion): Record<string, unknown> {
  return {
    id: version.id,
    job_id: version.job_id,
    version_name: version.version_name,
    template: version.template,
    document_uri: version.document_uri,
  };
}
