import { createHash } from 'node:crypto';
import { z } from 'zod';
import { EventType } from '../../domain/index.js';
import type { Event, JobAnalysis, JobApplication } from '../../domain/index.js';
import { BaseAgent } from './base-agent.js';
import type { AgentOptions, AgentOutput } from './base-agent.js';
import type { ApplicationRepository, JobAnalyzer } from './collaborators.js';
import { analyzeByKeywords } from './keyword-analyzer.js';

const DEFAULT_CACHE_SIZE = 500;

const analysisRequestSchema = z
  .object({
    job_id: z.string().min(1).optional(),
    job_ids: z.array(z.string().min(1)).optional(),
    job_description: z.string().min(1).optional(),
  })
  .refine((v) => v.job_id !== undefined || v.job_ids !== undefined, {
    message: 'job_id or job_ids is required',
  });

export interface AnalysisAgentOptions extends AgentOptions {
  repository: ApplicationRepository;
  analyzer: JobAnalyzer;
  cacheSize?: number;
}

/**
 * Analyzes stored job postings: skills, seniority and role type.
 *
 * Results are cached by a hash of the description, written back into
 * the job's `extra_data.analysis`, and announced as `job.analyzed`.
 */
export class AnalysisAgent extends BaseAgent {
  readonly role = 'analysis' as const;
  readonly subscribedEvents = [EventType.JOB_ANALYSIS_REQUESTED] as const;

  private readonly repository: ApplicationRepository;
  private readonly analyzer: JobAnalyzer;
  private readonly cacheSize: number;
  private readonly cache = new Map<string, JobAnalysis>();

  constructor(options: AnalysisAgentOptions) {
    super(options, 'analysis');
    this.repository = options.repository;
    this.analyzer = options.analyzer;
    this.cacheSize = options.cacheSize ?? DEFAULT_CACHE_SIZE;
  }

  protected async processEvent(event: Event): Promise<AgentOutput> {
    const request = analysisRequestSchema.parse(event.data);
    const jobIds = [...new Set([...(request.job_ids ?? []), ...(request.job_id === undefined ? [] : [request.job_id])])];

    const analyses: Record<string, JobAnalysis> = {};
    for (const jobId of jobIds) {
      const job = await this.repository.findJobApplication(jobId);
      if (job === null) {
        throw new Error(`Job application ${jobId} not found`);
      }

      const description = jobIds.length === 1 && request.job_description !== undefined
        ? request.job_description
        : job.job_description;
      const analysis = await this.analyzeJob(job, description);

      await this.repository.updateJobApplication(job.id, {
        extra_data: { ...job.extra_data, analysis },
      });

      await this.publishEvent(this.deriveEvent(event, {
        event_type: EventType.JOB_ANALYZED,
        data: { job_id: job.id, analysis_result: analysis },
      }));
      analyses[job.id] = analysis;
    }

    return { analyzed_job_ids: Object.keys(analyses), analyses };
  }

  /**
   * Cached per description. Falls back to keyword analysis when the
   * analyzer throws; fallbacks are not cached.
   */
  private async analyzeJob(job: JobApplication, description: string): Promise<JobAnalysis> {
    const cacheKey = createHash('md5').update(`${job.company}\n${job.position}\n${description}`).digest('hex');
    const cached = this.cache.get(cacheKey);
    if (cached !== undefined) {
      this.log.debug({ job_id: job.id }, 'Analysis cache hit');
      return cached;
    }

    const input = { company: job.company, position: job.position, description };
    let analysis: JobAnalysis;
    try {
      analysis = await this.analyzer.analyze(input);
    } catch (err: unknown) {
      this.log.warn({ err, job_id: job.id }, 'Analyzer failed, using keyword fallback');
      return analyzeByKeywords(input, 'keyword_fallback');
    }

    this.cache.set(cacheKey, analysis);
    if (this.cache.size > this.cacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done !== true) this.cache.delete(oldest.value);
    }
    return analysis;
  }
}
