import { z } from 'zod';
import { ApplicationStatus, EventType, isApplicationStatus } from '../../domain/index.js';
import type { Event, JobApplication } from '../../domain/index.js';
import { BaseAgent } from './base-agent.js';
import type { AgentOptions, AgentOutput } from './base-agent.js';
import type { ApplicationRepository } from './collaborators.js';
import { readStoredAnalysis } from './job-analysis.js';

export const MIN_APPLICATIONS_FOR_ANALYSIS = 5;
export const SUCCESS_RATE_THRESHOLD = 0.2;
const INTERVIEW_RATE_THRESHOLD = 0.1;
const MAX_KEYWORD_RECOMMENDATIONS = 5;

const SUBMITTED: readonly ApplicationStatus[] = [
  ApplicationStatus.APPLIED,
  ApplicationStatus.ACKNOWLEDGED,
  ApplicationStatus.SCREENING,
  ApplicationStatus.INTERVIEW,
  ApplicationStatus.OFFER,
  ApplicationStatus.REJECTED,
];
const RESPONDED: readonly ApplicationStatus[] = SUBMITTED.filter((s) => s !== ApplicationStatus.APPLIED);
const INTERVIEWED: readonly ApplicationStatus[] = [ApplicationStatus.INTERVIEW, ApplicationStatus.OFFER];

export type PerformanceRating = 'excellent' | 'good' | 'average' | 'needs_improvement' | 'insufficient_data';

export interface PerformanceSummary {
  total_applications: number;
  submitted: number;
  responses: number;
  interviews: number;
  offers: number;
  response_rate: number;
  interview_rate: number;
  offer_rate: number;
  rating: PerformanceRating;
}

function rate(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 10_000) / 10_000;
}

/** Funnel rates over a user's applications, plus a coarse rating. */
export function summarizePerformance(applications: readonly JobApplication[]): PerformanceSummary {
  const count = (statuses: readonly ApplicationStatus[]): number =>
    applications.filter((a) => statuses.includes(a.status)).length;

  const submitted = count(SUBMITTED);
  const responses = count(RESPONDED);
  const interviews = count(INTERVIEWED);
  const offers = count([ApplicationStatus.OFFER]);
  const summary = {
    total_applications: applications.length,
    submitted,
    responses,
    interviews,
    offers,
    response_rate: rate(responses, submitted),
    interview_rate: rate(interviews, submitted),
    offer_rate: rate(offers, submitted),
  };

  let rating: PerformanceRating;
  if (submitted < MIN_APPLICATIONS_FOR_ANALYSIS) rating = 'insufficient_data';
  else if (summary.offer_rate > 0.1) rating = 'excellent';
  else if (summary.interview_rate > 0.15) rating = 'good';
  else if (summary.response_rate > 0.2) rating = 'average';
  else rating = 'needs_improvement';

  return { ...summary, rating };
}

export function buildRecommendations(
  performance: PerformanceSummary,
  topPatterns: readonly string[],
): string[] {
  if (performance.rating === 'insufficient_data') {
    return [
      `Submit at least ${MIN_APPLICATIONS_FOR_ANALYSIS} applications before performance can be assessed.`,
    ];
  }

  const recommendations: string[] = [];
  if (performance.response_rate < SUCCESS_RATE_THRESHOLD) {
    recommendations.push(
      'Response rate is below 20%. Tailor the resume summary to each role.',
      'Mirror keywords from the job description so applicant tracking systems pick the resume up.',
    );
  }
  if (performance.interview_rate < INTERVIEW_RATE_THRESHOLD) {
    recommendations.push(
      'Few applications reach interviews. Quantify achievements in the experience section.',
      'Lead with projects that match the role\'s required skills.',
    );
  }
  const best = topPatterns[0];
  if (best !== undefined) {
    recommendations.push(`Consider targeting ${best.replace(/_/g, ' ')} roles, which have produced interviews or offers.`);
  }
  return recommendations;
}

const statusUpdateSchema = z.object({
  job_id: z.string().min(1),
  status: z.string().refine(isApplicationStatus, 'Unknown application status'),
});

const optimizationRequestSchema = z.object({
  optimization_type: z.string().min(1).default('performance'),
  job_id: z.string().min(1).optional(),
  job_ids: z.array(z.string().min(1)).optional(),
});

const generatedSchema = z.object({
  job_id: z.string().min(1),
  resume_url: z.string().min(1),
  version_name: z.string().min(1),
});

export interface TrackedResume {
  job_id: string;
  resume_url: string;
  version_name: string;
  tracked_at: string;
}

export interface OptimizationAgentOptions extends AgentOptions {
  repository: ApplicationRepository;
  minApplicationsForAnalysis?: number;
}

/**
 * Learns from application outcomes and recommends resume changes.
 *
 * Tracks generated resumes, records which role profiles lead to
 * interviews or offers, requests an automatic optimisation once a user
 * has enough submitted applications, and answers optimisation requests
 * with a performance summary and recommendations.
 */
export class OptimizationAgent extends BaseAgent {
  readonly role = 'optimization' as const;
  readonly subscribedEvents = [
    EventType.RESUME_GENERATED,
    EventType.APPLICATION_STATUS_UPDATED,
    EventType.RESUME_OPTIMIZATION_REQUESTED,
  ] as const;

  private readonly repository: ApplicationRepository;
  private readonly minApplications: number;
  private readonly resumes = new Map<number, TrackedResume[]>();
  private readonly patterns = new Map<number, Map<string, number>>();
  /** Users who already got their automatic optimization request. */
  private readonly autoTriggered = new Set<number>();

  constructor(options: OptimizationAgentOptions) {
    super(options, 'optimization');
    this.repository = options.repository;
    this.minApplications = options.minApplicationsForAnalysis ?? MIN_APPLICATIONS_FOR_ANALYSIS;
  }

  protected async processEvent(event: Event): Promise<AgentOutput> {
    switch (event.event_type) {
      case EventType.RESUME_GENERATED:
        return this.trackResume(event);
      case EventType.APPLICATION_STATUS_UPDATED:
        return this.recordOutcome(event);
      case EventType.RESUME_OPTIMIZATION_REQUESTED:
        return this.optimize(event);
      default:
        throw new Error(`Unsupported event type: ${event.event_type}`);
    }
  }

  /** Pattern keys (`<job_type>_<experience_level>`) for a user, most successful first. */
  successPatterns(userId: number): string[] {
    const counts = this.patterns.get(userId);
    if (counts === undefined) return [];
    return [...counts.entries()].sort((a, b) => b[1] - a[1]).map(([key]) => key);
  }

  trackedResumes(userId: number): readonly TrackedResume[] {
    return this.resumes.get(userId) ?? [];
  }

  private async trackResume(event: Event): Promise<AgentOutput> {
    const data = generatedSchema.parse(event.data);
    const list = this.resumes.get(event.user_id) ?? [];
    list.push({ ...data, tracked_at: event.timestamp });
    this.resumes.set(event.user_id, list);
    return { tracked: true, tracked_resumes: list.length };
  }

  private async recordOutcome(event: Event): Promise<AgentOutput> {
    const { job_id, status } = statusUpdateSchema.parse(event.data);

    const job = await this.repository.findJobApplication(job_id);
    if (job === null) {
      throw new Error(`Job application ${job_id} not found`);
    }
    if (job.status !== status) {
      await this.repository.updateJobApplication(job_id, { status });
    }

    let pattern: string | null = null;
    if (INTERVIEWED.includes(status)) {
      const analysis = readStoredAnalysis(job);
      if (analysis !== null) {
        pattern = `${analysis.job_type}_${analysis.experience_level}`;
        const counts = this.patterns.get(event.user_id) ?? new Map<string, number>();
        counts.set(pattern, (counts.get(pattern) ?? 0) + 1);
        this.patterns.set(event.user_id, counts);
      }
    }

    const applications = await this.repository.listJobApplications({ user_id: event.user_id });
    const submitted = applications.filter((a) => SUBMITTED.includes(a.status)).length;
    const autoTriggered = submitted >= this.minApplications && !this.autoTriggered.has(event.user_id);
    if (autoTriggered) {
      this.autoTriggered.add(event.user_id);
      await this.publishEvent(this.deriveEvent(event, {
        event_type: EventType.RESUME_OPTIMIZATION_REQUESTED,
        data: { optimization_type: 'automatic', trigger: 'application_threshold', submitted },
      }));
    }

    return { job_id, status, pattern, auto_optimization_requested: autoTriggered };
  }

  private async optimize(event: Event): Promise<AgentOutput> {
    const request = optimizationRequestSchema.parse(event.data);
    const jobIds = [...new Set([...(request.job_ids ?? []), ...(request.job_id === undefined ? [] : [request.job_id])])];

    let result: AgentOutput;
    if (jobIds.length > 0) {
      result = await this.keywordRecommendations(jobIds);
    } else {
      const applications = await this.repository.listJobApplications({ user_id: event.user_id });
      const performance = summarizePerformance(applications);
      const patterns = this.successPatterns(event.user_id);
      switch (request.optimization_type) {
        case 'performance_review':
          result = { performance };
          break;
        case 'pattern_recognition':
          result = { success_patterns: patterns };
          break;
        default:
          result = {
            performance,
            success_patterns: patterns,
            recommendations: buildRecommendations(performance, patterns),
          };
      }
    }

    await this.publishEvent(this.deriveEvent(event, {
      event_type: EventType.RESUME_OPTIMIZED,
      data: { optimization_type: request.optimization_type, ...result },
    }));
    return result;
  }

  /** Job-targeted advice: make sure the analyzed skills show up on the resume. */
  private async keywordRecommendations(jobIds: readonly string[]): Promise<AgentOutput> {
    const recommendations: Record<string, string[]> = {};
    for (const jobId of jobIds) {
      const job = await this.repository.findJobApplication(jobId);
      if (job === null) {
        throw new Error(`Job application ${jobId} not found`);
      }
      const analysis = readStoredAnalysis(job);
      const skills = analysis?.required_skills ?? [];
      recommendations[jobId] = skills.length === 0
        ? [`Restate the ${job.position} responsibilities from the posting in your own words.`]
        : skills
          .slice(0, MAX_KEYWORD_RECOMMENDATIONS)
          .map((skill) => `Make sure "${skill}" appears in the skills or experience section.`);
    }
    return { optimized_job_ids: [...jobIds], recommendations };
  }
}
