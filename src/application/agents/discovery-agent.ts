import { z } from 'zod';
import { ApplicationStatus, EventType, createEvent } from '../../domain/index.js';
import type { Event, EventType as EventTypeTag, JobApplication, JobPosting } from '../../domain/index.js';
import { BaseAgent } from './base-agent.js';
import type { AgentOptions, AgentOutput, DerivedEvent } from './base-agent.js';
import type { ApplicationRepository, JobBoard } from './collaborators.js';
import { readStepRequest } from './task-replies.js';

export const scrapeRequestSchema = z.object({
  user_id: z.number().int().positive(),
  search_terms: z.array(z.string().trim().min(1)).min(1, 'search_terms must not be empty'),
  location: z.string().min(1).default('Remote'),
  max_jobs: z.number().int().positive().max(500).default(10),
  job_boards: z.array(z.string().min(1)).optional(),
});

export type ScrapeRequest = z.input<typeof scrapeRequestSchema>;

export interface ScrapeResult {
  jobs_discovered: number;
  job_ids: string[];
  boards_searched: string[];
  duplicates_skipped: number;
}

export interface DiscoveryAgentOptions extends AgentOptions {
  boards: readonly JobBoard[];
  repository: ApplicationRepository;
}

/**
 * Finds postings on the enabled job boards and stores the new ones.
 *
 * Subscribes to nothing: scraping starts from `startScraping()` (a
 * scheduler or HTTP handler) or from `handleTrigger()`, which the
 * discovery trigger calls for `job.discovery.requested` events.
 */
export class DiscoveryAgent extends BaseAgent {
  readonly role = 'discovery' as const;
  readonly subscribedEvents: readonly EventTypeTag[] = [];

  private readonly boards: readonly JobBoard[];
  private readonly repository: ApplicationRepository;

  constructor(options: DiscoveryAgentOptions) {
    super(options, 'discovery');
    this.boards = options.boards;
    this.repository = options.repository;
  }

  /** Runs a request event through the standard dispatch wrapper. */
  async handleTrigger(event: Event): Promise<void> {
    await this.dispatch(event);
  }

  protected async processEvent(event: Event): Promise<AgentOutput> {
    if (event.event_type !== EventType.JOB_DISCOVERY_REQUESTED) {
      throw new Error(`Unsupported event type: ${event.event_type}`);
    }
    const result = await this.scrape({ ...event.data, user_id: event.user_id }, event);
    return { ...result };
  }

  /** External scheduling entry point. */
  async startScraping(request: ScrapeRequest): Promise<ScrapeResult> {
    return this.scrape(request, null);
  }

  private async scrape(raw: unknown, source: Event | null): Promise<ScrapeResult> {
    const request = scrapeRequestSchema.parse(raw);
    // Workflows schedule analysis themselves.
    const chainAnalysis = source === null || readStepRequest(source) === null;

    const boards = this.boards.filter(
      (board) => board.enabled && (request.job_boards === undefined || request.job_boards.includes(board.name)),
    );

    const jobIds: string[] = [];
    let duplicates = 0;

    for (const board of boards) {
      if (jobIds.length >= request.max_jobs) break;

      let postings: JobPosting[];
      try {
        postings = await board.search({
          search_terms: request.search_terms,
          location: request.location,
          max_jobs: request.max_jobs - jobIds.length,
        });
      } catch (err: unknown) {
        this.log.warn({ err, board: board.name }, 'Job board search failed');
        continue;
      }

      for (const posting of postings) {
        if (jobIds.length >= request.max_jobs) break;

        const existing = await this.repository.findJobApplicationByUrl(request.user_id, posting.url);
        if (existing !== null) {
          duplicates++;
          continue;
        }

        const job = await this.repository.createJobApplication({
          user_id: request.user_id,
          company: posting.company,
          position: posting.position,
          url: posting.url,
          job_description: posting.job_description,
          location: posting.location,
          remote: posting.remote,
          salary_min: posting.salary_min,
          salary_max: posting.salary_max,
          status: ApplicationStatus.DISCOVERED,
          source: board.name,
          extra_data: { requirements: posting.requirements, search_terms: request.search_terms },
        });
        jobIds.push(job.id);

        await this.emit(source, request.user_id, {
          event_type: EventType.JOB_DISCOVERED,
          data: discoveredPayload(job),
        });
        if (chainAnalysis) {
          await this.emit(source, request.user_id, {
            event_type: EventType.JOB_ANALYSIS_REQUESTED,
            data: { job_id: job.id },
          });
        }
      }
    }

    this.log.info(
      { user_id: request.user_id, discovered: jobIds.length, duplicates, boards: boards.map((b) => b.name) },
      'Scraping finished',
    );

    return {
      jobs_discovered: jobIds.length,
      job_ids: jobIds,
      boards_searched: boards.map((b) => b.name),
      duplicates_skipped: duplicates,
    };
  }

  private async emit(source: Event | null, userId: number, derived: DerivedEvent): Promise<void> {
    const event = source === null
      ? createEvent({ ...derived, user_id: userId, cell_id: this.cellId, metadata: { agent_id: this.agentId } })
      : this.deriveEvent(source, derived);
    if (!(await this.publishEvent(event))) {
      this.log.warn({ event_type: derived.event_type, user_id: userId }, 'Derived event dropped');
    }
  }
}

function discoveredPayload(job: JobApplication): Record<string, unknown> {
  return {
    job_id: job.id,
    company: job.company,
    position: job.position,
    url: job.url,
    location: job.location,
    remote: job.remote,
    source: job.source,
  };
}
