import { z } from 'zod';
import type { JobPosting } from '../../domain/index.js';
import type { JobBoard, JobSearchQuery } from '../../application/index.js';

const DEFAULT_TIMEOUT_MS = 15_000;

const feedPostingSchema = z.object({
  company: z.string().min(1),
  position: z.string().min(1),
  url: z.string().url(),
  description: z.string().default(''),
  location: z.string().default(''),
  remote: z.boolean().default(false),
  salary_min: z.number().int().nullable().default(null),
  salary_max: z.number().int().nullable().default(null),
  requirements: z.array(z.string()).default([]),
});

const feedResponseSchema = z.object({
  jobs: z.array(feedPostingSchema),
});

export interface JsonFeedJobBoardOptions {
  name: string;
  url: string;
  enabled?: boolean;
  timeoutMs?: number;
}

/**
 * Job board backed by a JSON search endpoint:
 * `GET <url>?q=<terms>&location=<location>&limit=<n>` returning
 * `{ jobs: [...] }`. Non-OK responses and malformed bodies reject; the
 * discovery agent logs them and moves on to the next board.
 */
export class JsonFeedJobBoard implements JobBoard {
  readonly name: string;
  readonly enabled: boolean;

  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(options: JsonFeedJobBoardOptions) {
    this.name = options.name;
    this.url = options.url;
    this.enabled = options.enabled ?? true;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async search(query: JobSearchQuery): Promise<JobPosting[]> {
    const url = new URL(this.url);
    url.searchParams.set('q', query.search_terms.join(' '));
    url.searchParams.set('location', query.location);
    url.searchParams.set('limit', String(query.max_jobs));

    const response = await fetch(url, {
      headers: { Accept: 'application/json' },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Job feed ${this.name} returned HTTP ${response.status}`);
    }

    const body = feedResponseSchema.parse(await response.json());
    return body.jobs.slice(0, query.max_jobs).map((job) => ({
      company: job.company,
      position: job.position,
      url: job.url,
      job_description: job.description,
      location: job.location,
      remote: job.remote,
      salary_min: job.salary_min,
      salary_max: job.salary_max,
      requirements: job.requirements,
    }));
  }
}
