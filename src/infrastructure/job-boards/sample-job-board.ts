import type { JobPosting } from '../../domain/index.js';
import type { JobBoard, JobSearchQuery } from '../../application/index.js';

const COMPANIES = ['TechCorp Inc', 'DataWorks', 'CloudNine Labs'] as const;
const SENIORITY = ['Senior', '', 'Lead'] as const;

function slugify(value: string): string {
  return value.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
}

/**
 * Deterministic offline board for local runs and demos. The same
 * query always yields the same postings, so re-running discovery
 * exercises duplicate detection.
 */
export class SampleJobBoard implements JobBoard {
  readonly name = 'sample';
  readonly enabled = true;

  async search(query: JobSearchQuery): Promise<JobPosting[]> {
    const postings: JobPosting[] = [];
    for (let i = 0; postings.length < query.max_jobs && i < SENIORITY.length; i++) {
      for (const term of query.search_terms) {
        if (postings.length >= query.max_jobs) break;
        postings.push(this.posting(term, i, query.location));
      }
    }
    return postings;
  }

  private posting(term: string, variant: number, location: string): JobPosting {
    const company = COMPANIES[variant % COMPANIES.length] ?? COMPANIES[0];
    const seniority = SENIORITY[variant] ?? '';
    const position = [seniority, term, 'Engineer'].filter((part) => part !== '').join(' ');
    const remote = /remote/i.test(location);

    return {
      company,
      position,
      url: `https://jobs.example.com/${slugify(company)}/${slugify(position)}?location=${encodeURIComponent(slugify(location))}`,
      job_description: [
        `${company} is hiring a ${position} (${location}).`,
        `Requirements: ${term}, git and sql with 3+ years of experience.`,
        'Nice to have: docker, aws.',
      ].join('\n'),
      location,
      remote,
      salary_min: null,
      salary_max: null,
      requirements: [term, 'git', 'sql'],
    };
  }
}
