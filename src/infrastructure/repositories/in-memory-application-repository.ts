import { randomUUID } from 'node:crypto';
import type {
  JobApplication,
  JobApplicationPatch,
  NewJobApplication,
  NewResumeVersion,
  ResumeVersion,
} from '../../domain/index.js';
import type { ApplicationRepository, JobApplicationFilter } from '../../application/index.js';

/**
 * In-memory application repository.
 *
 * Used when no DATABASE_URL is configured and as the stand-in for
 * Postgres in tests. Mirrors the Postgres behaviour that callers rely
 * on: unique (user, url), newest-first listing, copies on read.
 */
export class InMemoryApplicationRepository implements ApplicationRepository {
  private readonly jobs = new Map<string, JobApplication>();
  private readonly versions: ResumeVersion[] = [];

  async createJobApplication(input: NewJobApplication): Promise<JobApplication> {
    const duplicate = await this.findJobApplicationByUrl(input.user_id, input.url);
    if (duplicate !== null) {
      throw new Error(`Job application for ${input.url} already exists for user ${input.user_id}`);
    }
    const now = new Date();
    const job: JobApplication = {
      ...input,
      id: randomUUID(),
      resume_version: null,
      extra_data: { ...input.extra_data },
      created_at: now,
      updated_at: now,
    };
    this.jobs.set(job.id, job);
    return { ...job };
  }

  async findJobApplication(id: string): Promise<JobApplication | null> {
    const job = this.jobs.get(id);
    return job === undefined ? null : { ...job };
  }

  async findJobApplicationByUrl(userId: number, url: string): Promise<JobApplication | null> {
    for (const job of this.jobs.values()) {
      if (job.user_id === userId && job.url === url) return { ...job };
    }
    return null;
  }

  async listJobApplications(filter: JobApplicationFilter): Promise<JobApplication[]> {
    return [...this.jobs.values()]
      .filter((job) => job.user_id === filter.user_id && (filter.status === undefined || job.status === filter.status))
      .reverse()
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .map((job) => ({ ...job }));
  }

  async updateJobApplication(id: string, patch: JobApplicationPatch): Promise<JobApplication | null> {
    const job = this.jobs.get(id);
    if (job === undefined) return null;
    const updated: JobApplication = {
      ...job,
      ...(patch.status === undefined ? {} : { status: patch.status }),
      ...(patch.resume_version === undefined ? {} : { resume_version: patch.resume_version }),
      ...(patch.extra_data === undefined ? {} : { extra_data: { ...patch.extra_data } }),
      updated_at: new Date(),
    };
    this.jobs.set(id, updated);
    return { ...updated };
  }

  async createResumeVersion(input: NewResumeVersion): Promise<ResumeVersion> {
    const version: ResumeVersion = {
      ...input,
      id: randomUUID(),
      extra_data: { ...input.extra_data },
      created_at: new Date(),
    };
    this.versions.push(version);
    return { ...version };
  }

  async listResumeVersions(jobId: string): Promise<ResumeVersion[]> {
    return this.versions.filter((v) => v.job_id === jobId).map((v) => ({ ...v }));
  }
}
