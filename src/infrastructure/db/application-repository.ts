import { randomUUID } from 'node:crypto';
import { and, asc, desc, eq } from 'drizzle-orm';
import type {
  JobApplication,
  JobApplicationPatch,
  NewJobApplication,
  NewResumeVersion,
  ResumeVersion,
} from '../../domain/index.js';
import type { ApplicationRepository, JobApplicationFilter } from '../../application/index.js';
import type { Database } from './client.js';
import { jobApplications, resumeVersions } from './schema.js';

export type JobApplicationRow = typeof jobApplications.$inferSelect;
export type ResumeVersionRow = typeof resumeVersions.$inferSelect;

export async function insertJobApplication(db: Database, input: NewJobApplication): Promise<JobApplicationRow> {
  const now = new Date();
  const rows = await db.insert(jobApplications).values({
    id: randomUUID(),
    user_id: input.user_id,
    company: input.company,
    position: input.position,
    url: input.url,
    job_description: input.job_description,
    location: input.location,
    remote: input.remote,
    salary_min: input.salary_min,
    salary_max: input.salary_max,
    status: input.status,
    source: input.source,
    extra_data: input.extra_data ?? {},
    created_at: now,
    updated_at: now,
  }).returning();

  const row = rows[0];
  if (row === undefined) throw new Error('Insert into job_applications returned no row');
  return row;
}

export async function findJobApplicationById(db: Database, id: string): Promise<JobApplicationRow | undefined> {
  const rows = await db.select().from(jobApplications).where(eq(jobApplications.id, id)).limit(1);
  return rows[0];
}

export async function findJobApplicationByUrl(
  db: Database,
  userId: number,
  url: string,
): Promise<JobApplicationRow | undefined> {
  const rows = await db.select().from(jobApplications)
    .where(and(eq(jobApplications.user_id, userId), eq(jobApplications.url, url)))
    .limit(1);
  return rows[0];
}

/** Newest first. */
export async function queryJobApplications(db: Database, filter: JobApplicationFilter): Promise<JobApplicationRow[]> {
  const conditions = [eq(jobApplications.user_id, filter.user_id)];
  if (filter.status !== undefined) conditions.push(eq(jobApplications.status, filter.status));

  return db.select().from(jobApplications)
    .where(and(...conditions))
    .orderBy(desc(jobApplications.created_at));
}

export async function patchJobApplication(
  db: Database,
  id: string,
  patch: JobApplicationPatch,
): Promise<JobApplicationRow | undefined> {
  const setFields: Partial<typeof jobApplications.$inferInsert> = { updated_at: new Date() };
  if (patch.status !== undefined) setFields.status = patch.status;
  if (patch.resume_version !== undefined) setFields.resume_version = patch.resume_version;
  if (patch.extra_data !== undefined) setFields.extra_data = patch.extra_data;

  const rows = await db.update(jobApplications).set(setFields).where(eq(jobApplications.id, id)).returning();
  return rows[0];
}

export async function insertResumeVersion(db: Database, input: NewResumeVersion): Promise<ResumeVersionRow> {
  const rows = await db.insert(resumeVersions).values({
    id: randomUUID(),
    user_id: input.user_id,
    job_id: input.job_id,
    version_name: input.version_name,
    template: input.template,
    document_uri: input.document_uri,
    extra_data: input.extra_data ?? {},
    created_at: new Date(),
  }).returning();

  const row = rows[0];
  if (row === undefined) throw new Error('Insert into resume_versions returned no row');
  return row;
}

/** Oldest first, so the last entry is the current version. */
export async function findResumeVersionsByJob(db: Database, jobId: string): Promise<ResumeVersionRow[]> {
  return db.select().from(resumeVersions)
    .where(eq(resumeVersions.job_id, jobId))
    .orderBy(asc(resumeVersions.created_at));
}

/** Adapts the query functions above to the agents' repository port. */
export function createDrizzleApplicationRepository(db: Database): ApplicationRepository {
  return {
    createJobApplication: (input): Promise<JobApplication> => insertJobApplication(db, input),
    findJobApplication: async (id) => (await findJobApplicationById(db, id)) ?? null,
    findJobApplicationByUrl: async (userId, url) => (await findJobApplicationByUrl(db, userId, url)) ?? null,
    listJobApplications: (filter) => queryJobApplications(db, filter),
    updateJobApplication: async (id, patch) => (await patchJobApplication(db, id, patch)) ?? null,
    createResumeVersion: (input): Promise<ResumeVersion> => insertResumeVersion(db, input),
    listResumeVersions: (jobId) => findResumeVersionsByJob(db, jobId),
  };
}
