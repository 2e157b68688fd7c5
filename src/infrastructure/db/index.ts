export { jobApplications, resumeVersions } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient, DbClientOptions } from './client.js';
export { ensureSchema } from './bootstrap.js';
export {
  insertJobApplication,
  findJobApplicationById,
  findJobApplicationByUrl,
  queryJobApplications,
  patchJobApplication,
  insertResumeVersion,
  findResumeVersionsByJob,
  createDrizzleApplicationRepository,
} from './application-repository.js';
export type { JobApplicationRow, ResumeVersionRow } from './application-repository.js';
