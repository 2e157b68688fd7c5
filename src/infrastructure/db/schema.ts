import {
  pgTable,
  uuid,
  integer,
  varchar,
  text,
  boolean,
  timestamp,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import type { ApplicationStatus } from '../../domain/index.js';

/**
 * Drizzle schema for `job_applications`.
 *
 * One row per (user, posting URL); the unique index is what lets the
 * discovery agent skip postings it has already stored.
 */
export const jobApplications = pgTable('job_applications', {
  id: uuid('id').primaryKey(),
  user_id: integer('user_id').notNull(),
  company: varchar('company', { length: 255 }).notNull(),
  position: varchar('position', { length: 255 }).notNull(),
  url: varchar('url', { length: 2048 }).notNull(),
  job_description: text('job_description').notNull().default(''),
  location: varchar('location', { length: 255 }).notNull().default(''),
  remote: boolean('remote').notNull().default(false),
  salary_min: integer('salary_min'),
  salary_max: integer('salary_max'),
  status: varchar('status', { length: 32 }).$type<ApplicationStatus>().notNull(),
  source: varchar('source', { length: 64 }).notNull(),
  resume_version: varchar('resume_version', { length: 255 }),
  extra_data: jsonb('extra_data').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_job_applications_user_id').on(table.user_id),
  index('idx_job_applications_status').on(table.status),
  uniqueIndex('uq_job_applications_user_url').on(table.user_id, table.url),
]);

/** Every generated resume document, newest versions appended. */
export const resumeVersions = pgTable('resume_versions', {
  id: uuid('id').primaryKey(),
  user_id: integer('user_id').notNull(),
  job_id: uuid('job_id').notNull(),
  version_name: varchar('version_name', { length: 255 }).notNull(),
  template: varchar('template', { length: 64 }).notNull(),
  document_uri: varchar('document_uri', { length: 2048 }).notNull(),
  extra_data: jsonb('extra_data').$type<Record<string, unknown>>().notNull().default({}),
  created_at: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_resume_versions_job_id').on(table.job_id),
  index('idx_resume_versions_user_id').on(table.user_id),
]);
