import type { DbClient } from './client.js';

/**
 * Creates the tables and indexes if they are missing. Deployments run
 * drizzle-kit migrations; this keeps a fresh local database usable on
 * first start.
 */
export async function ensureSchema(sql: DbClient['sql']): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS job_applications (
      id               UUID PRIMARY KEY,
      user_id          INTEGER       NOT NULL,
      company          VARCHAR(255)  NOT NULL,
      position         VARCHAR(255)  NOT NULL,
      url              VARCHAR(2048) NOT NULL,
      job_description  TEXT          NOT NULL DEFAULT '',
      location         VARCHAR(255)  NOT NULL DEFAULT '',
      remote           BOOLEAN       NOT NULL DEFAULT false,
      salary_min       INTEGER,
      salary_max       INTEGER,
      status           VARCHAR(32)   NOT NULL,
      source           VARCHAR(64)   NOT NULL,
      resume_version   VARCHAR(255),
      extra_data       JSONB         NOT NULL DEFAULT '{}',
      created_at       TIMESTAMPTZ   NOT NULL DEFAULT NOW(),
      updated_at       TIMESTAMPTZ   NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS resume_versions (
      id            UUID PRIMARY KEY,
      user_id       INTEGER       NOT NULL,
      job_id        UUID          NOT NULL,
      version_name  VARCHAR(255)  NOT NULL,
      template      VARCHAR(64)   NOT NULL,
      document_uri  VARCHAR(2048) NOT NULL,
      extra_data    JSONB         NOT NULL DEFAULT '{}',
      created_at    TIMESTAMPTZ   NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_job_applications_user_id ON job_applications (user_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_job_applications_status ON job_applications (status)`);
  await sql.unsafe(`CREATE UNIQUE INDEX IF NOT EXISTS uq_job_applications_user_url ON job_applications (user_id, url)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_resume_versions_job_id ON resume_versions (job_id)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_resume_versions_user_id ON resume_versions (user_id)`);
}
