/**
 * Job-search records the agents read and write through the
 * application repository.
 */

export const ApplicationStatus = {
  DISCOVERED: 'discovered',
  QUEUED: 'queued',
  APPLIED: 'applied',
  ACKNOWLEDGED: 'acknowledged',
  SCREENING: 'screening',
  INTERVIEW: 'interview',
  OFFER: 'offer',
  REJECTED: 'rejected',
  WITHDRAWN: 'withdrawn',
} as const;

export type ApplicationStatus = (typeof ApplicationStatus)[keyof typeof ApplicationStatus];

export const APPLICATION_STATUSES: readonly ApplicationStatus[] = Object.values(ApplicationStatus);

export function isApplicationStatus(value: unknown): value is ApplicationStatus {
  return APPLICATION_STATUSES.some((status) => status === value);
}

/** A posting as returned by a job board, before it is stored. */
export interface JobPosting {
  company: string;
  position: string;
  url: string;
  job_description: string;
  location: string;
  remote: boolean;
  salary_min: number | null;
  salary_max: number | null;
  requirements: string[];
}

export interface JobApplication {
  id: string;
  user_id: number;
  company: string;
  position: string;
  url: string;
  job_description: string;
  location: string;
  remote: boolean;
  salary_min: number | null;
  salary_max: number | null;
  status: ApplicationStatus;
  source: string;
  resume_version: string | null;
  extra_data: Record<string, unknown>;
  created_at: Date;
  updated_at: Date;
}

export interface NewJobApplication {
  user_id: number;
  company: string;
  position: string;
  url: string;
  job_description: string;
  location: string;
  remote: boolean;
  salary_min: number | null;
  salary_max: number | null;
  status: ApplicationStatus;
  source: string;
  extra_data?: Record<string, unknown>;
}

export interface JobApplicationPatch {
  status?: ApplicationStatus;
  resume_version?: string | null;
  extra_data?: Record<string, unknown>;
}

export interface ResumeVersion {
  id: string;
  user_id: number;
  job_id: string;
  version_name: string;
  template: string;
  document_uri: string;
  extra_data: Record<string, unknown>;
  created_at: Date;
}

export interface NewResumeVersion {
  user_id: number;
  job_id: string;
  version_name: string;
  template: string;
  document_uri: string;
  extra_data?: Record<string, unknown>;
}

export const ExperienceLevel = {
  ENTRY: 'entry',
  MID: 'mid',
  SENIOR: 'senior',
  LEAD: 'lead',
  MANAGEMENT: 'management',
} as const;

export type ExperienceLevel = (typeof ExperienceLevel)[keyof typeof ExperienceLevel];

export interface JobAnalysis {
  required_skills: string[];
  preferred_skills: string[];
  keywords: string[];
  experience_level: ExperienceLevel;
  job_type: string;
  remote_friendly: boolean;
  summary: string;
  analysis_method: 'analyzer' | 'keyword_fallback';
}
