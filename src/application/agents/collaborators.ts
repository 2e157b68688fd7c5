import type {
  ApplicationStatus,
  JobAnalysis,
  JobApplication,
  JobApplicationPatch,
  JobPosting,
  NewJobApplication,
  NewResumeVersion,
  ResumeVersion,
} from '../../domain/index.js';

/**
 * Narrow ports the agents call out to. Implementations live in
 * infrastructure/ (or in tests); every call may reject.
 */

export interface JobApplicationFilter {
  user_id: number;
  status?: ApplicationStatus;
}

export interface ApplicationRepository {
  createJobApplication(input: NewJobApplication): Promise<JobApplication>;
  findJobApplication(id: string): Promise<JobApplication | null>;
  findJobApplicationByUrl(userId: number, url: string): Promise<JobApplication | null>;
  listJobApplications(filter: JobApplicationFilter): Promise<JobApplication[]>;
  updateJobApplication(id: string, patch: JobApplicationPatch): Promise<JobApplication | null>;
  createResumeVersion(input: NewResumeVersion): Promise<ResumeVersion>;
  listResumeVersions(jobId: string): Promise<ResumeVersion[]>;
}

export interface JobSearchQuery {
  search_terms: string[];
  location: string;
  max_jobs: number;
}

export interface JobBoard {
  readonly name: string;
  readonly enabled: boolean;
  search(query: JobSearchQuery): Promise<JobPosting[]>;
}

export interface JobAnalysisInput {
  company: string;
  position: string;
  description: string;
}

export interface JobAnalyzer {
  analyze(input: JobAnalysisInput): Promise<JobAnalysis>;
}

export interface ResumeRenderInput {
  user_id: number;
  template: string;
  job: JobApplication;
  analysis: JobAnalysis | null;
}

export interface RenderedDocument {
  content: string;
  content_type: string;
  extension: string;
}

export interface ResumeRenderer {
  render(input: ResumeRenderInput): Promise<RenderedDocument>;
}

export interface DocumentStore {
  /** Stores the document and returns a URI it can be fetched from. */
  put(key: string, content: string, contentType: string): Promise<string>;
}
