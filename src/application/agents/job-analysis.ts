import { z } from 'zod';
import { ExperienceLevel } from '../../domain/index.js';
import type { JobAnalysis, JobApplication } from '../../domain/index.js';

export const jobAnalysisSchema = z.object({
  required_skills: z.array(z.string()),
  preferred_skills: z.array(z.string()),
  keywords: z.array(z.string()),
  experience_level: z.nativeEnum(ExperienceLevel),
  job_type: z.string(),
  remote_friendly: z.boolean(),
  summary: z.string(),
  analysis_method: z.enum(['analyzer', 'keyword_fallback']),
});

/** The analysis the analysis agent stored on the job, if it is there and well-formed. */
export function readStoredAnalysis(job: JobApplication): JobAnalysis | null {
  const parsed = jobAnalysisSchema.safeParse(job.extra_data['analysis']);
  return parsed.success ? parsed.data : null;
}
