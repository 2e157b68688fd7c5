import { ExperienceLevel } from '../../domain/index.js';
import type { JobAnalysis } from '../../domain/index.js';
import type { JobAnalysisInput, JobAnalyzer } from './collaborators.js';

export const COMMON_SKILLS: readonly string[] = [
  'python', 'javascript', 'typescript', 'java', 'react', 'node.js', 'aws', 'docker',
  'kubernetes', 'sql', 'postgresql', 'mongodb', 'redis', 'git', 'machine learning',
  'ai', 'data science', 'backend', 'frontend', 'full-stack', 'devops', 'cloud',
  'microservices', 'api',
];

const PREFERRED_MARKERS = ['nice to have', 'preferred', 'bonus', 'plus'];

const JOB_TYPES: ReadonlyArray<[type: string, markers: readonly string[]]> = [
  ['data', ['data scientist', 'data engineer', 'machine learning', 'analytics']],
  ['devops', ['devops', 'site reliability', 'sre', 'platform engineer', 'infrastructure']],
  ['full_stack', ['full-stack', 'full stack', 'fullstack']],
  ['frontend', ['frontend', 'front-end', 'front end', 'ui engineer']],
  ['backend', ['backend', 'back-end', 'back end', 'api']],
  ['management', ['engineering manager', 'director', 'head of', 'vp']],
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive containment. */
export function mentions(text: string, term: string): boolean {
  return new RegExp(`(^|[^a-z0-9])${escapeRegExp(term)}($|[^a-z0-9])`, 'i').test(text);
}

export function detectExperienceLevel(position: string, description: string): ExperienceLevel {
  const title = position.toLowerCase();
  if (/\b(director|manager|head of|vp)\b/.test(title)) return ExperienceLevel.MANAGEMENT;
  if (/\b(lead|principal|staff)\b/.test(title)) return ExperienceLevel.LEAD;
  if (/\b(senior|sr\.?)\b/.test(title)) return ExperienceLevel.SENIOR;
  if (/\b(junior|jr\.?|entry|graduate|intern)\b/.test(title)) return ExperienceLevel.ENTRY;

  const years = /(\d+)\+?\s*years/i.exec(description);
  if (years?.[1] !== undefined) {
    const n = Number(years[1]);
    if (n >= 8) return ExperienceLevel.LEAD;
    if (n >= 5) return ExperienceLevel.SENIOR;
    if (n <= 1) return ExperienceLevel.ENTRY;
  }
  return ExperienceLevel.MID;
}

export function detectJobType(position: string, description: string): string {
  for (const text of [position, description]) {
    for (const [type, markers] of JOB_TYPES) {
      if (markers.some((m) => mentions(text, m))) return type;
    }
  }
  return 'general';
}

/**
 * Dictionary-based analysis over the common skills list. Used on its
 * own when no model-backed analyzer is configured, and as the fallback
 * when one fails.
 */
export class KeywordJobAnalyzer implements JobAnalyzer {
  async analyze(input: JobAnalysisInput): Promise<JobAnalysis> {
    return analyzeByKeywords(input, 'analyzer');
  }
}

export function analyzeByKeywords(
  input: JobAnalysisInput,
  method: JobAnalysis['analysis_method'],
): JobAnalysis {
  const text = `${input.position}\n${input.description}`;

  // Skills after a "preferred"-style marker count as preferred.
  const markerIdx = PREFERRED_MARKERS
    .map((m) => text.search(new RegExp(`\\b${escapeRegExp(m)}\\b`, 'i')))
    .filter((idx) => idx >= 0)
    .reduce((min, idx) => Math.min(min, idx), Number.POSITIVE_INFINITY);
  const required = Number.isFinite(markerIdx) ? text.slice(0, markerIdx) : text;
  const preferred = Number.isFinite(markerIdx) ? text.slice(markerIdx) : '';

  const requiredSkills = COMMON_SKILLS.filter((s) => mentions(required, s));
  const preferredSkills = COMMON_SKILLS.filter((s) => !requiredSkills.includes(s) && mentions(preferred, s));
  const experienceLevel = detectExperienceLevel(input.position, input.description);
  const jobType = detectJobType(input.position, input.description);
  const remote = /\b(remote|distributed|work from home)\b/i.test(text);

  return {
    required_skills: requiredSkills,
    preferred_skills: preferredSkills,
    keywords: [...requiredSkills, ...preferredSkills],
    experience_level: experienceLevel,
    job_type: jobType,
    remote_friendly: remote,
    summary: `${experienceLevel} ${jobType} role at ${input.company} requiring ${
      requiredSkills.length > 0 ? requiredSkills.join(', ') : 'no listed core skills'
    }`,
    analysis_method: method,
  };
}
