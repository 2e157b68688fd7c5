import { describe, it, expect } from 'vitest';
import {
  KeywordJobAnalyzer,
  analyzeByKeywords,
  detectExperienceLevel,
  detectJobType,
} from '../../../src/application/index.js';
import { mentions } from '../../../src/application/agents/keyword-analyzer.js';

describe('mentions', () => {
  it('matches whole terms only, ignoring case', () => {
    expect(mentions('Node.js developer', 'node.js')).toBe(true);
    expect(mentions('Strong JavaScript skills', 'java')).toBe(false);
    expect(mentions('postgresql', 'sql')).toBe(false);
    expect(mentions('SQL, Git', 'sql')).toBe(true);
  });
});

describe('detectExperienceLevel', () => {
  it('prefers the title', () => {
    expect(detectExperienceLevel('Engineering Manager', '')).toBe('management');
    expect(detectExperienceLevel('Staff Engineer', '')).toBe('lead');
    expect(detectExperienceLevel('Sr. Developer', '')).toBe('senior');
    expect(detectExperienceLevel('Junior Developer', '10 years')).toBe('entry');
  });

  it('falls back to the years of experience asked for', () => {
    expect(detectExperienceLevel('Developer', '10+ years of experience')).toBe('lead');
    expect(detectExperienceLevel('Developer', '5 years of experience')).toBe('senior');
    expect(detectExperienceLevel('Developer', '1+ years of experience')).toBe('entry');
    expect(detectExperienceLevel('Developer', '3 years of experience')).toBe('mid');
    expect(detectExperienceLevel('Developer', 'no requirements')).toBe('mid');
  });
});

describe('detectJobType', () => {
  it('checks the title before the description', () => {
    expect(detectJobType('Data Engineer', 'backend services')).toBe('data');
    expect(detectJobType('Engineer', 'Join our site reliability team')).toBe('devops');
    expect(detectJobType('Cook', 'kitchen work')).toBe('general');
  });
});

describe('analyzeByKeywords', () => {
  it('splits required and preferred skills at the first preference marker', () => {
    const analysis = analyzeByKeywords(
      {
        company: 'Acme',
        position: 'Senior Backend Engineer',
        description: 'Build APIs with python and postgresql. Requires 6 years of experience. '
          + 'Nice to have: docker, kubernetes. Remote friendly.',
      },
      'analyzer',
    );

    expect(analysis).toEqual({
      required_skills: ['python', 'postgresql', 'backend'],
      preferred_skills: ['docker', 'kubernetes'],
      keywords: ['python', 'postgresql', 'backend', 'docker', 'kubernetes'],
      experience_level: 'senior',
      job_type: 'backend',
      remote_friendly: true,
      summary: 'senior backend role at Acme requiring python, postgresql, backend',
      analysis_method: 'analyzer',
    });
  });

  it('describes a posting without known skills', async () => {
    const analysis = await new KeywordJobAnalyzer().analyze({
      company: 'Bistro',
      position: 'Cook',
      description: 'Prepare meals on site.',
    });

    expect(analysis.required_skills).toEqual([]);
    expect(analysis.remote_friendly).toBe(false);
    expect(analysis.summary).toBe('mid general role at Bistro requiring no listed core skills');
  });
});
