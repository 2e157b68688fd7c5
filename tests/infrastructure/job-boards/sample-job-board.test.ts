import { describe, it, expect } from 'vitest';
import { SampleJobBoard } from '../../../src/infrastructure/index.js';

describe('SampleJobBoard', () => {
  const board = new SampleJobBoard();

  it('builds postings per term and seniority up to max_jobs', async () => {
    const postings = await board.search({ search_terms: ['Python', 'Rust'], location: 'Remote', max_jobs: 3 });

    expect(postings.map((p) => `${p.company} / ${p.position}`)).toEqual([
      'TechCorp Inc / Senior Python Engineer',
      'TechCorp Inc / Senior Rust Engineer',
      'DataWorks / Python Engineer',
    ]);
    expect(postings[0]).toMatchObject({
      url: 'https://jobs.example.com/techcorp-inc/senior-python-engineer?location=remote',
      remote: true,
      requirements: ['Python', 'git', 'sql'],
    });
  });

  it('stops after every seniority variant', async () => {
    const postings = await board.search({ search_terms: ['Go'], location: 'Berlin', max_jobs: 10 });

    expect(postings.map((p) => p.position)).toEqual(['Senior Go Engineer', 'Go Engineer', 'Lead Go Engineer']);
    expect(postings[2]?.company).toBe('CloudNine Labs');
    expect(postings.every((p) => !p.remote)).toBe(true);
  });

  it('returns the same postings for the same query', async () => {
    const query = { search_terms: ['Go'], location: 'Berlin', max_jobs: 2 };

    expect(await board.search(query)).toEqual(await board.search(query));
  });
});
