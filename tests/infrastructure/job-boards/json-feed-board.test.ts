import { describe, it, expect, vi, afterEach } from 'vitest';
import { ZodError } from 'zod';
import { JsonFeedJobBoard } from '../../../src/infrastructure/index.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

describe('JsonFeedJobBoard', () => {
  const board = new JsonFeedJobBoard({ name: 'feed', url: 'https://feed.example.com/search' });
  const query = { search_terms: ['python', 'django'], location: 'Remote', max_jobs: 1 };

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('queries the feed and maps postings', async () => {
    const fetchMock = vi.fn(async (_url: unknown) => jsonResponse({
      jobs: [
        { company: 'Acme', position: 'Backend Engineer', url: 'https://acme.example.com/1', description: 'python' },
        { company: 'Globex', position: 'Data Engineer', url: 'https://globex.example.com/2' },
      ],
    }));
    vi.stubGlobal('fetch', fetchMock);

    const postings = await board.search(query);

    expect(postings).toEqual([{
      company: 'Acme',
      position: 'Backend Engineer',
      url: 'https://acme.example.com/1',
      job_description: 'python',
      location: '',
      remote: false,
      salary_min: null,
      salary_max: null,
      requirements: [],
    }]);
    const calledWith: unknown = fetchMock.mock.calls[0]?.[0];
    expect(String(calledWith)).toBe('https://feed.example.com/search?q=python+django&location=Remote&limit=1');
  });

  it('rejects a non-OK response', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'down' }, 503)));

    await expect(board.search(query)).rejects.toThrow('Job feed feed returned HTTP 503');
  });

  it('rejects a malformed body', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ jobs: [{ company: 'Acme' }] })));

    await expect(board.search(query)).rejects.toBeInstanceOf(ZodError);
  });

  it('is enabled unless configured otherwise', () => {
    expect(board.enabled).toBe(true);
    expect(new JsonFeedJobBoard({ name: 'off', url: 'https://feed.example.com', enabled: false }).enabled).toBe(false);
  });
});
