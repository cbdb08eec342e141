import { afterEach, describe, expect, it, vi } from 'vitest';

import { createGitHubTracker } from '../src/integrations/github-tracker.js';
import { createReviewFeed } from '../src/integrations/review-feed.js';
import { createAnnouncementFeed, parseLatestPublished } from '../src/integrations/announcement-feed.js';
import { UpstreamError } from '../src/core/errors.js';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });
}

function rawIssue(number: number, labels: Array<string | { name: string }> = [{ name: 'proposal' }]) {
  return { number, title: `Proposal ${number}`, html_url: `https://github.com/matrix-org/matrix-doc/pull/${number}`, labels };
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('GitHub tracker', () => {
  it('lists open issues for a label', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      jsonResponse([rawIssue(7, [{ name: 'proposal' }, 'proposal-in-review'])]));
    vi.stubGlobal('fetch', fetchMock);

    const tracker = createGitHubTracker({ repo: 'matrix-org/matrix-doc', token: 'test-secret' });
    const issues = await tracker.listIssuesByLabel('proposal');

    expect(fetchMock.mock.calls[0][0]).toBe(
      'https://api.github.com/repos/matrix-org/matrix-doc/issues?labels=proposal&state=open&per_page=100&page=1',
    );
    expect(fetchMock.mock.calls[0][1].headers).toMatchObject({ authorization: 'Bearer test-secret' });
    expect(issues).toHaveLength(1);
    expect(issues[0]).toMatchObject({
      number: 7,
      title: 'Proposal 7',
      url: 'https://github.com/matrix-org/matrix-doc/pull/7',
      labels: ['proposal', 'proposal-in-review'],
    });
  });

  it('follows pagination until a short page', async () => {
    const fullPage = Array.from({ length: 100 }, (_, i) => rawIssue(i + 1));
    const fetchMock = vi.fn()
      .mockResolvedValueOnce(jsonResponse(fullPage))
      .mockResolvedValueOnce(jsonResponse([rawIssue(101)]));
    vi.stubGlobal('fetch', fetchMock);

    const issues = await createGitHubTracker({ repo: 'matrix-org/matrix-doc' }).listIssuesByLabel('proposal');
    expect(issues).toHaveLength(101);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('fetches comments once and keeps label events only', async () => {
    const fetchMock = vi.fn(async (url: string) => {
      if (url.includes('/comments')) {
        return jsonResponse([
          { user: { id: 40832866 }, created_at: '2026-06-09T10:00:00Z' },
          { user: null, created_at: '2026-06-09T11:00:00Z' },
        ]);
      }
      if (url.includes('/events')) {
        return jsonResponse([
          { event: 'labeled', created_at: '2026-06-01T00:00:00Z', label: { name: 'final-comment-period' } },
          { event: 'renamed', created_at: '2026-06-02T00:00:00Z' },
          { event: 'unlabeled', created_at: '2026-06-03T00:00:00Z', label: { name: 'proposal-in-review' } },
        ]);
      }
      return jsonResponse([rawIssue(9)]);
    });
    vi.stubGlobal('fetch', fetchMock);

    const [issue] = await createGitHubTracker({ repo: 'matrix-org/matrix-doc' }).listIssuesByLabel('proposal');

    const comments = await issue.comments();
    await issue.comments();
    expect(comments).toEqual([
      { authorId: 40832866, createdAt: new Date('2026-06-09T10:00:00Z') },
      { authorId: 0, createdAt: new Date('2026-06-09T11:00:00Z') },
    ]);
    expect(fetchMock.mock.calls.filter(([url]) => url.includes('/comments'))).toHaveLength(1);

    expect(await issue.labelEvents()).toEqual([
      { label: 'final-comment-period', added: true, createdAt: new Date('2026-06-01T00:00:00Z') },
      { label: 'proposal-in-review', added: false, createdAt: new Date('2026-06-03T00:00:00Z') },
    ]);
  });

  it('raises upstream errors', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('rate limited', { status: 403 })));

    await expect(createGitHubTracker({ repo: 'matrix-org/matrix-doc' }).listIssuesByLabel('proposal'))
      .rejects.toMatchObject({ service: 'GitHub', status: 403 });
  });
});

describe('review feed', () => {
  it('maps feed records to review records', async () => {
    const fetchMock = vi.fn(async (_url: string) => jsonResponse([
      {
        fcp: { disposition: 'merge', fcp_start: null },
        reviews: [[{ login: 'alice' }, true], [{ login: 'bob' }, false]],
        issue: { number: 12 },
      },
    ]));
    vi.stubGlobal('fetch', fetchMock);

    const records = await createReviewFeed('https://fcp.example.org/').fetchAll();

    expect(fetchMock.mock.calls[0][0]).toBe('https://fcp.example.org/api/all');
    expect(records).toEqual([{
      issueNumber: 12,
      disposition: 'merge',
      reviewers: [{ login: 'alice', approved: true }, { login: 'bob', approved: false }],
      fcpStart: undefined,
    }]);
  });

  it('rejects unexpected payloads', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: 'nope' })));
    await expect(createReviewFeed('https://fcp.example.org').fetchAll()).rejects.toThrow(UpstreamError);
  });
});

describe('announcement feed', () => {
  const rss = `<?xml version="1.0"?>
<rss version="2.0"><channel><title>Weekly</title>
  <item><title>Newest</title><pubDate>Fri, 05 Jun 2026 09:30:00 +0000</pubDate></item>
  <item><title>Older</title><pubDate>Fri, 29 May 2026 09:30:00 +0000</pubDate></item>
</channel></rss>`;

  it('reads the newest RSS item', () => {
    expect(parseLatestPublished(rss)).toEqual(new Date(Date.UTC(2026, 5, 5, 9, 30)));
  });

  it('reads a single Atom entry', () => {
    const atom = `<feed xmlns="http://www.w3.org/2005/Atom"><title>Weekly</title>
  <entry><title>Only</title><published>2026-06-05T09:30:00Z</published></entry></feed>`;
    expect(parseLatestPublished(atom)).toEqual(new Date(Date.UTC(2026, 5, 5, 9, 30)));
  });

  it('rejects feeds without dates', () => {
    expect(() => parseLatestPublished('<rss><channel><title>Empty</title></channel></rss>')).toThrow(UpstreamError);
  });

  it('fetches and parses the feed', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(rss, { status: 200 })));
    await expect(createAnnouncementFeed('https://blog.example.org/feed').latestPublishedAt())
      .resolves.toEqual(new Date(Date.UTC(2026, 5, 5, 9, 30)));
  });
});
