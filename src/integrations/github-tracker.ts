import { z } from 'zod';

import { logger } from '../middleware/logger.js';
import { UpstreamError } from '../core/errors.js';
import type { IssueComment, IssueTracker, LabelEvent, TrackedIssue } from '../core/msc.js';

/**
 * GitHub issue tracker over the REST v3 API.
 *
 * MSCs live as issues/PRs in a single repository. Comments and label events
 * are only fetched when a renderer asks for them, and memoised on the issue
 * object for the remainder of that aggregation pass.
 */

const GITHUB_API = 'https://api.github.com';
const PER_PAGE = 100;
const MAX_PAGES = 20;
const REQUEST_TIMEOUT_MS = 15_000;

// ── Response schemas ────────────────────────────────────────────────

const IssueSchema = z.object({
  number: z.number().int(),
  title: z.string(),
  html_url: z.string(),
  labels: z.array(z.union([z.string(), z.object({ name: z.string() })])),
});

const CommentSchema = z.object({
  user: z.object({ id: z.number().int() }).nullable(),
  created_at: z.string(),
});

const EventSchema = z.object({
  event: z.string(),
  created_at: z.string(),
  label: z.object({ name: z.string() }).optional(),
});

type GitHubIssue = z.infer<typeof IssueSchema>;

export interface GitHubTrackerOptions {
  /** `owner/repo` */
  repo: string;
  token?: string;
}

// ── Client ──────────────────────────────────────────────────────────

export function createGitHubTracker(options: GitHubTrackerOptions): IssueTracker {
  const headers: Record<string, string> = {
    accept: 'application/vnd.github+json',
    'user-agent': 'mscbot',
  };
  if (options.token) headers.authorization = `Bearer ${options.token}`;

  async function getPage<T>(path: string, schema: z.ZodType<T>, page: number): Promise<T[]> {
    const url = new URL(`${GITHUB_API}${path}`);
    url.searchParams.set('per_page', String(PER_PAGE));
    url.searchParams.set('page', String(page));

    const response = await fetch(url.toString(), {
      headers,
      signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new UpstreamError('GitHub', `${path} failed: ${errorText.slice(0, 200)}`, response.status);
    }

    const parsed = z.array(schema).safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamError('GitHub', `${path} returned an unexpected payload`, response.status, { cause: parsed.error });
    }
    return parsed.data;
  }

  async function getAll<T>(path: string, schema: z.ZodType<T>, query: Record<string, string> = {}): Promise<T[]> {
    const search = new URLSearchParams(query).toString();
    const fullPath = search ? `${path}?${search}` : path;
    const items: T[] = [];

    for (let page = 1; page <= MAX_PAGES; page++) {
      const batch = await getPage(fullPath, schema, page);
      items.push(...batch);
      if (batch.length < PER_PAGE) return items;
    }

    logger.warn({ path, pages: MAX_PAGES }, 'GitHub pagination limit reached — results truncated');
    return items;
  }

  function toTrackedIssue(raw: GitHubIssue): TrackedIssue {
    let comments: Promise<IssueComment[]> | null = null;
    let events: Promise<LabelEvent[]> | null = null;
    const issuePath = `/repos/${options.repo}/issues/${raw.number}`;

    return {
      number: raw.number,
      title: raw.title,
      url: raw.html_url,
      labels: raw.labels.map((label) => (typeof label === 'string' ? label : label.name)),

      comments(): Promise<IssueComment[]> {
        comments ??= getAll(`${issuePath}/comments`, CommentSchema).then((rows) =>
          rows.map((row) => ({
            authorId: row.user?.id ?? 0,
            createdAt: new Date(row.created_at),
          })),
        );
        return comments;
      },

      labelEvents(): Promise<LabelEvent[]> {
        events ??= getAll(`${issuePath}/events`, EventSchema).then((rows) => {
          const labelEvents: LabelEvent[] = [];
          for (const row of rows) {
            if (!row.label) continue;
            if (row.event !== 'labeled' && row.event !== 'unlabeled') continue;
            labelEvents.push({
              label: row.label.name,
              added: row.event === 'labeled',
              createdAt: new Date(row.created_at),
            });
          }
          return labelEvents;
        });
        return events;
      },
    };
  }

  return {
    repo: options.repo,

    async listIssuesByLabel(label: string): Promise<TrackedIssue[]> {
      const rows = await getAll(`/repos/${options.repo}/issues`, IssueSchema, { labels: label, state: 'open' });
      logger.debug({ label, count: rows.length }, 'Fetched labelled issues');
      return rows.map(toTrackedIssue);
    },
  };
}
