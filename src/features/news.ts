import { logger } from '../middleware/logger.js';
import { bold, formatInstant, italic, link, type Result } from '../utils/formatting.js';
import { parseInstant } from '../utils/time-expressions.js';
import { MSC_LABELS, type AnnouncementFeed, type TrackedIssue } from '../core/msc.js';

/**
 * MSC news — which proposals changed stage within a time window.
 *
 * Usage:
 *   show news                       — the last week
 *   show news since <time>
 *   show news from <time> to <time>
 *   show news twim                  — since the last This Week in Matrix post
 */

export const ANNOUNCEMENT_KEYWORD = 'twim';

const NEWS_USAGE = 'Usage: `show news [from (time) to (time)] [since (time)] [twim]`';

// ── Types ────────────────────────────────────────────────────────────

export interface NewsWindow {
  from: Date;
  until: Date;
  /** true when `from` came from the announcement feed */
  sinceAnnouncement: boolean;
}

export interface LabelChange {
  issue: TrackedIssue;
  label: string;
  at: Date;
}

interface Bucket {
  title: string;
  /** Completes "No MSCs …" for an empty bucket */
  sentence: string;
  labels: ReadonlySet<string>;
}

const BUCKETS: readonly Bucket[] = [
  {
    title: 'Approved MSCs',
    sentence: 'have been approved.',
    labels: new Set([MSC_LABELS.finishedFcp, MSC_LABELS.specPrMissing, MSC_LABELS.specPrInReview, MSC_LABELS.merged]),
  },
  {
    title: 'Final Comment Period',
    sentence: 'have entered FCP.',
    labels: new Set([MSC_LABELS.fcp]),
  },
  {
    title: 'In Progress MSCs',
    sentence: 'have been started.',
    labels: new Set([MSC_LABELS.proposal, MSC_LABELS.inReview]),
  },
];

// ── Window parsing ───────────────────────────────────────────────────

function resolveWindow(fromExpression: string, untilExpression: string, now: Date): Result<NewsWindow> {
  const from = parseInstant(fromExpression, now);
  const until = parseInstant(untilExpression, now);
  if (!from || !until) {
    return { ok: false, error: `Unable to parse '${fromExpression}' and/or '${untilExpression}' as time.` };
  }
  return { ok: true, value: { from, until, sinceAnnouncement: false } };
}

/**
 * Turn `show news` arguments into an absolute `[from, until)` window.
 * Unparseable input comes back as a user-facing error.
 */
export async function parseNewsWindow(
  args: readonly string[],
  now: Date,
  announcements: AnnouncementFeed,
): Promise<Result<NewsWindow>> {
  if (args.length === 0) {
    return resolveWindow('1 week ago', 'now', now);
  }

  const keyword = args[0].toLowerCase();

  if (keyword === ANNOUNCEMENT_KEYWORD) {
    try {
      const from = await announcements.latestPublishedAt();
      return { ok: true, value: { from, until: now, sinceAnnouncement: true } };
    } catch (err) {
      logger.warn({ err }, 'Announcement feed parsing error');
      return { ok: false, error: 'Unable to parse last TWIM post date.' };
    }
  }

  if (keyword === 'from') {
    const toIndex = args.findIndex((arg, i) => i > 1 && arg.toLowerCase() === 'to');
    if (toIndex < 0 || toIndex === args.length - 1) {
      return { ok: false, error: `Expected \`from (time) to (time)\`. ${NEWS_USAGE}` };
    }
    return resolveWindow(args.slice(1, toIndex).join(' '), args.slice(toIndex + 1).join(' '), now);
  }

  if (keyword === 'since' && args.length > 1) {
    return resolveWindow(args.slice(1).join(' '), 'now', now);
  }

  return { ok: false, error: `Unknown news time range. ${NEWS_USAGE}` };
}

// ── Label changes ────────────────────────────────────────────────────

/**
 * Latest watched label added to each issue within `[from, until)`.
 * Issues without such an event are left out.
 */
export async function collectLabelChanges(
  issues: readonly TrackedIssue[],
  from: Date,
  until: Date,
  watchedLabels: ReadonlySet<string>,
): Promise<LabelChange[]> {
  const changes: LabelChange[] = [];

  for (const issue of issues) {
    let latest: LabelChange | null = null;

    for (const event of await issue.labelEvents()) {
      if (!event.added) continue;
      if (!watchedLabels.has(event.label)) continue;
      if (event.createdAt < from || event.createdAt >= until) continue;

      if (!latest || event.createdAt >= latest.at) {
        latest = { issue, label: event.label, at: event.createdAt };
      }
    }

    if (latest) changes.push(latest);
  }

  return changes;
}

// ── Formatting ───────────────────────────────────────────────────────

/** Drop a leading "MSC123" / "MSC 123" (and colon) that repeats the proposal number */
export function stripMscPrefix(title: string, issueNumber: number): string {
  const prefix = new RegExp(`^MSC\\s?${issueNumber}(?!\\d)\\s*:?`, 'i');
  return title.replace(prefix, '').trim();
}

function renderBucket(bucket: Bucket, changes: readonly LabelChange[]): string {
  const members = changes.filter((change) => bucket.labels.has(change.label));
  if (members.length === 0) {
    return `${bold(bucket.title)}\n\n${italic(`No MSCs ${bucket.sentence}`)}`;
  }

  const items = members
    .sort((a, b) => a.issue.number - b.issue.number)
    .map(({ issue }) => `- ${link(`MSC${issue.number}: ${stripMscPrefix(issue.title, issue.number)}`, issue.url)}`);
  return `${bold(bucket.title)}\n\n${items.join('\n')}`;
}

export function renderNews(changes: readonly LabelChange[], window: NewsWindow): string {
  const banner = window.sinceAnnouncement ? '(last TWIM) ' : '';
  const header = `News from ${bold(formatInstant(window.from))} ${banner}til ${bold(formatInstant(window.until))}.`;
  return [header, ...BUCKETS.map((bucket) => renderBucket(bucket, changes))].join('\n\n');
}

/** Label-transition report for `issues` between two instants */
export async function buildNewsDigest(
  issues: readonly TrackedIssue[],
  window: NewsWindow,
  watchedLabels: ReadonlySet<string>,
): Promise<string> {
  const changes = await collectLabelChanges(issues, window.from, window.until, watchedLabels);
  logger.debug({
    from: window.from.toISOString(),
    until: window.until.toISOString(),
    changes: changes.length,
  }, 'News digest computed');
  return renderNews(changes, window);
}
