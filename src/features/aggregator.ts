import { logger } from '../middleware/logger.js';
import type { AppContext } from '../core/app-context.js';
import { MSC_LABELS, type ReviewRecord, type StatusEntry } from '../core/msc.js';

/**
 * Status aggregation. Merges tracker label state with the review feed.
 *
 * Both fetches must succeed; any failure rejects the whole aggregation so
 * callers never render a half-merged view.
 */

type AggregationContext = Pick<AppContext, 'tracker' | 'reviewFeed' | 'settings'>;

/**
 * Fetch every open proposal and attach review records to those awaiting FCP.
 * When `roomId` has priority MSCs set, only those proposals are returned.
 * The result is unsorted.
 */
export async function aggregateStatus(ctx: AggregationContext, roomId?: string): Promise<StatusEntry[]> {
  let issues = await ctx.tracker.listIssuesByLabel(MSC_LABELS.proposal);

  const priority = roomId ? ctx.settings.get(roomId, 'priorityIssueIds') : undefined;
  if (priority && priority.length > 0) {
    issues = issues.filter((issue) => priority.includes(issue.number));
  }

  const reviews = await ctx.reviewFeed.fetchAll();
  const reviewsByIssue = new Map<number, ReviewRecord>();
  for (const review of reviews) {
    // Later records win, matching a linear scan for the last match
    reviewsByIssue.set(review.issueNumber, review);
  }

  const entries = issues.map((issue): StatusEntry => {
    const labels = new Set(issue.labels);
    const review = labels.has(MSC_LABELS.proposedFcp) ? reviewsByIssue.get(issue.number) : undefined;
    return Object.freeze(review ? { issue, labels, review } : { issue, labels });
  });

  logger.debug({
    roomId,
    issues: entries.length,
    withReview: entries.filter((entry) => entry.review).length,
  }, 'Status aggregated');

  return entries;
}
