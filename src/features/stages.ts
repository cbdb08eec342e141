import { bold, italic, link, plural } from '../utils/formatting.js';
import { mentionFor, type MentionTable } from '../core/mentions-config.js';
import { MSC_LABELS, type StatusEntry, type TrackedIssue } from '../core/msc.js';

/**
 * Stage classification and rendering.
 *
 * Proposals are partitioned by label into in-progress, pending-FCP and
 * in-FCP. The tracker keeps those labels mutually exclusive; nothing here
 * enforces it. Every section is always rendered, empty or not.
 */

export const EMPTY_SECTION = 'No MSCs in this category.';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FcpOptions {
  fcpLengthDays: number;
  /** Account id of the bot that comments when an FCP starts */
  botUserId: number;
  now: Date;
}

// ── Classifiers ─────────────────────────────────────────────────────

export function isInProgress(entry: StatusEntry): boolean {
  return entry.labels.has(MSC_LABELS.inReview);
}

export function isPending(entry: StatusEntry): boolean {
  return entry.labels.has(MSC_LABELS.proposedFcp) && entry.review !== undefined;
}

export function isInFcp(entry: StatusEntry): boolean {
  return entry.labels.has(MSC_LABELS.fcp);
}

/** Logins that have not yet signed off on a pending FCP */
export function outstandingReviewers(entry: StatusEntry): string[] {
  return (entry.review?.reviewers ?? [])
    .filter((reviewer) => !reviewer.approved)
    .map((reviewer) => reviewer.login);
}

// ── FCP timing ──────────────────────────────────────────────────────

/**
 * The FCP bot comments the day after an FCP starts, so its most recent
 * comment minus one day is taken as the start. Null when it never commented.
 */
export async function findFcpStart(issue: TrackedIssue, botUserId: number): Promise<Date | null> {
  const comments = await issue.comments();
  for (let i = comments.length - 1; i >= 0; i--) {
    if (comments[i].authorId === botUserId) {
      return new Date(comments[i].createdAt.getTime() - DAY_MS);
    }
  }
  return null;
}

export function remainingFcpDays(start: Date, fcpLengthDays: number, now: Date): number {
  const elapsedDays = Math.floor((now.getTime() - start.getTime()) / DAY_MS);
  return fcpLengthDays - elapsedDays;
}

// ── Sections ────────────────────────────────────────────────────────

function issueLine(issue: TrackedIssue): string {
  return `[${link(`MSC${issue.number}`, issue.url)}] - ${issue.title}`;
}

function section(title: string, lines: string[]): string {
  return `${bold(title)}\n\n${lines.length > 0 ? lines.join('\n\n') : EMPTY_SECTION}`;
}

export function renderInProgress(entries: readonly StatusEntry[]): string {
  const lines = entries.filter(isInProgress).map((entry) => issueLine(entry.issue));
  return section('In Progress', lines);
}

/**
 * Proposals awaiting FCP sign-off, with the reviewers still outstanding.
 * With `reviewer`, only proposals waiting on that GitHub user are listed.
 */
export function renderPending(
  entries: readonly StatusEntry[],
  mentions: MentionTable,
  reviewer?: string,
): string {
  const wanted = reviewer?.toLowerCase();
  const lines: string[] = [];

  for (const entry of entries) {
    if (!isPending(entry) || !entry.review) continue;

    const outstanding = outstandingReviewers(entry);
    if (wanted && !outstanding.some((login) => login.toLowerCase() === wanted)) continue;

    let line = `${issueLine(entry.issue)} - ${italic(entry.review.disposition)}`;
    if (outstanding.length > 0) {
      line += `\n\nTo review: ${outstanding.map((login) => mentionFor(mentions, login)).join(', ')}`;
    }
    lines.push(line);
  }

  return section('Pending Final Comment Period', lines);
}

export async function renderFcp(entries: readonly StatusEntry[], options: FcpOptions): Promise<string> {
  const lines: string[] = [];

  for (const entry of entries) {
    if (!isInFcp(entry)) continue;

    let line = issueLine(entry.issue);
    const start = await findFcpStart(entry.issue, options.botUserId);
    if (start) {
      const remaining = remainingFcpDays(start, options.fcpLengthDays, options.now);
      line += remaining > 0
        ? ` - Ends in ${bold(`${remaining} ${plural(remaining, 'day')}`)}`
        : ` - Ends ${bold('today')}`;
    }
    lines.push(line);
  }

  return section('In Final Comment Period', lines);
}

export function sortByNumber(entries: readonly StatusEntry[]): StatusEntry[] {
  return [...entries].sort((a, b) => a.issue.number - b.issue.number);
}

/** In-progress, pending and in-FCP, in that order, sorted by MSC number */
export async function renderAll(
  entries: readonly StatusEntry[],
  mentions: MentionTable,
  options: FcpOptions,
): Promise<string> {
  const sorted = sortByNumber(entries);
  return [
    "# Today's MSC Status",
    renderInProgress(sorted),
    renderPending(sorted, mentions),
    await renderFcp(sorted, options),
  ].join('\n\n');
}

/** In-progress proposals everyone should look at, plus FCPs waiting on `reviewer` */
export function renderTasks(entries: readonly StatusEntry[], mentions: MentionTable, reviewer?: string): string {
  const sorted = sortByNumber(entries);
  return [renderInProgress(sorted), renderPending(sorted, mentions, reviewer)].join('\n\n');
}

/**
 * A priority proposal counts as completed once it has left every active
 * stage, or finished its FCP.
 */
export function isConcluded(entry: StatusEntry): boolean {
  const active = entry.labels.has(MSC_LABELS.inReview)
    || entry.labels.has(MSC_LABELS.proposedFcp)
    || entry.labels.has(MSC_LABELS.fcp);
  return !active || entry.labels.has(MSC_LABELS.finishedFcp);
}

export function renderGoalProgress(entries: readonly StatusEntry[], priorityIds: readonly number[]): string {
  const completed = entries
    .filter((entry) => priorityIds.includes(entry.issue.number))
    .filter(isConcluded)
    .length;
  return `Priority MSC progress: ${completed}/${priorityIds.length}`;
}
