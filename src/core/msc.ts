/**
 * MSC data model shared by the aggregator, renderers and commands.
 *
 * Tracker and review-feed objects are read-only snapshots fetched per
 * operation; nothing here is cached across aggregation passes.
 */

/** Label names the MSC process moves a proposal through. */
export const MSC_LABELS = {
  proposal: 'proposal',
  inReview: 'proposal-in-review',
  proposedFcp: 'proposed-final-comment-period',
  fcp: 'final-comment-period',
  finishedFcp: 'finished-final-comment-period',
  specPrMissing: 'spec-pr-missing',
  specPrInReview: 'spec-pr-in-review',
  merged: 'merged',
} as const;

export interface IssueComment {
  /** Numeric account id of the comment author */
  authorId: number;
  createdAt: Date;
}

export interface LabelEvent {
  label: string;
  /** true when the label was added, false when removed */
  added: boolean;
  createdAt: Date;
}

export interface TrackedIssue {
  number: number;
  title: string;
  url: string;
  labels: readonly string[];
  /** Comments in chronological order (oldest first) */
  comments(): Promise<IssueComment[]>;
  /** Label add/remove events in chronological order */
  labelEvents(): Promise<LabelEvent[]>;
}

export type Disposition = 'merge' | 'close' | 'postpone';

export interface ReviewerStatus {
  login: string;
  approved: boolean;
}

export interface ReviewRecord {
  issueNumber: number;
  disposition: Disposition | string;
  reviewers: ReviewerStatus[];
  fcpStart?: Date;
}

export interface StatusEntry {
  readonly issue: TrackedIssue;
  readonly labels: ReadonlySet<string>;
  /** Present only while the issue carries the proposed-FCP label and the feed knows it */
  readonly review?: ReviewRecord;
}

export const SUMMARY_CONTENT_MODES = ['all', 'pending', 'fcp', 'in-progress'] as const;
export type SummaryContentMode = (typeof SUMMARY_CONTENT_MODES)[number];

export function isSummaryContentMode(value: string): value is SummaryContentMode {
  return SUMMARY_CONTENT_MODES.some((mode) => mode === value);
}

export interface RoomSettings {
  summaryEnabled?: boolean;
  /** Zero-padded 24h `HH:MM`; falls back to the global default when absent */
  summaryTimeOfDay?: string;
  summaryContentMode?: SummaryContentMode;
  priorityIssueIds?: number[];
}

export type RoomSettingKey = keyof RoomSettings;

// ── Capabilities ────────────────────────────────────────────────────

export interface IssueTracker {
  /** Repository identifier, eg "matrix-org/matrix-doc" */
  readonly repo: string;
  listIssuesByLabel(label: string): Promise<TrackedIssue[]>;
}

export interface ReviewFeed {
  fetchAll(): Promise<ReviewRecord[]>;
}

export interface AnnouncementFeed {
  /** Publication time of the newest feed entry */
  latestPublishedAt(): Promise<Date>;
}
