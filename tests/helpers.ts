import { mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { vi } from 'vitest';

import { parseConfig, type AppConfig } from '../src/utils/config.js';
import { createRoomSettingsStore } from '../src/utils/room-settings.js';
import { createSummaryScheduler } from '../src/features/scheduler.js';
import { sendSummary } from '../src/features/summary.js';
import { createMatrixDemoAdapter, type MatrixDemoOutboxEntry } from '../src/platforms/matrix/adapter.js';
import type { AppContext } from '../src/core/app-context.js';
import type {
  AnnouncementFeed,
  IssueComment,
  IssueTracker,
  LabelEvent,
  ReviewFeed,
  ReviewRecord,
  StatusEntry,
  TrackedIssue,
} from '../src/core/msc.js';

export const REPO = 'matrix-org/matrix-doc';
export const BOT_USER = '@mscbot:example.org';
export const FCP_BOT_ID = 40832866;
export const DAY_MS = 24 * 60 * 60 * 1000;

export function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'mscbot-test-'));
}

export function makeConfig(env: NodeJS.ProcessEnv = {}): AppConfig {
  const result = parseConfig({
    MATRIX_USER_ID: BOT_USER,
    MATRIX_ACCESS_TOKEN: 'test-token',
    REVIEW_FEED_URL: 'https://fcp.example.org',
    ROOM_DATA_PATH: join(tempDir(), 'room_data.json'),
    ...env,
  });
  if (!result.ok) throw new Error(result.error.join('\n'));
  return result.value;
}

export interface IssueOptions {
  title?: string;
  labels?: string[];
  comments?: IssueComment[];
  labelEvents?: LabelEvent[];
}

export function makeIssue(number: number, options: IssueOptions = {}): TrackedIssue {
  return {
    number,
    title: options.title ?? `Proposal ${number}`,
    url: `https://github.com/${REPO}/pull/${number}`,
    labels: options.labels ?? ['proposal'],
    comments: async () => options.comments ?? [],
    labelEvents: async () => options.labelEvents ?? [],
  };
}

export function makeEntry(issue: TrackedIssue, review?: ReviewRecord): StatusEntry {
  const labels = new Set(issue.labels);
  return review ? { issue, labels, review } : { issue, labels };
}

export function fakeTracker(issues: TrackedIssue[]): IssueTracker {
  return {
    repo: REPO,
    listIssuesByLabel: vi.fn(async (label: string) => issues.filter((issue) => issue.labels.includes(label))),
  };
}

export function fakeReviewFeed(records: ReviewRecord[]): ReviewFeed {
  return { fetchAll: vi.fn(async () => records) };
}

export function fakeAnnouncements(publishedAt: Date): AnnouncementFeed {
  return { latestPublishedAt: vi.fn(async () => publishedAt) };
}

export interface TestContext {
  ctx: AppContext;
  outbox: MatrixDemoOutboxEntry[];
}

export interface ContextOptions {
  issues?: TrackedIssue[];
  reviews?: ReviewRecord[];
  now?: Date;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<AppContext>;
}

/** A full context over fakes, with settings persisted to a fresh temp dir */
export function makeContext(options: ContextOptions = {}): TestContext {
  const outbox: MatrixDemoOutboxEntry[] = [];
  const config = makeConfig(options.env);
  const now = options.now ?? new Date(2026, 5, 10, 8, 0);

  const ctx: AppContext = {
    config,
    settings: createRoomSettingsStore(config.ROOM_DATA_PATH),
    scheduler: createSummaryScheduler((roomId) => sendSummary(ctx, roomId)),
    tracker: fakeTracker(options.issues ?? []),
    reviewFeed: fakeReviewFeed(options.reviews ?? []),
    announcements: fakeAnnouncements(new Date(Date.UTC(2026, 5, 5, 9, 30))),
    mentions: {},
    messenger: createMatrixDemoAdapter(outbox),
    now: () => now,
    ...options.overrides,
  };

  return { ctx, outbox };
}
