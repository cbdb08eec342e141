import { logger } from '../middleware/logger.js';
import { sendMarkdown } from '../core/messaging-adapter.js';
import type { AppContext } from '../core/app-context.js';
import type { StatusEntry } from '../core/msc.js';
import { aggregateStatus } from './aggregator.js';
import {
  renderAll,
  renderFcp,
  renderGoalProgress,
  renderInProgress,
  renderPending,
  sortByNumber,
  type FcpOptions,
} from './stages.js';

/**
 * Daily summary: the report a room receives on its schedule, or on demand
 * with `show summary`. Content follows the room's summary mode and ends
 * with priority-goal progress when the room has priority MSCs.
 */

type SummaryContext = Pick<AppContext, 'config' | 'settings' | 'tracker' | 'reviewFeed' | 'mentions' | 'now'>;

export function fcpOptions(ctx: Pick<AppContext, 'config' | 'now'>): FcpOptions {
  return {
    fcpLengthDays: ctx.config.FCP_LENGTH_DAYS,
    botUserId: ctx.config.FCP_BOT_USER_ID,
    now: ctx.now(),
  };
}

export async function renderSummary(ctx: SummaryContext, roomId: string, entries: readonly StatusEntry[]): Promise<string> {
  const mode = ctx.settings.get(roomId, 'summaryContentMode') ?? 'all';
  const sorted = sortByNumber(entries);

  let text: string;
  switch (mode) {
    case 'in-progress':
      text = renderInProgress(sorted);
      break;
    case 'pending':
      text = renderPending(sorted, ctx.mentions);
      break;
    case 'fcp':
      text = await renderFcp(sorted, fcpOptions(ctx));
      break;
    default:
      text = await renderAll(sorted, ctx.mentions, fcpOptions(ctx));
  }

  const priority = ctx.settings.get(roomId, 'priorityIssueIds');
  if (priority && priority.length > 0) {
    text += `\n\n${renderGoalProgress(entries, priority)}`;
  }
  return text;
}

/** Aggregate fresh status for the room and render its summary */
export async function buildSummary(ctx: SummaryContext, roomId: string): Promise<string> {
  const entries = await aggregateStatus(ctx, roomId);
  return renderSummary(ctx, roomId, entries);
}

/**
 * Scheduled delivery. Aggregation failures propagate so the scheduler can
 * skip this cycle; delivery failures are logged and dropped.
 */
export async function sendSummary(ctx: AppContext, roomId: string): Promise<void> {
  const text = await buildSummary(ctx, roomId);

  try {
    await sendMarkdown(ctx.messenger, roomId, text);
    logger.info({ roomId }, 'Daily summary sent');
  } catch (err) {
    logger.warn({ err, roomId }, 'Unable to send daily summary');
  }
}
