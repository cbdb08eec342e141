import { logger } from '../middleware/logger.js';
import { link } from '../utils/formatting.js';
import type { AppContext } from '../core/app-context.js';
import type { SummaryContentMode } from '../core/msc.js';

/**
 * Per-room options: priority MSCs and daily summary settings.
 *
 * These handlers only touch the settings store and the scheduler; none of
 * them need MSC status.
 */

type OptionsContext = Pick<AppContext, 'config' | 'settings' | 'scheduler' | 'now'>;

function formatIds(ids: readonly number[] | undefined): string {
  return ids && ids.length > 0 ? `[${ids.join(', ')}]` : 'none';
}

/** Effective summary time for a room: its own, or the global default */
export function roomSummaryTime(ctx: Pick<AppContext, 'config' | 'settings'>, roomId: string): string {
  return ctx.settings.get(roomId, 'summaryTimeOfDay') ?? ctx.config.DAILY_SUMMARY_TIME;
}

// ── Priority MSCs ───────────────────────────────────────────────────

export function setPriority(ctx: OptionsContext, roomId: string, issueIds: number[]): string {
  ctx.settings.update(roomId, { priorityIssueIds: issueIds });
  logger.info({ roomId, issueIds }, 'Priority MSCs set');
  return `Priority MSCs set: ${formatIds(issueIds)}`;
}

export function clearPriority(ctx: OptionsContext, roomId: string): string {
  const previous = ctx.settings.get(roomId, 'priorityIssueIds');
  ctx.settings.delete(roomId, 'priorityIssueIds');
  return `Priority MSCs cleared. Was: ${formatIds(previous)}.`;
}

export function showPriority(ctx: OptionsContext, roomId: string): string {
  const ids = ctx.settings.get(roomId, 'priorityIssueIds');
  if (!ids || ids.length === 0) return 'No priority MSCs set.';

  const links = ids.map((id) => link(String(id), `https://github.com/${ctx.config.GITHUB_REPO}/pull/${id}`));
  return `Currently set priority MSCs: [${links.join(', ')}]`;
}

// ── Daily summary ───────────────────────────────────────────────────

export function setSummaryContent(ctx: OptionsContext, roomId: string, mode: SummaryContentMode): string {
  ctx.settings.update(roomId, { summaryContentMode: mode });
  return `Summary content updated successfully to '${mode}'.`;
}

export function enableSummary(ctx: OptionsContext, roomId: string): string {
  ctx.settings.update(roomId, { summaryEnabled: true });
  ctx.scheduler.setRoomTime(roomId, roomSummaryTime(ctx, roomId), ctx.now());
  return 'Daily summary enabled.';
}

export function disableSummary(ctx: OptionsContext, roomId: string): string {
  ctx.settings.update(roomId, { summaryEnabled: false });
  ctx.scheduler.cancel(roomId);
  return 'Daily summary disabled.';
}

/** `time` is already normalized to `HH:MM` */
export function setSummaryTime(ctx: OptionsContext, roomId: string, time: string): string {
  ctx.settings.update(roomId, { summaryTimeOfDay: time });

  if (ctx.settings.get(roomId, 'summaryEnabled') === false) {
    ctx.scheduler.cancel(roomId);
    return `Summary time now set to ${time}. Summaries in this room are currently disabled.`;
  }

  ctx.scheduler.setRoomTime(roomId, time, ctx.now());
  return `Summary time now set to ${time}.`;
}

export function showSummaryTime(ctx: OptionsContext, roomId: string): string {
  let response = `The currently configured daily summary time for this room is ${roomSummaryTime(ctx, roomId)}.`;
  if (ctx.settings.get(roomId, 'summaryEnabled') === false) {
    response += ' However, summaries in this room are currently disabled.';
  }
  return response;
}
