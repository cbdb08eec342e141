import { logger } from '../middleware/logger.js';
import { interpret, parseCommand, UNKNOWN_COMMAND, type Command } from '../features/router.js';
import { aggregateStatus } from '../features/aggregator.js';
import { renderAll, renderFcp, renderInProgress, renderPending, renderTasks, sortByNumber } from '../features/stages.js';
import { buildNewsDigest, parseNewsWindow } from '../features/news.js';
import { buildSummary, fcpOptions } from '../features/summary.js';
import { getHelpMessage } from '../features/help.js';
import {
  clearPriority,
  disableSummary,
  enableSummary,
  setPriority,
  setSummaryContent,
  setSummaryTime,
  showPriority,
  showSummaryTime,
} from '../features/room-options.js';
import type { AppContext } from './app-context.js';

export const STATUS_UNAVAILABLE = 'Unable to fetch MSC status right now. Please try again later.';

const PRIORITY_NEWS_NOTE =
  'Be aware that there are priority MSCs enabled in this room, and that you may not be seeing all available MSC news.';

function assertNever(value: never): never {
  throw new Error(`Unhandled command: ${JSON.stringify(value)}`);
}

/**
 * Run a parsed command for a room and return the markdown response.
 * Report commands aggregate fresh status first; room options do not.
 */
export async function runCommand(ctx: AppContext, roomId: string, command: Command): Promise<string> {
  switch (command.kind) {
    case 'showInProgress':
      return renderInProgress(sortByNumber(await aggregateStatus(ctx, roomId)));
    case 'showPending':
      return renderPending(sortByNumber(await aggregateStatus(ctx, roomId)), ctx.mentions, command.reviewer);
    case 'showFcp':
      return renderFcp(sortByNumber(await aggregateStatus(ctx, roomId)), fcpOptions(ctx));
    case 'showAll':
      return renderAll(await aggregateStatus(ctx, roomId), ctx.mentions, fcpOptions(ctx));
    case 'showSummary':
      return buildSummary(ctx, roomId);
    case 'showTasks':
      return renderTasks(await aggregateStatus(ctx, roomId), ctx.mentions, command.reviewer);
    case 'showNews': {
      const range = await parseNewsWindow(command.args, ctx.now(), ctx.announcements);
      if (!range.ok) return range.error;

      const entries = await aggregateStatus(ctx, roomId);
      let digest = await buildNewsDigest(
        entries.map((entry) => entry.issue),
        range.value,
        new Set(ctx.config.GITHUB_LABELS),
      );
      const priority = ctx.settings.get(roomId, 'priorityIssueIds');
      if (priority && priority.length > 0) {
        digest += `\n\n${PRIORITY_NEWS_NOTE}`;
      }
      return digest;
    }
    case 'help':
      return getHelpMessage(ctx, roomId);
    case 'setSummaryContent':
      return setSummaryContent(ctx, roomId, command.mode);
    case 'enableSummary':
      return enableSummary(ctx, roomId);
    case 'disableSummary':
      return disableSummary(ctx, roomId);
    case 'setSummaryTime':
      return setSummaryTime(ctx, roomId, command.time);
    case 'showSummaryTime':
      return showSummaryTime(ctx, roomId);
    case 'showPriority':
      return showPriority(ctx, roomId);
    case 'setPriority':
      return setPriority(ctx, roomId, command.issueIds);
    case 'clearPriority':
      return clearPriority(ctx, roomId);
    default:
      return assertNever(command);
  }
}

/**
 * Interpret command text and produce the response for the room.
 * Always resolves: parse problems and upstream failures become messages.
 */
export async function getResponse(ctx: AppContext, roomId: string, text: string): Promise<string> {
  const match = interpret(text);
  if (!match) return UNKNOWN_COMMAND;

  const command = parseCommand(match, ctx.now());
  if (!command.ok) return command.error;

  try {
    return await runCommand(ctx, roomId, command.value);
  } catch (err) {
    logger.error({ err, roomId, command: command.value.kind }, 'Command failed');
    return STATUS_UNAVAILABLE;
  }
}
