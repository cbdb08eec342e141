import { bold } from '../utils/formatting.js';
import type { AppContext } from '../core/app-context.js';

/**
 * Help command: shows users what the bot can do, followed by this room's
 * current summary schedule.
 */

function usage(command: string): string {
  return `\`${command}\``;
}

export function getHelpMessage(ctx: Pick<AppContext, 'config' | 'settings'>, roomId: string): string {
  const prefix = ctx.config.BOT_COMMAND;

  const lines = [
    '# Available commands',
    '',
    `Address the bot as ${usage(`${prefix}: <command>`)}.`,
    '',
    bold('MSCs'),
    '',
    `- ${usage('show in-progress')} — MSCs that are still being finalized`,
    `- ${usage('show pending [github username]')} — MSCs pending an FCP; these need review from team members`,
    `- ${usage('show fcp')} — MSCs currently in FCP`,
    `- ${usage('show all')} — all of the above combined`,
    `- ${usage('show summary')} — this room's summary, once, whether daily summaries are enabled or not`,
    `- ${usage('show news [from (time) to (time)] [since (time)]')} — MSC status changes over a period. Valid times are \`1 week ago\`, \`last friday\`, \`2 days ago\`, etc.`,
    `- ${usage('show news twim')} — what happened since the last This Week in Matrix post`,
    `- ${usage('show tasks [github username]')} — MSC tasks that must still be completed`,
    '',
    bold('Per-room options'),
    '',
    `- ${usage('set priority 123, 456, 555, 12')} — only show information about these MSCs`,
    `- ${usage('show priority')} — show this room's priority MSCs`,
    `- ${usage('set priority clear')} — clear priority MSCs`,
    `- ${usage('set summary enable|disable')} — enable or disable the daily summary`,
    `- ${usage('set summary time 08:00|8am|8:15pm')} — set the daily summary time`,
    `- ${usage('summary time')} — show the configured daily summary time`,
    `- ${usage('set summary content all|pending|fcp|in-progress')} — what the daily summary contains`,
    '',
    bold('Other'),
    '',
    `- ${usage('help')} — show this help`,
    '',
  ];

  if (ctx.settings.get(roomId, 'summaryEnabled') === false) {
    lines.push('Summaries are currently disabled for this room.');
  } else {
    const time = ctx.settings.get(roomId, 'summaryTimeOfDay') ?? ctx.config.DAILY_SUMMARY_TIME;
    lines.push(`Summaries are currently shown every day at ${time}.`);
  }

  return lines.join('\n');
}
