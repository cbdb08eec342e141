import { logger } from '../middleware/logger.js';
import type { Result } from '../utils/formatting.js';
import { parseTimeOfDay } from '../utils/time-expressions.js';
import { isSummaryContentMode, SUMMARY_CONTENT_MODES, type SummaryContentMode } from '../core/msc.js';

/**
 * Command routing — map free text to a command and its arguments.
 *
 * A command matches when the lower-cased input starts with any of its
 * phrases. The table is scanned in order and the first matching command
 * wins, so earlier entries take precedence for overlapping phrases.
 * Arguments are whatever follows the longest phrase of the matched
 * command, split on whitespace.
 */

export const COMMAND_TABLE = [
  // General bot commands
  ['SHOW_IN_PROGRESS', ['show in-progress']],
  ['SHOW_PENDING', ['show pending']],
  ['SHOW_FCP', ['show fcp', 'show in fcp']],
  ['SHOW_ALL', ['show all', 'show active']],
  ['SHOW_SUMMARY', ['show summary', 'summarize', 'summarise']],
  ['SHOW_NEWS', ['show news']],
  ['SHOW_TASKS', ['show tasks']],
  ['HELP', ['help', 'show help']],

  // Room-specific commands
  ['ROOM_SUMMARY_CONTENT', ['set summary content', 'set summary mode']],
  ['ROOM_SUMMARY_ENABLE', ['set enable summary', 'set summary enable', 'set summary enabled']],
  ['ROOM_SUMMARY_DISABLE', ['set disable summary', 'set summary disable', 'set summary disabled']],
  ['ROOM_SUMMARY_TIME', ['set time summary', 'set summary time', 'set summary time to']],
  ['ROOM_SUMMARY_TIME_INFO', ['summary time', 'get summary time']],
  ['ROOM_SHOW_PRIORITY', ['show priority', 'priority', 'priorities']],
  ['ROOM_PRIORITY_MSCS', ['set priority mscs', 'set priority']],
] as const satisfies ReadonlyArray<readonly [string, readonly string[]]>;

export type CommandId = (typeof COMMAND_TABLE)[number][0];

export interface CommandMatch {
  id: CommandId;
  /** Whitespace-separated tokens after the command phrase, original casing */
  args: string[];
}

/** Typed command payloads, one variant per command kind */
export type Command =
  | { kind: 'showInProgress' }
  | { kind: 'showPending'; reviewer?: string }
  | { kind: 'showFcp' }
  | { kind: 'showAll' }
  | { kind: 'showSummary' }
  | { kind: 'showNews'; args: string[] }
  | { kind: 'showTasks'; reviewer?: string }
  | { kind: 'help' }
  | { kind: 'setSummaryContent'; mode: SummaryContentMode }
  | { kind: 'enableSummary' }
  | { kind: 'disableSummary' }
  | { kind: 'setSummaryTime'; time: string }
  | { kind: 'showSummaryTime' }
  | { kind: 'showPriority' }
  | { kind: 'setPriority'; issueIds: number[] }
  | { kind: 'clearPriority' };

export const UNKNOWN_COMMAND = 'Unknown command.';

/**
 * Match text against the command table.
 * Returns null when no command phrase prefixes the input.
 */
export function interpret(text: string): CommandMatch | null {
  const trimmed = text.trim();
  const lower = trimmed.toLowerCase();
  // Lower-casing can change length for a few scripts; slice what we matched against then
  const source = lower.length === trimmed.length ? trimmed : lower;

  for (const [id, variants] of COMMAND_TABLE) {
    const phrases: readonly string[] = variants;
    const matching = phrases.filter((phrase) => lower.startsWith(phrase));
    if (matching.length === 0) continue;

    const longest = matching.reduce((best, phrase) => (phrase.length > best.length ? phrase : best));
    const args = source
      .slice(longest.length)
      .split(/\s+/)
      .map((token) => token.trim())
      .filter(Boolean);

    logger.debug({ command: id, args }, 'Command matched');
    return { id, args };
  }

  return null;
}

/** Parse `set priority` arguments: "123, 456" → [123, 456] */
export function parseIssueIds(args: readonly string[]): Result<number[]> {
  const ids: number[] = [];
  for (const piece of args.flatMap((token) => token.split(','))) {
    const digits = piece.trim();
    if (digits === '') continue;
    if (!/^\d+$/.test(digits)) {
      return { ok: false, error: `Unable to parse ${digits} as an MSC number. Make sure it is a valid integer.` };
    }
    ids.push(Number(digits));
  }

  if (ids.length === 0) {
    return { ok: false, error: 'Unknown MSC numbers. Usage: set priority 123, 456, 555, 12' };
  }
  return { ok: true, value: ids };
}

/**
 * Build a typed command from a table match. Argument errors come back as
 * user-facing messages; nothing is mutated here.
 */
export function parseCommand(match: CommandMatch, now: Date = new Date()): Result<Command> {
  const { id, args } = match;

  switch (id) {
    case 'SHOW_IN_PROGRESS':
      return { ok: true, value: { kind: 'showInProgress' } };
    case 'SHOW_PENDING':
      return { ok: true, value: { kind: 'showPending', reviewer: args[0] } };
    case 'SHOW_FCP':
      return { ok: true, value: { kind: 'showFcp' } };
    case 'SHOW_ALL':
      return { ok: true, value: { kind: 'showAll' } };
    case 'SHOW_SUMMARY':
      return { ok: true, value: { kind: 'showSummary' } };
    case 'SHOW_NEWS':
      return { ok: true, value: { kind: 'showNews', args } };
    case 'SHOW_TASKS':
      return { ok: true, value: { kind: 'showTasks', reviewer: args[0] } };
    case 'HELP':
      return { ok: true, value: { kind: 'help' } };

    case 'ROOM_SUMMARY_CONTENT': {
      const mode = args[0]?.toLowerCase();
      if (!mode || !isSummaryContentMode(mode)) {
        return {
          ok: false,
          error: `Invalid or unknown summary content option.\n\nUsage: \`set summary content [${SUMMARY_CONTENT_MODES.join(', ')}]\``,
        };
      }
      return { ok: true, value: { kind: 'setSummaryContent', mode } };
    }
    case 'ROOM_SUMMARY_ENABLE':
      return { ok: true, value: { kind: 'enableSummary' } };
    case 'ROOM_SUMMARY_DISABLE':
      return { ok: true, value: { kind: 'disableSummary' } };
    case 'ROOM_SUMMARY_TIME': {
      if (args.length === 0) {
        return {
          ok: false,
          error: 'Invalid or unknown summary time option.\n\nUsage: `set summary time 07:00` or `set summary time 4pm`',
        };
      }
      const time = parseTimeOfDay(args.join(' '), now);
      if (!time.ok) {
        logger.warn({ input: args.join(' ') }, 'Unable to parse summary time');
        return time;
      }
      return { ok: true, value: { kind: 'setSummaryTime', time: time.value } };
    }
    case 'ROOM_SUMMARY_TIME_INFO':
      return { ok: true, value: { kind: 'showSummaryTime' } };
    case 'ROOM_SHOW_PRIORITY':
      return { ok: true, value: { kind: 'showPriority' } };
    case 'ROOM_PRIORITY_MSCS': {
      if (args[0]?.toLowerCase() === 'clear') {
        return { ok: true, value: { kind: 'clearPriority' } };
      }
      const ids = parseIssueIds(args);
      if (!ids.ok) {
        logger.warn({ args }, 'Unable to parse priority MSC numbers');
        return ids;
      }
      return { ok: true, value: { kind: 'setPriority', issueIds: ids.value } };
    }
  }
}
