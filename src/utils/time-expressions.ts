import * as chrono from 'chrono-node';

import { formatTimeOfDay, type Result } from './formatting.js';

/**
 * Free-form time parsing for commands ("8am", "8:15pm", "2 days ago",
 * "last friday"). Everything resolves against an explicit reference instant.
 */

/**
 * Parse a time of day into zero-padded 24h `HH:MM`.
 * Input without an explicit hour (eg "tomorrow") is rejected.
 */
export function parseTimeOfDay(input: string, reference: Date = new Date()): Result<string> {
  const [parsed] = chrono.parse(input, reference);
  if (!parsed || !parsed.start.isCertain('hour')) {
    return { ok: false, error: `Unknown time parameter '${input}'.` };
  }

  const hour = parsed.start.get('hour') ?? 0;
  const minute = parsed.start.get('minute') ?? 0;
  return { ok: true, value: formatTimeOfDay(hour, minute) };
}

/** Resolve a natural-language expression to an absolute instant */
export function parseInstant(expression: string, reference: Date): Date | null {
  return chrono.parseDate(expression, reference) ?? null;
}

/**
 * Next local-time occurrence of `HH:MM` strictly after `now`.
 * A time equal to or earlier than now rolls to the following day.
 */
export function nextOccurrence(timeOfDay: string, now: Date): Date {
  const [hour, minute] = timeOfDay.split(':').map(Number);
  const target = new Date(now);
  target.setHours(hour, minute, 0, 0);

  if (now >= target) {
    target.setDate(target.getDate() + 1);
  }
  return target;
}
