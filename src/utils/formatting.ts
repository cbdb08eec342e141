import { marked } from 'marked';

/**
 * Matrix message formatting helpers + shared utility types.
 *
 * Responses are written as markdown, then rendered to HTML for the
 * `formatted_body` while the markdown itself travels as the plain `body`.
 */

// ── Shared utility types ────────────────────────────────────────────

/**
 * Discriminated union for operations that can fail with a user-facing reason.
 *
 * @example
 * ```ts
 * function parseHour(input: string): Result<number> {
 *   if (!/^\d+$/.test(input)) return { ok: false, error: `Unknown hour '${input}'.` };
 *   return { ok: true, value: Number(input) };
 * }
 * ```
 */
export type Result<T, E = string> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/** Bold text */
export function bold(text: string): string {
  return `**${text}**`;
}

/** Italic text */
export function italic(text: string): string {
  return `*${text}*`;
}

/** Markdown link */
export function link(text: string, url: string): string {
  return `[${text}](${url})`;
}

/** Singular or plural noun for a count */
export function plural(count: number, singular: string, pluralForm: string = `${singular}s`): string {
  return count === 1 ? singular : pluralForm;
}

/** Zero-padded 24h `HH:MM` */
export function formatTimeOfDay(hour: number, minute: number): string {
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

/** `YYYY-MM-DD HH:MM UTC` */
export function formatInstant(date: Date): string {
  return `${date.toISOString().slice(0, 16).replace('T', ' ')} UTC`;
}

// ── HTML ────────────────────────────────────────────────────────────

const MATRIX_ID_PATTERN = /(?<![\w/#])(@[a-zA-Z0-9._=\-/]+:[a-zA-Z0-9.-]+\.[a-zA-Z]+)/g;

/** Wrap bare Matrix user IDs in matrix.to links so clients render them as pills */
export function pillify(html: string): string {
  return html.replace(MATRIX_ID_PATTERN, '<a href="https://matrix.to/#/$1">$1</a>');
}

/** Render a markdown response to the HTML sent as `formatted_body` */
export async function toHtml(markdown: string): Promise<string> {
  const html = await marked.parse(markdown);
  return pillify(html.trim());
}
