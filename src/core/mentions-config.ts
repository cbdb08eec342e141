import { existsSync, readFileSync } from 'node:fs';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';

// ── Zod schema for config/mentions.json ─────────────────────────────

const MentionsConfigSchema = z.object({
  // GitHub username → Matrix user ID. Zod v4 requires both key and value schemas for records.
  mentions: z.record(z.string(), z.string().regex(/^@[^:\s]+:\S+$/, 'must be a Matrix user ID')),
});

export type MentionTable = Readonly<Record<string, string>>;

/**
 * Load the GitHub → Matrix mention table. The file is optional; a missing
 * file means reviewers are shown by GitHub username.
 */
export function loadMentions(path: string): MentionTable {
  if (!existsSync(path)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Mentions file ${path} is not valid JSON`, { cause: err });
  }

  const parsed = MentionsConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Mentions file ${path} is invalid: ${issues.join('; ')}`);
  }
  return parsed.data.mentions;
}

/** Translate a GitHub username to a Matrix mention, passing it through when unmapped */
export function mentionFor(mentions: MentionTable, login: string): string {
  return Object.hasOwn(mentions, login) ? mentions[login] : login;
}
