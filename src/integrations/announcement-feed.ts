import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';

import { UpstreamError } from '../core/errors.js';
import type { AnnouncementFeed } from '../core/msc.js';

/**
 * Announcement feed (RSS 2.0 or Atom) — used by `show news twim` to find
 * when the last weekly announcement went out.
 */

const REQUEST_TIMEOUT_MS = 15_000;

const EntrySchema = z.object({
  pubDate: z.string().optional(),
  published: z.string().optional(),
  updated: z.string().optional(),
});

const EntriesSchema = z.union([z.array(EntrySchema), EntrySchema]);

const RssSchema = z.object({
  rss: z.object({ channel: z.object({ item: EntriesSchema }) }),
});

const AtomSchema = z.object({
  feed: z.object({ entry: EntriesSchema }),
});

const parser = new XMLParser({ parseTagValue: false });

function firstEntry(entries: z.infer<typeof EntriesSchema>): z.infer<typeof EntrySchema> | undefined {
  return Array.isArray(entries) ? entries[0] : entries;
}

/**
 * Publication time of the first (newest) entry of an RSS or Atom document.
 * Throws when the document has no entries or no parseable date.
 */
export function parseLatestPublished(xml: string): Date {
  const document: unknown = parser.parse(xml);

  const rss = RssSchema.safeParse(document);
  const atom = AtomSchema.safeParse(document);
  const entry = rss.success
    ? firstEntry(rss.data.rss.channel.item)
    : atom.success
      ? firstEntry(atom.data.feed.entry)
      : undefined;

  const raw = entry?.pubDate ?? entry?.published ?? entry?.updated;
  if (!raw) {
    throw new UpstreamError('Announcement feed', 'no entries with a publish date');
  }

  const published = new Date(raw.trim());
  if (Number.isNaN(published.getTime())) {
    throw new UpstreamError('Announcement feed', `unparseable publish date '${raw}'`);
  }
  return published;
}

export function createAnnouncementFeed(url: string): AnnouncementFeed {
  return {
    async latestPublishedAt(): Promise<Date> {
      const response = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
      if (!response.ok) {
        throw new UpstreamError('Announcement feed', `GET ${url} failed`, response.status);
      }
      return parseLatestPublished(await response.text());
    },
  };
}
