import { z } from 'zod';

import { logger } from '../middleware/logger.js';
import { UpstreamError } from '../core/errors.js';
import type { ReviewFeed, ReviewRecord } from '../core/msc.js';

/**
 * Review-status feed published by the FCP bot's web server.
 *
 * `GET <base>/api/all` returns every in-flight FCP proposal with its
 * disposition and the per-reviewer sign-off state.
 */

const REQUEST_TIMEOUT_MS = 15_000;

const FeedRecordSchema = z.object({
  fcp: z.object({
    disposition: z.string(),
    fcp_start: z.string().nullable().optional(),
  }),
  reviews: z.array(z.tuple([z.object({ login: z.string() }), z.boolean()])),
  issue: z.object({ number: z.number().int() }),
});

const FeedSchema = z.array(FeedRecordSchema);

type FeedRecord = z.infer<typeof FeedRecordSchema>;

function toReviewRecord(raw: FeedRecord): ReviewRecord {
  const start = raw.fcp.fcp_start ? new Date(raw.fcp.fcp_start) : undefined;
  return {
    issueNumber: raw.issue.number,
    disposition: raw.fcp.disposition,
    reviewers: raw.reviews.map(([user, approved]) => ({ login: user.login, approved })),
    fcpStart: start && !Number.isNaN(start.getTime()) ? start : undefined,
  };
}

export function createReviewFeed(baseUrl: string): ReviewFeed {
  const url = `${baseUrl.replace(/\/+$/, '')}/api/all`;

  return {
    async fetchAll(): Promise<ReviewRecord[]> {
      const response = await fetch(url, { signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS) });
      if (!response.ok) {
        throw new UpstreamError('Review feed', `GET ${url} failed`, response.status);
      }

      const parsed = FeedSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new UpstreamError('Review feed', 'unexpected payload', response.status, { cause: parsed.error });
      }

      logger.debug({ records: parsed.data.length }, 'Fetched review feed');
      return parsed.data.map(toReviewRecord);
    },
  };
}
