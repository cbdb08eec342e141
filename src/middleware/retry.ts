import { setTimeout as sleep } from 'node:timers/promises';

import { logger } from './logger.js';

/**
 * Bounded retry with a fixed delay between attempts.
 *
 * Used for joining rooms on invite: homeservers sometimes reject a join
 * issued immediately after the invite arrives.
 */

export interface RetryPolicy {
  /** Total attempts including the first */
  attempts: number;
  delayMs: number;
}

/** One retry, five seconds after the first failure */
export const ROOM_JOIN_RETRY: RetryPolicy = { attempts: 2, delayMs: 5_000 };

/**
 * Run `operation`, retrying per `policy`. Rejects with the last error once
 * every attempt has failed.
 */
export async function withRetry<T>(
  operation: () => Promise<T>,
  policy: RetryPolicy,
  label: string,
): Promise<T> {
  let lastError: unknown = new Error(`${label}: no attempts made`);

  for (let attempt = 1; attempt <= policy.attempts; attempt++) {
    try {
      return await operation();
    } catch (err) {
      lastError = err;
      if (attempt < policy.attempts) {
        logger.warn({ err, label, attempt, retryIn: `${policy.delayMs / 1000}s` }, 'Operation failed — retrying');
        await sleep(policy.delayMs);
      }
    }
  }

  throw lastError;
}
