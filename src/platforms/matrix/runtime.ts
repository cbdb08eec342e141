import { setTimeout as sleep } from 'node:timers/promises';

import { logger } from '../../middleware/logger.js';
import type { AppContext } from '../../core/app-context.js';
import type { PlatformRuntime } from '../types.js';
import type { MatrixClient } from './adapter.js';
import { processSyncResponse } from './processor.js';

/**
 * Matrix runtime: a single loop alternating long-poll `/sync` with the
 * summary scheduler. Everything runs sequentially, so handlers never race
 * on room settings.
 */
export function createMatrixRuntime(ctx: AppContext, client: MatrixClient): PlatformRuntime {
  const intervalMs = ctx.config.SYNC_INTERVAL_SECONDS * 1000;
  const botUserId = ctx.config.MATRIX_USER_ID;
  let running = false;
  let since: string | null = null;

  /** Returns false when the homeserver could not be reached */
  async function initialSync(): Promise<boolean> {
    try {
      const raw = await client.sync(null, 0);
      since = await processSyncResponse(ctx, client, raw, botUserId, { replayMessages: false });
    } catch (err) {
      logger.warn({ err, retryIn: `${ctx.config.SYNC_INTERVAL_SECONDS}s` }, 'Initial sync failed — retrying');
      return false;
    }
    logger.info({ rooms: ctx.settings.roomIds().length }, 'Initial sync complete');
    return true;
  }

  async function tick(): Promise<void> {
    try {
      const raw = await client.sync(since, intervalMs);
      since = await processSyncResponse(ctx, client, raw, botUserId, { replayMessages: true });
    } catch (err) {
      logger.warn({ err }, 'Unable to contact /sync');
    }

    await ctx.scheduler.runPending(ctx.now());
  }

  return {
    platform: 'matrix',

    async start(): Promise<void> {
      running = true;
      while (running && !(await initialSync())) {
        await sleep(intervalMs);
      }
      if (!running) return;
      logger.info({ user: botUserId, homeserver: ctx.config.MATRIX_HOMESERVER_URL }, 'Matrix runtime started');

      while (running) {
        await tick();
        if (running) await sleep(intervalMs);
      }

      logger.info('Matrix runtime stopped');
    },

    stop(): void {
      running = false;
    },
  };
}
