import { logger } from '../../middleware/logger.js';
import { ROOM_JOIN_RETRY, withRetry, type RetryPolicy } from '../../middleware/retry.js';
import { processInboundMessage } from '../../core/process-inbound-message.js';
import type { AppContext } from '../../core/app-context.js';
import { roomSummaryTime } from '../../features/room-options.js';
import type { MatrixClient } from './adapter.js';
import { normalizeSync } from './inbound.js';

/**
 * Join a room we were invited to. A newly joined room gets a settings entry
 * so it survives restarts, and a daily summary at the default time.
 */
export async function handleInvite(
  ctx: AppContext,
  client: Pick<MatrixClient, 'joinRoom'>,
  roomId: string,
  policy: RetryPolicy = ROOM_JOIN_RETRY,
): Promise<boolean> {
  logger.info({ roomId }, 'Joining room');

  try {
    await withRetry(() => client.joinRoom(roomId), policy, `join ${roomId}`);
  } catch (err) {
    logger.warn({ err, roomId }, 'Unable to join room — giving up');
    return false;
  }

  if (!ctx.settings.roomIds().includes(roomId)) {
    ctx.settings.update(roomId, {});
  }
  if (ctx.settings.get(roomId, 'summaryEnabled') !== false && !ctx.scheduler.get(roomId)) {
    ctx.scheduler.setRoomTime(roomId, roomSummaryTime(ctx, roomId), ctx.now());
  }
  return true;
}

/**
 * Handle one `/sync` response: invites first, then messages in order.
 * With `replayMessages` false (the first sync after startup) room history
 * is skipped. Returns the next batch token.
 */
export async function processSyncResponse(
  ctx: AppContext,
  client: Pick<MatrixClient, 'joinRoom'>,
  raw: unknown,
  botUserId: string,
  options: { replayMessages: boolean; joinPolicy?: RetryPolicy },
): Promise<string> {
  const batch = normalizeSync(raw);

  for (const roomId of batch.invites) {
    await handleInvite(ctx, client, roomId, options.joinPolicy);
  }

  if (options.replayMessages) {
    for (const message of batch.messages) {
      await processInboundMessage(ctx, message, botUserId);
    }
  } else if (batch.messages.length > 0) {
    logger.debug({ skipped: batch.messages.length }, 'Skipping messages from initial sync');
  }

  return batch.nextBatch;
}
