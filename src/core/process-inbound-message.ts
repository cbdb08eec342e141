import { logger } from '../middleware/logger.js';
import type { AppContext } from './app-context.js';
import type { InboundMessage } from './inbound-message.js';
import { sendMarkdown } from './messaging-adapter.js';
import { getResponse } from './response-router.js';

/**
 * Strip the `<prefix>:` address from a message body.
 * Returns null when the message is not addressed to the bot.
 */
export function extractCommand(body: string, prefix: string): string | null {
  const trimmed = body.trim();
  const address = `${prefix}:`;
  if (!trimmed.toLowerCase().startsWith(address.toLowerCase())) return null;
  return trimmed.slice(address.length).trim();
}

/**
 * Core inbound message processing.
 *
 * Ignores the bot's own messages, non-text messages and anything not
 * addressed to the bot; otherwise routes the command and sends the reply.
 * Delivery failures are logged, never thrown.
 */
export async function processInboundMessage(
  ctx: AppContext,
  inbound: InboundMessage,
  botUserId: string,
): Promise<void> {
  if (inbound.sender === botUserId) return;
  if (inbound.msgtype !== 'm.text') return;

  const command = extractCommand(inbound.body, ctx.config.BOT_COMMAND);
  if (command === null) return;

  logger.info({ roomId: inbound.roomId, sender: inbound.sender, command }, 'Received command');
  const response = await getResponse(ctx, inbound.roomId, command);

  try {
    await sendMarkdown(ctx.messenger, inbound.roomId, response);
    logger.info({ roomId: inbound.roomId }, 'Sent command response');
  } catch (err) {
    logger.warn({ err, roomId: inbound.roomId }, 'Unable to post to room');
  }
}
