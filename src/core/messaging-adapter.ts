import { toHtml } from '../utils/formatting.js';

/**
 * Messaging adapter API.
 *
 * This is the minimal surface needed to send responses without exposing
 * transport-specific client types to command handling or the scheduler.
 */
export interface MessagingAdapter {
  sendMessage(roomId: string, htmlBody: string, plainBody: string): Promise<void>;
}

/** Render a markdown response and send it as both formatted and plain body */
export async function sendMarkdown(messenger: MessagingAdapter, roomId: string, markdown: string): Promise<void> {
  await messenger.sendMessage(roomId, await toHtml(markdown), markdown);
}
