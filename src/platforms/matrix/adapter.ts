import { UpstreamError } from '../../core/errors.js';
import type { MessagingAdapter } from '../../core/messaging-adapter.js';

/**
 * Matrix client-server API over fetch. Only the calls the bot needs:
 * sync, join, and sending room messages.
 */

export interface MatrixClientOptions {
  homeserverUrl: string;
  accessToken: string;
  /** `m.text` notifies most clients, `m.notice` does not */
  messageType: 'm.text' | 'm.notice';
}

export interface MatrixClient extends MessagingAdapter {
  /** Raw `/sync` response; validate with `normalizeSync` */
  sync(since: string | null, timeoutMs: number): Promise<unknown>;
  joinRoom(roomId: string): Promise<void>;
}

export interface MatrixDemoOutboxEntry {
  roomId: string;
  htmlBody: string;
  plainBody: string;
}

const CLIENT_API = '/_matrix/client/v3';
const REQUEST_TIMEOUT_MS = 15_000;

async function matrixApiRequest(
  options: MatrixClientOptions,
  path: string,
  init: RequestInit,
  timeoutMs: number = REQUEST_TIMEOUT_MS,
): Promise<unknown> {
  const response = await fetch(`${options.homeserverUrl}${CLIENT_API}${path}`, {
    ...init,
    headers: {
      authorization: `Bearer ${options.accessToken}`,
      'content-type': 'application/json',
      ...(init.headers ?? {}),
    },
    signal: AbortSignal.timeout(timeoutMs),
  });

  if (!response.ok) {
    const text = await response.text();
    throw new UpstreamError('Matrix', `${init.method ?? 'GET'} ${path.split('?')[0]} failed: ${text.slice(0, 200)}`, response.status);
  }

  return await response.json();
}

export function createMatrixClient(options: MatrixClientOptions): MatrixClient {
  let txnCounter = 0;

  return {
    async sync(since: string | null, timeoutMs: number): Promise<unknown> {
      const params = new URLSearchParams({ timeout: String(timeoutMs) });
      if (since) params.set('since', since);
      return matrixApiRequest(options, `/sync?${params.toString()}`, { method: 'GET' }, timeoutMs + REQUEST_TIMEOUT_MS);
    },

    async joinRoom(roomId: string): Promise<void> {
      await matrixApiRequest(options, `/join/${encodeURIComponent(roomId)}`, {
        method: 'POST',
        body: JSON.stringify({}),
      });
    },

    async sendMessage(roomId: string, htmlBody: string, plainBody: string): Promise<void> {
      txnCounter += 1;
      const txnId = `mscbot-${Date.now()}-${txnCounter}`;

      await matrixApiRequest(
        options,
        `/rooms/${encodeURIComponent(roomId)}/send/m.room.message/${encodeURIComponent(txnId)}`,
        {
          method: 'PUT',
          body: JSON.stringify({
            msgtype: options.messageType,
            body: plainBody,
            format: 'org.matrix.custom.html',
            formatted_body: htmlBody,
          }),
        },
      );
    },
  };
}

/** In-memory messenger that records what would have been sent */
export function createMatrixDemoAdapter(outbox: MatrixDemoOutboxEntry[]): MessagingAdapter {
  return {
    async sendMessage(roomId: string, htmlBody: string, plainBody: string): Promise<void> {
      outbox.push({ roomId, htmlBody, plainBody });
    },
  };
}
