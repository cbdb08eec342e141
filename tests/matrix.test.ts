import { afterEach, describe, expect, it, vi } from 'vitest';

import { createMatrixClient } from '../src/platforms/matrix/adapter.js';
import { normalizeSync } from '../src/platforms/matrix/inbound.js';
import { handleInvite, processSyncResponse } from '../src/platforms/matrix/processor.js';
import { createMatrixRuntime } from '../src/platforms/matrix/runtime.js';
import { UpstreamError } from '../src/core/errors.js';
import { BOT_USER, makeContext } from './helpers.js';

const NO_DELAY = { attempts: 2, delayMs: 0 };

function syncPayload(options: { invites?: string[]; messages?: Array<[string, string, string]> } = {}) {
  const join: Record<string, { timeline: { events: unknown[] } }> = {};
  for (const [roomId, sender, body] of options.messages ?? []) {
    join[roomId] ??= { timeline: { events: [] } };
    join[roomId].timeline.events.push({
      type: 'm.room.message',
      sender,
      event_id: `$${join[roomId].timeline.events.length}`,
      content: { msgtype: 'm.text', body },
    });
  }

  return {
    next_batch: 's2',
    rooms: {
      invite: Object.fromEntries((options.invites ?? []).map((roomId) => [roomId, {}])),
      join,
    },
  };
}

describe('normalizeSync', () => {
  it('extracts invites and text messages', () => {
    const batch = normalizeSync({
      next_batch: 's9',
      rooms: {
        invite: { '!new:example.org': { invite_state: { events: [] } } },
        join: {
          '!a:example.org': {
            timeline: {
              events: [
                { type: 'm.room.member', sender: '@bob:example.org', content: { membership: 'join' } },
                { type: 'm.room.message', sender: '@bob:example.org', event_id: '$1', content: { msgtype: 'm.text', body: 'hi' } },
                { type: 'm.room.message', sender: '@bob:example.org', content: { msgtype: 'm.text' } },
              ],
            },
          },
        },
      },
    });

    expect(batch).toEqual({
      nextBatch: 's9',
      invites: ['!new:example.org'],
      messages: [{ roomId: '!a:example.org', sender: '@bob:example.org', eventId: '$1', msgtype: 'm.text', body: 'hi' }],
    });
  });

  it('accepts a sync with no rooms', () => {
    expect(normalizeSync({ next_batch: 's1' })).toEqual({ nextBatch: 's1', invites: [], messages: [] });
  });

  it('rejects payloads without a batch token', () => {
    expect(() => normalizeSync({ rooms: {} })).toThrow(UpstreamError);
  });
});

describe('matrix client', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends formatted messages with the configured msgtype', async () => {
    const fetchMock = vi.fn(async (_url: string, _init: RequestInit) =>
      new Response(JSON.stringify({ event_id: '$x' }), { status: 200 }));
    vi.stubGlobal('fetch', fetchMock);

    const client = createMatrixClient({
      homeserverUrl: 'https://matrix.example.org',
      accessToken: 'test-token',
      messageType: 'm.notice',
    });
    await client.sendMessage('!room:example.org', '<p>hi</p>', 'hi');

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url.startsWith('https://matrix.example.org/_matrix/client/v3/rooms/!room%3Aexample.org/send/m.room.message/')).toBe(true);
    expect(init.method).toBe('PUT');
    expect(init.headers).toMatchObject({ authorization: 'Bearer test-token' });
    expect(JSON.parse(String(init.body))).toEqual({
      msgtype: 'm.notice',
      body: 'hi',
      format: 'org.matrix.custom.html',
      formatted_body: '<p>hi</p>',
    });
  });

  it('raises upstream errors with the status code', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('{"errcode":"M_FORBIDDEN"}', { status: 403 })));

    const client = createMatrixClient({
      homeserverUrl: 'https://matrix.example.org',
      accessToken: 'test-token',
      messageType: 'm.text',
    });

    await expect(client.joinRoom('!room:example.org')).rejects.toMatchObject({ service: 'Matrix', status: 403 });
  });
});

describe('invite handling', () => {
  it('joins, records the room and arms the default summary', async () => {
    const { ctx } = makeContext();
    const joinRoom = vi.fn()
      .mockRejectedValueOnce(new Error('M_UNKNOWN'))
      .mockResolvedValueOnce(undefined);

    expect(await handleInvite(ctx, { joinRoom }, '!new:example.org', NO_DELAY)).toBe(true);
    expect(joinRoom).toHaveBeenCalledTimes(2);
    expect(ctx.settings.roomIds()).toEqual(['!new:example.org']);
    expect(ctx.scheduler.get('!new:example.org')?.time).toBe('07:00');
  });

  it('gives up after the retry', async () => {
    const { ctx } = makeContext();
    const joinRoom = vi.fn().mockRejectedValue(new Error('M_FORBIDDEN'));

    expect(await handleInvite(ctx, { joinRoom }, '!new:example.org', NO_DELAY)).toBe(false);
    expect(joinRoom).toHaveBeenCalledTimes(2);
    expect(ctx.settings.roomIds()).toEqual([]);
    expect(ctx.scheduler.triggers()).toEqual([]);
  });

  it('keeps a room disabled when rejoining', async () => {
    const { ctx } = makeContext();
    ctx.settings.update('!old:example.org', { summaryEnabled: false });

    await handleInvite(ctx, { joinRoom: vi.fn(async () => {}) }, '!old:example.org', NO_DELAY);
    expect(ctx.scheduler.get('!old:example.org')).toBeUndefined();
  });
});

describe('sync processing', () => {
  it('skips history on the first sync', async () => {
    const { ctx, outbox } = makeContext();
    const raw = syncPayload({ messages: [['!a:example.org', '@bob:example.org', 'mscbot: help']] });

    const next = await processSyncResponse(ctx, { joinRoom: vi.fn(async () => {}) }, raw, BOT_USER, { replayMessages: false });
    expect(next).toBe('s2');
    expect(outbox).toEqual([]);
  });

  it('answers messages in order after joining invited rooms', async () => {
    const { ctx, outbox } = makeContext();
    const joinRoom = vi.fn(async () => {});
    const raw = syncPayload({
      invites: ['!new:example.org'],
      messages: [
        ['!a:example.org', '@bob:example.org', 'mscbot: set priority 5'],
        ['!a:example.org', '@bob:example.org', 'mscbot: show priority'],
        ['!a:example.org', BOT_USER, 'mscbot: show priority'],
      ],
    });

    await processSyncResponse(ctx, { joinRoom }, raw, BOT_USER, { replayMessages: true, joinPolicy: NO_DELAY });

    expect(joinRoom).toHaveBeenCalledWith('!new:example.org');
    expect(outbox.map((entry) => entry.plainBody)).toEqual([
      'Priority MSCs set: [5]',
      'Currently set priority MSCs: [[5](https://github.com/matrix-org/matrix-doc/pull/5)]',
    ]);
  });
});

describe('matrix runtime', () => {
  it('alternates sync with scheduled summaries until stopped', async () => {
    const { ctx, outbox } = makeContext();
    const runPending = vi.spyOn(ctx.scheduler, 'runPending');
    let calls = 0;

    const client = {
      sendMessage: ctx.messenger.sendMessage,
      joinRoom: vi.fn(async () => {}),
      sync: vi.fn(async (since: string | null) => {
        calls += 1;
        if (calls === 1) {
          expect(since).toBeNull();
          return syncPayload({ messages: [['!a:example.org', '@bob:example.org', 'mscbot: help']] });
        }
        expect(since).toBe('s2');
        runtime.stop();
        return syncPayload({ messages: [['!a:example.org', '@bob:example.org', 'mscbot: show priority']] });
      }),
    };

    const runtime = createMatrixRuntime(ctx, client);
    await runtime.start();

    expect(client.sync).toHaveBeenCalledTimes(2);
    expect(outbox.map((entry) => entry.plainBody)).toEqual(['No priority MSCs set.']);
    expect(runPending).toHaveBeenCalledTimes(1);
  });

  it('retries the first sync instead of failing startup', async () => {
    const { ctx, outbox } = makeContext({ env: { SYNC_INTERVAL_SECONDS: '1' } });
    const sinces: Array<string | null> = [];

    const client = {
      sendMessage: ctx.messenger.sendMessage,
      joinRoom: vi.fn(async () => {}),
      sync: vi.fn(async (since: string | null) => {
        sinces.push(since);
        if (sinces.length === 1) throw new Error('ECONNRESET');
        if (sinces.length === 3) runtime.stop();
        return syncPayload({ messages: [['!a:example.org', '@bob:example.org', 'mscbot: show priority']] });
      }),
    };

    const runtime = createMatrixRuntime(ctx, client);
    await expect(runtime.start()).resolves.toBeUndefined();

    expect(sinces).toEqual([null, null, 's2']);
    expect(outbox.map((entry) => entry.plainBody)).toEqual(['No priority MSCs set.']);
  });
});
