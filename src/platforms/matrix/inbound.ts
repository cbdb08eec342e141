import { z } from 'zod';

import { UpstreamError } from '../../core/errors.js';
import type { InboundMessage } from '../../core/inbound-message.js';

const TimelineEventSchema = z.object({
  type: z.string(),
  sender: z.string(),
  event_id: z.string().optional(),
  content: z.record(z.string(), z.unknown()),
});

const MessageContentSchema = z.object({
  msgtype: z.string(),
  body: z.string(),
});

const SyncResponseSchema = z.object({
  next_batch: z.string(),
  rooms: z.object({
    invite: z.record(z.string(), z.unknown()).optional(),
    join: z.record(z.string(), z.object({
      timeline: z.object({ events: z.array(TimelineEventSchema).optional() }).optional(),
    })).optional(),
  }).optional(),
});

export interface SyncBatch {
  nextBatch: string;
  /** Room IDs with a pending invite */
  invites: string[];
  /** `m.room.message` events in timeline order, per room */
  messages: InboundMessage[];
}

/** Validate a `/sync` response and pull out invites and room messages */
export function normalizeSync(raw: unknown): SyncBatch {
  const parsed = SyncResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UpstreamError('Matrix', '/sync returned an unexpected payload', null, { cause: parsed.error });
  }

  const rooms = parsed.data.rooms;
  const messages: InboundMessage[] = [];

  for (const [roomId, room] of Object.entries(rooms?.join ?? {})) {
    for (const event of room.timeline?.events ?? []) {
      if (event.type !== 'm.room.message') continue;

      const content = MessageContentSchema.safeParse(event.content);
      if (!content.success) continue;

      messages.push({
        roomId,
        sender: event.sender,
        eventId: event.event_id,
        msgtype: content.data.msgtype,
        body: content.data.body,
      });
    }
  }

  return {
    nextBatch: parsed.data.next_batch,
    invites: Object.keys(rooms?.invite ?? {}),
    messages,
  };
}
