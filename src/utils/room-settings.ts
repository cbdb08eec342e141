import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';

import { logger } from '../middleware/logger.js';
import { ConfigurationError } from '../core/errors.js';
import { SUMMARY_CONTENT_MODES, type RoomSettingKey, type RoomSettings } from '../core/msc.js';

/**
 * Per-room settings, persisted as one flat JSON object keyed by room ID.
 *
 * Every mutation rewrites the whole file, keeping the previous revision
 * beside it as `<file>.bak`. A failed write is logged and the in-memory map
 * stays authoritative; the next mutation writes everything again.
 */

const RoomSettingsSchema = z.object({
  summaryEnabled: z.boolean().optional(),
  summaryTimeOfDay: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/).optional(),
  summaryContentMode: z.enum(SUMMARY_CONTENT_MODES).optional(),
  priorityIssueIds: z.array(z.number().int()).optional(),
});

const RoomDataSchema = z.record(z.string(), RoomSettingsSchema);

export interface RoomSettingsStore {
  /** Replace the in-memory map with the file on disk, if there is one */
  load(): void;
  get<K extends RoomSettingKey>(roomId: string, key: K): RoomSettings[K] | undefined;
  update(roomId: string, settings: RoomSettings): void;
  delete(roomId: string, key: RoomSettingKey): void;
  roomIds(): string[];
}

export function createRoomSettingsStore(filePath: string): RoomSettingsStore {
  let rooms: Record<string, RoomSettings> = {};

  function persist(): void {
    try {
      mkdirSync(dirname(filePath), { recursive: true });
    } catch (err) {
      logger.warn({ err, filePath }, 'Unable to create room data directory');
      return;
    }

    if (existsSync(filePath)) {
      try {
        renameSync(filePath, `${filePath}.bak`);
      } catch (err) {
        logger.warn({ err, filePath }, 'Unable to back up previous room data');
      }
    }

    try {
      writeFileSync(filePath, JSON.stringify(rooms), 'utf-8');
    } catch (err) {
      logger.warn({ err, filePath }, 'Unable to save room data to disk');
    }
  }

  return {
    load(): void {
      if (!existsSync(filePath)) {
        rooms = {};
        logger.info({ filePath }, 'No room data file yet — starting empty');
        return;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(readFileSync(filePath, 'utf-8'));
      } catch (err) {
        throw new ConfigurationError(`Room data file ${filePath} is not valid JSON`, { cause: err });
      }

      const parsed = RoomDataSchema.safeParse(raw);
      if (!parsed.success) {
        throw new ConfigurationError(`Room data file ${filePath} is malformed`, { cause: parsed.error });
      }

      rooms = parsed.data;
      logger.info({ filePath, rooms: Object.keys(rooms).length }, 'Room data loaded');
    },

    get<K extends RoomSettingKey>(roomId: string, key: K): RoomSettings[K] | undefined {
      return Object.hasOwn(rooms, roomId) ? rooms[roomId][key] : undefined;
    },

    update(roomId: string, settings: RoomSettings): void {
      rooms[roomId] = { ...(Object.hasOwn(rooms, roomId) ? rooms[roomId] : {}), ...settings };
      persist();
    },

    delete(roomId: string, key: RoomSettingKey): void {
      if (!Object.hasOwn(rooms, roomId)) {
        logger.warn({ roomId, key }, 'Tried to delete a setting on a room with no settings');
        return;
      }
      delete rooms[roomId][key];
      persist();
    },

    roomIds(): string[] {
      return Object.keys(rooms);
    },
  };
}
