import { logger } from '../middleware/logger.js';
import { nextOccurrence } from '../utils/time-expressions.js';
import type { RoomSettingsStore } from '../utils/room-settings.js';

/**
 * Daily summary scheduler, one recurring trigger per room.
 *
 * Triggers are not timers: the runtime loop calls `runPending()` between
 * syncs and every due trigger fires in turn, then re-arms for the next day.
 * Replacing a room's time always cancels the old trigger first.
 */

export interface DailyTrigger {
  roomId: string;
  /** Zero-padded 24h `HH:MM`, local time */
  time: string;
  nextRunAt: Date;
}

export type TriggerHandler = (roomId: string) => Promise<void>;

export interface SummaryScheduler {
  /** Cancel any trigger for the room, then arm one at `time` */
  setRoomTime(roomId: string, time: string, now?: Date): DailyTrigger;
  /** Returns true if a trigger existed */
  cancel(roomId: string): boolean;
  get(roomId: string): DailyTrigger | undefined;
  triggers(): DailyTrigger[];
  /** Arm every room whose summaries are not disabled. Call once at startup. */
  armFromSettings(settings: RoomSettingsStore, defaultTime: string, now?: Date): void;
  /** Fire due triggers sequentially. Returns how many fired. */
  runPending(now?: Date): Promise<number>;
}

export function createSummaryScheduler(onTrigger: TriggerHandler): SummaryScheduler {
  const triggers = new Map<string, DailyTrigger>();

  function arm(roomId: string, time: string, now: Date): DailyTrigger {
    triggers.delete(roomId);
    const trigger: DailyTrigger = { roomId, time, nextRunAt: nextOccurrence(time, now) };
    triggers.set(roomId, trigger);
    logger.info({ roomId, time, nextRun: trigger.nextRunAt.toISOString() }, 'Daily summary scheduled');
    return trigger;
  }

  return {
    setRoomTime(roomId: string, time: string, now: Date = new Date()): DailyTrigger {
      return arm(roomId, time, now);
    },

    cancel(roomId: string): boolean {
      const existed = triggers.delete(roomId);
      if (existed) logger.info({ roomId }, 'Daily summary cancelled');
      return existed;
    },

    get(roomId: string): DailyTrigger | undefined {
      return triggers.get(roomId);
    },

    triggers(): DailyTrigger[] {
      return [...triggers.values()];
    },

    armFromSettings(settings: RoomSettingsStore, defaultTime: string, now: Date = new Date()): void {
      const withoutCustomTime: string[] = [];

      for (const roomId of settings.roomIds()) {
        if (settings.get(roomId, 'summaryEnabled') === false) continue;

        const custom = settings.get(roomId, 'summaryTimeOfDay');
        if (custom) {
          arm(roomId, custom, now);
        } else {
          withoutCustomTime.push(roomId);
        }
      }

      // Rooms without a custom time share the process-wide default
      for (const roomId of withoutCustomTime) {
        arm(roomId, defaultTime, now);
      }
    },

    async runPending(now: Date = new Date()): Promise<number> {
      const due = [...triggers.values()]
        .filter((trigger) => trigger.nextRunAt <= now)
        .sort((a, b) => a.nextRunAt.getTime() - b.nextRunAt.getTime());

      for (const trigger of due) {
        trigger.nextRunAt = nextOccurrence(trigger.time, now);
        try {
          await onTrigger(trigger.roomId);
        } catch (err) {
          logger.error({ err, roomId: trigger.roomId }, 'Scheduled summary failed — skipping this cycle');
        }
      }

      return due.length;
    },
  };
}
