import type { AppConfig } from '../utils/config.js';
import type { RoomSettingsStore } from '../utils/room-settings.js';
import type { SummaryScheduler } from '../features/scheduler.js';
import type { MentionTable } from './mentions-config.js';
import type { MessagingAdapter } from './messaging-adapter.js';
import type { AnnouncementFeed, IssueTracker, ReviewFeed } from './msc.js';

/**
 * Everything a handler can touch, built once at startup and passed down
 * explicitly. Tests build one from fakes.
 */
export interface AppContext {
  config: AppConfig;
  settings: RoomSettingsStore;
  scheduler: SummaryScheduler;
  tracker: IssueTracker;
  reviewFeed: ReviewFeed;
  announcements: AnnouncementFeed;
  mentions: MentionTable;
  messenger: MessagingAdapter;
  now(): Date;
}
