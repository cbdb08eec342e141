import { logger } from './middleware/logger.js';
import { loadConfig } from './utils/config.js';
import { createRoomSettingsStore } from './utils/room-settings.js';
import { loadMentions } from './core/mentions-config.js';
import type { AppContext } from './core/app-context.js';
import { createSummaryScheduler } from './features/scheduler.js';
import { sendSummary } from './features/summary.js';
import { createGitHubTracker } from './integrations/github-tracker.js';
import { createReviewFeed } from './integrations/review-feed.js';
import { createAnnouncementFeed } from './integrations/announcement-feed.js';
import { createMatrixClient } from './platforms/matrix/adapter.js';
import { createMatrixRuntime } from './platforms/matrix/runtime.js';
import type { PlatformRuntime } from './platforms/types.js';

let runtime: PlatformRuntime | null = null;

async function main(): Promise<void> {
  logger.info('mscbot starting...');

  const config = loadConfig();

  logger.info({
    user: config.MATRIX_USER_ID,
    homeserver: config.MATRIX_HOMESERVER_URL,
    repo: config.GITHUB_REPO,
    labels: config.GITHUB_LABELS,
    dailySummaryTime: config.DAILY_SUMMARY_TIME,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  const settings = createRoomSettingsStore(config.ROOM_DATA_PATH);
  settings.load();

  const client = createMatrixClient({
    homeserverUrl: config.MATRIX_HOMESERVER_URL,
    accessToken: config.MATRIX_ACCESS_TOKEN,
    messageType: config.MATRIX_MESSAGE_TYPE,
  });

  const ctx: AppContext = {
    config,
    settings,
    scheduler: createSummaryScheduler((roomId) => sendSummary(ctx, roomId)),
    tracker: createGitHubTracker({ repo: config.GITHUB_REPO, token: config.GITHUB_TOKEN }),
    reviewFeed: createReviewFeed(config.REVIEW_FEED_URL),
    announcements: createAnnouncementFeed(config.ANNOUNCEMENT_FEED_URL),
    mentions: loadMentions(config.MENTIONS_PATH),
    messenger: client,
    now: () => new Date(),
  };

  ctx.scheduler.armFromSettings(settings, config.DAILY_SUMMARY_TIME, ctx.now());

  runtime = createMatrixRuntime(ctx, client);
  logger.info({ platform: runtime.platform }, 'Starting platform runtime');
  await runtime.start();
}

main().catch((err) => {
  logger.fatal({ err }, 'Fatal error — bot shutting down');
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection — bot shutting down');
  process.exit(1);
});

process.on('uncaughtException', (err) => {
  logger.fatal({ err }, 'Uncaught exception — bot shutting down');
  process.exit(1);
});

function shutdown(signal: 'SIGINT' | 'SIGTERM'): void {
  logger.info({ signal }, 'Received shutdown signal — shutting down');
  runtime?.stop();
  process.exit(0);
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
