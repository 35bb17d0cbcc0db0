import { openKnowledgeStore, type KnowledgeStore } from './utils/db.js';
import { getPlatformRuntime } from './platforms/index.js';
import type { PlatformRuntime } from './platforms/types.js';
import { createAssistant, type Assistant } from './core/assistant.js';
import { logger } from './middleware/logger.js';
import { config } from './utils/config.js';
import { startHealthServer, stopHealthServer } from './middleware/health.js';

let store: KnowledgeStore | null = null;
let assistant: Assistant | null = null;
let runtime: PlatformRuntime | null = null;

async function main(): Promise<void> {
  logger.info('Huddle starting...');

  logger.info({
    messagingPlatform: config.MESSAGING_PLATFORM,
    dbPath: config.DB_PATH,
    faqAdmins: config.FAQ_ADMIN_IDS.length,
    healthPort: config.HEALTH_PORT,
    healthBindHost: config.HEALTH_BIND_HOST,
    logLevel: config.LOG_LEVEL,
  }, 'Configuration loaded');

  store = openKnowledgeStore(config.DB_PATH);
  runtime = getPlatformRuntime();

  assistant = createAssistant({
    store,
    messenger: runtime.messenger,
    adminIds: config.FAQ_ADMIN_IDS,
    contextMaxMessages: config.CONTEXT_MAX_MESSAGES,
  });

  // Re-arm reminders persisted by a previous run; overdue ones fire now
  await assistant.reminders.restore();

  const reminders = assistant.reminders;
  startHealthServer({ scheduledReminders: () => reminders.pendingCount() }, config.HEALTH_PORT, config.HEALTH_BIND_HOST);

  logger.info({ platform: runtime.platform }, 'Starting platform runtime');
  await runtime.start(assistant);
  logger.info('Huddle is online and listening');
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

// Graceful shutdown. Pending reminders stay `scheduled` in the database.
async function shutdown(signal: 'SIGINT' | 'SIGTERM'): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal — shutting down');
  assistant?.reminders.stop();
  stopHealthServer();

  try {
    await runtime?.stop();
  } catch (err) {
    logger.error({ err, signal }, 'Failed to stop platform runtime cleanly');
  }

  try {
    await store?.close();
  } catch (err) {
    logger.error({ err, signal }, 'Failed to close database cleanly during shutdown');
  }

  process.exit(0);
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});

process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
