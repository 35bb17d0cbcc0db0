import { logger } from '../../middleware/logger.js';
import { markConnected, markDisconnected } from '../../middleware/health.js';
import type { Assistant } from '../../core/assistant.js';
import type { PlatformRuntime } from '../types.js';

import { createTelegramAdapter, createTelegramClient, type TelegramClient } from './adapter.js';
import { processTelegramUpdates } from './processor.js';

/** Pause between polls; longer after a failed poll. */
const POLL_INTERVAL_MS = 500;
const POLL_ERROR_BACKOFF_MS = 5_000;

export function createTelegramRuntime(params: {
  token: string;
  client?: TelegramClient;
}): PlatformRuntime {
  const client = params.client ?? createTelegramClient(params.token);
  const messenger = createTelegramAdapter(client);

  let running = false;
  let offset = 0;
  let botUserId: number | undefined;
  let pollTimer: ReturnType<typeof setTimeout> | null = null;
  let inFlight: AbortController | null = null;

  async function pollOnce(assistant: Assistant): Promise<void> {
    inFlight = new AbortController();
    try {
      const updates = await client.getUpdates(offset, inFlight.signal);
      offset = await processTelegramUpdates(assistant, messenger, updates, { offset, botUserId });
    } finally {
      inFlight = null;
    }
  }

  function loop(assistant: Assistant): void {
    if (!running) return;

    void pollOnce(assistant)
      .then(() => POLL_INTERVAL_MS)
      .catch((err: unknown) => {
        if (!running) return 0;
        logger.error({ err }, 'Telegram poll error');
        return POLL_ERROR_BACKOFF_MS;
      })
      .then((delay) => {
        if (running) pollTimer = setTimeout(() => loop(assistant), delay);
      });
  }

  return {
    platform: 'telegram',
    messenger,

    async start(assistant: Assistant): Promise<void> {
      if (running) return;

      const me = await client.getMe();
      botUserId = me.id;
      assistant.botUsername = me.username;

      running = true;
      markConnected();
      logger.info({ botUserId, username: me.username }, 'Telegram runtime started');
      loop(assistant);
    },

    async stop(): Promise<void> {
      running = false;
      if (pollTimer) {
        clearTimeout(pollTimer);
        pollTimer = null;
      }
      inFlight?.abort();
      markDisconnected();
      logger.info('Telegram runtime stopped');
    },
  };
}
