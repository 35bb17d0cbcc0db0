import { logger } from '../../middleware/logger.js';
import type { Assistant } from '../../core/assistant.js';
import type { MessagingAdapter } from '../../core/messaging-adapter.js';
import { processInboundMessage } from '../../core/process-inbound-message.js';

import { normalizeTelegramMessage } from './inbound.js';
import type { TelegramUpdate } from './types.js';

/**
 * Process a batch of Telegram updates in arrival order.
 *
 * A failing update is logged and skipped so one bad message cannot stall
 * the rest of the batch. Returns the next `getUpdates` offset.
 */
export async function processTelegramUpdates(
  assistant: Assistant,
  adapter: MessagingAdapter,
  updates: TelegramUpdate[],
  env: { offset: number; botUserId?: number },
): Promise<number> {
  let offset = env.offset;

  for (const update of updates) {
    offset = Math.max(offset, update.update_id + 1);
    if (!update.message) continue;

    const inbound = normalizeTelegramMessage(update.message, env.botUserId);
    try {
      await processInboundMessage(assistant, adapter, inbound);
    } catch (err) {
      logger.error({ err, updateId: update.update_id, chatId: inbound.chatId }, 'Failed to process Telegram update');
    }
  }

  return offset;
}
