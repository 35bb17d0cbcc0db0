import { logger } from '../middleware/logger.js';
import { sanitizeMessage } from '../middleware/sanitize.js';
import { markMessageReceived } from '../middleware/health.js';
import { isCommand, matchCommand } from '../features/router.js';
import type { Assistant } from './assistant.js';
import type { InboundMessage } from './inbound-message.js';
import type { MessagingAdapter } from './messaging-adapter.js';
import { processCommand } from './process-command.js';
import { processGroupMessage } from './process-group-message.js';

/**
 * Core inbound message processing.
 *
 * Platform-agnostic pipeline steps:
 * - transport guards (self/bot/empty)
 * - sanitization (control chars, length limit)
 * - dispatch to commands or to the group message pipeline
 */
export async function processInboundMessage(
  assistant: Assistant,
  adapter: MessagingAdapter,
  inbound: InboundMessage,
): Promise<void> {
  // Ignore messages sent by this or any other bot
  if (inbound.fromSelf || inbound.fromBot) return;

  if (!inbound.text) return;

  const sanitized = sanitizeMessage(inbound.text);
  if (sanitized.rejected) {
    logger.debug({ reason: sanitized.rejectionReason, chatId: inbound.chatId }, 'Message rejected by sanitizer');
    return;
  }
  const text = sanitized.text;

  markMessageReceived();

  if (isCommand(text)) {
    const match = matchCommand(text, assistant.botUsername);
    if (!match) {
      logger.debug({ chatId: inbound.chatId, text: text.slice(0, 40) }, 'Ignoring unknown command');
      return;
    }
    await processCommand(assistant, adapter, inbound, match);
    return;
  }

  await processGroupMessage(assistant, adapter, inbound, text);
}
