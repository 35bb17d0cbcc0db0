import { logger } from '../middleware/logger.js';
import { isImportant } from '../features/relevance.js';
import { extractQuestion } from '../features/question-extractor.js';
import type { FaqLookup } from '../features/faq.js';
import type { Assistant } from './assistant.js';
import type { InboundMessage } from './inbound-message.js';
import { createMessageRef } from './message-ref.js';
import type { MessagingAdapter } from './messaging-adapter.js';

export function formatImportantAnnouncement(text: string): string {
  return `📢 [Important] ${text}`;
}

export function formatFaqReply(question: string, lookup: FaqLookup): string {
  if (lookup.status === 'answered') return `🤖 Auto-Answer: ${lookup.answer}`;
  return `Could you clarify or provide more details about '${question}'?`;
}

/**
 * Core group message processor for plain (non-command) text.
 *
 * 1. Important messages are archived and announced.
 * 2. The first question-like sentence is answered from the FAQ store, or
 *    recorded as pending with a clarification prompt.
 * 3. The message joins the group's rolling context.
 *
 * Storage failures propagate to the caller.
 */
export async function processGroupMessage(
  assistant: Assistant,
  adapter: MessagingAdapter,
  inbound: InboundMessage,
  text: string,
): Promise<void> {
  const { chatId: groupId, messageId } = inbound;
  const replyTo = createMessageRef({ platform: inbound.platform, chatId: groupId, id: messageId });

  if (isImportant(text, assistant.recognizer)) {
    await assistant.store.insertImportantMessage(groupId, messageId, text);
    logger.info({ groupId, messageId }, 'Important message archived');
    await adapter.sendText(groupId, formatImportantAnnouncement(text), { replyTo });
  }

  const question = extractQuestion(text, assistant.segmenter);
  if (question) {
    const lookup = await assistant.faq.handleQuestion(groupId, question);
    logger.debug({ groupId, question, status: lookup.status }, 'FAQ lookup');
    await adapter.sendText(groupId, formatFaqReply(question, lookup), { replyTo });
  }

  assistant.context.record(groupId, {
    senderId: inbound.senderId,
    text,
    timestampMs: inbound.timestampMs,
  });
}
