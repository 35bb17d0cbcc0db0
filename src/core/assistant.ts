import { logger } from '../middleware/logger.js';
import { createGroupContext, type GroupContext } from '../middleware/context.js';
import { createFaqService, type FaqService } from '../features/faq.js';
import {
  createPatternEntityRecognizer,
  createPatternSegmenter,
  type EntityRecognizer,
  type SentenceSegmenter,
} from '../features/nlp.js';
import { createReminderService, formatReminderNotification, type ReminderService } from '../features/reminders.js';
import type { KnowledgeStore } from '../utils/db.js';
import { createMessageRef } from './message-ref.js';
import type { MessagingAdapter } from './messaging-adapter.js';

/**
 * Everything the message pipeline needs, bundled into one object that is
 * built at startup and passed to handlers.
 */
export interface Assistant {
  store: KnowledgeStore;
  recognizer: EntityRecognizer;
  segmenter: SentenceSegmenter;
  faq: FaqService;
  reminders: ReminderService;
  context: GroupContext;
  /** Sender ids allowed to register FAQs; empty means everyone. */
  adminIds: readonly string[];
  /** Used to tell `/cmd@thisbot` apart from `/cmd@otherbot`. */
  botUsername?: string;
}

export interface CreateAssistantParams {
  store: KnowledgeStore;
  /** Where fired reminders are sent. */
  messenger: MessagingAdapter;
  adminIds?: readonly string[];
  contextMaxMessages?: number;
  recognizer?: EntityRecognizer;
  segmenter?: SentenceSegmenter;
  botUsername?: string;
  now?: () => number;
}

export function createAssistant(params: CreateAssistantParams): Assistant {
  const { store, messenger } = params;

  const reminders = createReminderService({
    store,
    now: params.now,
    deliver: async (reminder) => {
      await messenger.sendText(reminder.groupId, formatReminderNotification(reminder.content), {
        replyTo: createMessageRef({
          platform: messenger.platform,
          chatId: reminder.groupId,
          id: reminder.messageId,
        }),
      });
    },
  });

  logger.debug({ platform: messenger.platform }, 'Assistant created');

  return {
    store,
    recognizer: params.recognizer ?? createPatternEntityRecognizer(),
    segmenter: params.segmenter ?? createPatternSegmenter(),
    faq: createFaqService(store),
    reminders,
    context: createGroupContext(params.contextMaxMessages ?? 100),
    adminIds: params.adminIds ?? [],
    botUsername: params.botUsername,
  };
}
