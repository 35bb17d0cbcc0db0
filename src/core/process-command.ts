import { logger } from '../middleware/logger.js';
import { sanitizeCommandArg } from '../middleware/sanitize.js';
import { canRegisterFaq, formatFaqList, parseAddFaqArgs } from '../features/faq.js';
import { getHelpMessage, getStartMessage } from '../features/help.js';
import {
  formatReminderList,
  formatReminderTime,
  parseSetReminderArgs,
} from '../features/reminders.js';
import type { CommandMatch } from '../features/router.js';
import { FormatError, PastTimeError, UsageError } from '../utils/errors.js';
import type { Assistant } from './assistant.js';
import type { InboundMessage } from './inbound-message.js';
import { createMessageRef } from './message-ref.js';
import type { MessagingAdapter } from './messaging-adapter.js';

export const CANCEL_REMINDER_USAGE = 'Usage: /cancelreminder <id>';
export const FAQ_ADMIN_ONLY = 'Only group admins can add FAQs.';
export const REMINDER_FAILED = 'Failed to set reminder.';

async function handleAddFaq(assistant: Assistant, inbound: InboundMessage, args: string): Promise<string> {
  if (!canRegisterFaq(inbound.senderId, assistant.adminIds)) {
    logger.warn({ senderId: inbound.senderId, groupId: inbound.chatId }, 'Non-admin tried to add FAQ');
    return FAQ_ADMIN_ONLY;
  }

  try {
    const { question, answer } = parseAddFaqArgs(args);
    await assistant.faq.registerFaq(inbound.chatId, question, answer);
    return `FAQ added: ${question} -> ${answer}`;
  } catch (err) {
    if (err instanceof UsageError) return err.message;
    throw err;
  }
}

async function handleSetReminder(assistant: Assistant, inbound: InboundMessage, args: string): Promise<string> {
  try {
    const { content, timeStr } = parseSetReminderArgs(args);
    const reminder = await assistant.reminders.requestReminder(inbound.chatId, inbound.messageId, content, timeStr);
    return `Reminder #${reminder.id} set for '${reminder.content}' at ${formatReminderTime(reminder.remindAt)}`;
  } catch (err) {
    if (err instanceof UsageError || err instanceof FormatError || err instanceof PastTimeError) {
      return err.message;
    }
    logger.error({ err, groupId: inbound.chatId }, 'Failed to set reminder');
    return REMINDER_FAILED;
  }
}

async function handleCancelReminder(assistant: Assistant, inbound: InboundMessage, args: string): Promise<string> {
  if (!/^#?\d+$/.test(args)) return CANCEL_REMINDER_USAGE;

  const id = Number(args.replace('#', ''));
  const cancelled = await assistant.reminders.cancelReminder(inbound.chatId, id);
  return cancelled
    ? `Reminder #${id} cancelled.`
    : `No scheduled reminder #${id} in this chat.`;
}

async function buildCommandReply(
  assistant: Assistant,
  inbound: InboundMessage,
  match: CommandMatch,
): Promise<string> {
  const args = sanitizeCommandArg(match.args);

  switch (match.command) {
    case 'start':
      return getStartMessage();
    case 'help':
      return getHelpMessage();
    case 'addfaq':
      return handleAddFaq(assistant, inbound, args);
    case 'faqs':
      return formatFaqList(await assistant.faq.listFaqs(inbound.chatId));
    case 'setreminder':
      return handleSetReminder(assistant, inbound, args);
    case 'reminders':
      return formatReminderList(await assistant.reminders.listReminders(inbound.chatId));
    case 'cancelreminder':
      return handleCancelReminder(assistant, inbound, args);
  }
}

/**
 * Run a matched slash command and reply in the same chat, threaded to the
 * command message. Validation problems become user-visible replies; storage
 * failures propagate, except on /setreminder which answers with a generic
 * failure.
 */
export async function processCommand(
  assistant: Assistant,
  adapter: MessagingAdapter,
  inbound: InboundMessage,
  match: CommandMatch,
): Promise<void> {
  const reply = await buildCommandReply(assistant, inbound, match);
  logger.debug({ command: match.command, groupId: inbound.chatId }, 'Command handled');

  await adapter.sendText(inbound.chatId, reply, {
    replyTo: createMessageRef({ platform: inbound.platform, chatId: inbound.chatId, id: inbound.messageId }),
  });
}
