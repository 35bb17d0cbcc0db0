import type { InboundMessage } from '../../core/inbound-message.js';

import { TELEGRAM_GROUP_CHAT_TYPES, type TelegramMessage } from './types.js';

export interface TelegramInbound extends InboundMessage {
  platform: 'telegram';
}

/** Map a Telegram message into the core inbound shape. */
export function normalizeTelegramMessage(message: TelegramMessage, botUserId?: number): TelegramInbound {
  return {
    platform: 'telegram',
    chatId: String(message.chat.id),
    senderId: message.from ? String(message.from.id) : '',
    messageId: message.message_id,
    fromSelf: botUserId !== undefined && message.from?.id === botUserId,
    fromBot: message.from?.is_bot ?? false,
    isGroupChat: TELEGRAM_GROUP_CHAT_TYPES.has(message.chat.type),
    timestampMs: message.date * 1000,
    text: message.text ?? null,
  };
}
