import { z } from 'zod';

import { logger } from '../../middleware/logger.js';
import type { MessageRef } from '../../core/message-ref.js';
import type { MessagingAdapter } from '../../core/messaging-adapter.js';
import { TransportError } from '../../utils/errors.js';

import {
  TelegramApiResponseSchema,
  TelegramUpdateSchema,
  TelegramUserSchema,
  type TelegramUpdate,
  type TelegramUser,
} from './types.js';

/** Long-polling timeout in seconds */
export const POLL_TIMEOUT_SECONDS = 30;

export interface TelegramClient {
  getMe(): Promise<TelegramUser>;
  /** Fetch pending updates after `offset`. Updates that fail validation are dropped. */
  getUpdates(offset: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
  sendMessage(chatId: string, text: string, replyToMessageId?: number): Promise<void>;
}

export function createTelegramClient(token: string): TelegramClient {
  async function callTelegramApi(
    method: string,
    body: Record<string, unknown>,
    signal?: AbortSignal,
  ): Promise<unknown> {
    const response = await fetch(`https://api.telegram.org/bot${token}/${method}`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
      signal,
    });

    // Never log the URL: it carries the bot token.
    if (!response.ok) {
      const error = await response.text();
      logger.error({ method, status: response.status, error }, 'Telegram API error');
      throw new TransportError('Telegram', `API error (${method}): status ${response.status}`, { method });
    }

    const payload = TelegramApiResponseSchema.parse(await response.json());
    if (!payload.ok) {
      throw new TransportError('Telegram', `API error (${method}): ${payload.description ?? 'unknown'}`, { method });
    }
    return payload.result;
  }

  return {
    async getMe() {
      return TelegramUserSchema.parse(await callTelegramApi('getMe', {}));
    },

    async getUpdates(offset, signal) {
      const result = await callTelegramApi('getUpdates', {
        offset,
        timeout: POLL_TIMEOUT_SECONDS,
        allowed_updates: ['message'],
      }, signal);

      const updates: TelegramUpdate[] = [];
      for (const raw of z.array(z.unknown()).parse(result)) {
        const parsed = TelegramUpdateSchema.safeParse(raw);
        if (parsed.success) {
          updates.push(parsed.data);
        } else {
          logger.warn({ issues: parsed.error.issues }, 'Invalid Telegram update payload');
        }
      }
      return updates;
    },

    async sendMessage(chatId, text, replyToMessageId) {
      await callTelegramApi('sendMessage', {
        chat_id: chatId,
        text,
        ...(replyToMessageId !== undefined
          ? { reply_to_message_id: replyToMessageId, allow_sending_without_reply: true }
          : {}),
      });
    },
  };
}

function getReplyMessageId(replyTo: MessageRef | undefined): number | undefined {
  if (!replyTo) return undefined;
  if (replyTo.platform !== 'telegram') return undefined;
  return replyTo.id;
}

export function createTelegramAdapter(client: TelegramClient): MessagingAdapter {
  return {
    platform: 'telegram',

    async sendText(chatId: string, text: string, options?: { replyTo?: MessageRef }): Promise<void> {
      await client.sendMessage(chatId, text, getReplyMessageId(options?.replyTo));
    },
  };
}
