import type { MessagingPlatform } from '../platforms/types.js';
import type { MessageRef } from './message-ref.js';

/**
 * Messaging adapter API.
 *
 * This is the minimal surface needed to send responses without exposing
 * transport-specific types to core routing.
 */
export interface MessagingAdapter {
  platform: MessagingPlatform;

  sendText(chatId: string, text: string, options?: { replyTo?: MessageRef }): Promise<void>;
}
