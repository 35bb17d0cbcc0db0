import type { MessagingPlatform } from '../platforms/types.js';

/**
 * Normalized inbound message.
 *
 * Platform adapters map their native update types into this shape.
 */
export interface InboundMessage {
  platform: MessagingPlatform;
  chatId: string;
  senderId: string;

  /** Platform message id. */
  messageId: number;

  /** True when the message was sent by this bot. */
  fromSelf: boolean;

  /** True when the sender is any bot account. */
  fromBot: boolean;

  /** True when this chat is a group chat on the platform. */
  isGroupChat: boolean;

  /** Milliseconds since epoch. */
  timestampMs: number;

  /** Text content if present. */
  text: string | null;
}
