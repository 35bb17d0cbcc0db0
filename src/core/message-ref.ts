import type { MessagingPlatform } from '../platforms/types.js';

/**
 * Cross-platform message reference, used to thread replies.
 *
 * Carrying the platform keeps a reply ref from one transport from being
 * handed to another transport's adapter.
 */
export interface MessageRef {
  platform: MessagingPlatform;
  chatId: string;
  /** Platform message id. */
  id: number;
}

export function createMessageRef(params: {
  platform: MessagingPlatform;
  chatId: string;
  id: number;
}): MessageRef {
  return {
    platform: params.platform,
    chatId: params.chatId,
    id: params.id,
  };
}
