import type { MessageRef } from '../../core/message-ref.js';
import type { MessagingAdapter } from '../../core/messaging-adapter.js';

export interface DemoOutboxEntry {
  chatId: string;
  text: string;
  replyToId: number | null;
}

/** Adapter that records every outgoing message instead of sending it. */
export function createDemoAdapter(outbox: DemoOutboxEntry[]): MessagingAdapter {
  return {
    platform: 'demo',

    async sendText(chatId: string, text: string, options?: { replyTo?: MessageRef }): Promise<void> {
      outbox.push({
        chatId,
        text,
        replyToId: options?.replyTo?.id ?? null,
      });
    },
  };
}
