import { z } from 'zod';

import type { InboundMessage } from '../../core/inbound-message.js';

const DemoMessageSchema = z.object({
  chatId: z.string().min(1),
  senderId: z.string().min(1),
  text: z.string().default(''),
  messageId: z.coerce.number().int().positive().optional(),
  isGroupChat: z.boolean().default(true),
});

export type DemoMessage = z.infer<typeof DemoMessageSchema>;

export function parseDemoMessage(input: unknown): DemoMessage {
  return DemoMessageSchema.parse(input);
}

export function normalizeDemoInbound(message: DemoMessage, fallbackMessageId: number): InboundMessage {
  return {
    platform: 'demo',
    chatId: message.chatId,
    senderId: message.senderId,
    messageId: message.messageId ?? fallbackMessageId,
    fromSelf: false,
    fromBot: false,
    isGroupChat: message.isGroupChat,
    timestampMs: Date.now(),
    text: message.text,
  };
}
