import type { Assistant } from '../core/assistant.js';
import type { MessagingAdapter } from '../core/messaging-adapter.js';

export type MessagingPlatform = 'telegram' | 'demo';

export interface PlatformRuntime {
  platform: MessagingPlatform;
  /** Messenger used for messages the bot sends on its own (reminders). */
  messenger: MessagingAdapter;
  start(assistant: Assistant): Promise<void>;
  stop(): Promise<void>;
}
