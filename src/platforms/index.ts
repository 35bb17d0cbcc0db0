import { config } from '../utils/config.js';
import { createTelegramRuntime } from './telegram/runtime.js';
import { createDemoRuntime } from './demo/runtime.js';
import type { PlatformRuntime } from './types.js';

export function getPlatformRuntime(): PlatformRuntime {
  if (config.MESSAGING_PLATFORM === 'telegram' && config.TELEGRAM_BOT_TOKEN) {
    return createTelegramRuntime({ token: config.TELEGRAM_BOT_TOKEN });
  }
  if (config.MESSAGING_PLATFORM === 'demo') {
    return createDemoRuntime({ host: config.DEMO_BIND_HOST, port: config.DEMO_PORT });
  }

  throw new Error(`Unsupported platform runtime: ${config.MESSAGING_PLATFORM}`);
}
