import type { Server } from 'node:http';

import { logger } from '../../middleware/logger.js';
import { markConnected, markDisconnected } from '../../middleware/health.js';
import type { Assistant } from '../../core/assistant.js';
import type { PlatformRuntime } from '../types.js';

import { createDemoAdapter, type DemoOutboxEntry } from './adapter.js';
import { createDemoServer } from './demo-server.js';

export function createDemoRuntime(params: { host: string; port: number }): PlatformRuntime {
  const deliveries: DemoOutboxEntry[] = [];
  let server: Server | null = null;

  return {
    platform: 'demo',
    messenger: createDemoAdapter(deliveries),

    async start(assistant: Assistant): Promise<void> {
      server = createDemoServer({ host: params.host, port: params.port, assistant, deliveries });
      markConnected();
      logger.info({ host: params.host, port: params.port }, 'Demo mode started (local dev only)');
    },

    async stop(): Promise<void> {
      markDisconnected();
      if (!server) return;
      const closing = server;
      server = null;
      await new Promise<void>((resolve, reject) => {
        closing.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
