import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import { ZodError } from 'zod';

import { logger } from '../../middleware/logger.js';
import type { Assistant } from '../../core/assistant.js';
import { processInboundMessage } from '../../core/process-inbound-message.js';

import { createDemoAdapter, type DemoOutboxEntry } from './adapter.js';
import { normalizeDemoInbound, parseDemoMessage } from './processor.js';

/** Keep only the most recent background deliveries (fired reminders). */
const MAX_DELIVERIES = 200;

/**
 * Local demo server: POST a chat message, get back every reply the bot
 * would have sent. Messages the bot sends on its own (fired reminders)
 * collect in `deliveries` and are exposed at `GET /demo/outbox`.
 */
export function createDemoServer(params: {
  host: string;
  port: number;
  assistant: Assistant;
  deliveries: DemoOutboxEntry[];
}): ReturnType<typeof createServer> {
  let nextMessageId = 1;

  const server = createServer(async (req, res) => {
    try {
      if (!req.url || !req.method) {
        writeJson(res, 400, { ok: false, error: 'Missing request URL/method' });
        return;
      }

      if (req.method === 'GET' && (req.url === '/' || req.url === '/demo')) {
        writeJson(res, 200, {
          ok: true,
          message: 'Demo server is running',
          postTo: '/demo',
          example: {
            curl: "curl -s -X POST http://127.0.0.1:" + params.port + "/demo \\\n  -H 'content-type: application/json' \\\n  -d '{\"chatId\":\"42\",\"senderId\":\"7\",\"text\":\"What is the venue?\"}' | jq",
          },
        });
        return;
      }

      if (req.method === 'GET' && req.url === '/demo/outbox') {
        if (params.deliveries.length > MAX_DELIVERIES) {
          params.deliveries.splice(0, params.deliveries.length - MAX_DELIVERIES);
        }
        writeJson(res, 200, { ok: true, outbox: params.deliveries });
        return;
      }

      if (req.method !== 'POST' || req.url !== '/demo') {
        writeJson(res, 404, { ok: false, error: 'Not found' });
        return;
      }

      const body = await readJsonBody(req, 64_000);
      const msg = parseDemoMessage(body);

      const inbound = normalizeDemoInbound(msg, nextMessageId);
      nextMessageId = Math.max(nextMessageId, inbound.messageId) + 1;

      const outbox: DemoOutboxEntry[] = [];
      await processInboundMessage(params.assistant, createDemoAdapter(outbox), inbound);

      writeJson(res, 200, {
        ok: true,
        inbound: {
          chatId: inbound.chatId,
          senderId: inbound.senderId,
          messageId: inbound.messageId,
        },
        outbox,
      });
    } catch (err) {
      if (err instanceof ZodError) {
        writeJson(res, 400, { ok: false, error: 'Invalid demo message', issues: err.issues });
        return;
      }
      const error = err instanceof Error ? err.message : String(err);
      logger.error({ err, platform: 'demo', path: req.url }, 'Demo request failed');
      writeJson(res, 500, { ok: false, error });
    }
  });

  server.listen(params.port, params.host, () => {
    logger.info({ host: params.host, port: params.port }, 'Demo server listening');
  });

  return server;
}

async function readJsonBody(req: IncomingMessage, maxBytes: number): Promise<unknown> {
  const chunks: Buffer[] = [];
  let total = 0;

  for await (const chunk of req) {
    const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    total += buf.length;
    if (total > maxBytes) {
      throw new Error(`Request body too large (max ${maxBytes} bytes)`);
    }
    chunks.push(buf);
  }

  const raw = Buffer.concat(chunks).toString('utf-8').trim();
  if (!raw) return {};

  try {
    return JSON.parse(raw) as unknown;
  } catch {
    throw new Error('Invalid JSON body');
  }
}

function writeJson(res: ServerResponse, status: number, body: unknown): void {
  const json = JSON.stringify(body, null, 2);
  res.statusCode = status;
  res.setHeader('content-type', 'application/json; charset=utf-8');
  res.end(json);
}
