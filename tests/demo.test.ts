import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ZodError } from 'zod';

import { createAssistant, type Assistant } from '../src/core/assistant.js';
import { createDemoAdapter, type DemoOutboxEntry } from '../src/platforms/demo/adapter.js';
import { createDemoServer } from '../src/platforms/demo/demo-server.js';
import { normalizeDemoInbound, parseDemoMessage } from '../src/platforms/demo/processor.js';
import { MEMORY_DB_PATH, openKnowledgeStore, type KnowledgeStore } from '../src/utils/db.js';

describe('demo message parsing', () => {
  it('applies defaults', () => {
    expect(parseDemoMessage({ chatId: '42', senderId: '7' })).toEqual({
      chatId: '42',
      senderId: '7',
      text: '',
      isGroupChat: true,
    });
  });

  it('coerces message ids', () => {
    expect(parseDemoMessage({ chatId: '42', senderId: '7', messageId: '5' }).messageId).toBe(5);
  });

  it('rejects missing chat ids', () => {
    expect(() => parseDemoMessage({ senderId: '7', text: 'hi' })).toThrow(ZodError);
  });

  it('falls back to the supplied message id', () => {
    const inbound = normalizeDemoInbound(parseDemoMessage({ chatId: '42', senderId: '7', text: 'hi' }), 3);
    expect(inbound).toMatchObject({ platform: 'demo', chatId: '42', messageId: 3, fromBot: false, text: 'hi' });
  });
});

describe('demo server', () => {
  let store: KnowledgeStore;
  let assistant: Assistant;
  let deliveries: DemoOutboxEntry[];
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    store = openKnowledgeStore(MEMORY_DB_PATH);
    deliveries = [];
    assistant = createAssistant({ store, messenger: createDemoAdapter(deliveries) });
    server = createDemoServer({ host: '127.0.0.1', port: 0, assistant, deliveries });
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));

    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Demo server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    assistant.reminders.stop();
    await store.close();
  });

  async function post(body: unknown): Promise<Response> {
    return fetch(`${baseUrl}/demo`, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('returns the replies for each posted message', async () => {
    const first = await post({ chatId: '42', senderId: '7', text: '/addfaq what is the venue | Building 5' });
    expect(first.status).toBe(200);
    expect(await first.json()).toEqual({
      ok: true,
      inbound: { chatId: '42', senderId: '7', messageId: 1 },
      outbox: [{ chatId: '42', text: 'FAQ added: what is the venue -> Building 5', replyToId: 1 }],
    });

    const second = await post({ chatId: '42', senderId: '7', text: 'What is the venue?' });
    expect(await second.json()).toMatchObject({
      inbound: { messageId: 2 },
      outbox: [{ chatId: '42', text: '🤖 Auto-Answer: Building 5', replyToId: 2 }],
    });
  });

  it('answers 400 for invalid payloads', async () => {
    const res = await post({ text: 'no chat' });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ ok: false, error: 'Invalid demo message' });
  });

  it('answers 500 for malformed JSON', async () => {
    const res = await fetch(`${baseUrl}/demo`, { method: 'POST', body: '{not json' });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ ok: false, error: 'Invalid JSON body' });
  });

  it('exposes background deliveries and 404s unknown routes', async () => {
    deliveries.push({ chatId: '42', text: '⏰ Reminder: team sync', replyToId: 1 });

    const outbox = await fetch(`${baseUrl}/demo/outbox`);
    expect(await outbox.json()).toEqual({
      ok: true,
      outbox: [{ chatId: '42', text: '⏰ Reminder: team sync', replyToId: 1 }],
    });

    const missing = await fetch(`${baseUrl}/nope`);
    expect(missing.status).toBe(404);
  });
});
