/**
 * Health check HTTP endpoint + connection state tracker.
 *
 * Exposes a tiny HTTP server that returns JSON with:
 * - Messaging connection status (connected/disconnected/connecting)
 * - Uptime in seconds
 * - Last message received timestamp
 * - Number of reminders waiting to fire
 * - Memory usage
 */

import { createServer, type Server } from 'http';
import { logger } from './logger.js';

// ── Connection state ────────────────────────────────────────────────

export type ConnectionStatus = 'connected' | 'disconnected' | 'connecting';

interface ConnectionState {
  status: ConnectionStatus;
  connectedAt: number | null;
  lastMessageAt: number | null;
  startedAt: number;
}

const state: ConnectionState = {
  status: 'connecting',
  connectedAt: null,
  lastMessageAt: null,
  startedAt: Date.now(),
};

/** Call once the platform runtime is receiving updates */
export function markConnected(): void {
  state.status = 'connected';
  state.connectedAt = Date.now();
}

export function markDisconnected(): void {
  state.status = 'disconnected';
}

/** Call on every incoming message to track freshness */
export function markMessageReceived(): void {
  state.lastMessageAt = Date.now();
}

export function getConnectionState(): ConnectionState {
  return { ...state };
}

// ── Health HTTP server ──────────────────────────────────────────────

export interface HealthSources {
  scheduledReminders(): number;
}

export interface HealthReport {
  status: ConnectionStatus;
  uptime: number;
  connectedFor: number | null;
  lastMessageAgo: number | null;
  scheduledReminders: number;
  memory: { rss: number; heapUsed: number };
}

export function buildHealthReport(sources: HealthSources, now: number = Date.now()): HealthReport {
  const mem = process.memoryUsage();
  return {
    status: state.status,
    uptime: Math.floor((now - state.startedAt) / 1000),
    connectedFor: state.connectedAt ? Math.floor((now - state.connectedAt) / 1000) : null,
    lastMessageAgo: state.lastMessageAt ? Math.floor((now - state.lastMessageAt) / 1000) : null,
    scheduledReminders: sources.scheduledReminders(),
    memory: {
      rss: Math.round(mem.rss / 1024 / 1024),
      heapUsed: Math.round(mem.heapUsed / 1024 / 1024),
    },
  };
}

let server: Server | null = null;

/** Start the HTTP health endpoint (`GET /health`). */
export function startHealthServer(sources: HealthSources, port: number = 3001, host: string = '127.0.0.1'): void {
  server = createServer((req, res) => {
    if (req.url === '/health' && req.method === 'GET') {
      res.writeHead(200, { 'content-type': 'application/json' });
      res.end(JSON.stringify(buildHealthReport(sources)));
    } else {
      res.writeHead(404);
      res.end();
    }
  });

  server.listen(port, host, () => {
    logger.info({ port, url: `http://${host}:${port}/health` }, 'Health check server started');
  });

  server.on('error', (err) => {
    logger.error({ err, port }, 'Health check server error');
  });
}

export function stopHealthServer(): void {
  if (server) {
    server.close();
    server = null;
  }
}
