import { createServer } from 'node:http';
import type { IncomingMessage, Server, ServerResponse } from 'node:http';
import type { AddressInfo } from 'node:net';

import { WebSocketServer } from 'ws';
import type { WebSocket } from 'ws';

import type { EventBus } from '../events/eventBus.js';
import { MONITOR } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import { attachObserver, describeDeliveryError } from './observer.js';
import type { ObserverConnection } from './observer.js';

// ── Public types ─────────────────────────────────────────────

export interface MonitorServerOptions {
  host?: string | undefined;
  port?: number | undefined;
}

export interface MonitorServer {
  readonly url: string;
  readonly port: number;
  readonly clientCount: number;
  close(): Promise<void>;
}

// ── Transport adapter ────────────────────────────────────────

export function wsConnection(socket: WebSocket): ObserverConnection {
  return {
    send(payload: string): Promise<void> {
      return new Promise((resolve, reject) => {
        if (socket.readyState !== socket.OPEN) {
          reject(new Error('socket is not open'));
          return;
        }
        socket.send(payload, (err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
  };
}

// ── HTTP endpoints ───────────────────────────────────────────

export function handleHttp(bus: EventBus, req: IncomingMessage, res: ServerResponse): void {
  const url = new URL(req.url ?? '/', 'http://localhost');

  if (req.method === 'GET' && url.pathname === '/api/status') {
    sendJson(res, 200, bus.snapshot());
    return;
  }
  if (req.method === 'GET' && url.pathname === '/api/history') {
    sendJson(res, 200, bus.replay());
    return;
  }
  sendJson(res, 404, { error: 'not found' });
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

// ── Server ───────────────────────────────────────────────────

/**
 * Start the observer channel: WebSocket push on `/`, plus read-only JSON
 * endpoints. Unauthenticated; binds to loopback unless told otherwise.
 */
export async function startMonitorServer(
  bus: EventBus,
  options: MonitorServerOptions = {},
): Promise<MonitorServer> {
  const host = options.host ?? MONITOR.HOST;
  const httpServer: Server = createServer((req, res) => {
    handleHttp(bus, req, res);
  });
  const wss = new WebSocketServer({ server: httpServer });

  wss.on('connection', (socket) => {
    const observer = attachObserver(bus, wsConnection(socket), (err) => {
      log.warn(describeDeliveryError(err));
    });
    log.monitor(`Observer connected | Total: ${String(wss.clients.size)}`);

    socket.on('close', () => {
      observer.detach();
      log.monitor(`Observer disconnected | Total: ${String(wss.clients.size)}`);
    });
    socket.on('error', (err) => {
      log.warn(describeDeliveryError(err));
      observer.detach();
    });
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once('error', reject);
    httpServer.listen(options.port ?? MONITOR.PORT, host, () => {
      httpServer.off('error', reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = isAddressInfo(address) ? address.port : (options.port ?? MONITOR.PORT);
  const url = `http://${host}:${String(port)}`;
  log.monitor(`Monitor listening on ${url} (ws://${host}:${String(port)}/)`);

  return {
    url,
    port,
    get clientCount() {
      return wss.clients.size;
    },
    close: () =>
      new Promise<void>((resolve, reject) => {
        for (const client of wss.clients) client.terminate();
        wss.close();
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      }),
  };
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null;
}
