import { describe, it, expect, vi, afterEach } from 'vitest';
import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import WebSocket from 'ws';
import { StatusBroadcaster } from '../src/status-broadcaster.js';
import type { EngineEvent } from '../src/types/index.js';

const status: EngineEvent = {
  type: 'STATUS',
  timestamp: 1000,
  price: 1006,
  indicator: 20,
  profitPct: 0.6,
  totalAssetValue: 1_000_600,
  changeRate: 0.012,
  cumulativeReturnPct: 0.06,
};

function listen(server: Server): Promise<number> {
  return new Promise((resolve) => {
    server.listen(0, '127.0.0.1', () => {
      const addr: AddressInfo | string | null = server.address();
      resolve(typeof addr === 'object' && addr ? addr.port : 0);
    });
  });
}

function connect(url: string, options?: WebSocket.ClientOptions): Promise<WebSocket> {
  const ws = new WebSocket(url, options);
  return new Promise((resolve, reject) => {
    ws.once('open', () => resolve(ws));
    ws.once('error', reject);
  });
}

function nextMessage(ws: WebSocket): Promise<unknown> {
  return new Promise((resolve) => {
    ws.once('message', (data) => {
      const parsed: unknown = JSON.parse(data.toString());
      resolve(parsed);
    });
  });
}

describe('StatusBroadcaster', () => {
  let server: Server | null = null;
  let broadcaster: StatusBroadcaster | null = null;
  let clients: WebSocket[] = [];

  async function start(heartbeatMs?: number): Promise<string> {
    server = createServer();
    broadcaster = new StatusBroadcaster({ server, heartbeatMs });
    const port = await listen(server);
    return `ws://127.0.0.1:${port}/ws`;
  }

  afterEach(async () => {
    for (const c of clients) c.terminate();
    clients = [];
    await broadcaster?.close();
    broadcaster = null;
    const s = server;
    server = null;
    if (s) {
      s.closeAllConnections();
      await new Promise<void>((resolve) => s.close(() => resolve()));
    }
  });

  it('broadcasts without clients and closes cleanly', async () => {
    const b = new StatusBroadcaster({ noServer: true });
    expect(b.clientCount).toBe(0);
    expect(() => b.broadcast({ type: 'MESSAGE', timestamp: 0, text: 'hello' })).not.toThrow();
    await expect(b.close()).resolves.toBeUndefined();
  });

  it('delivers each event as JSON to every connected client', async () => {
    const url = await start();
    const a = await connect(url);
    const b = await connect(url);
    clients.push(a, b);
    await vi.waitFor(() => expect(broadcaster?.clientCount).toBe(2));

    const received = Promise.all([nextMessage(a), nextMessage(b)]);
    broadcaster?.broadcast(status);

    expect(await received).toEqual([status, status]);
  });

  it('keeps delivering to the remaining client after another disconnects', async () => {
    const url = await start();
    const leaving = await connect(url);
    const staying = await connect(url);
    clients.push(staying);
    await vi.waitFor(() => expect(broadcaster?.clientCount).toBe(2));

    leaving.close();
    await vi.waitFor(() => expect(broadcaster?.clientCount).toBe(1));

    const received = nextMessage(staying);
    broadcaster?.broadcast({ type: 'MESSAGE', timestamp: 5, text: '관망 중' });
    expect(await received).toEqual({ type: 'MESSAGE', timestamp: 5, text: '관망 중' });
  });

  it('terminates a client that stops answering the heartbeat', async () => {
    const url = await start(100);
    const responsive = await connect(url);
    const silent = await connect(url, { autoPong: false });
    clients.push(responsive, silent);
    await vi.waitFor(() => expect(broadcaster?.clientCount).toBe(2));

    const closeCode = await new Promise<number>((resolve) => silent.once('close', (code) => resolve(code)));

    expect(closeCode).toBe(1006);
    await vi.waitFor(() => expect(broadcaster?.clientCount).toBe(1));
    expect(responsive.readyState).toBe(WebSocket.OPEN);
  });
});
