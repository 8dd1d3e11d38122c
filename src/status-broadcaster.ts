import type { Server } from 'node:http';
import WebSocket, { WebSocketServer } from 'ws';
import { createChildLogger } from './logger.js';
import type { EngineEvent } from './types/index.js';

const log = createChildLogger('status-ws');

const HEARTBEAT_INTERVAL_MS = 30_000;

export type StatusBroadcasterOptions =
  ({ server: Server; path?: string } | { noServer: true }) & { heartbeatMs?: number };

/**
 * 대시보드용 WebSocket 푸시: 엔진 이벤트를 연결된 모든 클라이언트에 전송.
 * 응답 없는 클라이언트는 PING/PONG 하트비트로 정리.
 */
export class StatusBroadcaster {
  private readonly wss: WebSocketServer;
  private readonly alive = new WeakMap<WebSocket, boolean>();
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: StatusBroadcasterOptions) {
    this.wss = 'server' in options
      ? new WebSocketServer({ server: options.server, path: options.path ?? '/ws' })
      : new WebSocketServer({ noServer: true });

    this.wss.on('connection', (ws) => {
      this.alive.set(ws, true);
      ws.on('pong', () => this.alive.set(ws, true));
      ws.on('error', (err) => log.warn({ err }, 'Client socket error'));
      log.info({ clients: this.wss.clients.size }, 'Dashboard client connected');
    });
    this.startHeartbeat(options.heartbeatMs ?? HEARTBEAT_INTERVAL_MS);
  }

  get clientCount(): number {
    return this.wss.clients.size;
  }

  /** 이벤트 브로드캐스트: 열린 연결에만, 실패는 로그만 */
  broadcast(event: EngineEvent): void {
    const payload = JSON.stringify(event);
    for (const client of this.wss.clients) {
      if (client.readyState !== WebSocket.OPEN) continue;
      client.send(payload, (err) => {
        if (err) log.debug({ err }, 'Broadcast send failed');
      });
    }
  }

  close(): Promise<void> {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    for (const client of this.wss.clients) client.terminate();
    return new Promise((resolve, reject) => {
      this.wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private startHeartbeat(intervalMs: number): void {
    this.heartbeatTimer = setInterval(() => {
      for (const client of this.wss.clients) {
        if (this.alive.get(client) === false) {
          log.info('Dashboard client unresponsive, terminating');
          client.terminate();
          continue;
        }
        this.alive.set(client, false);
        client.ping();
      }
    }, intervalMs);
    this.heartbeatTimer.unref();
  }
}
