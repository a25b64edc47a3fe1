/**
 * WsConnection - adapts a `ws` socket to the gateway's IConnection
 */

import { WebSocket } from 'ws';
import { randomBytes } from 'node:crypto';
import type { IConnection } from '../types.js';

export class WsConnection implements IConnection {
  readonly id: string;

  constructor(
    private readonly ws: WebSocket,
    readonly remoteAddress: string
  ) {
    this.id = `conn_${Date.now()}_${randomBytes(4).toString('hex')}`;
  }

  isOpen(): boolean {
    return this.ws.readyState === WebSocket.OPEN;
  }

  send(payload: string): void {
    this.ws.send(payload);
  }

  close(code: number, reason: string): void {
    this.ws.close(code, reason);
  }

  terminate(): void {
    this.ws.terminate();
  }

  ping(): void {
    this.ws.ping();
  }

  onPong(listener: () => void): void {
    this.ws.on('pong', listener);
  }
}
