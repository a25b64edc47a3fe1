/**
 * Image Chat Client - WebSocket client for one image chat session.
 * Reconnects through ReconnectStateMachine.
 */

import { WebSocket } from 'ws';

import type { IntentKind } from '../../domain/image-chat/intents.js';
import type { ClientFrame, ServerFrame, ServerFrameType } from '../../gateway/types.js';
import { CloseCodes, SESSION_PATH_PREFIX } from '../../gateway/types.js';
import {
  ReconnectStateMachine,
  type ReconnectState,
  type ReconnectTransition,
  type Scheduler,
} from './reconnect-state-machine.js';

export interface ClientSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
  isOpen(): boolean;
}

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
  onError(error: Error): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => ClientSocket;

export const wsSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.on('open', () => handlers.onOpen());
  ws.on('message', (data) => handlers.onMessage(data.toString()));
  ws.on('close', (code, reason) => handlers.onClose(code, reason.toString()));
  ws.on('error', (error) => handlers.onError(error));

  return {
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
    isOpen: () => ws.readyState === WebSocket.OPEN,
  };
};

export interface ImageChatClientOptions {
  /** Server base URL, e.g. ws://127.0.0.1:8000 */
  url: string;
  sessionId: string;
  reconnectDelayMs?: number;
  schedule?: Scheduler;
  createSocket?: SocketFactory;
  /** Close codes after which the client stops instead of retrying */
  terminalCloseCodes?: number[];
}

export type FrameOptions = NonNullable<ClientFrame['data']>;

const SERVER_FRAME_TYPES: readonly ServerFrameType[] = ['status', 'message', 'image', 'mixed', 'error'];

const DEFAULT_TERMINAL_CLOSE_CODES = [
  CloseCodes.SUPERSEDED,
  CloseCodes.BAD_PATH,
  CloseCodes.SESSION_NOT_FOUND,
];

export function buildSessionUrl(baseUrl: string, sessionId: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${SESSION_PATH_PREFIX}${encodeURIComponent(sessionId)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseServerFrame(raw: string): ServerFrame | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;
  const record = parsed;

  const type = SERVER_FRAME_TYPES.find(candidate => candidate === record.type);
  const { timestamp, content, image_url: imageUrl, data } = record;
  if (!type || typeof timestamp !== 'string') return null;

  const frame: ServerFrame = { type, timestamp };
  if (typeof content === 'string') frame.content = content;
  if (typeof imageUrl === 'string') frame.image_url = imageUrl;
  if (isRecord(data)) frame.data = data;
  return frame;
}

export class ImageChatClient {
  private socket: ClientSocket | null = null;
  private machine: ReconnectStateMachine;
  private createSocket: SocketFactory;
  private terminalCloseCodes: number[];

  readonly url: string;

  // Event callbacks
  onFrame?: (frame: ServerFrame) => void;
  onStateChange?: (transition: ReconnectTransition) => void;
  onDisconnected?: (code: number, reason: string) => void;
  onError?: (error: Error) => void;

  constructor(options: ImageChatClientOptions) {
    this.url = buildSessionUrl(options.url, options.sessionId);
    this.createSocket = options.createSocket ?? wsSocketFactory;
    this.terminalCloseCodes = options.terminalCloseCodes ?? DEFAULT_TERMINAL_CLOSE_CODES;
    this.machine = new ReconnectStateMachine(() => this.connect(), {
      delayMs: options.reconnectDelayMs,
      schedule: options.schedule,
      onTransition: (transition) => this.onStateChange?.(transition),
    });
  }

  get state(): ReconnectState {
    return this.machine.state;
  }

  start(): void {
    this.machine.start();
  }

  stop(): void {
    this.machine.stop();
    const socket = this.socket;
    this.socket = null;
    socket?.close(CloseCodes.NORMAL, 'Client stopped');
  }

  isConnected(): boolean {
    return this.machine.state === 'connected' && (this.socket?.isOpen() ?? false);
  }

  /**
   * Send one intent frame. Returns false when not connected; frames are not queued.
   */
  send(type: IntentKind, content: string, data?: FrameOptions): boolean {
    const socket = this.socket;
    if (!socket || !this.isConnected()) {
      return false;
    }

    const frame: ClientFrame = { type, content, ...(data && { data }) };
    socket.send(JSON.stringify(frame));
    return true;
  }

  private connect(): void {
    let socket: ClientSocket;
    try {
      socket = this.createSocket(this.url, {
        onOpen: () => {
          if (this.socket === socket) this.machine.opened();
        },
        onMessage: (data) => {
          if (this.socket !== socket) return;
          const frame = parseServerFrame(data);
          if (frame) {
            this.onFrame?.(frame);
          } else {
            this.onError?.(new Error('Received malformed frame from server'));
          }
        },
        onClose: (code, reason) => this.handleClose(socket, code, reason),
        onError: (error) => this.onError?.(error),
      });
    } catch (error) {
      this.onError?.(error instanceof Error ? error : new Error(String(error)));
      this.machine.closed();
      return;
    }
    this.socket = socket;
  }

  private handleClose(socket: ClientSocket, code: number, reason: string): void {
    if (this.socket !== socket) return;
    this.socket = null;
    this.onDisconnected?.(code, reason);

    if (this.terminalCloseCodes.includes(code)) {
      this.machine.stop();
      return;
    }
    this.machine.closed();
  }
}
