/**
 * Gateway Server - WebSocket server for image chat sessions
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { IncomingMessage } from 'http';
import type { AddressInfo } from 'net';

import type { GatewayConfig } from './types.js';
import { DEFAULT_GATEWAY_CONFIG } from './types.js';
import { ConnectionSupervisor } from './connection/connection-supervisor.js';
import { WsConnection } from './connection/ws-connection.js';
import { FrameCodec } from './protocol/frame-codec.js';
import { ProtocolEngine } from './protocol/protocol-engine.js';
import { SessionRegistry } from './session/session-registry.js';
import { debugEmitter, type DebugEvent } from '../debug/index.js';
import { DEFAULT_GATEWAY_OPTIONS, GenerationGateway } from '../infra/generation/generation-gateway.js';
import type { IImageBackend } from '../infra/generation/image-backend.js';
import type { ISessionStore } from '../infra/persistence/session-store.js';

export interface GatewayServerDependencies {
  store: ISessionStore;
  backend: IImageBackend;
  /** Per-call generation timeout */
  generationTimeoutMs?: number;
  /** Conversation turns passed to the backend as context */
  contextWindow?: number;
  debugMode?: boolean;
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

function printDebugEvent(event: DebugEvent): void {
  const time = new Date(event.timestamp).toISOString();
  console.log(`[Debug] ${time} ${event.type} (${event.source}) ${JSON.stringify(event.data)}`);
}

export class GatewayServer {
  private wss?: WebSocketServer;
  private config: GatewayConfig;
  private debugMode: boolean;

  private codec: FrameCodec;
  private registry: SessionRegistry;
  private engine: ProtocolEngine;
  private generation: GenerationGateway;
  private supervisor: ConnectionSupervisor;

  private isRunning = false;
  private boundPort?: number;

  constructor(
    dependencies: GatewayServerDependencies,
    config: Partial<GatewayConfig> = {}
  ) {
    this.config = { ...DEFAULT_GATEWAY_CONFIG, ...config };
    this.debugMode = dependencies.debugMode ?? false;

    this.codec = new FrameCodec();
    this.generation = new GenerationGateway(dependencies.backend, {
      timeoutMs: dependencies.generationTimeoutMs ?? DEFAULT_GATEWAY_OPTIONS.timeoutMs,
    });
    this.registry = new SessionRegistry(
      dependencies.store,
      { contextWindow: dependencies.contextWindow ?? 10 },
      this.codec
    );
    this.engine = new ProtocolEngine(dependencies.store, this.generation, this.codec);
    this.supervisor = new ConnectionSupervisor(
      {
        maxConnectionsPerIp: this.config.maxConnectionsPerIp,
        heartbeat: {
          intervalMs: this.config.heartbeatIntervalMs,
          timeoutMs: this.config.heartbeatTimeoutMs,
        },
        sessionIdleMs: this.config.sessionIdleMs,
      },
      this.registry,
      this.engine,
      this.codec
    );
  }

  /**
   * Start the gateway server
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error('Gateway server is already running');
    }

    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        host: this.config.host,
        port: this.config.port,
      });
      this.wss = wss;

      wss.on('connection', (ws, req) => this.handleConnection(ws, req));

      wss.on('error', (error) => {
        console.error('[GatewayServer] Server error:', error);
        if (!this.isRunning) {
          reject(error);
        }
      });

      wss.on('listening', () => {
        this.isRunning = true;
        const address: AddressInfo | string | null = wss.address();
        this.boundPort = address && typeof address === 'object' ? address.port : this.config.port;
        this.supervisor.start();

        if (this.debugMode) {
          debugEmitter.enable();
          debugEmitter.onDebug(printDebugEvent);
        }

        console.log('[GatewayServer] Image chat gateway started');
        console.log(`  Address: ws://${this.config.host}:${this.boundPort}/ws/image-chat/<sessionId>`);
        console.log(`  Backend: ${this.generation.backendName}`);
        console.log(`  Connection limit: ${this.config.maxConnectionsPerIp} per IP`);
        console.log(
          `  Heartbeat: ${this.config.heartbeatIntervalMs}ms interval, ${this.config.heartbeatTimeoutMs}ms timeout`
        );
        console.log(`  Debug Mode: ${this.debugMode ? 'Enabled' : 'Disabled'}`);

        resolve();
      });
    });
  }

  /**
   * Stop the gateway server
   */
  async stop(): Promise<void> {
    if (!this.isRunning) {
      return;
    }

    this.isRunning = false;
    this.supervisor.stop();

    if (this.debugMode) {
      debugEmitter.offDebug(printDebugEvent);
      debugEmitter.disable();
    }

    return new Promise((resolve) => {
      if (this.wss) {
        this.wss.close(() => {
          console.log('[GatewayServer] Server stopped');
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  getStats() {
    return {
      isRunning: this.isRunning,
      address: this.isRunning ? `ws://${this.config.host}:${this.boundPort}` : null,
      backend: this.generation.backendName,
      ...this.supervisor.getStats(),
      debugMode: this.debugMode,
    };
  }

  /** Port actually bound (differs from the configured one when that was 0) */
  get port(): number | undefined {
    return this.boundPort;
  }

  private handleConnection(ws: WebSocket, req: IncomingMessage): void {
    const remoteAddress = req.socket.remoteAddress || 'unknown';
    const connection = new WsConnection(ws, remoteAddress);

    // Handlers go on before accept so a close during accept is seen
    ws.on('message', (data) => {
      this.supervisor.handleMessage(connection, toBuffer(data));
    });

    ws.on('close', (code, reason) => {
      console.log(`[GatewayServer] Connection ${connection.id} closed: ${code} ${reason.toString()}`);
      this.supervisor.handleClose(connection, `closed:${code}`);
    });

    ws.on('error', (error) => {
      console.error(`[GatewayServer] WebSocket error on ${connection.id}:`, error);
    });

    const state = this.supervisor.accept(connection, req.url);
    if (state) {
      console.log(`[GatewayServer] Connection ${connection.id} from ${remoteAddress} bound to session ${state.id}`);
    }
  }
}
