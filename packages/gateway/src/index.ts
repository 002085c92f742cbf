import { WebSocketServer, WebSocket, type RawData } from 'ws';
import { once } from 'node:events';
import { DEFAULT_PORT } from '@semdrop/core';
import type { Airdrop } from '@semdrop/engine';
import {
  JsonRpcRequestSchema,
  RPC_ERRORS,
  createRpcHandler,
  serializeEvent,
  type JsonRpcNotification,
  type JsonRpcResponse,
  type RpcHandler,
} from './rpc.js';

export * from './rpc.js';
export { logAudit } from './audit.js';

export const EVENT_NOTIFICATION = 'airdrop_event';

export interface GatewayConfig {
  airdrop: Airdrop;
  port?: number;
  host?: string;
  auditLogPath?: string;
  onCommit?: () => Promise<void>;
}

/**
 * JSON-RPC 2.0 over WebSocket in front of an Airdrop service. Every
 * airdrop event is pushed to all connected clients.
 */
export class Gateway {
  private wss: WebSocketServer;
  private handler: RpcHandler;
  private clients: Set<WebSocket> = new Set();
  private unsubscribe: () => void;

  constructor(config: GatewayConfig) {
    this.wss = new WebSocketServer({ port: config.port ?? DEFAULT_PORT, host: config.host });
    this.handler = createRpcHandler(config.airdrop, {
      auditLogPath: config.auditLogPath,
      onCommit: config.onCommit,
    });
    this.unsubscribe = config.airdrop.on((event) => {
      this.broadcast({ jsonrpc: '2.0', method: EVENT_NOTIFICATION, params: serializeEvent(event) });
    });

    this.wss.on('error', (err) => {
      console.error('Gateway server error:', err);
    });
    this.setupWebSocket();
  }

  private setupWebSocket(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      this.clients.add(ws);

      ws.on('message', (data: RawData) => {
        void this.handleMessage(data)
          .then((response) => {
            if (ws.readyState === WebSocket.OPEN) {
              ws.send(JSON.stringify(response));
            }
          })
          .catch((err: unknown) => {
            console.error('Failed to answer request:', err);
          });
      });

      ws.on('close', () => {
        this.clients.delete(ws);
      });
    });
  }

  async handleMessage(data: RawData): Promise<JsonRpcResponse> {
    let raw: unknown;
    try {
      raw = JSON.parse(data.toString());
    } catch {
      return { jsonrpc: '2.0', id: null, error: { code: RPC_ERRORS.PARSE_ERROR, message: 'Parse error' } };
    }

    const parsed = JsonRpcRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return {
        jsonrpc: '2.0',
        id: null,
        error: { code: RPC_ERRORS.INVALID_REQUEST, message: 'Invalid Request' },
      };
    }
    return this.handler(parsed.data);
  }

  broadcast(notification: JsonRpcNotification): void {
    const payload = JSON.stringify(notification);
    for (const ws of this.clients) {
      if (ws.readyState === WebSocket.OPEN) {
        ws.send(payload);
      }
    }
  }

  /**
   * Resolve with the bound port once the server accepts connections
   */
  async listening(): Promise<number> {
    if (!this.wss.address()) {
      await once(this.wss, 'listening');
    }
    const address = this.wss.address();
    if (typeof address === 'string') {
      throw new Error(`Gateway bound to a pipe: ${address}`);
    }
    return address.port;
  }

  async close(): Promise<void> {
    this.unsubscribe();
    for (const ws of this.clients) {
      ws.close();
    }

    await new Promise<void>((resolve, reject) => {
      this.wss.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}

export interface GatewayStartResult {
  gateway: Gateway;
  port: number;
  cleanup: () => Promise<void>;
}

/**
 * Start a gateway and stop it on SIGINT/SIGTERM
 */
export async function startGateway(config: GatewayConfig): Promise<GatewayStartResult> {
  const gateway = new Gateway(config);
  const port = await gateway.listening();
  console.log(`Gateway listening on ws://${config.host ?? 'localhost'}:${port}. Press Ctrl+C to stop.`);

  let cleanedUp = false;
  const cleanup = async (): Promise<void> => {
    if (cleanedUp) return;
    cleanedUp = true;
    console.log('\nShutting down...');
    await gateway.close();
    console.log('Gateway stopped.');
  };

  const onSignal = (): void => {
    cleanup().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Failed to stop gateway:', err);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  return { gateway, port, cleanup };
}
