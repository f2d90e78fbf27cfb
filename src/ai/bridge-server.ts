/**
 * WebSocket Bridge Server — RPC interface for an external harness.
 *
 * A renderer or input front end drives sessions over JSON messages:
 * start, tick, close. Each connection gets its own SessionController.
 * Binds to localhost only (no LAN exposure).
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { RawData } from 'ws';
import { SessionController } from '../engine/SessionController';
import type { SessionRecord, TickResult } from '../engine/SessionController';
import type { GameConfig } from '../engine/config';
import { DEFAULT_GAME_CONFIG } from '../engine/config';
import { Action } from '../engine/types';
import { ManualActionSource, createActionSource } from './action-source';
import type { ControlMode } from './bot-config';
import { DEFAULT_RUN_CONFIG, parseControlMode } from './bot-config';

export type BridgeResponse =
  | { type: 'start_result'; seed: number; mode: ControlMode; state: TickResult }
  | { type: 'tick_result'; state: TickResult; record?: SessionRecord }
  | { type: 'close_result'; record: SessionRecord | null }
  | { type: 'error'; message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalInteger(msg: Record<string, unknown>, key: string): number | undefined {
  const value = msg[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new Error(`"${key}" must be an integer`);
  }
  return value;
}

function parseAction(raw: unknown): Action {
  if (raw === undefined || raw === Action.NoFlap) return Action.NoFlap;
  if (raw === Action.Flap) return Action.Flap;
  throw new Error(`Unknown action "${String(raw)}". Expected "flap" or "no_flap"`);
}

/**
 * Protocol state of one socket. Transport-free, so it can be driven
 * directly with parsed messages.
 */
export class BridgeConnection {
  private session: SessionController | null = null;
  private manual: ManualActionSource | null = null;

  constructor(private readonly config: GameConfig = DEFAULT_GAME_CONFIG) {}

  get active(): boolean {
    return this.session !== null;
  }

  handle(msg: unknown): BridgeResponse {
    if (!isRecord(msg)) {
      return { type: 'error', message: 'Message must be a JSON object' };
    }
    switch (msg.type) {
      case 'start': {
        const mode = parseControlMode(msg.bot ?? 'none');
        const seed = optionalInteger(msg, 'seed');
        const maxTicks = optionalInteger(msg, 'maxTicks') ?? DEFAULT_RUN_CONFIG.maxTicks;
        const source = createActionSource(mode, this.config);
        const session = new SessionController({ config: this.config, maxTicks });
        const resolved = session.start(seed, source);
        this.session = session;
        this.manual = source instanceof ManualActionSource ? source : null;
        return { type: 'start_result', seed: resolved, mode, state: session.peek() };
      }
      case 'tick': {
        if (!this.session) {
          return { type: 'error', message: 'Call start before tick' };
        }
        const action = parseAction(msg.action);
        if (this.manual && action === Action.Flap) {
          this.manual.requestFlap();
        }
        const state = this.session.tick();
        const record = this.session.record;
        return record ? { type: 'tick_result', state, record } : { type: 'tick_result', state };
      }
      case 'close': {
        const record = this.session?.record ?? null;
        this.reset();
        return { type: 'close_result', record };
      }
      default:
        return { type: 'error', message: `Unknown message type: ${String(msg.type)}` };
    }
  }

  reset(): void {
    this.session = null;
    this.manual = null;
  }
}

/** Decode one frame, run it through the connection and encode the reply. */
export function respond(connection: BridgeConnection, data: RawData): string {
  let response: BridgeResponse;
  try {
    const msg: unknown = JSON.parse(data.toString());
    response = connection.handle(msg);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('[bridge] error:', message);
    response = { type: 'error', message };
  }
  return JSON.stringify(response);
}

export interface BridgeServerOptions {
  /** 0 picks a free port. */
  port?: number;
  config?: GameConfig;
  /** How long close() waits for clients to finish the close handshake. */
  closeGraceMs?: number;
}

export interface BridgeServer {
  readonly port: number;
  readonly wss: WebSocketServer;
  /** Close every client with 1001, then stop listening. */
  close(): Promise<void>;
}

const DEFAULT_BRIDGE_PORT = 9876;
const DEFAULT_CLOSE_GRACE_MS = 5000;

/** Resolves once the server is listening on 127.0.0.1. */
export function startBridgeServer(options: BridgeServerOptions = {}): Promise<BridgeServer> {
  const config = options.config ?? DEFAULT_GAME_CONFIG;
  const closeGraceMs = options.closeGraceMs ?? DEFAULT_CLOSE_GRACE_MS;
  const wss = new WebSocketServer({
    port: options.port ?? DEFAULT_BRIDGE_PORT,
    host: '127.0.0.1',
    perMessageDeflate: false,
    maxPayload: 65_536,
    clientTracking: true,
  });

  wss.on('connection', (ws, req) => {
    req.socket.setNoDelay(true);

    const connection = new BridgeConnection(config);

    ws.on('message', (data: RawData) => {
      ws.send(respond(connection, data));
    });

    ws.on('close', () => { connection.reset(); });
    ws.on('error', (err) => {
      console.error('[bridge] connection error:', err.message);
      connection.reset();
    });
  });

  function close(): Promise<void> {
    for (const client of wss.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.close(1001, 'Server shutting down');
      }
    }
    return new Promise((resolve, reject) => {
      const force = setTimeout(() => {
        for (const client of wss.clients) client.terminate();
      }, closeGraceMs);
      force.unref();
      wss.close((err) => {
        clearTimeout(force);
        if (err) reject(err);
        else resolve();
      });
    });
  }

  return new Promise((resolve, reject) => {
    wss.once('error', reject);
    wss.once('listening', () => {
      wss.off('error', reject);
      const address = wss.address();
      if (typeof address === 'string') {
        reject(new Error(`Expected a TCP address, got ${address}`));
        return;
      }
      const port = address.port;
      console.log(`[bridge] listening on ws://127.0.0.1:${port}`);
      resolve({ port, wss, close });
    });
  });
}
