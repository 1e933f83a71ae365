/**
 * WebSocket server for league race control.
 *
 * Thin adapter layer: maps WebSocket connections to the race-control handler.
 * Uses the `ws` library for WebSocket support.
 */

import { WebSocketServer, WebSocket, type RawData } from 'ws';
import type { GridFillPolicy } from '../types.js';
import type { SeasonStore } from '../season/store.js';
import type { LeagueConfig } from '../season/config.js';
import type { LeagueLogger } from '../utils/logger.js';
import { logger as defaultLogger } from '../utils/logger.js';
import type { RandomSource } from '../random.js';
import type { ClientMessage, Connection, ServerMessage } from './types.js';
import { type ConnectionRegistry, type RaceControl, createRaceControl } from './race-control.js';
import { parseClientMessage } from './protocol.js';

interface WsConnection extends Connection {
  ws: WebSocket;
}

export interface LeagueServerConfig {
  port: number;
  store: SeasonStore;
  league: LeagueConfig;
  logger?: LeagueLogger;
  rng?: RandomSource;
  fillPolicy?: GridFillPolicy;
}

export interface LeagueServer {
  /** The underlying WebSocket server. */
  wss: WebSocketServer;
  control: RaceControl;
  /** Shut down the server. */
  close(): void;
}

/**
 * Create and start the race-control WebSocket server.
 */
export function createLeagueServer(config: LeagueServerConfig): LeagueServer {
  const logger = config.logger ?? defaultLogger;
  const connections = new Map<string, WsConnection>();

  const registry: ConnectionRegistry = {
    broadcast(message: ServerMessage) {
      for (const conn of connections.values()) sendJson(conn.ws, message);
    },
  };

  const control = createRaceControl({
    store: config.store,
    config: config.league,
    registry,
    logger,
    rng: config.rng,
    fillPolicy: config.fillPolicy,
  });

  const wss = new WebSocketServer({ port: config.port });

  wss.on('connection', (ws: WebSocket) => {
    const conn: WsConnection = {
      id: generateConnectionId(),
      ws,
      send(message: ServerMessage) {
        sendJson(ws, message);
      },
    };

    connections.set(conn.id, conn);
    logger.debug(`Connection ${conn.id} opened`);
    conn.send({ type: 'session-created', connectionId: conn.id });

    ws.on('message', (data: RawData) => {
      let message: ClientMessage;
      try {
        message = parseClientMessage(data.toString());
      } catch (err) {
        const errorMsg = err instanceof Error ? err.message : 'Invalid message';
        logger.warn(`Rejected message from ${conn.id}: ${errorMsg}`);
        conn.send({ type: 'error', message: errorMsg });
        return;
      }
      control.handleMessage(conn, message);
    });

    const close = () => {
      if (!connections.delete(conn.id)) return;
      control.handleDisconnect(conn);
      logger.debug(`Connection ${conn.id} closed`);
    };

    ws.on('close', close);
    ws.on('error', err => {
      logger.error(`Connection ${conn.id} failed`, err);
      close();
    });
  });

  return {
    wss,
    control,
    close() {
      for (const conn of connections.values()) conn.ws.close();
      connections.clear();
      wss.close();
    },
  };
}

function sendJson(ws: WebSocket, data: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(data));
  }
}

let connectionCounter = 0;
function generateConnectionId(): string {
  return `conn-${++connectionCounter}-${Math.random().toString(36).slice(2, 6)}`;
}
