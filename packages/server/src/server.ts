import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { type RawData, type WebSocket, WebSocketServer } from 'ws';
import { GameStore, type GameStoreConfig } from './game/GameStore.js';
import { Session } from './session/Session.js';
import { logger } from './utils/logger.js';

export interface ServerConfig {
  port: number;
  host?: string;
  /** Options for the game store (match rules, disconnect handling) */
  store?: Partial<GameStoreConfig>;
}

/**
 * Convert a ws payload to text, whatever shape ws delivered it in.
 */
export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Answer plain HTTP requests made to the WebSocket port.
 */
export function handleHttpRequest(req: IncomingMessage, res: ServerResponse): void {
  if (req.method === 'GET' && req.url === '/health') {
    res.writeHead(200, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ status: 'ok' }));
    return;
  }
  res.writeHead(404, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify({ error: 'Not found' }));
}

export class CardDuelServer {
  private readonly httpServer: Server;
  private readonly wss: WebSocketServer;
  private readonly store: GameStore;

  constructor(config: ServerConfig) {
    this.httpServer = createServer(handleHttpRequest);
    this.wss = new WebSocketServer({ server: this.httpServer });
    this.store = new GameStore(config.store);

    this.setupWebSocketHandlers();
    this.startServer(config);
  }

  private setupWebSocketHandlers(): void {
    this.wss.on('connection', (ws: WebSocket) => {
      logger.info('New WebSocket connection');

      const session = new Session(ws, this.store);
      session.start();

      ws.on('message', (data: RawData, isBinary: boolean) => {
        if (isBinary) {
          logger.warn('Binary frame ignored', { playerId: session.playerId });
          return;
        }
        session.handleMessage(rawDataToString(data));
      });

      ws.on('close', () => {
        session.handleClose();
      });

      ws.on('error', (error: Error) => {
        logger.error('WebSocket error', { error: error.message, playerId: session.playerId });
      });
    });
  }

  private startServer(config: ServerConfig): void {
    const host = config.host ?? '0.0.0.0';
    this.httpServer.listen(config.port, host, () => {
      logger.info('Server started', { port: config.port, host });
    });
  }

  close(): void {
    for (const client of this.wss.clients) {
      client.close();
    }
    this.wss.close();
    this.httpServer.close();
    logger.info('Server closed');
  }

  // For testing
  getStore(): GameStore {
    return this.store;
  }
}
