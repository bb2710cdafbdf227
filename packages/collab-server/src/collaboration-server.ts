/**
 * Collaboration Server
 *
 * HTTP and WebSocket surface of the room server: the document session
 * endpoint, the room endpoint every client connects to, and a stats
 * endpoint.
 *
 * @module server
 */

import { createServer, type IncomingHttpHeaders, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { resolveConfig } from './config.js';
import type { ContentsManager, FileIdManager } from './contents/contents-manager.js';
import { CollabError } from './errors.js';
import { handleSessionRequest } from './http/session-handler.js';
import { createLogger, type Logger } from './logger.js';
import { RoomCoordinator, type UpdateStoreFactory } from './room-coordinator.js';
import type { SessionIssuer } from './session.js';
import { CloseCode, YDocConnection } from './transport/ydoc-connection.js';
import type { AuthInfo, CollaborationServerConfig, ResolvedCollaborationConfig } from './types.js';
import { MemoryUpdateStore } from './ystore/memory-update-store.js';

/**
 * Everything the server needs beyond its configuration
 */
export interface CollaborationServerOptions extends CollaborationServerConfig {
  contentsManager: ContentsManager;
  fileIdManager: FileIdManager;
  /** Update log factory; defaults to in-memory logs kept per path */
  createUpdateStore?: UpdateStoreFactory;
  logger?: Logger;
  session?: SessionIssuer;
}

/** Largest accepted session request body */
const MAX_BODY_SIZE = 64 * 1024;

/**
 * Route of a request below the base path
 */
export type Route =
  | { kind: 'session'; path: string }
  | { kind: 'room'; roomId: string }
  | { kind: 'stats' }
  | { kind: 'unknown' };

/**
 * Match a request path against the server's routes
 */
export function matchRoute(basePath: string, pathname: string): Route {
  const prefix = basePath === '/' ? '' : basePath;
  if (!pathname.startsWith(`${prefix}/`)) return { kind: 'unknown' };

  const rest = pathname.slice(prefix.length + 1);
  if (rest === 'stats') return { kind: 'stats' };

  const slash = rest.indexOf('/');
  if (slash < 0) return { kind: 'unknown' };

  const segment = rest.slice(0, slash);
  const value = safeDecode(rest.slice(slash + 1));
  if (value === null || value === '') return { kind: 'unknown' };

  if (segment === 'session') return { kind: 'session', path: value };
  if (segment === 'room') return { kind: 'room', roomId: value };
  return { kind: 'unknown' };
}

/**
 * Token presented by a request: `Authorization: token <t>` or
 * `Authorization: Bearer <t>`, else the `token` query parameter
 */
export function readToken(headers: IncomingHttpHeaders, url: URL): string | null {
  const header = headers.authorization;
  if (header) {
    const match = /^(?:token|bearer)\s+(.+)$/i.exec(header.trim());
    if (match?.[1]) return match[1];
  }
  return url.searchParams.get('token');
}

export class CollaborationServer {
  readonly config: ResolvedCollaborationConfig;
  readonly coordinator: RoomCoordinator;

  private readonly logger: Logger;
  private readonly fileIdManager: FileIdManager;
  private readonly connections = new Set<YDocConnection>();
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;

  constructor(options: CollaborationServerOptions) {
    const { contentsManager, fileIdManager, createUpdateStore, logger, session, ...config } = options;

    this.config = resolveConfig(config);
    this.logger = logger ?? createLogger({ level: this.config.logging });
    this.fileIdManager = fileIdManager;

    this.coordinator = new RoomCoordinator({
      contentsManager,
      fileIdManager,
      createUpdateStore: createUpdateStore ?? createMemoryUpdateStores(),
      logger: this.logger,
      documentCleanupDelay: this.config.documentCleanupDelay,
      documentSaveDelay: this.config.documentSaveDelay,
      filePollInterval: this.config.filePollInterval,
      session,
    });
  }

  /** Open WebSocket connections */
  get connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Listen on the configured host and port
   */
  async start(): Promise<void> {
    if (this.server) {
      throw new Error('Server already running');
    }

    if (this.config.requireAuth && !this.config.validateAuth) {
      this.logger.warn('Authentication is required but no validator is configured: every request will be rejected');
    }

    const wss = new WebSocketServer({ noServer: true, maxPayload: this.config.maxMessageSize });
    const server = createServer((request, response) => {
      void this.handleRequest(request, response);
    });
    server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      void this.handleUpgrade(request, socket, head);
    });
    wss.on('error', (error) => {
      this.logger.error('WebSocket server error:', error);
    });

    this.server = server;
    this.wss = wss;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(this.config.port, this.config.host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    this.logger.info(
      `Collaboration server started on ${this.config.host}:${this.config.port}${this.config.basePath}`
    );
  }

  /**
   * Close every connection, destroy the rooms (writing pending saves) and
   * stop listening
   */
  async stop(): Promise<void> {
    const server = this.server;
    const wss = this.wss;
    if (!server || !wss) return;
    this.server = null;
    this.wss = null;

    for (const connection of this.connections) {
      connection.close(CloseCode.GOING_AWAY, 'Server shutting down');
    }
    this.connections.clear();

    await this.coordinator.stop();

    await new Promise<void>((resolve, reject) => {
      wss.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });
    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
    });

    this.logger.info('Collaboration server stopped');
  }

  /**
   * Authenticate a request. Resolves null when it must be refused.
   */
  async authenticate(headers: IncomingHttpHeaders, url: URL): Promise<AuthInfo | null> {
    const token = readToken(headers, url);

    if (!this.config.requireAuth) {
      return { userId: token ?? 'anonymous' };
    }
    if (!token || !this.config.validateAuth) return null;

    const result = await this.config.validateAuth(token);
    if (!result) return null;
    return typeof result === 'object' ? result : { userId: token };
  }

  private async handleRequest(request: IncomingMessage, response: ServerResponse): Promise<void> {
    try {
      const url = requestUrl(request);
      const route = matchRoute(this.config.basePath, url.pathname);

      if (route.kind === 'unknown' || route.kind === 'room') {
        throw new CollabError({ code: 'NOT_FOUND', message: `No route for ${request.method ?? 'GET'} ${url.pathname}` });
      }

      const auth = await this.authenticate(request.headers, url);
      if (!auth) {
        this.logger.warn("Couldn't authenticate HTTP request");
        throw new CollabError({ code: 'UNAUTHORIZED' });
      }

      if (route.kind === 'stats' && request.method === 'GET') {
        sendJson(response, 200, this.coordinator.getStats());
        return;
      }

      if (route.kind === 'session' && request.method === 'PUT') {
        const body = await readJsonBody(request);
        const result = await handleSessionRequest(route.path, body, {
          fileIdManager: this.fileIdManager,
          session: this.coordinator.session,
        });
        sendJson(response, result.status, result.body);
        return;
      }

      response.setHeader('Allow', route.kind === 'stats' ? 'GET' : 'PUT');
      sendJson(response, 405, { code: 'METHOD_NOT_ALLOWED', message: 'Method not allowed' });
    } catch (error) {
      if (CollabError.isCode(error)) {
        sendJson(response, error.status, error.toJSON());
        return;
      }
      this.logger.error('Error handling request:', error);
      sendJson(response, 500, { code: 'INTERNAL_ERROR', message: 'Internal server error' });
    }
  }

  private async handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): Promise<void> {
    socket.on('error', (error) => {
      this.logger.debug('Socket error during upgrade:', error);
    });

    try {
      const url = requestUrl(request);
      const route = matchRoute(this.config.basePath, url.pathname);
      if (route.kind !== 'room') {
        rejectUpgrade(socket, 404, 'Not Found');
        return;
      }

      const auth = await this.authenticate(request.headers, url);
      if (!auth) {
        this.logger.warn("Couldn't authenticate WebSocket connection");
        rejectUpgrade(socket, 403, 'Forbidden');
        return;
      }

      const wss = this.wss;
      if (!wss) {
        rejectUpgrade(socket, 503, 'Service Unavailable');
        return;
      }

      const sessionId = url.searchParams.get('sessionId');
      wss.handleUpgrade(request, socket, head, (ws) => {
        this.handleConnection(ws, route.roomId, sessionId);
      });
    } catch (error) {
      this.logger.error('Error handling upgrade:', error);
      rejectUpgrade(socket, 500, 'Internal Server Error');
    }
  }

  private handleConnection(ws: WebSocket, roomId: string, sessionId: string | null): void {
    const connection = new YDocConnection({
      roomId,
      sessionId,
      coordinator: this.coordinator,
      logger: this.logger,
      transport: {
        send: (message, callback) => ws.send(message, { binary: true }, callback),
        close: (code, reason) => ws.close(code, reason),
      },
    });
    this.connections.add(connection);
    this.logger.debug(`New connection ${connection.id} to room ${roomId}`);

    ws.on('message', (data: RawData, isBinary: boolean) => {
      connection.handleMessage(toUint8Array(data), isBinary);
    });
    ws.on('close', () => {
      this.connections.delete(connection);
      connection.handleClose();
    });
    ws.on('error', (error) => {
      this.logger.error(`Connection ${connection.id} error:`, error);
    });

    void connection.open().catch((error: unknown) => {
      this.logger.error(`Failed to open connection ${connection.id}:`, error);
      connection.close(CloseCode.INTERNAL_ERROR, 'Connection error');
    });
  }
}

/**
 * Create a collaboration server
 *
 * @example
 * ```typescript
 * const contents = createFileContentsManager({ rootDir: './notes' });
 * const server = createCollaborationServer({
 *   contentsManager: contents,
 *   fileIdManager: createMemoryFileIdManager(contents),
 *   validateAuth: async (token) => token === process.env.DOCROOM_TOKEN,
 * });
 * await server.start();
 * ```
 */
export function createCollaborationServer(options: CollaborationServerOptions): CollaborationServer {
  return new CollaborationServer(options);
}

/**
 * Update log factory keeping one in-memory log per path for the lifetime
 * of the process
 */
export function createMemoryUpdateStores(): UpdateStoreFactory {
  const stores = new Map<string, MemoryUpdateStore>();
  return (path) => {
    let store = stores.get(path);
    if (!store) {
      store = new MemoryUpdateStore();
      stores.set(path, store);
    }
    return store;
  };
}

function requestUrl(request: IncomingMessage): URL {
  return new URL(request.url ?? '/', `http://${request.headers.host ?? 'localhost'}`);
}

function safeDecode(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

function toUint8Array(data: RawData): Uint8Array {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return new Uint8Array(data);
  return data;
}

function sendJson(response: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  response.writeHead(status, {
    'Content-Type': 'application/json',
    'Content-Length': Buffer.byteLength(payload),
  });
  response.end(payload);
}

function rejectUpgrade(socket: Duplex, status: number, message: string): void {
  socket.write(`HTTP/1.1 ${status} ${message}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

async function readJsonBody(request: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of request) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    size += buffer.length;
    if (size > MAX_BODY_SIZE) {
      throw new CollabError({ code: 'INVALID_REQUEST', message: 'Request body too large' });
    }
    chunks.push(buffer);
  }

  const text = Buffer.concat(chunks).toString('utf8');
  try {
    return text ? JSON.parse(text) : {};
  } catch (error) {
    throw new CollabError({ code: 'INVALID_REQUEST', message: 'Request body is not valid JSON', cause: error });
  }
}
