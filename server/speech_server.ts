import http from 'node:http';
import WebSocket, { WebSocketServer } from 'ws';
import { runConnection } from './connection_loop';
import { createLogger, type Logger } from './logger';
import type { RecognitionModel } from './recognizer';
import { Session } from './session';
import { socketTransport, type ClientSocket } from './transport';

export interface SpeechServerOptions {
  host: string;
  port: number;
  sampleRate: number;
  /** 0 disables the ping loop */
  heartbeatMs: number;
  loggers?: {
    server?: Logger;
    connection?: Logger;
    session?: Logger;
  };
}

export interface HealthReport {
  status: 'ok';
  connections: number;
  model: string;
}

export interface HealthRequest {
  method?: string;
  url?: string;
}

export interface HealthResponse {
  writeHead(statusCode: number, headers: Record<string, string>): unknown;
  end(body: string): unknown;
}

/** Closing side of a client socket, used when a connection cannot be set up. */
export interface ClosableSocket extends ClientSocket {
  close(code?: number, reason?: string): void;
}

export class SpeechServer {
  private httpServer?: http.Server;
  private wss?: WebSocketServer;
  private clients = new Set<WebSocket>();
  private tasks = new Set<Promise<void>>();
  private heartbeatTimer?: ReturnType<typeof setInterval>;
  private active = 0;
  private readonly log: Logger;
  private readonly sessionLog: Logger;
  private readonly connLog: Logger;

  constructor(private readonly model: RecognitionModel, private readonly options: SpeechServerOptions) {
    this.log = options.loggers?.server ?? createLogger('stt-server');
    this.connLog = options.loggers?.connection ?? createLogger('conn');
    this.sessionLog = options.loggers?.session ?? createLogger('session');
  }

  get activeConnections(): number {
    return this.active;
  }

  /** Bound port once listening; differs from options.port when that is 0. */
  get port(): number | undefined {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address.port : undefined;
  }

  health(): HealthReport {
    return { status: 'ok', connections: this.active, model: this.model.name };
  }

  handleRequest(req: HealthRequest, res: HealthResponse) {
    if (req.method === 'GET' && (req.url === '/health' || req.url === '/healthz')) {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify(this.health()));
      return;
    }
    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'not found' }));
  }

  start(): Promise<void> {
    if (this.httpServer) return Promise.resolve(); // idempotent
    const { host, port, heartbeatMs } = this.options;
    const server = http.createServer((req, res) => this.handleRequest(req, res));
    const wss = new WebSocketServer({ server, perMessageDeflate: false });
    this.httpServer = server;
    this.wss = wss;

    wss.on('connection', (ws, req) => {
      this.clients.add(ws);
      ws.on('close', () => this.clients.delete(ws));
      const peer = `${req.socket.remoteAddress ?? 'unknown'}:${req.socket.remotePort ?? 0}`;
      const task = this.handleConnection(ws, peer, req.url);
      this.tasks.add(task);
      void task.finally(() => this.tasks.delete(task));
    });

    if (heartbeatMs > 0) {
      this.heartbeatTimer = setInterval(() => {
        for (const ws of this.clients) {
          if (ws.readyState !== WebSocket.OPEN) continue;
          try {
            ws.ping();
          } catch (err) {
            this.log.warn('ping failed', err);
          }
        }
      }, heartbeatMs);
    }

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        server.on('error', (err) => this.log.error('Server error:', err));
        this.log.info(`listening on ws://${host}:${this.port ?? port}`);
        resolve();
      });
    });
  }

  /** Runs one connection to completion. Never rejects. */
  async handleConnection(socket: ClosableSocket, peer: string, path?: string): Promise<void> {
    this.log.info(`New client connected from ${peer}${path && path !== '/' ? ` path=${path}` : ''}`);
    let session: Session;
    try {
      session = new Session(this.model, { sampleRate: this.options.sampleRate, label: peer, logger: this.sessionLog });
    } catch (err) {
      this.log.error(`Failed to initialize recognizer for ${peer}:`, err);
      socket.close(1011, 'recognizer unavailable');
      return;
    }

    this.active++;
    try {
      const summary = await runConnection(socketTransport(socket, peer, this.connLog), session, this.connLog);
      this.log.info(
        `Connection closed for ${peer} frames=${summary.frames} flushes=${summary.flushes} failures=${summary.failures} skipped=${summary.skipped}`,
      );
    } catch (err) {
      this.log.error(`Error processing client ${peer}:`, err);
    } finally {
      this.active--;
    }
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    const wss = this.wss;
    if (!server || !wss) return;
    this.httpServer = undefined;
    this.wss = undefined;
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
    for (const ws of this.clients) {
      ws.close(1001, 'shutting down');
    }
    this.clients.clear();
    // connections release their sessions before the servers close
    await Promise.all(this.tasks);
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    this.log.info('stopped');
  }
}
