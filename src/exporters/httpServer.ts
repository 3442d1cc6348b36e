import http from 'node:http';
import type { Duplex } from 'node:stream';
import { WebSocketServer, type WebSocket } from 'ws';
import type { Logger } from '../logger.js';
import { createLatestRouter } from '../routes/latest.js';
import { boundPort, closeServer, createApp, finalizeApp, listen } from '../server.js';
import type { Exporter } from '../services/fanout.js';
import { WsHub } from '../services/wsHub.js';
import { ALL_KEYS, type HealthData, type UpdatedKey, type UpdateMessage } from '../types/health.js';

export type HttpServerExporterOptions = {
  port: number;
  corsOrigin?: string;
  logger: Logger;
};

const copy = (data: HealthData): HealthData => ({
  ...data,
  time: data.time ? new Date(data.time) : null
});

/**
 * Serves the latest record on `GET /` and streams every update to
 * `GET /ws` subscribers.
 */
export class HttpServerExporter implements Exporter {
  readonly name = 'http-server';
  readonly server: http.Server;
  private readonly wss = new WebSocketServer({ noServer: true });
  private readonly hub: WsHub<UpdateMessage>;
  private latest: HealthData | null = null;

  constructor(private readonly opts: HttpServerExporterOptions) {
    const { logger } = opts;
    this.hub = new WsHub<UpdateMessage>((id, err) => logger.error({ err, subscriber: id }, 'Writing message'));

    const app = createApp({ corsOrigin: opts.corsOrigin });
    app.use('/', createLatestRouter(() => (this.latest?.time ? this.latest : null)));
    finalizeApp(app, logger);

    this.server = http.createServer(app);
    this.server.on('upgrade', (req, socket, head) => this.upgrade(req, socket, head));
  }

  get port() {
    return boundPort(this.server);
  }

  get subscriberCount() {
    return this.hub.size;
  }

  async start() {
    await listen(this.server, this.opts.port, this.opts.logger, 'HTTP exporter');
  }

  update(data: HealthData, updatedKey: UpdatedKey) {
    this.latest = copy(data);
    const { dropped } = this.hub.broadcast({ data: this.latest, updatedKey });
    if (dropped > 0) this.opts.logger.debug({ dropped, updatedKey }, 'Skipped stalled subscribers');
  }

  async close() {
    this.hub.closeAll();
    for (const ws of this.wss.clients) ws.terminate();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
    await closeServer(this.server);
  }

  private upgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer) {
    const path = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (path !== '/ws') {
      socket.end('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      return;
    }
    this.wss.handleUpgrade(req, socket, head, (ws) => this.connect(ws, req.socket.remoteAddress));
  }

  private connect(ws: WebSocket, addr: string | undefined) {
    const { logger } = this.opts;
    const id = this.hub.addClient(ws);
    logger.info({ addr, current: this.hub.size }, 'New WebSocket connection');

    let closed = false;
    const cleanup = () => {
      if (closed) return;
      closed = true;
      this.hub.removeClient(id);
      logger.info({ addr, current: this.hub.size }, 'Closing WebSocket connection');
    };

    // Inbound frames are ignored; the socket is only watched for disconnects.
    ws.on('close', cleanup);
    ws.on('error', (err) => {
      logger.error({ err, addr }, 'Reading message');
      ws.terminate();
      cleanup();
    });

    if (this.latest?.time) {
      this.hub.send(id, { data: this.latest, updatedKey: ALL_KEYS });
    }
  }
}
