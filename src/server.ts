import http from 'node:http';
import express, { type Express } from 'express';
import cors from 'cors';
import type { Logger } from './logger.js';
import { createErrorHandler } from './middleware/error.js';

export type AppOptions = {
  corsOrigin?: string;
  jsonLimit?: string;
  /** Parse JSON bodies regardless of Content-Type. */
  jsonAnyContentType?: boolean;
};

export function createApp(opts: AppOptions = {}): Express {
  const app = express();

  app.disable('x-powered-by');
  if (opts.corsOrigin) app.use(cors({ origin: opts.corsOrigin }));
  app.use(
    express.json({
      limit: opts.jsonLimit ?? '16kb',
      type: opts.jsonAnyContentType ? () => true : 'application/json'
    })
  );

  app.get('/healthz', (_req, res) => {
    res.json({ ok: true });
  });

  return app;
}

/** Appends the error middleware; call after every router is mounted. */
export function finalizeApp(app: Express, logger: Logger): Express {
  app.use(createErrorHandler(logger));
  return app;
}

export function listen(server: http.Server, port: number, logger: Logger, name: string) {
  return new Promise<http.Server>((resolve, reject) => {
    const onError = (err: Error) => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = () => {
      server.off('error', onError);
      logger.info({ port: boundPort(server) }, `${name} listening...`);
      resolve(server);
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port);
  });
}

export function boundPort(server: http.Server): number {
  const addr = server.address();
  return addr && typeof addr === 'object' ? addr.port : 0;
}

export function closeServer(server: http.Server) {
  return new Promise<void>((resolve, reject) => {
    if (!server.listening) return resolve();
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}
