import http from 'node:http';
import type { Express } from 'express';
import type { Logger } from '../logger.js';
import { createHdsRouter } from '../routes/hds.js';
import { boundPort, closeServer, createApp, finalizeApp, listen } from '../server.js';
import type { Exporter } from '../services/fanout.js';
import type { HdsProtocol } from '../services/hdsPayload.js';
import { HealthRecord } from '../services/healthRecord.js';
import type { Receiver } from './types.js';

export type HdsReceiverOptions = {
  port: number;
  protocol: HdsProtocol;
  exporters: readonly Exporter[];
  logger: Logger;
  now?: () => Date;
};

/** Push ingestion: the watch app PUTs `key:value` payloads to us. */
export class HdsReceiver implements Receiver {
  readonly name = 'hds';
  readonly record: HealthRecord;
  readonly app: Express;
  private readonly server: http.Server;

  constructor(private readonly opts: HdsReceiverOptions) {
    this.record = new HealthRecord(opts.logger, opts.now);
    this.app = createApp({ jsonAnyContentType: true });
    this.app.use(
      '/',
      createHdsRouter({
        record: this.record,
        exporters: opts.exporters,
        protocol: opts.protocol,
        logger: opts.logger
      })
    );
    finalizeApp(this.app, opts.logger);
    this.server = http.createServer(this.app);
  }

  get port() {
    return boundPort(this.server);
  }

  async start() {
    await listen(this.server, this.opts.port, this.opts.logger, 'HDS Receiver');
  }

  stop() {
    return closeServer(this.server);
  }
}
