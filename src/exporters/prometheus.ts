import http from 'node:http';
import { Gauge, Registry } from 'prom-client';
import type { Logger } from '../logger.js';
import { createMetricsRouter } from '../routes/metrics.js';
import { boundPort, closeServer, createApp, finalizeApp, listen } from '../server.js';
import type { Exporter } from '../services/fanout.js';
import { emptyHealthData, type HealthData, type HealthKey } from '../types/health.js';

export type PrometheusExporterOptions = {
  port: number;
  freshnessMs: number;
  logger: Logger;
  now?: () => number;
};

const METRICS: ReadonlyArray<{ name: string; help: string; key: HealthKey }> = [
  { name: 'heart_rate', help: 'Current heart rate in beats per minute', key: 'heartRate' },
  { name: 'step_count', help: 'Cumulative step count', key: 'stepCount' },
  { name: 'distance_traveled_meters', help: 'Cumulative distance traveled in meters', key: 'distanceTraveled' },
  { name: 'speed_meters_per_second', help: 'Current speed in meters per second', key: 'speed' },
  { name: 'calories', help: 'Cumulative active calories burned', key: 'calories' }
];

/**
 * Exposes the record on `/metrics`. Data older than the freshness window is
 * hidden so a dead source does not look like a flat heart rate.
 */
export class PrometheusExporter implements Exporter {
  readonly name = 'prometheus';
  // Custom registry, no default process collectors.
  readonly registry = new Registry();
  readonly server: http.Server;
  private data: HealthData = emptyHealthData();
  private receivedAt: number | null = null;
  private readonly now: () => number;

  constructor(private readonly opts: PrometheusExporterOptions) {
    this.now = opts.now ?? Date.now;

    const current = () => this.data;
    for (const { name, help, key } of METRICS) {
      new Gauge({
        name,
        help,
        registers: [this.registry],
        collect() {
          this.set(current()[key]);
        }
      });
    }

    const app = createApp();
    app.use('/', createMetricsRouter(this));
    finalizeApp(app, opts.logger);
    this.server = http.createServer(app);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  get port() {
    return boundPort(this.server);
  }

  async start() {
    await listen(this.server, this.opts.port, this.opts.logger, 'Prometheus metrics server');
  }

  update(data: HealthData) {
    this.data = { ...data };
    this.receivedAt = this.now();
  }

  isFresh(): boolean {
    return this.receivedAt !== null && this.now() - this.receivedAt <= this.opts.freshnessMs;
  }

  async render(): Promise<string> {
    if (!this.isFresh()) return '';
    return this.registry.metrics();
  }

  close() {
    return closeServer(this.server);
  }
}
