#!/usr/bin/env node
import { ConfigError, loadConfig, type AppConfig } from './config.js';
import { HttpServerExporter } from './exporters/httpServer.js';
import { OscExporter, createOscTransport } from './exporters/osc.js';
import { PrometheusExporter } from './exporters/prometheus.js';
import { createLogger, type Logger } from './logger.js';
import { HdsReceiver } from './receivers/hds.js';
import type { Receiver } from './receivers/types.js';
import { WsPullReceiver } from './receivers/wsPull.js';
import type { Exporter } from './services/fanout.js';
import { formatVersion, readBuildInfo } from './version.js';

type Startable = { start(): Promise<void> };

function buildExporters(config: AppConfig, logger: Logger) {
  const exporters: Exporter[] = [];
  const listeners: Startable[] = [];

  if (config.httpExporter.enabled) {
    const http = new HttpServerExporter({
      port: config.httpExporter.port,
      corsOrigin: config.httpExporter.corsOrigin,
      logger: logger.child({ component: 'http-exporter' })
    });
    exporters.push(http);
    listeners.push(http);
  }

  if (config.osc.enabled) {
    const { host, port, address, activeAddress, activeDebounceMs } = config.osc;
    logger.info({ addr: address, ip: `${host}:${port}` }, 'OSC config');
    exporters.push(
      new OscExporter({
        transport: createOscTransport(host, port),
        address,
        activeAddress,
        activeDebounceMs,
        logger: logger.child({ component: 'osc-exporter' })
      })
    );
  }

  if (config.prometheus.enabled) {
    const prom = new PrometheusExporter({
      port: config.prometheus.port,
      freshnessMs: config.prometheus.freshnessMs,
      logger: logger.child({ component: 'prometheus-exporter' })
    });
    exporters.push(prom);
    listeners.push(prom);
  }

  return { exporters, listeners };
}

function buildReceiver(config: AppConfig, exporters: Exporter[], logger: Logger): Receiver {
  const { receiver } = config;
  if (receiver.kind === 'ws-pull') {
    return new WsPullReceiver({
      url: receiver.url,
      maxBackoffMs: receiver.maxBackoffMs,
      exporters,
      logger: logger.child({ component: 'ws-pull-receiver' })
    });
  }
  return new HdsReceiver({
    port: receiver.port,
    protocol: receiver.protocol,
    exporters,
    logger: logger.child({ component: 'hds-receiver' })
  });
}

async function main() {
  const version = formatVersion(readBuildInfo());
  if (process.argv.includes('--version')) {
    process.stdout.write(`${version}\n`);
    return;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      process.stderr.write(`${err.message}\n`);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger(config.logLevel);
  logger.info({ version }, 'Starting hds-bridge');

  const { exporters, listeners } = buildExporters(config, logger);
  if (exporters.length === 0) logger.warn('No exporters enabled');
  const receiver = buildReceiver(config, exporters, logger);

  try {
    await Promise.all(listeners.map((l) => l.start()));
    await receiver.start();
  } catch (err) {
    logger.fatal({ err }, 'Failed to start');
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    await receiver.stop();
    await Promise.all(exporters.map((e) => e.close?.()));
    process.exit(0);
  };
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, (s) => {
      shutdown(s).catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }
}

main().catch((err: unknown) => {
  process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
  process.exit(1);
});
