import { Client } from 'node-osc';
import type { Logger } from '../logger.js';
import type { Exporter } from '../services/fanout.js';
import { ALL_KEYS, type HealthData, type UpdatedKey } from '../types/health.js';

export const HEART_RATE_MAX = 256;

export interface OscTransport {
  send(address: string, value: number | boolean): Promise<void>;
  close(): Promise<void>;
}

type OscArgument = { type: 'float'; value: number } | { type: 'boolean'; value: boolean };

// node-osc tags a whole number as an int; receivers expect a float parameter.
const toArgument = (value: number | boolean): OscArgument =>
  typeof value === 'boolean' ? { type: 'boolean', value } : { type: 'float', value };

export function createOscTransport(host: string, port: number): OscTransport {
  const client = new Client(host, port);
  return {
    send: (address, value) =>
      new Promise<void>((resolve, reject) => {
        client.send(address, toArgument(value), (err?: Error | null) => (err ? reject(err) : resolve()));
      }),
    close: () =>
      new Promise<void>((resolve) => {
        client.close(() => resolve());
      })
  };
}

export type OscExporterOptions = {
  transport: OscTransport;
  address: string;
  /** When set, a boolean "active" signal is sent on this address as well. */
  activeAddress?: string;
  activeDebounceMs: number;
  logger: Logger;
};

/**
 * Forwards heart rate as a 0..1 float, e.g. to an avatar parameter.
 * Other metrics are not sent.
 */
export class OscExporter implements Exporter {
  readonly name = 'osc';
  private inactiveTimer?: NodeJS.Timeout;

  constructor(private readonly opts: OscExporterOptions) {}

  async update(data: HealthData, updatedKey: UpdatedKey) {
    if (updatedKey !== 'heartRate' && updatedKey !== ALL_KEYS) return;

    const { transport, address, activeAddress } = this.opts;
    const sends = [transport.send(address, data.heartRate / HEART_RATE_MAX)];
    if (activeAddress) {
      sends.push(transport.send(activeAddress, true));
      this.scheduleInactive(activeAddress);
    }
    await Promise.all(sends);
  }

  async close() {
    clearTimeout(this.inactiveTimer);
    this.inactiveTimer = undefined;
    await this.opts.transport.close();
  }

  private scheduleInactive(activeAddress: string) {
    clearTimeout(this.inactiveTimer);
    this.inactiveTimer = setTimeout(() => {
      this.inactiveTimer = undefined;
      this.opts.transport.send(activeAddress, false).catch((err: unknown) => {
        this.opts.logger.error({ err, address: activeAddress }, 'Sending data');
      });
    }, this.opts.activeDebounceMs);
  }
}
