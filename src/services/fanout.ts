import type { Logger } from '../logger.js';
import type { HealthData, UpdatedKey } from '../types/health.js';

export interface Exporter {
  readonly name: string;
  /** Must not block; async work is reported through the returned promise. */
  update(data: HealthData, updatedKey: UpdatedKey): void | Promise<void>;
  close?(): Promise<void>;
}

export function notifyExporters(
  exporters: readonly Exporter[],
  data: HealthData,
  updatedKey: UpdatedKey,
  logger: Logger
) {
  for (const exporter of exporters) {
    const fail = (err: unknown) => logger.error({ err, exporter: exporter.name }, 'Sending data');
    try {
      Promise.resolve(exporter.update(data, updatedKey)).catch(fail);
    } catch (err) {
      fail(err);
    }
  }
}
