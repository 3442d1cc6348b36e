import type { Logger } from '../logger.js';
import {
  INTEGER_KEYS,
  emptyHealthData,
  isHealthKey,
  type HealthData,
  type HealthKey
} from '../types/health.js';

export class HealthRecord {
  private data: HealthData = emptyHealthData();

  constructor(
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Writes one field and stamps the record. Unknown keys leave the record
   * untouched and return false.
   */
  applyUpdate(key: string, value: number): key is HealthKey {
    if (!isHealthKey(key)) {
      this.logger.warn({ key }, 'Unknown key');
      return false;
    }
    this.data.time = this.now();
    this.data[key] = INTEGER_KEYS.has(key) ? Math.trunc(value) : value;
    return true;
  }

  snapshot(): HealthData {
    return { ...this.data, time: this.data.time ? new Date(this.data.time) : null };
  }

  hasData(): boolean {
    return this.data.time !== null;
  }
}
