import type { Exporter } from '../src/services/fanout.js';
import type { HealthData, UpdatedKey } from '../src/types/health.js';

export class RecordingExporter implements Exporter {
  readonly calls: Array<{ data: HealthData; key: UpdatedKey }> = [];

  constructor(readonly name = 'recording') {}

  update(data: HealthData, key: UpdatedKey) {
    this.calls.push({ data, key });
  }
}

export class FailingExporter implements Exporter {
  constructor(
    readonly name: string,
    private readonly mode: 'throw' | 'reject'
  ) {}

  update(): void | Promise<void> {
    if (this.mode === 'throw') throw new Error(`${this.name} exploded`);
    return Promise.reject(new Error(`${this.name} rejected`));
  }
}

export function sample(overrides: Partial<HealthData> = {}): HealthData {
  return {
    time: new Date('2024-05-01T10:00:00.000Z'),
    heartRate: 80,
    stepCount: 1200,
    distanceTraveled: 850.5,
    speed: 1.4,
    calories: 42,
    ...overrides
  };
}
