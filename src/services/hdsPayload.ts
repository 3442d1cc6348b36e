import { HttpError } from '../middleware/error.js';

export type HdsProtocol = 'multi' | 'legacy';

export type HdsUpdate = {
  key: string;
  value: number;
};

export class HdsPayloadError extends HttpError {
  constructor(message: 'Invalid data format' | 'Invalid value format') {
    super(400, message);
    this.name = 'HdsPayloadError';
  }
}

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const LEGACY = /^heartRate:([+-]?\d+)$/;

/** Parses `key:value`, e.g. `heartRate:80` or `speed:0.86`. */
export function parseMultiKey(raw: string): HdsUpdate {
  const parts = raw.split(':');
  if (parts.length !== 2) throw new HdsPayloadError('Invalid data format');
  const [key, valueStr] = parts;
  const value = Number(valueStr);
  if (!DECIMAL.test(valueStr) || !Number.isFinite(value)) {
    throw new HdsPayloadError('Invalid value format');
  }
  return { key, value };
}

/** Single-metric predecessor: only `heartRate:<int>` is accepted. */
export function parseLegacy(raw: string): HdsUpdate {
  const match = LEGACY.exec(raw);
  if (!match) throw new HdsPayloadError('Invalid data format');
  return { key: 'heartRate', value: Number(match[1]) };
}

export function parseHdsPayload(raw: string, protocol: HdsProtocol = 'multi'): HdsUpdate {
  return protocol === 'legacy' ? parseLegacy(raw) : parseMultiKey(raw);
}
