import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((v, ctx) => {
      if (v === undefined || v === '') return fallback;
      const normalized = v.trim().toLowerCase();
      if (['true', '1', 'yes'].includes(normalized)) return true;
      if (['false', '0', 'no'].includes(normalized)) return false;
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${v}"` });
      return z.NEVER;
    });

const port = (fallback: number) => z.coerce.number().int().min(0).max(65535).default(fallback);
const millis = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
  .object({
    RECEIVER: z.enum(['hds', 'ws-pull']).default('hds'),
    HDS_PORT: port(3476),
    HDS_PROTOCOL: z.enum(['multi', 'legacy']).default('multi'),
    WS_PULL_URL: z
      .string()
      .url()
      .refine((v) => URL.canParse(v) && ['ws:', 'wss:'].includes(new URL(v).protocol), 'expected a ws:// or wss:// URL')
      .optional(),
    WS_PULL_MAX_BACKOFF_MS: millis(10 * 60 * 1000),

    HTTP_EXPORTER_ENABLED: flag(false),
    HTTP_EXPORTER_PORT: port(3477),
    CORS_ORIGIN: z.string().default('*'),

    OSC_ENABLED: flag(true),
    OSC_IP: z.string().min(1).default('127.0.0.1'),
    OSC_PORT: port(9000),
    OSC_ADDR: z.string().startsWith('/').default('/avatar/parameters/HeartRate'),
    OSC_ACTIVE_ADDR: z.string().startsWith('/').optional(),
    OSC_ACTIVE_DEBOUNCE_MS: millis(10_000),

    PROMETHEUS_ENABLED: flag(false),
    PROMETHEUS_PORT: port(9090),
    METRICS_FRESHNESS_MS: millis(30_000),

    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
  })
  .superRefine((env, ctx) => {
    if (env.RECEIVER === 'ws-pull' && !env.WS_PULL_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['WS_PULL_URL'],
        message: 'required when RECEIVER=ws-pull'
      });
    }
  });

export type AppConfig = Readonly<{
  receiver:
    | { kind: 'hds'; port: number; protocol: 'multi' | 'legacy' }
    | { kind: 'ws-pull'; url: string; maxBackoffMs: number };
  httpExporter: Readonly<{ enabled: boolean; port: number; corsOrigin: string }>;
  osc: Readonly<{
    enabled: boolean;
    host: string;
    port: number;
    address: string;
    activeAddress?: string;
    activeDebounceMs: number;
  }>;
  prometheus: Readonly<{ enabled: boolean; port: number; freshnessMs: number }>;
  logLevel: string;
}>;

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

// Empty strings count as unset, like the rest of the env handling.
function getEnv(env: NodeJS.ProcessEnv) {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(getEnv(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;

  const receiver: AppConfig['receiver'] =
    e.RECEIVER === 'ws-pull' && e.WS_PULL_URL
      ? { kind: 'ws-pull', url: e.WS_PULL_URL, maxBackoffMs: e.WS_PULL_MAX_BACKOFF_MS }
      : { kind: 'hds', port: e.HDS_PORT, protocol: e.HDS_PROTOCOL };

  return Object.freeze({
    receiver: Object.freeze(receiver),
    httpExporter: Object.freeze({
      enabled: e.HTTP_EXPORTER_ENABLED,
      port: e.HTTP_EXPORTER_PORT,
      corsOrigin: e.CORS_ORIGIN
    }),
    osc: Object.freeze({
      enabled: e.OSC_ENABLED,
      host: e.OSC_IP,
      port: e.OSC_PORT,
      address: e.OSC_ADDR,
      activeAddress: e.OSC_ACTIVE_ADDR,
      activeDebounceMs: e.OSC_ACTIVE_DEBOUNCE_MS
    }),
    prometheus: Object.freeze({
      enabled: e.PROMETHEUS_ENABLED,
      port: e.PROMETHEUS_PORT,
      freshnessMs: e.METRICS_FRESHNESS_MS
    }),
    logLevel: e.LOG_LEVEL
  });
}
