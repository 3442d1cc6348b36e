import { z } from 'zod';

export const HEALTH_KEYS = ['heartRate', 'stepCount', 'distanceTraveled', 'speed', 'calories'] as const;

export type HealthKey = (typeof HEALTH_KEYS)[number];

/** Sentinel key used when a whole snapshot is pushed at once. */
export const ALL_KEYS = 'all';

export type UpdatedKey = HealthKey | typeof ALL_KEYS;

export const INTEGER_KEYS: ReadonlySet<HealthKey> = new Set(['heartRate', 'stepCount', 'calories']);

export type HealthData = {
  /** Last write to any field; null until the first update. */
  time: Date | null;
  heartRate: number;
  stepCount: number;
  distanceTraveled: number;
  speed: number;
  calories: number;
};

export function isHealthKey(key: string): key is HealthKey {
  return (HEALTH_KEYS as readonly string[]).includes(key);
}

export function emptyHealthData(): HealthData {
  return { time: null, heartRate: 0, stepCount: 0, distanceTraveled: 0, speed: 0, calories: 0 };
}

// Some peers send 0001-01-01T00:00:00Z for a record that was never written.
const isZeroTime = (d: Date) => d.getUTCFullYear() <= 1;

const TimeSchema = z
  .union([z.string(), z.null()])
  .optional()
  .transform((v, ctx) => {
    if (v == null) return null;
    const d = new Date(v);
    if (Number.isNaN(d.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.invalid_date, message: `invalid time "${v}"` });
      return z.NEVER;
    }
    return isZeroTime(d) ? null : d;
  });

export const HealthDataSchema = z.object({
  time: TimeSchema,
  heartRate: z.number().int().default(0),
  stepCount: z.number().int().default(0),
  distanceTraveled: z.number().default(0),
  speed: z.number().default(0),
  calories: z.number().int().default(0)
});

export const UpdateMessageSchema = z.object({
  data: HealthDataSchema,
  updatedKey: z.string()
});

/** Frame exchanged over the live stream, in both directions. */
export type UpdateMessage = {
  data: HealthData;
  updatedKey: string;
};

export const HdsRequestSchema = z.object({
  data: z.string()
});

export function isUpdatedKey(key: string): key is UpdatedKey {
  return key === ALL_KEYS || isHealthKey(key);
}

/** Throws on malformed JSON or a frame that does not match the schema. */
export function parseUpdateMessage(text: string): UpdateMessage {
  return UpdateMessageSchema.parse(JSON.parse(text));
}
