import { z } from 'zod';

const optionalString = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().min(1).optional()
);

const EnvSchema = z.object({
  DATABASE_URL: optionalString,
  PROGRESSION_UTC_OFFSET_MINUTES: z.coerce.number().int().min(-14 * 60).max(14 * 60).default(0),
  DB_MIGRATE_RETRIES: z.coerce.number().int().positive().default(10),
  DB_MIGRATE_RETRY_DELAY_MS: z.coerce.number().int().positive().default(5_000),
});

export interface ProgressionConfig {
  databaseUrl: string | null;
  utcOffsetMinutes: number;
  migrateRetries: number;
  migrateRetryDelayMs: number;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: Record<string, string[] | undefined>
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ProgressionConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.flatten().fieldErrors;
    throw new ConfigError(`invalid environment: ${Object.keys(issues).join(', ')}`, issues);
  }
  return {
    databaseUrl: parsed.data.DATABASE_URL ?? null,
    utcOffsetMinutes: parsed.data.PROGRESSION_UTC_OFFSET_MINUTES,
    migrateRetries: parsed.data.DB_MIGRATE_RETRIES,
    migrateRetryDelayMs: parsed.data.DB_MIGRATE_RETRY_DELAY_MS,
  };
}
