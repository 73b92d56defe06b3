/**
 * Service configuration, read from the environment (.env is loaded by server.ts).
 *
 *   PORT                    HTTP port (3001)
 *   CORS_ORIGIN             allowed origin (*)
 *   DATABASE_URL            PostgreSQL connection string; unset → local file only
 *   RECAP_CSV_PATH          local record file (data/daily_recap.csv)
 *   RECAP_ACCESS_PASSWORD   shared password for /api/recaps; unset → open
 *   RECAP_RECENT_LIMIT      rows returned by GET /api/recaps (20)
 *   REQUEST_LOGGING         morgan access log on/off (true)
 */

import { z } from 'zod';

const optionalText = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65_535).default(3001),
  CORS_ORIGIN: z.string().min(1).default('*'),
  DATABASE_URL: optionalText,
  RECAP_CSV_PATH: z.string().min(1).default('data/daily_recap.csv'),
  RECAP_ACCESS_PASSWORD: optionalText,
  RECAP_RECENT_LIMIT: z.coerce.number().int().min(1).max(1000).default(20),
  REQUEST_LOGGING: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
});

export interface RecapConfig {
  port: number;
  corsOrigin: string;
  databaseUrl?: string;
  csvPath: string;
  accessPassword?: string;
  recentLimit: number;
  requestLogging: boolean;
}

/** Throws a ZodError naming every bad variable. */
export function loadRecapConfig(env: NodeJS.ProcessEnv = process.env): RecapConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    corsOrigin: parsed.CORS_ORIGIN,
    databaseUrl: parsed.DATABASE_URL,
    csvPath: parsed.RECAP_CSV_PATH,
    accessPassword: parsed.RECAP_ACCESS_PASSWORD,
    recentLimit: parsed.RECAP_RECENT_LIMIT,
    requestLogging: parsed.REQUEST_LOGGING,
  };
}
