import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_EVENTS: z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true'),
  DEFAULT_PAGE_SIZE: z.coerce.number().int().positive().default(10),
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  /** Subscribe console logging to every domain event. */
  logEvents: boolean;
  /** Limit used by list operations when the caller gives none. */
  defaultPageSize: number;
}

/**
 * Read configuration from the environment (after `.env` has been loaded).
 * Throws a ZodError when a variable is set to something unusable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    nodeEnv: parsed.NODE_ENV,
    logEvents: parsed.LOG_EVENTS,
    defaultPageSize: parsed.DEFAULT_PAGE_SIZE,
  };
}
