/**
 * config.ts - Environment configuration.
 * Reads .env through dotenv and validates the result with zod at start-up.
 */

import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  MONGO_URI: z.string().trim().min(1).optional(),
  FRONTEND_URL: z.string().trim().min(1).optional(),
  FRESHNESS_INTERVAL_MS: z.coerce.number().int().positive().default(1000),
}).refine((env) => env.STORE_DRIVER !== 'mongo' || env.MONGO_URI !== undefined, {
  message: 'Set MONGO_URI in your .env file (or STORE_DRIVER=memory)',
  path: ['MONGO_URI'],
});

export type AppConfig = {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  storeDriver: 'mongo' | 'memory';
  mongoUri: string | null;
  allowedOrigins: string[];
  freshnessIntervalMs: number;
};

const DEFAULT_ORIGINS = [
  'http://localhost:5173',
  'http://localhost:5174',
  'http://localhost:3000',
];

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${issues.join('; ')}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    storeDriver: values.STORE_DRIVER,
    mongoUri: values.MONGO_URI ?? null,
    allowedOrigins: values.FRONTEND_URL ? [...DEFAULT_ORIGINS, values.FRONTEND_URL] : [...DEFAULT_ORIGINS],
    freshnessIntervalMs: values.FRESHNESS_INTERVAL_MS,
  };
}
