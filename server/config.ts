import dotenv from 'dotenv';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DATABASE_URL: z.string().url().default('postgres://localhost:5432/scene_assets'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://localhost:3000'),
  BODY_LIMIT: z.string().default('50mb'),
  MODEL_UPLOAD_LIMIT_MB: z.coerce.number().positive().default(50),
  LOG_REQUESTS: booleanFlag.default('true'),
});

export interface AppConfig {
  env: string;
  port: number;
  databaseUrl: string;
  poolMax: number;
  corsOrigins: string[];
  bodyLimit: string;
  modelUploadLimitBytes: number;
  logRequests: boolean;
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration - ${problems}`);
  }

  const parsed = result.data;
  return {
    env: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    poolMax: parsed.DB_POOL_MAX,
    corsOrigins: parsed.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean),
    bodyLimit: parsed.BODY_LIMIT,
    modelUploadLimitBytes: Math.round(parsed.MODEL_UPLOAD_LIMIT_MB * 1024 * 1024),
    logRequests: parsed.LOG_REQUESTS,
  };
}

// Load environment variables from .env, then validate them
export function loadConfig(): AppConfig {
  dotenv.config();
  return parseConfig(process.env);
}
