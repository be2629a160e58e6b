import { z } from 'zod';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  OVERLAP_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  COORDINATE_SCALE: z.coerce.number().positive().default(1.0),
  REVIEW_SAMPLE_SIZE: z.coerce.number().int().positive().default(100),
  REVIEW_SEED: z.coerce.number().int().default(42),
  UPLOAD_LIMIT_MB: z.coerce.number().positive().default(10),
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://localhost:3000'),
});

export interface AppConfig {
  nodeEnv: string;
  port: number;
  logLevel: LogLevel;
  overlapThreshold: number;
  coordinateScale: number;
  reviewSampleSize: number;
  reviewSeed: number;
  uploadLimitBytes: number;
  corsOrigins: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    overlapThreshold: e.OVERLAP_THRESHOLD,
    coordinateScale: e.COORDINATE_SCALE,
    reviewSampleSize: e.REVIEW_SAMPLE_SIZE,
    reviewSeed: e.REVIEW_SEED,
    uploadLimitBytes: Math.round(e.UPLOAD_LIMIT_MB * 1024 * 1024),
    corsOrigins: e.CORS_ORIGINS.split(',').map(o => o.trim()).filter(Boolean),
  };
}

export const config = loadConfig();
