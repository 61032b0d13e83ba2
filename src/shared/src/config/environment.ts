import { z } from 'zod';
import { config } from 'dotenv';

config();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).optional(),

  // Dataset source: a local CSV file wins over a remote one
  DATASET_PATH: z.string().min(1).optional(),
  DATASET_URL: z.string().url().optional(),
  DATASET_TIMEOUT_MS: z.coerce.number().int().min(1000).default(30000),
  DATASET_CACHE_TTL_MS: z.coerce.number().int().min(0).default(60 * 60 * 1000),

  TOP_APPS_LIMIT: z.coerce.number().int().min(1).max(100).default(10),
  REVIEW_FILTER: z.string().optional(),
});

export type Environment = z.infer<typeof envSchema>;

export const env: Environment = envSchema.parse(process.env);
