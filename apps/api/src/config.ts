import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  API_PORT: z.coerce.number().int().positive().default(4000),
  APP_URL: z.string().url().default('http://localhost:3000'),
  SUPABASE_URL: z.string().url().default('http://localhost:54321'),
  SUPABASE_SERVICE_ROLE_KEY: z.string().min(1).default('local-service-role-key'),
  CALENDAR_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(300),
  CALENDAR_CACHE_PRUNE_SECONDS: z.coerce.number().int().positive().default(300),
  RATE_LIMIT_TTL_SECONDS: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120)
});

const env = envSchema.parse(process.env);

export const config = {
  nodeEnv: env.NODE_ENV,
  isProd: env.NODE_ENV === 'production',
  port: env.API_PORT,
  appUrl: env.APP_URL,
  supabase: {
    url: env.SUPABASE_URL,
    serviceRoleKey: env.SUPABASE_SERVICE_ROLE_KEY
  },
  calendar: {
    cacheTtlMs: env.CALENDAR_CACHE_TTL_SECONDS * 1000,
    cachePruneIntervalMs: env.CALENDAR_CACHE_PRUNE_SECONDS * 1000
  },
  limits: {
    rateLimitTtlSeconds: env.RATE_LIMIT_TTL_SECONDS,
    rateLimitPerMinute: env.RATE_LIMIT_PER_MINUTE
  }
} as const;

export type GigboardConfig = typeof config;
