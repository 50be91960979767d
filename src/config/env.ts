import { z } from 'zod';

const envSchema = z.object({
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  PORT: z.coerce.number().int().positive().default(3000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().default('info'),
  // Stand-in for a session: requests without X-User-Id act as this user
  DEFAULT_USER_ID: z.string().min(1).default('demo-user'),
  STORE_COMMAND_TIMEOUT_MS: z.coerce.number().int().positive().default(2_000),
  RECONCILE_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  PENDING_ORDER_GRACE_MS: z.coerce.number().int().positive().default(5 * 60_000),
  RECONCILE_LOOKBACK_MS: z.coerce.number().int().positive().default(7 * 24 * 60 * 60_000),
  RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    console.error(JSON.stringify({ level: 'error', message: 'Invalid env', errors: parsed.error.flatten().fieldErrors }));
    throw new Error('Invalid environment configuration');
  }
  return parsed.data;
}

export const env = loadEnv();
