import { z } from 'zod';

const booleanString = z
  .enum(['true', 'false'])
  .transform((val) => val === 'true');

const integerString = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform((val) => parseInt(val, 10));

const envSchema = z.object({
  // Node Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  LOG_TO_FILE: booleanString.optional(),
  LOG_DIR: z.string().optional(),

  // Platform
  CRAWL_BASE_URL: z.string().url().optional(),
  CRAWL_COLUMN_URL: z.string().url().optional(),
  REQUEST_TIMEOUT_MS: integerString.optional(),
  CRAWL_INTERVAL_MS: integerString.optional(),
  ENABLE_SUB_COMMENTS: booleanString.optional(),

  // Signing service
  SIGN_SERVER_URL: z.string().url().optional(),

  // Account & proxy pool
  ACCOUNTS_DIR: z.string().optional(),
  PROXY_FILE: z.string().optional(),
  ENABLE_IP_PROXY: booleanString.optional(),
  PROXY_TTL_MS: integerString.optional(),
  MAX_BIND_ATTEMPTS: integerString.optional(),
  INVALIDATE_ON_FORBIDDEN: booleanString.optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  return envSchema.parse(source);
}
