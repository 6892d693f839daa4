import { z } from 'zod';

/**
 * Environment schema. Values arrive as strings from process.env / .env files,
 * so numeric settings are coerced.
 */
export const EnvSchema = z.object({
  DEVICE_HOST: z.string().trim().min(1, 'DEVICE_HOST is required'),
  DEVICE_USERNAME: z.string().trim().min(1).default('admin'),
  DEVICE_PASSWORD: z.string().optional(),
  DEVICE_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DEVICE_RETRY_MAX: z.coerce.number().int().min(0).max(10).default(3),
  DEVICE_RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  DEVICE_RETRY_JITTER: z.coerce.number().min(0).max(1).default(0),
  DEVICE_CACHE_TTL_MS: z.coerce.number().int().positive().default(600_000),
  PORT: z.coerce.number().int().positive().default(3000),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Validation hook for ConfigModule.forRoot().
 * Throws on startup with every offending variable listed.
 */
export function validateEnv(config: Record<string, unknown>): Env {
  const result = EnvSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return result.data;
}
