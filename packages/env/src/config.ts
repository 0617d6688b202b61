import { LOG_LEVELS } from '@txledger/logger';
import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  TXLEDGER_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  TXLEDGER_LOG_FILE: z.string().trim().min(1).optional(),
  TXLEDGER_LOG_COLOR: z
    .enum(['true', 'false'])
    .default('false')
    .transform((val) => val === 'true'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validate a set of environment variables without touching the cache.
 * @throws Error listing every invalid variable
 */
export function loadEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates `process.env` on first access and caches the result.
 */
export function getEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = loadEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Forget the cached environment so the next getEnv() re-reads process.env.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}
