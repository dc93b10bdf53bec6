import { z } from 'zod';

const optionalInt = z.coerce.number().int().nonnegative().optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  GRIDFILL_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  GRIDFILL_PROGRESS_DIR: z.string().min(1).default('.gridfill/progress'),
  GRIDFILL_SCAN_MAX_WAIT_MS: optionalInt,
  GRIDFILL_SCAN_POLL_MS: optionalInt,
  GRIDFILL_SCAN_STABLE_THRESHOLD: z.coerce.number().int().positive().optional(),
  GRIDFILL_MATCH_MIN_SCORE: z.coerce.number().int().min(0).max(100).optional(),
  GRIDFILL_PAGE_CLICK_WAIT_MS: optionalInt,
});

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = envSchema.parse(process.env);
  }
  return _env;
}

/** Drop the cached env so the next getEnv() re-reads process.env. */
export function resetEnv(): void {
  _env = null;
}
