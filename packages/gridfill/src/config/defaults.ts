/**
 * Engine configuration: defaults for every tunable, overridable from the
 * environment and per call. Timings are milliseconds throughout.
 */

import { z } from 'zod';
import { getEnv, type Env } from './env';
import { ConfigurationError } from '../errors';

// ── Schemas ──────────────────────────────────────────────────────────

const ScannerConfigSchema = z.object({
  maxWaitMs: z.number().int().nonnegative(),
  pollIntervalMs: z.number().int().nonnegative(),
  stableThreshold: z.number().int().positive(),
  loadingGraceMs: z.number().int().nonnegative(),
  maxFrameDepth: z.number().int().nonnegative(),
  minFrameSize: z.number().nonnegative(),
  businessFrameKeywords: z.array(z.string().min(1)),
  businessFramePolls: z.number().int().positive(),
  businessFramePollMs: z.number().int().nonnegative(),
  genericFramePolls: z.number().int().positive(),
  genericFramePollMs: z.number().int().nonnegative(),
});

const MatcherConfigSchema = z.object({
  minScore: z.number().int().min(0).max(100),
  highConfidence: z.number().int().min(0).max(100),
});

const FillerConfigSchema = z.object({
  elementTimeoutMs: z.number().int().nonnegative(),
  healingMaxCandidates: z.number().int().positive(),
  settleDelayMs: z.number().int().nonnegative(),
});

const PaginationConfigSchema = z.object({
  clickSettleMs: z.number().int().nonnegative(),
  changeTimeoutMs: z.number().int().nonnegative(),
  changePollMs: z.number().int().nonnegative(),
  maxRetries: z.number().int().positive(),
  readyTimeoutMs: z.number().int().nonnegative(),
  readyPollMs: z.number().int().nonnegative(),
});

const PersistenceConfigSchema = z.object({
  dir: z.string().min(1),
});

export const EngineConfigSchema = z.object({
  scanner: ScannerConfigSchema,
  matcher: MatcherConfigSchema,
  filler: FillerConfigSchema,
  pagination: PaginationConfigSchema,
  persistence: PersistenceConfigSchema,
});

export type ScannerConfig = z.infer<typeof ScannerConfigSchema>;
export type MatcherConfig = z.infer<typeof MatcherConfigSchema>;
export type FillerConfig = z.infer<typeof FillerConfigSchema>;
export type PaginationConfig = z.infer<typeof PaginationConfigSchema>;
export type PersistenceConfig = z.infer<typeof PersistenceConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: Partial<EngineConfig[K]>;
};

// ── Defaults ─────────────────────────────────────────────────────────

export const DEFAULT_SCANNER_CONFIG: ScannerConfig = {
  maxWaitMs: 15_000,
  pollIntervalMs: 800,
  stableThreshold: 3,
  loadingGraceMs: 5_000,
  maxFrameDepth: 3,
  minFrameSize: 50,
  businessFrameKeywords: ['trade', 'record', 'invoice', 'form', 'entry', 'business'],
  businessFramePolls: 5,
  businessFramePollMs: 1_000,
  genericFramePolls: 1,
  genericFramePollMs: 200,
};

export const DEFAULT_MATCHER_CONFIG: MatcherConfig = {
  minScore: 60,
  highConfidence: 90,
};

export const DEFAULT_FILLER_CONFIG: FillerConfig = {
  elementTimeoutMs: 300,
  healingMaxCandidates: 5,
  settleDelayMs: 0,
};

export const DEFAULT_PAGINATION_CONFIG: PaginationConfig = {
  clickSettleMs: 1_500,
  changeTimeoutMs: 5_000,
  changePollMs: 300,
  maxRetries: 3,
  readyTimeoutMs: 5_000,
  readyPollMs: 200,
};

// ── Loader ───────────────────────────────────────────────────────────

function envOverrides(env: Env): EngineConfigOverrides {
  const scanner: Partial<ScannerConfig> = {};
  const matcher: Partial<MatcherConfig> = {};
  const pagination: Partial<PaginationConfig> = {};

  if (env.GRIDFILL_SCAN_MAX_WAIT_MS !== undefined) scanner.maxWaitMs = env.GRIDFILL_SCAN_MAX_WAIT_MS;
  if (env.GRIDFILL_SCAN_POLL_MS !== undefined) scanner.pollIntervalMs = env.GRIDFILL_SCAN_POLL_MS;
  if (env.GRIDFILL_SCAN_STABLE_THRESHOLD !== undefined) {
    scanner.stableThreshold = env.GRIDFILL_SCAN_STABLE_THRESHOLD;
  }
  if (env.GRIDFILL_MATCH_MIN_SCORE !== undefined) matcher.minScore = env.GRIDFILL_MATCH_MIN_SCORE;
  if (env.GRIDFILL_PAGE_CLICK_WAIT_MS !== undefined) {
    pagination.clickSettleMs = env.GRIDFILL_PAGE_CLICK_WAIT_MS;
  }

  return { scanner, matcher, pagination, persistence: { dir: env.GRIDFILL_PROGRESS_DIR } };
}

/**
 * Build the effective configuration: defaults, then environment
 * overrides, then explicit overrides. Throws ConfigurationError when the
 * merged result fails validation.
 */
export function loadEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const fromEnv = envOverrides(getEnv());

  const merged = {
    scanner: { ...DEFAULT_SCANNER_CONFIG, ...fromEnv.scanner, ...overrides.scanner },
    matcher: { ...DEFAULT_MATCHER_CONFIG, ...fromEnv.matcher, ...overrides.matcher },
    filler: { ...DEFAULT_FILLER_CONFIG, ...overrides.filler },
    pagination: { ...DEFAULT_PAGINATION_CONFIG, ...fromEnv.pagination, ...overrides.pagination },
    persistence: { ...fromEnv.persistence, ...overrides.persistence },
  };

  const result = EngineConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(`Invalid engine configuration: ${issues.join('; ')}`);
  }
  return result.data;
}
