export { getEnv, resetEnv, type Env } from './env';
export {
  loadEngineConfig,
  EngineConfigSchema,
  DEFAULT_SCANNER_CONFIG,
  DEFAULT_MATCHER_CONFIG,
  DEFAULT_FILLER_CONFIG,
  DEFAULT_PAGINATION_CONFIG,
} from './defaults';
export type {
  EngineConfig,
  EngineConfigOverrides,
  ScannerConfig,
  MatcherConfig,
  FillerConfig,
  PaginationConfig,
  PersistenceConfig,
} from './defaults';
