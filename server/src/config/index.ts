export { validateConfig, MIN_INTERVAL_MS, MAX_ATTEMPTS_LIMIT } from './ConfigValidator';
export type { ValidatorRegistries } from './ConfigValidator';
export { hashContent, loadConfigFile, parseConfig, readConfigSource } from './ConfigLoader';
export { diffConfig, isEmptyDiff, stableStringify } from './ConfigDiffer';
export type { ConfigDiff, ServiceUpdate } from './ConfigDiffer';
export { HotReloader, ReloadEventType } from './HotReloader';
export type { HotReloaderOptions, ReloadResult, ReloadStatus } from './HotReloader';
export { ConfigWatcher, DEFAULT_POLL_INTERVAL_MS } from './ConfigWatcher';
export type { ConfigWatcherOptions } from './ConfigWatcher';
export { loadEnvConfig, parseNonNegativeInt, DEFAULT_CONFIG_PATH, DEFAULT_PORT, DEFAULT_RETENTION_DAYS } from './env';
export type { EnvConfig } from './env';
export * from './types';
