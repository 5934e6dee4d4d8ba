// =============================================================================
// Package Entry — public API of the cache library
// =============================================================================
export { CacheStore, createCacheFromConfig } from './services/cacheStore';
export { BackgroundSweeper } from './services/backgroundSweeper';
export type { BackgroundSweeperOptions } from './services/backgroundSweeper';
export { CacheConfigError } from './utils/CacheConfigError';
export type { Cache, CacheStats, CacheStoreOptions, Clock, SweepTask } from './types';
export { default as config } from './config';
export type { CacheConfig } from './config';
