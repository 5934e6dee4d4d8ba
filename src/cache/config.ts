// =============================================================================
// Cache Configuration — environment-driven defaults
// =============================================================================
// Values are read once at import time.  They are not validated here: the
// CacheStore constructor rejects anything unusable with a CacheConfigError,
// so a bad `CACHE_CAPACITY` fails exactly where the cache is built.
// =============================================================================
import dotenv from 'dotenv';
dotenv.config();

export interface CacheConfig {
  nodeEnv: string;
  logLevel: string;
  /** Capacity used by createCacheFromConfig() */
  capacity: number;
  /** How often the background sweeper drains expired entries */
  sweepIntervalMs: number;
  /** How long shutdown() waits for an in-flight sweep before forcing it */
  shutdownTimeoutMs: number;
}

const config: CacheConfig = {
  nodeEnv: process.env.NODE_ENV ?? 'development',
  logLevel: process.env.LOG_LEVEL ?? 'info',

  capacity: parseInt(process.env.CACHE_CAPACITY ?? '1000', 10),
  sweepIntervalMs: parseInt(process.env.CACHE_SWEEP_INTERVAL_MS ?? '30000', 10),
  shutdownTimeoutMs: parseInt(process.env.CACHE_SHUTDOWN_TIMEOUT_MS ?? '5000', 10),
};

export default config;
