/**
 * nsapi-pacer public entry point.
 * Rate limiters, the worker-thread bridge, the API client and its config.
 */

export { RateLimiter, DEFAULT_THROTTLE_STATUS, monotonicClock } from './ratelimit/limiter.js';
export { LimiterLane, type LaneOptions } from './ratelimit/lane.js';
export {
  AuthRateLimiter,
  DEFAULT_AUTH_HEADERS,
  DEFAULT_AUTH_REJECTED_STATUS,
  type AuthHeaderNames,
  type AuthRateLimiterOptions,
  type Credential,
} from './ratelimit/auth-limiter.js';
export {
  TelegramRateLimiter,
  type TelegramFloors,
  type TelegramRateLimiterOptions,
  type TelegramSnapshot,
} from './ratelimit/telegram-limiter.js';
export {
  DEFAULT_QUOTA_HEADERS,
  createHeaderQuotaExtractor,
  parseCount,
  parseDelayMs,
  type QuotaHeaderNames,
} from './ratelimit/quota.js';
export type * from './ratelimit/types.js';

export { LimiterHost, type HostedLimiter, type HostSession } from './bridge/host.js';
export {
  BlockingLimiterClient,
  connectToHost,
  portTransport,
  type BlockingClientOptions,
  type BlockingGrant,
  type BlockingTransport,
} from './bridge/blocking-client.js';

export {
  ApiClient,
  CLIENT_VERSION,
  DEFAULT_CREDENTIAL_HEADERS,
  formatUserAgent,
  type ApiClientOptions,
  type CredentialHeaderNames,
  type FetchFn,
} from './client/api-client.js';
export {
  createClientFromConfig,
  loadClient,
  normalizeNation,
  type ConfiguredClient,
  type FactoryOverrides,
} from './client/factory.js';
export * from './client/url.js';
export { findText } from './client/xml.js';
export { jitteredBackoffMs } from './client/utils.js';

export { loadConfig, resolveConfigPath, DEFAULT_CONFIG_PATH } from './config/loader.js';
export type * from './config/types.js';

export * from './shared/errors.js';
export type * from './shared/types.js';
export { logger } from './shared/logger.js';
