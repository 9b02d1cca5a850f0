/**
 * Builds a client and its limiters from validated configuration.
 * One limiter owns the API quota; credentialed and telegram lanes all queue
 * on it.
 */

import { logger } from '../shared/logger.js';
import { ConfigError } from '../shared/errors.js';
import { loadConfig, resolveConfigPath } from '../config/loader.js';
import type { Config } from '../config/types.js';
import { RateLimiter } from '../ratelimit/limiter.js';
import { AuthRateLimiter } from '../ratelimit/auth-limiter.js';
import { TelegramRateLimiter } from '../ratelimit/telegram-limiter.js';
import { createHeaderQuotaExtractor } from '../ratelimit/quota.js';
import type { SignalListener } from '../ratelimit/types.js';
import { ApiClient, type FetchFn } from './api-client.js';

export interface ConfiguredClient {
  client: ApiClient;
  /** Owns the API quota. Plain requests use it directly. */
  limiter: RateLimiter;
  telegram: { standard: TelegramRateLimiter; recruitment: TelegramRateLimiter };
  /** One limiter per configured nation, keyed by normalized nation name. */
  auth: Map<string, AuthRateLimiter>;
  /** Limiter holding `nation`'s credentials. */
  authorityFor(nation: string): AuthRateLimiter;
  /** Reject everything still queued, on every lane. */
  destroy(): void;
}

export interface FactoryOverrides {
  fetch?: FetchFn;
  clock?: () => number;
  onSignal?: SignalListener;
}

/** Nation names are case-insensitive and treat spaces as underscores. */
export function normalizeNation(nation: string): string {
  return nation.trim().toLowerCase().replace(/ /g, '_');
}

export function createClientFromConfig(config: Config, overrides: FactoryOverrides = {}): ConfiguredClient {
  logger.level = config.settings.logLevel;

  const limiter = new RateLimiter({
    extractor: createHeaderQuotaExtractor(config.quota.headers),
    fallbackDelayMs: config.settings.fallbackDelayMs,
    throttleStatus: config.quota.throttleStatus,
    clock: overrides.clock,
    onSignal: overrides.onSignal,
  });
  const telegram = {
    standard: new TelegramRateLimiter({ limiter, recruitment: false, floors: config.telegram }),
    recruitment: new TelegramRateLimiter({ limiter, recruitment: true, floors: config.telegram }),
  };

  const auth = new Map<string, AuthRateLimiter>();
  for (const credential of config.auth.credentials) {
    const identity = normalizeNation(credential.nation);
    auth.set(
      identity,
      new AuthRateLimiter({
        limiter,
        credential: {
          identity,
          password: credential.password,
          autologin: credential.autologin,
          pin: credential.pin,
        },
        authHeaders: config.auth.headers,
        authRejectedStatus: config.auth.rejectedStatus,
      }),
    );
  }

  const client = new ApiClient({
    userAgent: config.settings.userAgent,
    apiUrl: config.settings.apiUrl,
    limiter,
    telegram,
    fetch: overrides.fetch,
    throttleRetries: config.settings.throttleRetries,
    serverErrorRetries: config.settings.serverErrorRetries,
    retryStatuses: config.settings.retryStatuses,
    requestTimeoutMs: config.settings.requestTimeoutMs,
    throttleStatus: config.quota.throttleStatus,
    retryAfterHeader: config.quota.headers.retryAfter,
  });

  logger.debug({ credentials: auth.size }, 'Client and limiters created');

  return {
    client,
    limiter,
    telegram,
    auth,
    authorityFor(nation) {
      const found = auth.get(normalizeNation(nation));
      if (!found) {
        throw new ConfigError(`No credentials configured for nation "${nation}"`);
      }
      return found;
    },
    destroy() {
      limiter.destroy();
    },
  };
}

/** Load the config file (see `resolveConfigPath`) and build a client from it. */
export function loadClient(path?: string, overrides?: FactoryOverrides): ConfiguredClient {
  return createClientFromConfig(loadConfig(resolveConfigPath(path)), overrides);
}
