/**
 * Rate limiter with session affinity.
 * Once the API hands out an autologin token, requests carry it instead of
 * the password; a session pin is echoed back whenever one is cached.
 * Requests still queue on, and count against, the shared API limiter.
 */

import { logger } from '../shared/logger.js';
import { LimiterLane, type LaneOptions } from './lane.js';
import type {
  CredentialFields,
  LimiterSignal,
  ObserveContext,
  ObservedResponse,
} from './types.js';

/** Response headers carrying session artifacts. */
export interface AuthHeaderNames {
  autologin: string;
  pin: string;
}

export const DEFAULT_AUTH_HEADERS: AuthHeaderNames = {
  autologin: 'X-Autologin',
  pin: 'X-Pin',
};

export const DEFAULT_AUTH_REJECTED_STATUS = 403;

export interface Credential {
  /** Account the credentials belong to (a nation name). */
  identity: string;
  password?: string;
  autologin?: string;
  pin?: string;
}

export interface AuthRateLimiterOptions extends LaneOptions {
  credential: Credential;
  authHeaders?: AuthHeaderNames;
  /** Status code meaning the credentials were refused. */
  authRejectedStatus?: number;
}

export class AuthRateLimiter extends LimiterLane {
  public readonly identity: string;
  private readonly password: string | undefined;
  private readonly authHeaders: AuthHeaderNames;
  private readonly authRejectedStatus: number;
  private cachedToken: string | undefined;
  private cachedPin: string | undefined;

  constructor(options: AuthRateLimiterOptions) {
    super(options);
    this.identity = options.credential.identity;
    this.password = options.credential.password;
    this.cachedToken = options.credential.autologin || undefined;
    this.cachedPin = options.credential.pin || undefined;
    this.authHeaders = options.authHeaders ?? DEFAULT_AUTH_HEADERS;
    this.authRejectedStatus = options.authRejectedStatus ?? DEFAULT_AUTH_REJECTED_STATUS;
  }

  /** Autologin when cached, the password otherwise, plus the pin if any. */
  override prepareRequest(): CredentialFields {
    const fields: CredentialFields = {};
    if (this.cachedToken) {
      fields.autologin = this.cachedToken;
    } else if (this.password) {
      fields.password = this.password;
    }
    if (this.cachedPin) {
      fields.pin = this.cachedPin;
    }
    return fields;
  }

  /**
   * Shared quota handling, then session bookkeeping: an auth rejection of a
   * credentialed request drops cached artifacts, any other response may
   * refresh them. A rejection status on a request sent without credentials
   * leaves the session alone.
   */
  override observe(response: ObservedResponse, context: ObserveContext = {}): LimiterSignal[] {
    const signals = super.observe(response, context);

    if (response.status === this.authRejectedStatus) {
      if (context.credentialed === false) return signals;

      this.invalidate();
      const signal: LimiterSignal = { type: 'auth-rejected', identity: this.identity };
      signals.push(signal);
      this.limiter.emit(signal);

      logger.warn(
        { identity: this.identity, status: response.status },
        `Credentials for ${this.identity} rejected`,
      );
      return signals;
    }

    const token = response.headers.get(this.authHeaders.autologin);
    if (token) {
      if (token !== this.cachedToken) {
        logger.debug({ identity: this.identity }, `Cached autologin for ${this.identity}`);
      }
      this.cachedToken = token;
    }

    const pin = response.headers.get(this.authHeaders.pin);
    if (pin) {
      this.cachedPin = pin;
    }

    return signals;
  }

  /** Forget the autologin token and pin; the next request sends the password. */
  invalidate(): void {
    if (this.cachedToken === undefined && this.cachedPin === undefined) return;
    this.cachedToken = undefined;
    this.cachedPin = undefined;
    logger.debug({ identity: this.identity }, `Session for ${this.identity} invalidated`);
  }

  /** Whether a session artifact is cached. */
  get hasSession(): boolean {
    return this.cachedToken !== undefined;
  }
}
