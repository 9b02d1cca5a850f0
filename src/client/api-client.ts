/**
 * HTTP transport for the NationStates API.
 * Every request to the API endpoint waits on a limiter, carries whatever
 * credentials the limiter hands out, and reports its response back before
 * the caller sees it. Dumps and other hosts are fetched unpaced.
 */

import { logger } from '../shared/logger.js';
import {
  AgentNotSetError,
  AuthRejectedError,
  ConfigError,
  PrivateCommandError,
  TooManyRequestsError,
  narrowStatusError,
  type ApiStatusError,
} from '../shared/errors.js';
import type { ApiResponse, RequestOptions, TelegramParams } from '../shared/types.js';
import { DEFAULT_QUOTA_HEADERS, parseDelayMs } from '../ratelimit/quota.js';
import { DEFAULT_THROTTLE_STATUS } from '../ratelimit/limiter.js';
import type { CredentialFields, Grant, RequestAuthority } from '../ratelimit/types.js';
import { API_URL, commandUrl, isApiEndpoint, isApiHost, telegramUrl, type QueryParams } from './url.js';
import { findText } from './xml.js';
import { jitteredBackoffMs, sleep, withTimeout } from './utils.js';

export type FetchFn = (input: URL, init: RequestInit) => Promise<Response>;

/** Request headers credentials are sent in. */
export interface CredentialHeaderNames {
  password: string;
  autologin: string;
  pin: string;
}

export const DEFAULT_CREDENTIAL_HEADERS: CredentialHeaderNames = {
  password: 'X-Password',
  autologin: 'X-Autologin',
  pin: 'X-Pin',
};

export const CLIENT_VERSION = '0.1.0';

export interface ApiClientOptions {
  /** Identifies the script to the API operators. Required before any request. */
  userAgent: string;
  apiUrl?: string;
  /** Default limiter for API requests. */
  limiter: RequestAuthority;
  /** Pacers for sendtg; required by {@link ApiClient.sendTelegram}. */
  telegram?: { standard: RequestAuthority; recruitment: RequestAuthority };
  fetch?: FetchFn;
  /** Resends allowed after throttled responses. */
  throttleRetries?: number;
  /** Resends allowed after a status in `retryStatuses`. */
  serverErrorRetries?: number;
  retryStatuses?: number[];
  /** Delay before resend number `attempt` (from 0) after a server error. */
  backoff?: (attempt: number) => number;
  /** Per-attempt request timeout. */
  requestTimeoutMs?: number;
  credentialHeaders?: CredentialHeaderNames;
  /** Status that means throttling; should match the limiters'. */
  throttleStatus?: number;
  /** Header carrying the retry delay of a throttled response. */
  retryAfterHeader?: string;
}

interface Dispatched {
  response: Response;
  grant?: Grant;
  attempts: number;
  /** Set when the limiter reported the credentials as rejected. */
  rejectedIdentity?: string;
}

/** Compose the User-Agent header from the caller's contact string. */
export function formatUserAgent(agent: string): string {
  return `${agent} Node.js/${process.versions.node} nsapi-pacer/${CLIENT_VERSION}`;
}

export class ApiClient {
  public readonly apiUrl: string;
  public readonly userAgent: string;
  private readonly limiter: RequestAuthority;
  private readonly telegram?: { standard: RequestAuthority; recruitment: RequestAuthority };
  private readonly fetchFn: FetchFn;
  private readonly throttleRetries: number;
  private readonly serverErrorRetries: number;
  private readonly retryStatuses: ReadonlySet<number>;
  private readonly backoff: (attempt: number) => number;
  private readonly requestTimeoutMs?: number;
  private readonly credentialHeaders: CredentialHeaderNames;
  private readonly throttleStatus: number;
  private readonly retryAfterHeader: string;

  constructor(options: ApiClientOptions) {
    this.userAgent = options.userAgent.trim();
    this.apiUrl = options.apiUrl ?? API_URL;
    this.limiter = options.limiter;
    this.telegram = options.telegram;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.throttleRetries = options.throttleRetries ?? 5;
    this.serverErrorRetries = options.serverErrorRetries ?? 5;
    this.retryStatuses = new Set(options.retryStatuses ?? [500, 502]);
    this.backoff = options.backoff ?? ((attempt) => jitteredBackoffMs(attempt));
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.credentialHeaders = options.credentialHeaders ?? DEFAULT_CREDENTIAL_HEADERS;
    this.throttleStatus = options.throttleStatus ?? DEFAULT_THROTTLE_STATUS;
    this.retryAfterHeader = options.retryAfterHeader ?? DEFAULT_QUOTA_HEADERS.retryAfter;
  }

  /**
   * Send a request and read the whole body.
   * @throws AuthRejectedError when the authority's credentials were refused.
   * @throws ApiStatusError (narrowed) for any other non-OK final response.
   */
  async request(url: string | URL, options: RequestOptions = {}): Promise<ApiResponse> {
    const target = new URL(url);
    const { response, grant, attempts, rejectedIdentity } = await this.dispatch(target, options);
    const body = await response.text();

    if (!response.ok) {
      throw this.toError(response, target, body, rejectedIdentity);
    }

    return {
      status: response.status,
      headers: response.headers,
      body,
      url: target.toString(),
      attempts,
      ...(grant && { grant }),
    };
  }

  /**
   * Hand a successful response to `handler` without reading it first, e.g. to
   * stream a dump through gunzip. The body is cancelled afterwards unless the
   * handler consumed it, whether it returns or throws.
   */
  async withStream<T>(
    url: string | URL,
    handler: (response: Response) => Promise<T>,
    options: RequestOptions = {},
  ): Promise<T> {
    const target = new URL(url);
    const { response, rejectedIdentity } = await this.dispatch(target, options);

    if (!response.ok) {
      const body = await response.text();
      throw this.toError(response, target, body, rejectedIdentity);
    }

    try {
      return await handler(response);
    } finally {
      await discard(response);
    }
  }

  /**
   * Send a telegram through the standard or recruitment pacer.
   * @throws ConfigError when the client was built without telegram pacers.
   */
  async sendTelegram(params: TelegramParams, options: Omit<RequestOptions, 'authority'> = {}): Promise<ApiResponse> {
    if (!this.telegram) {
      throw new ConfigError('This client has no telegram limiters configured');
    }
    const authority = params.recruitment ? this.telegram.recruitment : this.telegram.standard;
    return this.request(telegramUrl(params, this.apiUrl), { ...options, authority });
  }

  /**
   * Run a private command in two steps: `mode=prepare` yields a token that
   * `mode=execute` must present.
   * @throws PrivateCommandError when the prepare step answers with an error.
   */
  async prepareAndExecute(
    authority: RequestAuthority,
    nation: string,
    command: string,
    params: QueryParams = {},
    options: Omit<RequestOptions, 'authority'> = {},
  ): Promise<ApiResponse> {
    const prepared = await this.request(commandUrl(nation, command, { ...params, mode: 'prepare' }, this.apiUrl), {
      ...options,
      authority,
    });

    const error = findText(prepared.body, 'ERROR');
    if (error !== undefined) {
      throw new PrivateCommandError(command, error);
    }
    const token = findText(prepared.body, 'SUCCESS') ?? '';

    logger.debug({ nation, command }, 'Command prepared, executing');

    return this.request(commandUrl(nation, command, { ...params, mode: 'execute', token }, this.apiUrl), {
      ...options,
      authority,
    });
  }

  /**
   * Send until a response is final: not throttled and not a retryable
   * server error, or out of retries. Bodies of superseded responses are discarded.
   */
  private async dispatch(target: URL, options: RequestOptions): Promise<Dispatched> {
    if (!this.userAgent) {
      throw new AgentNotSetError();
    }

    const paced = isApiEndpoint(target, this.apiUrl);
    const authority = options.authority ?? this.limiter;
    let throttled = 0;
    let failed = 0;

    for (let attempts = 1; ; attempts++) {
      const headers: Record<string, string> = { ...options.headers };
      if (isApiHost(target, this.apiUrl)) {
        headers['User-Agent'] = formatUserAgent(this.userAgent);
      }
      let method = options.method ?? 'GET';
      let grant: Grant | undefined;
      let credentialed = false;

      if (paced) {
        grant = await authority.acquire({ signal: options.signal });
        // Credentials only make sense on requests addressed to a nation.
        if (target.searchParams.has('nation')) {
          const credentials = this.toCredentialHeaders(authority.prepareRequest());
          if (Object.keys(credentials).length > 0) {
            Object.assign(headers, credentials);
            method = 'POST';
            credentialed = true;
          }
        }
      }

      logger.debug({ url: target.toString(), method, attempt: attempts, paced }, 'Sending API request');

      const start = performance.now();
      const response = await this.fetchFn(target, {
        method,
        headers,
        signal: withTimeout(options.signal, this.requestTimeoutMs),
      });
      const latencyMs = Math.round(performance.now() - start);

      if (!paced) {
        return { response, attempts };
      }

      const signals = authority.observe(response, { credentialed });
      const rejected = signals.find((signal) => signal.type === 'auth-rejected');
      if (rejected?.type === 'auth-rejected') {
        return { response, grant, attempts, rejectedIdentity: rejected.identity };
      }

      if (signals.some((signal) => signal.type === 'throttled') && throttled < this.throttleRetries) {
        throttled++;
        logger.warn(
          { url: target.toString(), latencyMs, retry: throttled, of: this.throttleRetries },
          'API returned throttled response, requeueing',
        );
        await discard(response);
        continue;
      }

      if (this.retryStatuses.has(response.status) && failed < this.serverErrorRetries) {
        const delayMs = this.backoff(failed);
        failed++;
        logger.warn(
          { url: target.toString(), status: response.status, latencyMs, delayMs, retry: failed, of: this.serverErrorRetries },
          'API returned server error, retrying after backoff',
        );
        await discard(response);
        await sleep(delayMs, options.signal);
        continue;
      }

      logger.debug({ url: target.toString(), status: response.status, latencyMs }, 'API request completed');
      return { response, grant, attempts };
    }
  }

  private toCredentialHeaders(fields: CredentialFields): Record<string, string> {
    const headers: Record<string, string> = {};
    if (fields.password) headers[this.credentialHeaders.password] = fields.password;
    if (fields.autologin) headers[this.credentialHeaders.autologin] = fields.autologin;
    if (fields.pin) headers[this.credentialHeaders.pin] = fields.pin;
    return headers;
  }

  private toError(response: Response, target: URL, body: string, rejectedIdentity?: string): ApiStatusError {
    const url = target.toString();
    if (rejectedIdentity !== undefined) {
      return new AuthRejectedError(rejectedIdentity, url, body);
    }
    if (response.status === this.throttleStatus) {
      const retryAfterMs = parseDelayMs(response.headers.get(this.retryAfterHeader));
      return new TooManyRequestsError(url, body, retryAfterMs, response.status);
    }

    logger.error({ url, status: response.status }, 'API returned error');
    return narrowStatusError(response.status, url, body);
  }
}

/** Cancel a body nobody is going to read. */
async function discard(response: Response): Promise<void> {
  if (response.body && !response.body.locked && !response.bodyUsed) {
    await response.body.cancel();
  }
}
