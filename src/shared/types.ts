/**
 * Request/response types for the API client.
 * These define the contract between the client and its callers.
 */

import type { Grant, RequestAuthority } from '../ratelimit/types.js';

/** Options for a single API request. */
export interface RequestOptions {
  /** Limiter that paces (and possibly authenticates) this request. Defaults to the client's limiter. */
  authority?: RequestAuthority;
  method?: 'GET' | 'POST';
  /** Extra request headers. */
  headers?: Record<string, string>;
  /** Cancels the wait for admission and the request itself. */
  signal?: AbortSignal;
}

/** A completed, successful API response. */
export interface ApiResponse {
  status: number;
  headers: Headers;
  /** Response body as text (the API answers in XML). */
  body: string;
  url: string;
  /** Grant of the attempt that produced this response; absent for unpaced URLs. */
  grant?: Grant;
  /** Number of attempts, counting retries after throttling or server errors. */
  attempts: number;
}

/** Parameters of the sendtg API call. */
export interface TelegramParams {
  /** Client key issued for the sending script. */
  client: string;
  /** Telegram template id. */
  tgid: string;
  /** Secret key of the template. */
  key: string;
  /** Recipient nation. */
  to: string;
  /** Recruitment telegrams are paced on the longer floor. */
  recruitment?: boolean;
}
