/**
 * Quota header extraction.
 * The limiter never names a header; it asks an extractor built here
 * from configured header names.
 */

import type { QuotaExtractor, QuotaReport } from './types.js';

/** Header names carrying the quota window. */
export interface QuotaHeaderNames {
  remaining: string;
  /** Seconds until the window resets. */
  reset: string;
  limit: string;
  /** Seconds (or an HTTP date) to wait after a throttled response. */
  retryAfter: string;
}

export const DEFAULT_QUOTA_HEADERS: QuotaHeaderNames = {
  remaining: 'RateLimit-Remaining',
  reset: 'RateLimit-Reset',
  limit: 'RateLimit-Limit',
  retryAfter: 'Retry-After',
};

/** Parse a non-negative integer header value. */
export function parseCount(value: string | null): number | undefined {
  if (value === null) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  return parseInt(trimmed, 10);
}

/**
 * Parse a delay header into milliseconds.
 * Accepts delta-seconds ("30", "1.5") or an HTTP date.
 *
 * @param now - Wall-clock time used to resolve HTTP dates.
 */
export function parseDelayMs(value: string | null, now: number = Date.now()): number | undefined {
  if (value === null) return undefined;
  const trimmed = value.trim();
  if (trimmed === '') return undefined;

  if (/^\d+(?:\.\d+)?$/.test(trimmed)) {
    return Math.round(parseFloat(trimmed) * 1000);
  }

  const date = Date.parse(trimmed);
  if (isNaN(date)) return undefined;
  return Math.max(0, date - now);
}

/**
 * Build an extractor reading the given headers.
 * Missing or unparseable values are left out of the report; the limiter
 * decides what an incomplete report means.
 */
export function createHeaderQuotaExtractor(
  names: QuotaHeaderNames = DEFAULT_QUOTA_HEADERS,
): QuotaExtractor {
  return ({ headers }) => {
    const report: QuotaReport = {};

    const remaining = parseCount(headers.get(names.remaining));
    if (remaining !== undefined) report.remaining = remaining;

    const reset = parseDelayMs(headers.get(names.reset));
    if (reset !== undefined) report.resetAfterMs = reset;

    const limit = parseCount(headers.get(names.limit));
    if (limit !== undefined) report.limit = limit;

    const retryAfter = parseDelayMs(headers.get(names.retryAfter));
    if (retryAfter !== undefined) report.retryAfterMs = retryAfter;

    return report;
  };
}
