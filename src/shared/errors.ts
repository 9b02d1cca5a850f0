/**
 * Custom error classes for the API client and its limiters.
 * Throttling is never raised from the limiter itself; these errors surface
 * only what a caller has to act on.
 */

/** Error thrown when config validation or loading fails. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/** Thrown when a request to the API is attempted without a User-Agent. */
export class AgentNotSetError extends Error {
  constructor(message = 'No User-Agent configured; the API rejects anonymous clients') {
    super(message);
    this.name = 'AgentNotSetError';
  }
}

/** Why a pending acquire stopped waiting. */
export type CancelReason = 'aborted' | 'timeout' | 'withdrawn' | 'destroyed';

/**
 * A pending acquire was cancelled before it was granted.
 * Limiter state is left exactly as it was before the acquire began.
 */
export class AcquireCancelledError extends Error {
  public readonly reason: CancelReason;

  constructor(reason: CancelReason) {
    super(`Acquire cancelled (${reason})`);
    this.name = 'AcquireCancelledError';
    this.reason = reason;
  }
}

/** Non-OK HTTP status returned by the API. */
export class ApiStatusError extends Error {
  public readonly statusCode: number;
  public readonly url: string;
  public readonly responseBody: string;

  constructor(statusCode: number, url: string, responseBody: string = '') {
    super(`API returned ${statusCode} for ${url}`);
    this.name = 'ApiStatusError';
    this.statusCode = statusCode;
    this.url = url;
    this.responseBody = responseBody;
  }
}

/** 4XX: Client Error. */
export class ClientError extends ApiStatusError {
  constructor(statusCode: number, url: string, responseBody?: string) {
    super(statusCode, url, responseBody);
    this.name = 'ClientError';
  }
}

/** 400: Bad Request. */
export class BadRequestError extends ClientError {
  constructor(url: string, responseBody?: string) {
    super(400, url, responseBody);
    this.name = 'BadRequestError';
  }
}

/** 403: Forbidden. */
export class ForbiddenError extends ClientError {
  constructor(url: string, responseBody?: string) {
    super(403, url, responseBody);
    this.name = 'ForbiddenError';
  }
}

/** 404: Not Found. */
export class NotFoundError extends ClientError {
  constructor(url: string, responseBody?: string) {
    super(404, url, responseBody);
    this.name = 'NotFoundError';
  }
}

/** 409: Conflict. */
export class ConflictError extends ClientError {
  constructor(url: string, responseBody?: string) {
    super(409, url, responseBody);
    this.name = 'ConflictError';
  }
}

/** 418: I'm a Teapot. */
export class TeapotError extends ClientError {
  constructor(url: string, responseBody?: string) {
    super(418, url, responseBody);
    this.name = 'TeapotError';
  }
}

/** 429, or the configured throttle status: throttled, and the retry budget ran out. */
export class TooManyRequestsError extends ClientError {
  public readonly retryAfterMs?: number;

  constructor(url: string, responseBody?: string, retryAfterMs?: number, statusCode = 429) {
    super(statusCode, url, responseBody);
    this.name = 'TooManyRequestsError';
    this.retryAfterMs = retryAfterMs;
  }
}

/** 5XX: Server Error. */
export class ServerError extends ApiStatusError {
  constructor(statusCode: number, url: string, responseBody?: string) {
    super(statusCode, url, responseBody);
    this.name = 'ServerError';
  }
}

/**
 * Credentials were rejected. The limiter that issued them has already
 * dropped its cached autologin and pin, so a retry falls back to the password.
 */
export class AuthRejectedError extends ForbiddenError {
  public readonly identity: string;

  constructor(identity: string, url: string, responseBody?: string) {
    super(url, responseBody);
    this.name = 'AuthRejectedError';
    this.identity = identity;
    this.message = `Credentials for ${identity} rejected by ${url}`;
  }
}

/** A private command's prepare step answered with <ERROR>. */
export class PrivateCommandError extends Error {
  public readonly command: string;

  constructor(command: string, message: string) {
    super(`Command "${command}" failed: ${message}`);
    this.name = 'PrivateCommandError';
    this.command = command;
  }
}

/** Pick the most specific status error class for a response. */
export function narrowStatusError(
  statusCode: number,
  url: string,
  responseBody?: string,
): ApiStatusError {
  switch (statusCode) {
    case 400:
      return new BadRequestError(url, responseBody);
    case 403:
      return new ForbiddenError(url, responseBody);
    case 404:
      return new NotFoundError(url, responseBody);
    case 409:
      return new ConflictError(url, responseBody);
    case 418:
      return new TeapotError(url, responseBody);
    case 429:
      return new TooManyRequestsError(url, responseBody);
  }
  if (statusCode >= 400 && statusCode < 500) {
    return new ClientError(statusCode, url, responseBody);
  }
  if (statusCode >= 500 && statusCode < 600) {
    return new ServerError(statusCode, url, responseBody);
  }
  return new ApiStatusError(statusCode, url, responseBody);
}
