import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { ApiClient, formatUserAgent, type ApiClientOptions, type FetchFn } from '../api-client.js';
import { API_URL, nationUrl, nationsDumpUrl, worldUrl } from '../url.js';
import { RateLimiter } from '../../ratelimit/limiter.js';
import { AuthRateLimiter } from '../../ratelimit/auth-limiter.js';
import { TelegramRateLimiter } from '../../ratelimit/telegram-limiter.js';
import { DEFAULT_QUOTA_HEADERS, createHeaderQuotaExtractor } from '../../ratelimit/quota.js';
import {
  AgentNotSetError,
  AuthRejectedError,
  ConfigError,
  ForbiddenError,
  NotFoundError,
  PrivateCommandError,
  ServerError,
  TooManyRequestsError,
} from '../../shared/errors.js';

// --- Test Helpers ---

const base = {
  extractor: createHeaderQuotaExtractor(),
  fallbackDelayMs: 1000,
  clock: () => Date.now(),
};

function apiResponse(body: string, status = 200, extra: Record<string, string> = {}): Response {
  return new Response(body, {
    status,
    headers: { 'RateLimit-Remaining': '40', 'RateLimit-Reset': '30', ...extra },
  });
}

function sentHeaders(fetchMock: Mock<FetchFn>, call = 0): Record<string, string> {
  const init = fetchMock.mock.calls[call]?.[1];
  return Object.fromEntries(new Headers(init?.headers).entries());
}

describe('ApiClient', () => {
  let limiter: RateLimiter;
  let fetchMock: Mock<FetchFn>;

  function makeClient(overrides: Partial<ApiClientOptions> = {}): ApiClient {
    return new ApiClient({ userAgent: 'Testlandia', limiter, fetch: fetchMock, ...overrides });
  }

  beforeEach(() => {
    limiter = new RateLimiter(base);
    fetchMock = vi.fn<FetchFn>();
  });

  afterEach(() => {
    limiter.destroy();
    vi.useRealTimers();
  });

  describe('request', () => {
    it('returns the body and reports the response to the limiter', async () => {
      fetchMock.mockResolvedValueOnce(apiResponse('<NATION id="testlandia"/>'));
      const client = makeClient();

      const result = await client.request(nationUrl('testlandia'));

      expect(result.status).toBe(200);
      expect(result.body).toBe('<NATION id="testlandia"/>');
      expect(result.attempts).toBe(1);
      expect(result.grant?.sequence).toBe(1);
      expect(limiter.snapshot().quota?.remaining).toBe(40);
    });

    it('identifies itself with a User-Agent and sends GET', async () => {
      fetchMock.mockResolvedValueOnce(apiResponse('<WORLD/>'));
      const client = makeClient();

      await client.request(worldUrl(['numnations']));

      const [input, init] = fetchMock.mock.calls[0] ?? [];
      expect(input?.toString()).toBe(`${API_URL}?q=numnations`);
      expect(init?.method).toBe('GET');
      expect(sentHeaders(fetchMock)).toEqual({ 'user-agent': formatUserAgent('Testlandia') });
    });

    it('refuses to send without a User-Agent', async () => {
      const client = makeClient({ userAgent: '   ' });

      await expect(client.request(nationUrl('testlandia'))).rejects.toBeInstanceOf(AgentNotSetError);
      expect(fetchMock).not.toHaveBeenCalled();
      expect(limiter.snapshot().granted).toBe(0);
    });

    it('throws narrowed errors for failed requests', async () => {
      fetchMock.mockResolvedValueOnce(apiResponse('Unknown nation', 404));
      const client = makeClient();

      const error = await client.request(nationUrl('nowhere')).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ statusCode: 404, responseBody: 'Unknown nation' });
    });

    it('does not pace dumps but still identifies itself', async () => {
      fetchMock.mockResolvedValueOnce(new Response('dump'));
      const client = makeClient();

      const result = await client.request(nationsDumpUrl());

      expect(result.body).toBe('dump');
      expect(result.grant).toBeUndefined();
      expect(limiter.snapshot().granted).toBe(0);
      expect(sentHeaders(fetchMock)).toEqual({ 'user-agent': formatUserAgent('Testlandia') });
    });

    it('sends no User-Agent to other hosts', async () => {
      fetchMock.mockResolvedValueOnce(new Response('elsewhere'));
      const client = makeClient();

      await client.request('https://example.com/data.xml');

      expect(sentHeaders(fetchMock)).toEqual({});
    });
  });

  describe('credentials', () => {
    let auth: AuthRateLimiter;

    beforeEach(() => {
      auth = new AuthRateLimiter({ limiter, credential: { identity: 'testlandia', password: 'test-secret' } });
    });

    it('sends the password by POST, then the issued token', async () => {
      fetchMock
        .mockResolvedValueOnce(apiResponse('<NATION/>', 200, { 'X-Autologin': 'test-token', 'X-Pin': '1234' }))
        .mockResolvedValueOnce(apiResponse('<NATION/>'));
      const client = makeClient();

      await client.request(nationUrl('testlandia', ['ping']), { authority: auth });
      await client.request(nationUrl('testlandia', ['ping']), { authority: auth });

      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('POST');
      expect(sentHeaders(fetchMock, 0)).toEqual({
        'user-agent': formatUserAgent('Testlandia'),
        'x-password': 'test-secret',
      });
      expect(sentHeaders(fetchMock, 1)).toEqual({
        'user-agent': formatUserAgent('Testlandia'),
        'x-autologin': 'test-token',
        'x-pin': '1234',
      });
    });

    it('leaves credentials off requests not addressed to a nation', async () => {
      fetchMock.mockResolvedValueOnce(apiResponse('<WORLD/>'));
      const client = makeClient();

      await client.request(worldUrl(['numnations']), { authority: auth });

      expect(fetchMock.mock.calls[0]?.[1]?.method).toBe('GET');
      expect(sentHeaders(fetchMock)).toEqual({ 'user-agent': formatUserAgent('Testlandia') });
    });

    it('raises AuthRejectedError and drops the session on 403', async () => {
      fetchMock
        .mockResolvedValueOnce(apiResponse('<NATION/>', 200, { 'X-Autologin': 'test-token' }))
        .mockResolvedValueOnce(apiResponse('Authentication Failed', 403));
      const client = makeClient();

      await client.request(nationUrl('testlandia', ['ping']), { authority: auth });
      const error = await client
        .request(nationUrl('testlandia', ['ping']), { authority: auth })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AuthRejectedError);
      expect(error).toMatchObject({ identity: 'testlandia', statusCode: 403 });
      expect(auth.hasSession).toBe(false);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('raises a plain ForbiddenError and keeps the session when no credentials were sent', async () => {
      auth = new AuthRateLimiter({ limiter, credential: { identity: 'testlandia', autologin: 'test-token' } });
      fetchMock.mockResolvedValueOnce(apiResponse('Forbidden', 403));
      const client = makeClient();

      const error = await client.request(worldUrl(['numnations']), { authority: auth }).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ForbiddenError);
      expect(error).not.toBeInstanceOf(AuthRejectedError);
      expect(error).toMatchObject({ statusCode: 403 });
      expect(auth.hasSession).toBe(true);
      expect(auth.prepareRequest()).toEqual({ autologin: 'test-token' });
    });

    it('counts credentialed requests against the shared quota', async () => {
      fetchMock.mockImplementation(async () => apiResponse('<NATION/>', 200, { 'RateLimit-Remaining': '1' }));
      const client = makeClient();

      const first = await client.request(nationUrl('testlandia', ['ping']), { authority: auth });
      const second = await client.request(worldUrl(['numnations']));

      expect([first.grant?.sequence, second.grant?.sequence]).toEqual([1, 2]);
      expect(limiter.snapshot()).toMatchObject({ granted: 2, quota: { remaining: 1 } });
    });
  });

  describe('retries', () => {
    it('requeues a throttled request until the retry-after passes', async () => {
      vi.useFakeTimers({ now: 0 });
      const sentAt: number[] = [];
      fetchMock.mockImplementation(async () => {
        sentAt.push(Date.now());
        return sentAt.length === 1
          ? apiResponse('Too many requests', 429, { 'Retry-After': '10', 'RateLimit-Remaining': '5' })
          : apiResponse('<WORLD/>');
      });
      const client = makeClient();

      const pending = client.request(worldUrl(['numnations']));
      await vi.advanceTimersByTimeAsync(10_000);
      const result = await pending;

      expect(sentAt).toEqual([0, 10_000]);
      expect(result.attempts).toBe(2);
      expect(result.body).toBe('<WORLD/>');
    });

    it('reads the configured throttle status and retry-after header', async () => {
      limiter.destroy();
      limiter = new RateLimiter({
        ...base,
        throttleStatus: 503,
        extractor: createHeaderQuotaExtractor({ ...DEFAULT_QUOTA_HEADERS, retryAfter: 'X-Retry-In' }),
      });
      fetchMock.mockResolvedValueOnce(apiResponse('Slow down', 503, { 'X-Retry-In': '7', 'Retry-After': '99' }));
      const client = makeClient({ throttleRetries: 0, throttleStatus: 503, retryAfterHeader: 'X-Retry-In' });

      const error = await client.request(worldUrl(['numnations'])).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TooManyRequestsError);
      expect(error).toMatchObject({ statusCode: 503, retryAfterMs: 7_000 });
    });

    it('gives up with TooManyRequestsError once throttle retries run out', async () => {
      fetchMock.mockResolvedValueOnce(apiResponse('Too many requests', 429, { 'Retry-After': '10' }));
      const client = makeClient({ throttleRetries: 0 });

      const error = await client.request(worldUrl(['numnations'])).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(TooManyRequestsError);
      expect(error).toMatchObject({ retryAfterMs: 10_000 });
    });

    it('backs off and retries server errors', async () => {
      fetchMock
        .mockResolvedValueOnce(apiResponse('oops', 500))
        .mockResolvedValueOnce(apiResponse('oops', 502))
        .mockResolvedValueOnce(apiResponse('<WORLD/>'));
      const backoff = vi.fn((_attempt: number) => 0);
      const client = makeClient({ backoff, serverErrorRetries: 2 });

      const result = await client.request(worldUrl(['numnations']));

      expect(result.attempts).toBe(3);
      expect(backoff.mock.calls).toEqual([[0], [1]]);
      expect(limiter.snapshot().granted).toBe(3);
    });

    it('raises ServerError when server retries run out', async () => {
      fetchMock.mockImplementation(async () => apiResponse('oops', 502));
      const client = makeClient({ backoff: () => 0, serverErrorRetries: 1 });

      const error = await client.request(worldUrl(['numnations'])).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ServerError);
      expect(error).toMatchObject({ statusCode: 502 });
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it('does not retry statuses outside the retry list', async () => {
      fetchMock.mockImplementation(async () => apiResponse('oops', 503));
      const client = makeClient({ backoff: () => 0 });

      await expect(client.request(worldUrl(['numnations']))).rejects.toBeInstanceOf(ServerError);
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });

  describe('withStream', () => {
    it('hands the unread response to the handler', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<NATIONS/>'));
      const client = makeClient();

      const text = await client.withStream(nationsDumpUrl(), (response) => response.text());

      expect(text).toBe('<NATIONS/>');
    });

    it('cancels the body when the handler throws', async () => {
      const response = new Response('<NATIONS/>');
      fetchMock.mockResolvedValueOnce(response);
      const client = makeClient();

      await expect(
        client.withStream(nationsDumpUrl(), async () => {
          throw new Error('handler failed');
        }),
      ).rejects.toThrow('handler failed');
      expect(response.bodyUsed).toBe(true);
    });

    it('throws before calling the handler on a failed response', async () => {
      fetchMock.mockResolvedValueOnce(new Response('gone', { status: 404 }));
      const client = makeClient();
      const handler = vi.fn(async (_response: Response) => 'unused');

      await expect(client.withStream(nationsDumpUrl(), handler)).rejects.toBeInstanceOf(NotFoundError);
      expect(handler).not.toHaveBeenCalled();
    });
  });

  describe('sendTelegram', () => {
    it('routes recruitment telegrams through the recruitment pacer', async () => {
      const floors = { standardMs: 30_000, recruitmentMs: 180_000 };
      const telegram = {
        standard: new TelegramRateLimiter({ limiter, recruitment: false, floors }),
        recruitment: new TelegramRateLimiter({ limiter, recruitment: true, floors }),
      };
      fetchMock.mockResolvedValueOnce(apiResponse('queued'));
      const client = makeClient({ telegram });

      const result = await client.sendTelegram({
        client: 'test-client',
        tgid: '123',
        key: 'test-key',
        to: 'testlandia',
        recruitment: true,
      });

      const input = fetchMock.mock.calls[0]?.[0];
      expect(input?.searchParams.get('a')).toBe('sendtg');
      expect(input?.searchParams.get('to')).toBe('testlandia');
      expect(result.body).toBe('queued');
      expect(telegram.recruitment.snapshot().lastGrantedAt).toBe(result.grant?.grantedAt);
      expect(telegram.standard.snapshot().lastGrantedAt).toBeUndefined();
      expect(limiter.snapshot().granted).toBe(1);
    });

    it('requires telegram limiters', async () => {
      const client = makeClient();
      const error = await client
        .sendTelegram({ client: 'test-client', tgid: '1', key: 'test-key', to: 'testlandia' })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ConfigError);
      expect(error).toMatchObject({ message: 'This client has no telegram limiters configured' });
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('prepareAndExecute', () => {
    let auth: AuthRateLimiter;

    beforeEach(() => {
      auth = new AuthRateLimiter({ limiter, credential: { identity: 'testlandia', password: 'test-secret' } });
    });

    it('executes with the token from the prepare step', async () => {
      fetchMock
        .mockResolvedValueOnce(apiResponse('<NATION id="testlandia"><SUCCESS>test-token-123</SUCCESS></NATION>'))
        .mockResolvedValueOnce(apiResponse('<NATION id="testlandia"><SUCCESS>Done</SUCCESS></NATION>'));
      const client = makeClient();

      const result = await client.prepareAndExecute(auth, 'testlandia', 'giftcard', { cardid: 1, season: 2 });

      const prepare = fetchMock.mock.calls[0]?.[0];
      const execute = fetchMock.mock.calls[1]?.[0];
      expect(prepare?.searchParams.get('mode')).toBe('prepare');
      expect(prepare?.searchParams.get('token')).toBeNull();
      expect(execute?.searchParams.get('mode')).toBe('execute');
      expect(execute?.searchParams.get('token')).toBe('test-token-123');
      expect(execute?.searchParams.get('c')).toBe('giftcard');
      expect(execute?.searchParams.get('cardid')).toBe('1');
      expect(result.body).toBe('<NATION id="testlandia"><SUCCESS>Done</SUCCESS></NATION>');
    });

    it('stops when the prepare step reports an error', async () => {
      fetchMock.mockResolvedValueOnce(apiResponse('<NATION id="testlandia"><ERROR>Invalid card.</ERROR></NATION>'));
      const client = makeClient();

      const error = await client
        .prepareAndExecute(auth, 'testlandia', 'giftcard', { cardid: 1 })
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(PrivateCommandError);
      expect(error).toMatchObject({ message: 'Command "giftcard" failed: Invalid card.' });
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });
  });
});
