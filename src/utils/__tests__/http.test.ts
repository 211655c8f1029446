import nock from 'nock';
import type { ApiCallInput } from '../../trace/types';
import { RateLimitError } from '../errors';
import { HttpRequestError, buildUrl, parseJsonBody, redactUrl, requestText } from '../http';

describe('http helpers', () => {
  it('should add defined query values only', () => {
    expect(buildUrl('https://api.example.com/search', { q: 'ad spend', page: 2, lang: undefined, x: null })).toBe(
      'https://api.example.com/search?q=ad+spend&page=2'
    );
    expect(buildUrl('https://api.example.com/search')).toBe('https://api.example.com/search');
  });

  it('should redact credential-looking parameters', () => {
    expect(redactUrl('https://api.example.com/q?apikey=test-secret&q=wpp&access_token=t')).toBe(
      'https://api.example.com/q?apikey=REDACTED&q=wpp&access_token=REDACTED'
    );
    expect(redactUrl('not a url')).toBe('not a url');
  });

  it('should parse JSON bodies and name the URL on failure', () => {
    expect(parseJsonBody('{"a":1}', 'https://api.example.com')).toEqual({ a: 1 });
    expect(() => parseJsonBody('<html>', 'https://api.example.com?apikey=test-secret')).toThrow(
      'Failed to parse JSON response'
    );
  });
});

describe('requestText', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  it('should return the raw body and record the call', async () => {
    nock('https://api.example.com').get('/items').query({ q: 'wpp', apikey: 'test-secret' }).reply(200, '[1,2]');
    const calls: ApiCallInput[] = [];

    const response = await requestText('https://api.example.com/items', {
      query: { q: 'wpp', apikey: 'test-secret' },
      recordCall: (call) => calls.push(call)
    });

    expect(response).toEqual({ status: 200, body: '[1,2]' });
    expect(calls).toEqual([
      {
        endpoint: 'https://api.example.com/items?q=wpp&apikey=REDACTED',
        method: 'GET',
        status: 200,
        latencyMs: expect.any(Number),
        cached: false
      }
    ]);
  });

  it('should send JSON bodies on POST', async () => {
    nock('https://api.example.com').post('/search', { query: 'wpp' }).reply(201, { ok: true });

    const response = await requestText('https://api.example.com/search', { method: 'POST', body: { query: 'wpp' } });

    expect(response).toEqual({ status: 201, body: '{"ok":true}' });
  });

  it('should raise a rate limit error for 429', async () => {
    nock('https://api.example.com').get('/items').reply(429, '', { 'Retry-After': '12' });

    const error = await requestText('https://api.example.com/items').catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RateLimitError);
    expect(error).toMatchObject({ service: 'api.example.com', retryAfterSeconds: 12 });
  });

  it('should raise an HTTP error without retrying client errors', async () => {
    nock('https://api.example.com').get('/items').reply(404, 'missing');
    const calls: ApiCallInput[] = [];

    const error = await requestText('https://api.example.com/items', {
      retries: 2,
      retryDelayMs: 1,
      recordCall: (call) => calls.push(call)
    }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(HttpRequestError);
    expect(error).toMatchObject({ status: 404, body: 'missing' });
    expect(calls.map((call) => call.status)).toEqual([404]);
  });

  it('should retry server errors and record every attempt', async () => {
    nock('https://api.example.com').get('/items').reply(503, 'busy').get('/items').reply(200, 'ok');
    const calls: ApiCallInput[] = [];

    const response = await requestText('https://api.example.com/items', {
      retries: 1,
      retryDelayMs: 1,
      recordCall: (call) => calls.push(call)
    });

    expect(response.body).toBe('ok');
    expect(calls.map((call) => [call.status, call.error])).toEqual([
      [503, expect.stringContaining('failed with 503')],
      [200, undefined]
    ]);
  });

  it('should record network failures with no status', async () => {
    nock('https://api.example.com').get('/items').replyWithError('socket hang up');
    const calls: ApiCallInput[] = [];

    await expect(
      requestText('https://api.example.com/items', { recordCall: (call) => calls.push(call) })
    ).rejects.toThrow('socket hang up');
    expect(calls.map((call) => [call.status, call.error])).toEqual([[null, 'socket hang up']]);
  });
});
