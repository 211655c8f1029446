import { makeContext, makeProfile } from '../../__tests__/factories';
import { MemoryResponseCache } from '../../cache/memory-cache';
import type { CollectContext } from '../../types/collectors';
import { CollectorTimeoutError } from '../../utils/errors';
import { requestText } from '../../utils/http';
import { ALPHA_VANTAGE_KEY, AlphaVantageCollector } from '../alpha-vantage';

jest.mock('../../utils/http', () => ({
  ...jest.requireActual<typeof import('../../utils/http')>('../../utils/http'),
  requestText: jest.fn()
}));

const request = jest.mocked(requestText);

const profile = makeProfile({
  entities: [
    { name: 'WPP', type: 'holding_companies', aliases: [], weight: 0.3, symbol: 'WPP' },
    { name: 'Omnicom', type: 'holding_companies', aliases: [], weight: 0.15, symbol: 'OMC' }
  ]
});

describe('request throttling', () => {
  beforeEach(() => {
    jest.useFakeTimers();
    request.mockImplementation(async (_url, options) => ({
      status: 200,
      body: JSON.stringify({
        'Global Quote': {
          '05. price': options?.query?.symbol === 'WPP' ? '49.50' : '70.00',
          '07. latest trading day': '2024-01-05'
        }
      })
    }));
  });

  afterEach(() => {
    jest.useRealTimers();
    request.mockReset();
  });

  const context = (overrides: Partial<CollectContext> = {}) =>
    makeContext({ profile, credentials: { [ALPHA_VANTAGE_KEY]: 'test-secret' }, ...overrides });

  it('should hold the second request until the delay has passed', async () => {
    const collector = new AlphaVantageCollector({ requestDelayMs: 12_000 });

    const run = collector.collect(context());
    await jest.advanceTimersByTimeAsync(0);
    expect(request).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(11_999);
    expect(request).toHaveBeenCalledTimes(1);

    await jest.advanceTimersByTimeAsync(1);
    expect(request).toHaveBeenCalledTimes(2);

    const result = await run;
    expect(result.error).toBeUndefined();
    expect(result.items.map((item) => item.title)).toEqual(['WPP 49.50 USD', 'OMC 70.00 USD']);
  });

  it('should not wait when every response comes from the cache', async () => {
    const collector = new AlphaVantageCollector({ requestDelayMs: 12_000 });
    const cache = new MemoryResponseCache();

    const first = collector.collect(context({ cache }));
    await jest.advanceTimersByTimeAsync(12_000);
    await first;

    let settled = false;
    const second = collector.collect(context({ cache })).then((result) => {
      settled = true;
      return result;
    });
    await jest.advanceTimersByTimeAsync(0);

    expect(settled).toBe(true);
    expect((await second).items).toHaveLength(2);
    expect(request).toHaveBeenCalledTimes(2);
  });

  it('should stop waiting when the signal is aborted', async () => {
    const collector = new AlphaVantageCollector({ requestDelayMs: 12_000 });
    const controller = new AbortController();

    const run = collector.collect(context({ signal: controller.signal }));
    await jest.advanceTimersByTimeAsync(1_000);
    controller.abort(new CollectorTimeoutError('alpha_vantage', 1_000));

    const result = await run;
    expect(request).toHaveBeenCalledTimes(1);
    expect(result.items.map((item) => item.title)).toEqual(['WPP 49.50 USD']);
    expect(result.error).toBe('Collector alpha_vantage timed out after 1000ms');
  });
});
