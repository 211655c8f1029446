import nock from 'nock';
import { DEFAULT_DEPTH, makeContext, makeProfile } from '../../__tests__/factories';
import { probeAvailability } from '../../availability/prober';
import { MemoryResponseCache } from '../../cache/memory-cache';
import { ExecutionCoordinator } from '../../orchestrator/coordinator';
import { RunTrace } from '../../trace/run-trace';
import { generateContentId } from '../../types/items';
import { Logger } from '../../utils/logger';
import { ALPHA_VANTAGE_KEY, AlphaVantageCollector } from '../alpha-vantage';
import { profileSymbols, toQuoteItem } from '../quotes';
import { YahooFinanceCollector } from '../yahoo-finance';

const profile = makeProfile({
  entities: [
    { name: 'Omnicom', type: 'holding_companies', aliases: [], weight: 0.15, symbol: 'omc' },
    { name: 'Google Ads', type: 'ad_platforms', aliases: [], weight: 0.05 },
    { name: 'WPP', type: 'holding_companies', aliases: [], weight: 0.3, symbol: 'WPP' }
  ]
});

describe('profileSymbols', () => {
  it('should return upper-cased symbols by entity weight and skip entities without one', () => {
    expect(profileSymbols(profile)).toEqual(['WPP', 'OMC']);
  });
});

describe('toQuoteItem', () => {
  it('should key the item by symbol and trading day', () => {
    const item = toQuoteItem('yahoo_finance', 'Yahoo Finance', {
      symbol: 'WPP',
      price: 51,
      changePercent: -1.5,
      currency: 'USD',
      observedAt: new Date('2024-01-05T21:00:00Z')
    });

    expect(item).toEqual({
      kind: 'financial',
      id: generateContentId('quote', 'WPP', '2024-01-05'),
      title: 'WPP 51.00 USD (-1.50%)',
      url: 'https://finance.yahoo.com/quote/WPP',
      sourceName: 'Yahoo Finance',
      collector: 'yahoo_finance',
      publishedAt: new Date('2024-01-05T21:00:00Z'),
      snippet: 'WPP last traded at 51.00 USD (-1.50%)',
      payload: { symbol: 'WPP', price: 51, changePercent: -1.5, currency: 'USD' }
    });
  });
});

describe('quote collectors', () => {
  beforeAll(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
  });

  afterAll(() => {
    nock.enableNetConnect();
  });

  describe('YahooFinanceCollector', () => {
    it('should build quotes from the chart endpoint and note missing symbols', async () => {
      nock('https://query1.finance.yahoo.com')
        .get('/v8/finance/chart/WPP')
        .query({ range: '5d', interval: '1d' })
        .reply(200, {
          chart: {
            result: [
              {
                meta: {
                  symbol: 'WPP',
                  currency: 'USD',
                  regularMarketPrice: 51,
                  chartPreviousClose: 50,
                  regularMarketTime: 1704456000
                }
              }
            ],
            error: null
          }
        })
        .get('/v8/finance/chart/OMC')
        .query(true)
        .reply(200, { chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } });

      const result = await new YahooFinanceCollector().collect(makeContext({ profile }));

      expect(result.error).toBeUndefined();
      expect(result.items).toHaveLength(1);
      expect(result.items[0]).toEqual(
        expect.objectContaining({
          id: generateContentId('quote', 'WPP', '2024-01-05'),
          title: 'WPP 51.00 USD (+2.00%)',
          publishedAt: new Date('2024-01-05T12:00:00Z'),
          collector: 'yahoo_finance'
        })
      );
      expect(result.sources).toEqual([{ name: 'Yahoo Finance', url: 'https://finance.yahoo.com/quote/WPP' }]);
    });

    it('should report an error when no symbol returns a quote', async () => {
      nock('https://query1.finance.yahoo.com')
        .get(/\/v8\/finance\/chart\/.*/)
        .query(true)
        .twice()
        .reply(200, { chart: { result: [] } });

      const result = await new YahooFinanceCollector().collect(makeContext({ profile }));

      expect(result.items).toEqual([]);
      expect(result.error).toBe('No quote returned for WPP; No quote returned for OMC');
    });

    it('should need no credentials', () => {
      expect(new YahooFinanceCollector().requiredCredentials().size).toBe(0);
    });
  });

  describe('AlphaVantageCollector', () => {
    const collector = () => new AlphaVantageCollector({ requestDelayMs: 0 });

    it('should parse global quotes', async () => {
      nock('https://www.alphavantage.co')
        .get('/query')
        .query({ function: 'GLOBAL_QUOTE', symbol: 'WPP', apikey: 'test-secret' })
        .reply(200, {
          'Global Quote': {
            '01. symbol': 'WPP',
            '05. price': '49.5000',
            '07. latest trading day': '2024-01-05',
            '10. change percent': '0.8147%'
          }
        })
        .get('/query')
        .query({ function: 'GLOBAL_QUOTE', symbol: 'OMC', apikey: 'test-secret' })
        .reply(200, { 'Global Quote': {} });

      const result = await collector().collect(
        makeContext({ profile, credentials: { [ALPHA_VANTAGE_KEY]: 'test-secret' } })
      );

      expect(result.error).toBeUndefined();
      expect(result.items.map((item) => [item.title, item.publishedAt?.toISOString()])).toEqual([
        ['WPP 49.50 USD (+0.81%)', '2024-01-05T00:00:00.000Z']
      ]);
      expect(result.sources).toEqual([{ name: 'Alpha Vantage', url: 'https://www.alphavantage.co' }]);
    });

    it('should stop on a quota notice and keep what it already had', async () => {
      nock('https://www.alphavantage.co')
        .get('/query')
        .query((query) => query.symbol === 'WPP')
        .reply(200, { 'Global Quote': { '05. price': '49.50', '07. latest trading day': '2024-01-05' } })
        .get('/query')
        .query((query) => query.symbol === 'OMC')
        .reply(200, { Note: 'Thank you for using Alpha Vantage! Our standard API call frequency is 5 calls per minute.' });

      const result = await collector().collect(
        makeContext({ profile, credentials: { [ALPHA_VANTAGE_KEY]: 'test-secret' } })
      );

      expect(result.items).toHaveLength(1);
      expect(result.error).toBe('Rate limit exceeded for alpha_vantage');
    });

    it('should retry past a quota notice instead of reading it back from the cache', async () => {
      nock('https://www.alphavantage.co')
        .get('/query')
        .query(true)
        .reply(200, { Information: 'Our standard API rate limit is 25 requests per day.' })
        .get('/query')
        .query(true)
        .reply(200, { 'Global Quote': { '05. price': '49.50', '07. latest trading day': '2024-01-05' } });
      const cache = new MemoryResponseCache();
      const trace = new RunTrace({ domain: 'advertising', profile: 'default', reportType: 'daily_brief', depth: 'default' });
      const alphaVantage = collector();
      const coordinator = new ExecutionCoordinator({ cache, trace, logger: Logger.silent() });

      const result = await coordinator.run({
        availability: probeAvailability([alphaVantage], new Set([ALPHA_VANTAGE_KEY])),
        depth: DEFAULT_DEPTH,
        profile: makeProfile({
          entities: [{ name: 'WPP', type: 'holding_companies', aliases: [], weight: 0.3, symbol: 'WPP' }]
        }),
        fromDate: '2024-01-01',
        toDate: '2024-01-07',
        credentials: { [ALPHA_VANTAGE_KEY]: 'test-secret' },
        retries: 1,
        retryDelayMs: 1
      });

      expect(result.items.map((item) => item.title)).toEqual(['WPP 49.50 USD']);
      const [traced] = trace.toJSON().collectors;
      expect(traced.status).toBe('success');
      expect(traced.api_calls.map((call) => [call.attempt, call.cached])).toEqual([
        [1, false],
        [2, false]
      ]);

      // the good reply is the one that was cached
      const again = await alphaVantage.collect(
        makeContext({ profile: makeProfile({ entities: [{ name: 'WPP', type: 'holding_companies', aliases: [], weight: 0.3, symbol: 'WPP' }] }), cache, credentials: { [ALPHA_VANTAGE_KEY]: 'test-secret' } })
      );
      expect(again.items.map((item) => item.title)).toEqual(['WPP 49.50 USD']);
    });

    it('should report a missing credential', async () => {
      const result = await collector().collect(makeContext({ profile }));

      expect(result.error).toBe('Collector alpha_vantage error: No credential configured');
    });
  });
});
