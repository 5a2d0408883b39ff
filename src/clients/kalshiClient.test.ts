import { AxiosRequestConfig } from 'axios';
import { KalshiClient } from './kalshiClient';

function fakeHttp(responses: unknown[]) {
  return jest.fn(async (_url: string, _config?: AxiosRequestConfig): Promise<{ data: unknown }> => {
    if (responses.length === 0) {
      throw new Error('no more responses');
    }
    return { data: responses.shift() };
  });
}

const market = (ticker: string) => ({
  ticker,
  event_ticker: 'KXNFLGAME-25NOV09ATLIND',
  title: 'Atlanta at Indianapolis Winner?',
  yes_bid: 35,
  yes_ask: 36,
  close_time: '2025-11-09T18:00:00Z',
});

describe('KalshiClient', () => {
  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('getGameMarkets', () => {
    it('should request open markets for the series', async () => {
      const get = fakeHttp([{ markets: [market('A')], cursor: 'next' }]);
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get } });

      const page = await client.getGameMarkets('KXNFLGAME');

      expect(get).toHaveBeenCalledWith('/markets', {
        params: { series_ticker: 'KXNFLGAME', status: 'open', limit: 1000 },
      });
      expect(page.cursor).toBe('next');
      expect(page.markets).toHaveLength(1);
      expect(page.markets[0].ticker).toBe('A');
    });

    it('should clamp the page size', async () => {
      const get = fakeHttp([{ markets: [] }, { markets: [] }]);
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get } });

      await client.getGameMarkets('KXNFLGAME', { limit: 5000 });
      await client.getGameMarkets('KXNFLGAME', { limit: 0 });

      expect(get.mock.calls[0][1]?.params.limit).toBe(1000);
      expect(get.mock.calls[1][1]?.params.limit).toBe(1);
    });

    it('should skip malformed markets and keep the rest', async () => {
      const get = fakeHttp([{ markets: [market('A'), { ticker: 42 }, market('B')], cursor: null }]);
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get } });

      const page = await client.getGameMarkets('KXNFLGAME');

      expect(page.markets.map((m) => m.ticker)).toEqual(['A', 'B']);
      expect(page.cursor).toBeNull();
    });

    it('should treat an unexpected payload as an empty page', async () => {
      const get = fakeHttp(['<html>maintenance</html>']);
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get } });

      expect(await client.getGameMarkets('KXNFLGAME')).toEqual({ markets: [], cursor: null });
    });

    it('should throw when the request fails', async () => {
      const get = fakeHttp([]);
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get } });

      await expect(client.getGameMarkets('KXNFLGAME')).rejects.toThrow(
        'Failed to fetch Kalshi markets: no more responses'
      );
    });
  });

  describe('getAllOpenContracts', () => {
    it('should follow the cursor until it is empty', async () => {
      const get = fakeHttp([
        { markets: [market('A'), market('B')], cursor: 'page2' },
        { markets: [market('C')], cursor: '' },
      ]);
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get } });

      const contracts = await client.getAllOpenContracts('KXNFLGAME');

      expect(contracts.map((c) => c.ticker)).toEqual(['A', 'B', 'C']);
      expect(get).toHaveBeenCalledTimes(2);
      expect(get.mock.calls[1][1]?.params.cursor).toBe('page2');
    });

    it('should stop at the page limit', async () => {
      const get = fakeHttp([
        { markets: [market('A')], cursor: 'p2' },
        { markets: [market('B')], cursor: 'p3' },
        { markets: [market('C')], cursor: 'p4' },
      ]);
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get } });

      const contracts = await client.getAllOpenContracts('KXNFLGAME', 2);

      expect(contracts.map((c) => c.ticker)).toEqual(['A', 'B']);
      expect(get).toHaveBeenCalledTimes(2);
    });
  });

  describe('getMarketCandlesticks', () => {
    it('should convert candle prices to probabilities', async () => {
      const get = fakeHttp([
        {
          candlesticks: [
            { end_period_ts: 1_700_000_000, volume: 120, price: { open: 45, high: 50, low: 40, close: 48 } },
            { end_period_ts: 1_700_003_600, price: null },
          ],
        },
      ]);
      const client = new KalshiClient({
        baseUrl: 'http://kalshi.test',
        http: { get },
        now: () => 1_700_000_000_000,
      });

      const candles = await client.getMarketCandlesticks('KXNFLGAME', 'KXNFLGAME-25NOV09ATLIND-IND');

      expect(get).toHaveBeenCalledWith('/series/KXNFLGAME/markets/KXNFLGAME-25NOV09ATLIND-IND/candlesticks', {
        params: { period_interval: 60, start_ts: 1_699_395_200, end_ts: 1_700_000_000 },
      });
      expect(candles).toEqual([
        { timestamp: '2023-11-14T22:13:20.000Z', open: 0.45, high: 0.5, low: 0.4, close: 0.48, volume: 120 },
        { timestamp: '2023-11-14T23:13:20.000Z', open: null, high: null, low: null, close: null, volume: 0 },
      ]);
    });

    it('should return null on failure', async () => {
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get: fakeHttp([]) } });
      expect(await client.getMarketCandlesticks('KXNFLGAME', 'X')).toBeNull();
    });
  });

  describe('getMarketOrderbook', () => {
    it('should convert both sides of the book', async () => {
      const get = fakeHttp([{ orderbook: { yes: [[35, 100], [34, 250]], no: null } }]);
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get } });

      expect(await client.getMarketOrderbook('T')).toEqual({
        yes: [
          { price: 0.35, quantity: 100 },
          { price: 0.34, quantity: 250 },
        ],
        no: [],
      });
    });

    it('should return null for a malformed book', async () => {
      const get = fakeHttp([{ orderbook: { yes: 'nope' } }]);
      const client = new KalshiClient({ baseUrl: 'http://kalshi.test', http: { get } });

      expect(await client.getMarketOrderbook('T')).toBeNull();
    });
  });
});
