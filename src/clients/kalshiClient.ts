import { z } from 'zod';
import { KalshiContract, MarketCandlestick, MarketOrderbook, MarketPage, OrderbookLevel } from '../types/markets';
import { centsToProbability } from '../lib/odds';
import { HttpClient, createHttpClient, errorMessage, logHttpError } from '../lib/http';
import { colors } from '../lib/colors';

export const MAX_PAGE_SIZE = 1000;
export const DEFAULT_MAX_PAGES = 20;

const DAY_SECONDS = 24 * 60 * 60;

const nullableNumber = z.number().nullish();
const nullableString = z.string().nullish();

const contractSchema = z.object({
  ticker: nullableString,
  event_ticker: nullableString,
  series_ticker: nullableString,
  title: nullableString,
  subtitle: nullableString,
  market_type: nullableString,
  close_time: nullableString,
  yes_bid: nullableNumber,
  yes_ask: nullableNumber,
  open_interest: nullableNumber,
  volume_24h: nullableNumber,
});

const marketsEnvelope = z.object({
  markets: z.array(z.unknown()).nullish(),
  cursor: nullableString,
});

const candlesticksEnvelope = z.object({
  candlesticks: z
    .array(
      z.object({
        end_period_ts: z.number(),
        volume: nullableNumber,
        price: z
          .object({
            open: nullableNumber,
            high: nullableNumber,
            low: nullableNumber,
            close: nullableNumber,
          })
          .nullish(),
      })
    )
    .nullish(),
});

// Levels come as [price_cents, quantity] pairs
const levelsSchema = z.array(z.tuple([z.number(), z.number()])).nullish();

const orderbookEnvelope = z.object({
  orderbook: z.object({ yes: levelsSchema, no: levelsSchema }).nullish(),
});

export interface KalshiClientOptions {
  baseUrl: string;
  http?: HttpClient;
  now?: () => number;
}

/**
 * Read-only client for the public market data endpoints.
 * No credentials: listing markets, candlesticks and orderbooks is unauthenticated.
 */
export class KalshiClient {
  private readonly http: HttpClient;
  private readonly now: () => number;

  constructor(options: KalshiClientOptions) {
    this.http = options.http ?? createHttpClient(options.baseUrl);
    this.now = options.now ?? Date.now;
  }

  /**
   * One page of open markets for a series
   */
  async getGameMarkets(
    seriesTicker: string,
    options: { limit?: number; cursor?: string | null } = {}
  ): Promise<MarketPage> {
    const limit = Math.min(Math.max(Math.trunc(options.limit ?? MAX_PAGE_SIZE), 1), MAX_PAGE_SIZE);
    const params: Record<string, string | number> = {
      series_ticker: seriesTicker,
      status: 'open',
      limit,
    };
    if (options.cursor) {
      params.cursor = options.cursor;
    }

    let data: unknown;
    try {
      const response = await this.http.get('/markets', { params });
      data = response.data;
    } catch (error: unknown) {
      logHttpError('Kalshi', error);
      throw new Error(`Failed to fetch Kalshi markets: ${errorMessage(error)}`);
    }

    const envelope = marketsEnvelope.safeParse(data);
    if (!envelope.success) {
      console.warn(`  ${colors.yellow}Unexpected markets payload for ${seriesTicker}; treating as empty${colors.reset}`);
      return { markets: [], cursor: null };
    }

    const markets: KalshiContract[] = [];
    let skipped = 0;
    for (const raw of envelope.data.markets ?? []) {
      const parsed = contractSchema.safeParse(raw);
      if (parsed.success) {
        markets.push(parsed.data);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      console.warn(`  ${colors.yellow}Skipped ${skipped} malformed markets for ${seriesTicker}${colors.reset}`);
    }

    return { markets, cursor: envelope.data.cursor || null };
  }

  /**
   * Follow the cursor until it runs out or `maxPages` pages were read
   */
  async getAllOpenContracts(seriesTicker: string, maxPages: number = DEFAULT_MAX_PAGES): Promise<KalshiContract[]> {
    const contracts: KalshiContract[] = [];
    let cursor: string | null = null;

    for (let page = 0; page < maxPages; page++) {
      const result: MarketPage = await this.getGameMarkets(seriesTicker, { cursor });
      contracts.push(...result.markets);
      cursor = result.cursor;
      if (!cursor) break;
    }

    console.log(`  Found ${contracts.length} open contracts for ${seriesTicker}`);
    return contracts;
  }

  /**
   * Price history for one market, or null when it cannot be fetched
   * @param periodInterval - Minutes per candle (1, 60 or 1440)
   */
  async getMarketCandlesticks(
    seriesTicker: string,
    ticker: string,
    periodInterval: number = 60,
    daysBack: number = 7
  ): Promise<MarketCandlestick[] | null> {
    const endTs = Math.floor(this.now() / 1000);
    const startTs = endTs - daysBack * DAY_SECONDS;

    try {
      const response = await this.http.get(`/series/${seriesTicker}/markets/${ticker}/candlesticks`, {
        params: { period_interval: periodInterval, start_ts: startTs, end_ts: endTs },
      });
      const parsed = candlesticksEnvelope.parse(response.data);

      return (parsed.candlesticks ?? []).map((candle) => ({
        timestamp: new Date(candle.end_period_ts * 1000).toISOString(),
        open: centsToProbability(candle.price?.open),
        high: centsToProbability(candle.price?.high),
        low: centsToProbability(candle.price?.low),
        close: centsToProbability(candle.price?.close),
        volume: candle.volume ?? 0,
      }));
    } catch (error: unknown) {
      console.error(`  ${colors.red}Failed to fetch candlesticks for ${ticker}: ${errorMessage(error)}${colors.reset}`);
      return null;
    }
  }

  /**
   * Resting orders on both sides, prices as probabilities; null when it cannot be fetched
   */
  async getMarketOrderbook(ticker: string): Promise<MarketOrderbook | null> {
    try {
      const response = await this.http.get(`/markets/${ticker}/orderbook`);
      const parsed = orderbookEnvelope.parse(response.data);

      const toLevels = (levels: Array<[number, number]> | null | undefined): OrderbookLevel[] =>
        (levels ?? []).map(([price, quantity]) => ({ price: centsToProbability(price), quantity }));

      return {
        yes: toLevels(parsed.orderbook?.yes),
        no: toLevels(parsed.orderbook?.no),
      };
    } catch (error: unknown) {
      console.error(`  ${colors.red}Failed to fetch orderbook for ${ticker}: ${errorMessage(error)}${colors.reset}`);
      return null;
    }
  }
}
