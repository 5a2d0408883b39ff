import { z } from 'zod';
import { SportsbookGame } from '../types/markets';
import { HttpClient, createHttpClient, errorMessage, logHttpError } from '../lib/http';
import { colors } from '../lib/colors';

const outcomeSchema = z.object({
  name: z.string(),
  price: z.union([z.number(), z.string()]).nullable().catch(null),
});

const gameSchema = z.object({
  id: z.string().optional(),
  commence_time: z.string().optional(),
  away_team: z.string(),
  home_team: z.string(),
  bookmakers: z
    .array(
      z.object({
        key: z.string().optional(),
        title: z.string().optional(),
        markets: z
          .array(
            z.object({
              key: z.string().optional(),
              outcomes: z.array(outcomeSchema).default([]),
            })
          )
          .default([]),
      })
    )
    .default([]),
});

export interface OddsApiClientOptions {
  baseUrl: string;
  apiKey?: string;
  http?: HttpClient;
}

/**
 * Moneyline quotes from a sportsbook aggregator, American format, US books
 */
export class OddsApiClient {
  private readonly http: HttpClient;
  private readonly apiKey: string | null;

  constructor(options: OddsApiClientOptions) {
    this.http = options.http ?? createHttpClient(options.baseUrl);
    this.apiKey = options.apiKey || null;
  }

  get isConfigured(): boolean {
    return this.apiKey !== null;
  }

  async getGames(sportKey: string): Promise<SportsbookGame[]> {
    if (!this.apiKey) {
      console.warn(`  ${colors.yellow}ODDS_API_KEY not set; skipping sportsbook odds for ${sportKey}${colors.reset}`);
      return [];
    }

    let data: unknown;
    try {
      const response = await this.http.get(`/sports/${sportKey}/odds`, {
        params: {
          apiKey: this.apiKey,
          regions: 'us',
          markets: 'h2h',
          oddsFormat: 'american',
        },
      });
      data = response.data;
    } catch (error: unknown) {
      logHttpError('Odds', error);
      throw new Error(`Failed to fetch sportsbook odds: ${errorMessage(error)}`);
    }

    if (!Array.isArray(data)) {
      console.warn(`  ${colors.yellow}Unexpected odds payload for ${sportKey}; treating as empty${colors.reset}`);
      return [];
    }

    const items: unknown[] = data;
    const games: SportsbookGame[] = [];
    for (const raw of items) {
      const parsed = gameSchema.safeParse(raw);
      if (parsed.success) {
        games.push(parsed.data);
      }
    }

    const skipped = items.length - games.length;
    console.log(`  Found ${games.length} sportsbook games for ${sportKey}${skipped > 0 ? ` (${skipped} skipped)` : ''}`);
    return games;
  }
}
