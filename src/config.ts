import dotenv from 'dotenv';
import * as path from 'path';
import { SportKey } from './types/markets';

// Load .env file from project root
dotenv.config({ path: path.resolve(__dirname, '..', '.env') });

export interface SportConfig {
  name: string;
  icon: string;
  /** Market series holding one winner contract per team per game */
  kalshiSeries: string;
  /** Sport key on the sportsbook odds API */
  oddsApiKey: string;
  espnPath: string;
}

export interface Config {
  kalshi: {
    apiBaseUrl: string;
    maxPages: number;
  };
  oddsApi: {
    apiBaseUrl: string;
    apiKey?: string;
  };
  espn: {
    apiBaseUrl: string;
  };
  cache: {
    ttlSeconds: number;
  };
  sports: Record<SportKey, SportConfig>;
  run: {
    sports: SportKey[];
    mispricingThresholdPct: number;
    runScheduleCron?: string;
  };
}

export const SPORTS: Record<SportKey, SportConfig> = {
  nfl: {
    name: 'NFL',
    icon: '🏈',
    kalshiSeries: 'KXNFLGAME',
    oddsApiKey: 'americanfootball_nfl',
    espnPath: 'football/nfl/scoreboard',
  },
  nba: {
    name: 'NBA',
    icon: '🏀',
    kalshiSeries: 'KXNBAGAME',
    oddsApiKey: 'basketball_nba',
    espnPath: 'basketball/nba/scoreboard',
  },
  nhl: {
    name: 'NHL',
    icon: '🏒',
    kalshiSeries: 'KXNHLGAME',
    oddsApiKey: 'icehockey_nhl',
    espnPath: 'hockey/nhl/scoreboard',
  },
  soccer: {
    name: 'Soccer',
    icon: '⚽',
    kalshiSeries: 'KXSOCCERGAME',
    oddsApiKey: 'soccer_epl',
    espnPath: 'soccer/eng.1/scoreboard',
  },
};

function getOptionalEnv(key: string, defaultValue?: string): string | undefined {
  return process.env[key] || defaultValue;
}

function getNumberEnv(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const parsed = parseFloat(raw);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : defaultValue;
}

function isSportKey(value: string): value is SportKey {
  return value in SPORTS;
}

export function parseSports(raw: string): SportKey[] {
  const sports: SportKey[] = [];
  for (const item of raw.split(',')) {
    const name = item.trim().toLowerCase();
    if (!name) continue;
    if (!isSportKey(name)) {
      throw new Error(`Unknown sport in SPORTS: ${name} (expected one of ${Object.keys(SPORTS).join(', ')})`);
    }
    if (!sports.includes(name)) {
      sports.push(name);
    }
  }
  return sports;
}

export const config: Config = {
  kalshi: {
    apiBaseUrl: getOptionalEnv('KALSHI_API_BASE_URL', 'https://api.elections.kalshi.com/trade-api/v2') || '',
    maxPages: Math.trunc(getNumberEnv('KALSHI_MAX_PAGES', 20)),
  },
  oddsApi: {
    apiBaseUrl: getOptionalEnv('ODDS_API_BASE_URL', 'https://api.the-odds-api.com/v4') || '',
    apiKey: getOptionalEnv('ODDS_API_KEY'),
  },
  espn: {
    apiBaseUrl: getOptionalEnv('ESPN_API_BASE_URL', 'https://site.api.espn.com/apis/site/v2/sports/') || '',
  },
  cache: {
    ttlSeconds: getNumberEnv('CACHE_TTL_SECONDS', 300),
  },
  sports: SPORTS,
  run: {
    sports: parseSports(getOptionalEnv('SPORTS', 'nfl') || 'nfl'),
    mispricingThresholdPct: getNumberEnv('MISPRICING_THRESHOLD_PCT', 0.05),
    runScheduleCron: getOptionalEnv('RUN_SCHEDULE_CRON'),
  },
};
