export type SportKey = 'nfl' | 'nba' | 'nhl' | 'soccer';

/**
 * Raw contract as returned by the market API's /markets endpoint.
 * Prices are in cents (0-100). Any field may be missing on the wire.
 */
export interface KalshiContract {
  ticker?: string | null;
  event_ticker?: string | null;
  series_ticker?: string | null;
  title?: string | null;
  subtitle?: string | null;
  market_type?: string | null;
  close_time?: string | null;
  yes_bid?: number | null;
  yes_ask?: number | null;
  open_interest?: number | null;
  volume_24h?: number | null;
}

export interface NormalizedContract {
  ticker: string | null;
  eventTicker: string | null;
  seriesTicker: string | null;
  title: string | null;
  subtitle: string | null;
  marketType: string | null;
  closeTime: string | null;
  closeDt: Date | null;
  yesBid: number | null; // probability (0-1)
  yesAsk: number | null; // probability (0-1)
  openInterest: number | null;
  volume24h: number | null;
}

export interface TeamEntry {
  name: string;
  abbr: string;
  variations: string[];
}

export interface CanonicalTeam extends TeamEntry {
  sport: SportKey;
}

export interface WinnerPrimary {
  label: string;
  /** Team the YES price refers to */
  subjectTeam: string;
  yesBid: number | null;
  yesAsk: number | null;
  /** Always derived, never observed */
  noBid: number | null;
  noAsk: number | null;
  ticker: string | null;
}

export interface EventRecord {
  eventTicker: string;
  prettyEvent: string;
  /** Display names; "Away"/"Home" when the matchup could not be resolved */
  awayTeam: string;
  homeTeam: string;
  awayCanonical: CanonicalTeam | null;
  homeCanonical: CanonicalTeam | null;
  closeDt: Date | null;
  openInterestSum: number;
  volume24hSum: number;
  winnerPrimary: WinnerPrimary;
  allContracts: NormalizedContract[];
}

export interface SportsbookOutcome {
  name: string;
  price: number | string | null;
}

export interface SportsbookMarket {
  key?: string;
  outcomes: SportsbookOutcome[];
}

export interface SportsbookBookmaker {
  key?: string;
  title?: string;
  markets: SportsbookMarket[];
}

/** Game with moneyline quotes as returned by the sportsbook odds API */
export interface SportsbookGame {
  id?: string;
  commence_time?: string;
  away_team: string;
  home_team: string;
  bookmakers: SportsbookBookmaker[];
}

export interface BookmakerQuote {
  bookmaker: string;
  odds: number | null; // American odds
  impliedProbability: number;
}

export interface ConsensusResult {
  away: number | null;
  home: number | null;
  awayQuotes: BookmakerQuote[];
  homeQuotes: BookmakerQuote[];
  awayBest: BookmakerQuote | null;
  homeBest: BookmakerQuote | null;
  bookmakerCount: number;
}

export interface ComparisonSide {
  team: string;
  marketProbability: number | null;
  consensusProbability: number | null;
  best: BookmakerQuote | null;
  diffPct: number | null;
  isOverThreshold: boolean;
  isMarketOvervaluing?: boolean;
}

export interface ComparisonRecord {
  event: EventRecord;
  game: SportsbookGame | null;
  away: ComparisonSide;
  home: ComparisonSide;
}

export interface GameResultTeam {
  id: string | null;
  name: string;
  abbreviation: string;
  score: number | null;
  winner: boolean;
}

export interface GameResult {
  gameId: string | null;
  name: string | null;
  shortName: string | null;
  date: string | null;
  status: {
    completed: boolean;
    description: string;
    state: string;
  };
  homeTeam: GameResultTeam | null;
  awayTeam: GameResultTeam | null;
  winner: 'home' | 'away' | null;
}

export type OutcomeComparison =
  | { status: 'incomplete'; message: string }
  | {
      status: 'complete';
      betWon: boolean;
      teamName: string;
      probability: number;
      percentage: string;
      confidenceLevel: string;
      actualWinner: string | null;
      finalScore: { home: number | null; away: number | null };
      message: string;
    };

export interface MarketPage {
  markets: KalshiContract[];
  /** Empty when there are no more pages */
  cursor: string | null;
}

/** OHLC price history point, prices as probabilities */
export interface MarketCandlestick {
  timestamp: string;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  volume: number;
}

export interface OrderbookLevel {
  price: number | null; // probability (0-1)
  quantity: number;
}

export interface MarketOrderbook {
  yes: OrderbookLevel[];
  no: OrderbookLevel[];
}

export type GameSide = 'home' | 'away';

export interface Mispricing {
  eventTicker: string;
  prettyEvent: string;
  side: GameSide;
  team: string;
  /** Winner contract ticker the market probability was read from */
  ticker: string | null;
  marketProbability: number;
  consensusProbability: number;
  bestOdds: number | null;
  differencePct: number; // Difference as percentage points
  isMarketOvervaluing: boolean; // True if the market has a higher implied probability than the books
}
