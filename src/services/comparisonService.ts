import {
  ComparisonRecord,
  ComparisonSide,
  ConsensusResult,
  EventRecord,
  GameSide,
  Mispricing,
  SportsbookGame,
} from '../types/markets';
import { CrossSourceMatcher } from './crossSourceMatcher';
import { complementProbability, probabilityDifferencePct } from '../lib/odds';

export class ComparisonService {
  /**
   * @param thresholdPct - Minimum difference, as a fraction (0.05 = 5 percentage points)
   */
  constructor(
    private readonly matcher: CrossSourceMatcher,
    private readonly thresholdPct: number
  ) {}

  /**
   * Match each event with its sportsbook game and compare both sides.
   * Events without a sportsbook game are kept with empty consensus.
   */
  compare(events: EventRecord[], games: SportsbookGame[]): ComparisonRecord[] {
    return events.map((event) => {
      const game = this.matcher.findMatchingGame(event.awayTeam, event.homeTeam, games);
      const consensus = game ? this.matcher.getConsensus(game) : null;

      return {
        event,
        game,
        away: this.buildSide(event, 'away', consensus),
        home: this.buildSide(event, 'home', consensus),
      };
    });
  }

  /**
   * Sides whose market and consensus probabilities differ by at least the threshold
   */
  findMispricings(records: ComparisonRecord[]): Mispricing[] {
    const mispricings: Mispricing[] = [];

    for (const record of records) {
      for (const side of ['away', 'home'] as const) {
        const data = record[side];
        if (!data.isOverThreshold || data.marketProbability === null || data.consensusProbability === null) {
          continue;
        }
        mispricings.push({
          eventTicker: record.event.eventTicker,
          prettyEvent: record.event.prettyEvent,
          side,
          team: data.team,
          ticker: record.event.winnerPrimary.ticker,
          marketProbability: data.marketProbability,
          consensusProbability: data.consensusProbability,
          bestOdds: data.best?.odds ?? null,
          differencePct: data.diffPct ?? 0,
          isMarketOvervaluing: data.isMarketOvervaluing ?? false,
        });
      }
    }

    return mispricings.sort((a, b) => b.differencePct - a.differencePct);
  }

  /**
   * Market probability for a side: the primary YES bid when the contract is
   * about this team, otherwise its complement.
   */
  marketProbability(event: EventRecord, side: GameSide): number | null {
    const primary = event.winnerPrimary;
    if (primary.ticker === null) return null;

    const team = side === 'home' ? event.homeTeam : event.awayTeam;
    return primary.subjectTeam === team ? primary.yesBid : complementProbability(primary.yesBid);
  }

  private buildSide(event: EventRecord, side: GameSide, consensus: ConsensusResult | null): ComparisonSide {
    const marketProbability = this.marketProbability(event, side);
    const consensusProbability = consensus ? consensus[side] : null;
    const best = consensus ? (side === 'home' ? consensus.homeBest : consensus.awayBest) : null;

    const result: ComparisonSide = {
      team: side === 'home' ? event.homeTeam : event.awayTeam,
      marketProbability,
      consensusProbability,
      best,
      diffPct: null,
      isOverThreshold: false,
    };

    if (marketProbability !== null && consensusProbability !== null) {
      const diffPct = probabilityDifferencePct(marketProbability, consensusProbability);
      result.diffPct = diffPct;
      result.isOverThreshold = diffPct >= this.thresholdPct * 100;
      result.isMarketOvervaluing = marketProbability > consensusProbability;
    }

    return result;
  }
}
