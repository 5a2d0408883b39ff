import { BookmakerQuote, ConsensusResult, GameSide, SportsbookGame } from '../types/markets';
import { TeamDirectory } from '../teams/teamDirectory';
import { americanToProbability, parseOddsString } from '../lib/odds';

const MONEYLINE_MARKET = 'h2h';

export class CrossSourceMatcher {
  constructor(private readonly directory: TeamDirectory) {}

  /**
   * Normalized matching key for a team name.
   * Lower-case canonical name when the directory knows the team ("KC" -> "kansas city chiefs"),
   * otherwise the last word ("Springfield Isotopes" -> "isotopes").
   */
  teamKey(name: string): string {
    const team = this.directory.resolve(name);
    if (team) {
      return team.name.toLowerCase();
    }
    const words = name.toLowerCase().trim().split(/\s+/);
    return words[words.length - 1] ?? '';
  }

  /**
   * First sportsbook game whose away and home keys are contained in ours.
   * No scoring across candidates: source order decides.
   */
  findMatchingGame(awayTeam: string, homeTeam: string, games: SportsbookGame[]): SportsbookGame | null {
    const awayKey = this.teamKey(awayTeam);
    const homeKey = this.teamKey(homeTeam);
    if (!awayKey || !homeKey) return null;

    for (const game of games) {
      const gameAway = this.teamKey(game.away_team);
      const gameHome = this.teamKey(game.home_team);
      if (gameAway && gameHome && awayKey.includes(gameAway) && homeKey.includes(gameHome)) {
        return game;
      }
    }
    return null;
  }

  /**
   * Every bookmaker's moneyline quote for one side of a game.
   * Bookmakers without a usable price for the side are skipped.
   */
  getBookmakerQuotes(game: SportsbookGame, side: GameSide): BookmakerQuote[] {
    const sideKey = this.teamKey(side === 'away' ? game.away_team : game.home_team);
    const quotes: BookmakerQuote[] = [];

    for (const bookmaker of game.bookmakers) {
      const market = bookmaker.markets.find((m) => !m.key || m.key === MONEYLINE_MARKET);
      if (!market) continue;

      const outcome = market.outcomes.find((o) => this.teamKey(o.name) === sideKey);
      const odds = parseOddsString(outcome?.price);
      if (odds === null || odds === 0) continue;

      quotes.push({
        bookmaker: bookmaker.title || bookmaker.key || 'unknown',
        odds,
        impliedProbability: americanToProbability(odds),
      });
    }

    return quotes;
  }

  /**
   * Highest American price: least negative favorite or most positive underdog
   */
  getBestQuote(quotes: BookmakerQuote[]): BookmakerQuote | null {
    let best: BookmakerQuote | null = null;
    for (const quote of quotes) {
      if (quote.odds === null) continue;
      if (best === null || best.odds === null || quote.odds > best.odds) {
        best = quote;
      }
    }
    return best;
  }

  /**
   * Average implied probability per side. Each quote is converted first and
   * the probabilities are averaged, never the raw odds.
   */
  getConsensus(game: SportsbookGame): ConsensusResult {
    const awayQuotes = this.getBookmakerQuotes(game, 'away');
    const homeQuotes = this.getBookmakerQuotes(game, 'home');
    const books = new Set([...awayQuotes, ...homeQuotes].map((quote) => quote.bookmaker));

    return {
      away: averageProbability(awayQuotes),
      home: averageProbability(homeQuotes),
      awayQuotes,
      homeQuotes,
      awayBest: this.getBestQuote(awayQuotes),
      homeBest: this.getBestQuote(homeQuotes),
      bookmakerCount: books.size,
    };
  }
}

function averageProbability(quotes: BookmakerQuote[]): number | null {
  if (quotes.length === 0) return null;
  return quotes.reduce((sum, quote) => sum + quote.impliedProbability, 0) / quotes.length;
}
