import { CrossSourceMatcher } from './crossSourceMatcher';
import { TeamDirectory } from '../teams/teamDirectory';
import { americanToProbability } from '../lib/odds';
import { SportsbookBookmaker, SportsbookGame } from '../types/markets';

function book(title: string, bills: number | string | null, chiefs: number | string | null): SportsbookBookmaker {
  return {
    key: title.toLowerCase(),
    title,
    markets: [
      {
        key: 'h2h',
        outcomes: [
          { name: 'Buffalo Bills', price: bills },
          { name: 'Kansas City Chiefs', price: chiefs },
        ],
      },
    ],
  };
}

const game: SportsbookGame = {
  id: 'g1',
  commence_time: '2025-11-09T18:00:00Z',
  away_team: 'Buffalo Bills',
  home_team: 'Kansas City Chiefs',
  bookmakers: [
    book('DraftKings', 150, -120),
    book('FanDuel', 170, -110),
    book('BetMGM', '+160', '-130'),
  ],
};

describe('CrossSourceMatcher', () => {
  const matcher = new CrossSourceMatcher(TeamDirectory.forSport('nfl'));

  describe('teamKey', () => {
    it('should use the canonical name for known teams', () => {
      expect(matcher.teamKey('KC')).toBe('kansas city chiefs');
      expect(matcher.teamKey('Raiders')).toBe('las vegas raiders');
    });

    it('should fall back to the last word for unknown teams', () => {
      expect(matcher.teamKey('Springfield Isotopes')).toBe('isotopes');
    });
  });

  describe('findMatchingGame', () => {
    const other: SportsbookGame = {
      away_team: 'Denver Broncos',
      home_team: 'Las Vegas Raiders',
      bookmakers: [],
    };

    it('should match on normalized team keys', () => {
      expect(matcher.findMatchingGame('Buffalo Bills', 'Kansas City Chiefs', [other, game])).toBe(game);
    });

    it('should not match when the sides are reversed', () => {
      expect(matcher.findMatchingGame('Kansas City Chiefs', 'Buffalo Bills', [other, game])).toBeNull();
    });

    it('should return the first hit in source order', () => {
      const duplicate: SportsbookGame = { ...game, id: 'g2' };
      expect(matcher.findMatchingGame('Buffalo Bills', 'Kansas City Chiefs', [game, duplicate])).toBe(game);
    });

    it('should return null for an empty list', () => {
      expect(matcher.findMatchingGame('Buffalo Bills', 'Kansas City Chiefs', [])).toBeNull();
    });
  });

  describe('getBookmakerQuotes', () => {
    it('should collect one moneyline quote per bookmaker', () => {
      const quotes = matcher.getBookmakerQuotes(game, 'home');

      expect(quotes.map((q) => [q.bookmaker, q.odds])).toEqual([
        ['DraftKings', -120],
        ['FanDuel', -110],
        ['BetMGM', -130],
      ]);
      expect(quotes[0].impliedProbability).toBeCloseTo(120 / 220, 12);
    });

    it('should skip unusable prices and non-moneyline markets', () => {
      const messy: SportsbookGame = {
        ...game,
        bookmakers: [
          book('NoPrice', 'N/A', null),
          {
            title: 'SpreadsOnly',
            markets: [{ key: 'spreads', outcomes: [{ name: 'Buffalo Bills', price: -110 }] }],
          },
          { key: 'unkeyed', markets: [{ outcomes: [{ name: 'Buffalo Bills', price: 140 }] }] },
        ],
      };

      expect(matcher.getBookmakerQuotes(messy, 'away')).toEqual([
        { bookmaker: 'unkeyed', odds: 140, impliedProbability: 100 / 240 },
      ]);
      expect(matcher.getBookmakerQuotes(messy, 'home')).toEqual([]);
    });
  });

  describe('getBestQuote', () => {
    it('should pick the highest American price', () => {
      expect(matcher.getBestQuote(matcher.getBookmakerQuotes(game, 'home'))?.odds).toBe(-110);
      expect(matcher.getBestQuote(matcher.getBookmakerQuotes(game, 'away'))?.odds).toBe(170);
    });

    it('should return null without quotes', () => {
      expect(matcher.getBestQuote([])).toBeNull();
    });
  });

  describe('getConsensus', () => {
    it('should average converted probabilities rather than raw odds', () => {
      const consensus = matcher.getConsensus(game);
      const expectedHome = (120 / 220 + 110 / 210 + 130 / 230) / 3;

      expect(consensus.home).toBeCloseTo(expectedHome, 12);
      // averaging the odds first (-120) would give a different number
      expect(Math.abs((consensus.home ?? 0) - americanToProbability(-120))).toBeGreaterThan(0.0005);
      expect(consensus.away).toBeCloseTo((100 / 250 + 100 / 270 + 100 / 260) / 3, 12);
      expect(consensus.bookmakerCount).toBe(3);
      expect(consensus.homeBest?.bookmaker).toBe('FanDuel');
    });

    it('should report null consensus when no bookmaker quotes the game', () => {
      const consensus = matcher.getConsensus({ ...game, bookmakers: [] });

      expect(consensus.away).toBeNull();
      expect(consensus.home).toBeNull();
      expect(consensus.bookmakerCount).toBe(0);
      expect(consensus.awayBest).toBeNull();
    });
  });
});

describe('CrossSourceMatcher with teams sharing a last word', () => {
  const matcher = new CrossSourceMatcher(TeamDirectory.forSport('soccer'));

  const cityDerby: SportsbookGame = {
    away_team: 'Leicester City',
    home_team: 'Manchester City',
    bookmakers: [
      {
        title: 'DraftKings',
        markets: [
          {
            key: 'h2h',
            outcomes: [
              { name: 'Manchester City', price: -300 },
              { name: 'Leicester City', price: 700 },
              { name: 'Draw', price: 400 },
            ],
          },
        ],
      },
    ],
  };

  it('should give distinct teams distinct keys', () => {
    expect(matcher.teamKey('Leicester City')).toBe('leicester city');
    expect(matcher.teamKey('Man City')).toBe('manchester city');
  });

  it('should not match a game for a different team', () => {
    const chelseaGame: SportsbookGame = { away_team: 'Manchester City', home_team: 'Chelsea', bookmakers: [] };
    const leicesterGame: SportsbookGame = { away_team: 'Leicester City', home_team: 'Chelsea', bookmakers: [] };

    expect(matcher.findMatchingGame('Leicester City', 'Chelsea', [chelseaGame])).toBeNull();
    expect(matcher.findMatchingGame('Leicester City', 'Chelsea', [chelseaGame, leicesterGame])).toBe(leicesterGame);
  });

  it('should quote each side from its own outcome and ignore the draw', () => {
    expect(matcher.getBookmakerQuotes(cityDerby, 'away')).toEqual([
      { bookmaker: 'DraftKings', odds: 700, impliedProbability: 100 / 800 },
    ]);
    expect(matcher.getBookmakerQuotes(cityDerby, 'home')).toEqual([
      { bookmaker: 'DraftKings', odds: -300, impliedProbability: 300 / 400 },
    ]);
  });
});
