import { parseEventTicker, decodeTeamsFromEventTicker, subjectCodeFromTicker } from './ticker';
import { TeamDirectory } from '../teams/teamDirectory';

describe('ticker', () => {
  const nfl = TeamDirectory.forSport('nfl');

  describe('parseEventTicker', () => {
    it('should split series, date and team block', () => {
      expect(parseEventTicker('KXNFLGAME-25NOV09ATLIND')).toEqual({
        series: 'KXNFLGAME',
        date: '2025-11-09',
        teamBlock: 'ATLIND',
      });
    });

    it('should accept lower-case tickers', () => {
      expect(parseEventTicker('kxnflgame-25dec01nygne')?.teamBlock).toBe('NYGNE');
    });

    it('should return null for other shapes', () => {
      expect(parseEventTicker('KXNFLGAME')).toBeNull();
      expect(parseEventTicker('random text')).toBeNull();
    });
  });

  describe('decodeTeamsFromEventTicker', () => {
    it('should decode a 3+3 team block as away then home', () => {
      const teams = decodeTeamsFromEventTicker('KXNFLGAME-25NOV09ATLIND', nfl);
      expect(teams?.away.name).toBe('Atlanta Falcons');
      expect(teams?.home.name).toBe('Indianapolis Colts');
    });

    it('should decode blocks containing a two-letter code', () => {
      const teams = decodeTeamsFromEventTicker('KXNFLGAME-25NOV30LACAR', nfl);
      expect(teams?.away.name).toBe('Los Angeles Rams');
      expect(teams?.home.name).toBe('Carolina Panthers');

      const raiders = decodeTeamsFromEventTicker('KXNFLGAME-25DEC01NYGNE', nfl);
      expect(raiders?.away.name).toBe('New York Giants');
      expect(raiders?.home.name).toBe('New England Patriots');
    });

    it('should fall back to the last two recognised codes', () => {
      const teams = decodeTeamsFromEventTicker('KXNFLGAME-SPECIAL-DAL-PHI', nfl);
      expect(teams?.away.name).toBe('Dallas Cowboys');
      expect(teams?.home.name).toBe('Philadelphia Eagles');
    });

    it('should return null when fewer than two teams are encoded', () => {
      expect(decodeTeamsFromEventTicker('KXNFLGAME-25NOV09XYZQRS', nfl)).toBeNull();
      expect(decodeTeamsFromEventTicker('', nfl)).toBeNull();
    });
  });

  describe('subjectCodeFromTicker', () => {
    it('should read the team code after the last dash', () => {
      expect(subjectCodeFromTicker('KXNFLGAME-25NOV09ATLIND-IND')).toBe('IND');
      expect(subjectCodeFromTicker('kxnflgame-25nov30lacar-la')).toBe('LA');
    });

    it('should return null without a code suffix', () => {
      expect(subjectCodeFromTicker('KXNFLGAME-25NOV09ATLIND-T45')).toBeNull();
      expect(subjectCodeFromTicker(null)).toBeNull();
    });
  });
});
