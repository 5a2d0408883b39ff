import {
  americanToProbability,
  centsToProbability,
  complementProbability,
  americanOddsFromProbability,
  probabilityDifferencePct,
  parseOddsString,
  formatAmericanOdds,
} from './odds';

describe('odds', () => {
  describe('americanToProbability', () => {
    it('should convert positive American odds to probability', () => {
      expect(americanToProbability(200)).toBeCloseTo(100 / 300, 10);
      expect(americanToProbability(150)).toBeCloseTo(100 / 250, 10);
    });

    it('should convert negative American odds to probability', () => {
      expect(americanToProbability(-150)).toBe(0.6);
      expect(americanToProbability(-200)).toBeCloseTo(200 / 300, 10);
    });

    it('should return exactly 0.5 at even money', () => {
      expect(americanToProbability(-100)).toBe(0.5);
      expect(americanToProbability(100)).toBe(0.5);
    });

    it('should keep favorites above and underdogs below 0.5', () => {
      for (const odds of [-101, -110, -250, -1000, -5000]) {
        expect(americanToProbability(odds)).toBeGreaterThan(0.5);
      }
      for (const odds of [101, 110, 250, 1000, 5000]) {
        expect(americanToProbability(odds)).toBeLessThan(0.5);
      }
    });

    it('should treat zero odds as zero probability', () => {
      expect(americanToProbability(0)).toBe(0);
    });
  });

  describe('centsToProbability', () => {
    it('should convert cents to a two-decimal probability', () => {
      expect(centsToProbability(35)).toBe(0.35);
      expect(centsToProbability(65)).toBe(0.65);
      expect(centsToProbability(0)).toBe(0);
      expect(centsToProbability(100)).toBe(1);
    });

    it('should pass null through', () => {
      expect(centsToProbability(null)).toBeNull();
      expect(centsToProbability(undefined)).toBeNull();
    });

    it('should be stable when converted back to cents', () => {
      for (let cents = 0; cents <= 100; cents++) {
        const probability = centsToProbability(cents);
        expect(probability).not.toBeNull();
        if (probability !== null) {
          expect(centsToProbability(probability * 100)).toBe(probability);
        }
      }
    });
  });

  describe('complementProbability', () => {
    it('should round the complement to two decimals', () => {
      expect(complementProbability(0.35)).toBe(0.65);
      expect(complementProbability(0.67)).toBe(0.33);
      expect(complementProbability(null)).toBeNull();
    });
  });

  describe('americanOddsFromProbability', () => {
    it('should convert probability to negative American odds when >= 0.5', () => {
      expect(americanOddsFromProbability(0.5)).toBe(-100);
      expect(americanOddsFromProbability(0.75)).toBe(-300);
    });

    it('should convert probability to positive American odds when < 0.5', () => {
      expect(americanOddsFromProbability(0.25)).toBe(300);
      expect(americanOddsFromProbability(0.1)).toBe(900);
    });
  });

  describe('probabilityDifferencePct', () => {
    it('should calculate absolute difference in percentage points', () => {
      expect(probabilityDifferencePct(0.5, 0.6)).toBeCloseTo(10, 10);
      expect(probabilityDifferencePct(0.6, 0.5)).toBeCloseTo(10, 10);
      expect(probabilityDifferencePct(0.5, 0.5)).toBe(0);
    });
  });

  describe('parseOddsString', () => {
    it('should parse signed strings and EVEN', () => {
      expect(parseOddsString('-105')).toBe(-105);
      expect(parseOddsString('+150')).toBe(150);
      expect(parseOddsString('EVEN')).toBe(100);
      expect(parseOddsString(' ev ')).toBe(100);
      expect(parseOddsString(-120)).toBe(-120);
    });

    it('should return null for unparseable input', () => {
      expect(parseOddsString('n/a')).toBeNull();
      expect(parseOddsString(null)).toBeNull();
      expect(parseOddsString(Number.NaN)).toBeNull();
    });
  });

  it('should format American odds with a sign', () => {
    expect(formatAmericanOdds(150)).toBe('+150');
    expect(formatAmericanOdds(-120)).toBe('-120');
  });
});
