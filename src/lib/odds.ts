/**
 * Round a probability to two decimal places
 */
export function roundProbability(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Convert a market price in cents to a probability
 * @param cents - Price in minor units (0-100)
 * @returns Probability rounded to 2 decimals, or null when the price is unknown
 */
export function centsToProbability(cents: number | null | undefined): number | null {
  if (cents === null || cents === undefined || !Number.isFinite(cents)) {
    return null;
  }
  return roundProbability(cents / 100);
}

/**
 * Convert American odds to implied probability
 * @param odds - American odds (e.g., -150, +200)
 * @returns Implied probability as a decimal (0-1); 0 for the invalid value 0
 */
export function americanToProbability(odds: number): number {
  if (odds === 0 || !Number.isFinite(odds)) {
    return 0;
  }
  if (odds > 0) {
    return 100 / (odds + 100);
  }
  return (-odds) / ((-odds) + 100);
}

/**
 * Complement of a probability, rounded to 2 decimals (the NO side of a YES price)
 */
export function complementProbability(probability: number | null): number | null {
  return probability === null ? null : roundProbability(1 - probability);
}

/**
 * Convert implied probability to American odds
 * @param probability - Implied probability as a decimal (0-1)
 * @returns American odds
 */
export function americanOddsFromProbability(probability: number): number {
  if (probability >= 0.5) {
    return Math.round(-100 * probability / (1 - probability));
  } else {
    return Math.round(100 * (1 - probability) / probability);
  }
}

/**
 * Calculate the difference between two probabilities as percentage points
 */
export function probabilityDifferencePct(prob1: number, prob2: number): number {
  return Math.abs(prob1 - prob2) * 100;
}

/**
 * Parse odds given as a number or a string.
 * Handles formats like "-105", "+150", "EVEN" (which is +100)
 */
export function parseOddsString(odds: string | number | null | undefined): number | null {
  if (typeof odds === 'number') {
    return Number.isFinite(odds) ? odds : null;
  }
  if (typeof odds !== 'string') {
    return null;
  }

  const trimmed = odds.trim().toUpperCase();
  if (trimmed === 'EVEN' || trimmed === 'EV') {
    return 100;
  }

  const parsed = parseInt(trimmed, 10);
  if (!isNaN(parsed)) {
    return parsed;
  }

  return null;
}

/**
 * Format American odds for display, e.g. +150 / -120
 */
export function formatAmericanOdds(odds: number): string {
  return odds > 0 ? `+${odds}` : `${odds}`;
}
