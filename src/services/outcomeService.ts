import { GameResult, GameSide, OutcomeComparison } from '../types/markets';

/**
 * Confidence wording for a market probability, by percentage floor
 */
const CONFIDENCE_BANDS: Array<[number, string]> = [
  [75, 'very confident'],
  [60, 'moderately confident'],
  [40, 'uncertain'],
  [25, 'doubtful'],
];

export function confidenceLevel(percentage: number): string {
  for (const [floor, label] of CONFIDENCE_BANDS) {
    if (percentage >= floor) return label;
  }
  return 'very doubtful';
}

export class OutcomeService {
  /**
   * Check a settled game against the probability the market gave one side
   * @param probability - Market probability (0-1) that `side` wins
   */
  compareToMarket(result: GameResult, probability: number, side: GameSide): OutcomeComparison {
    if (!result.status.completed) {
      return { status: 'incomplete', message: 'Game has not finished yet' };
    }

    const team = side === 'home' ? result.homeTeam : result.awayTeam;
    const teamName = team?.name || 'Unknown';
    const betWon = result.winner === side;
    const pct = probability * 100;
    const confidence = confidenceLevel(pct);
    const rounded = pct.toFixed(0);

    let actualWinner: string | null = null;
    if (result.winner === 'home') {
      actualWinner = result.homeTeam?.name ?? null;
    } else if (result.winner === 'away') {
      actualWinner = result.awayTeam?.name ?? null;
    }

    let message: string;
    if (betWon) {
      message = pct >= 60
        ? `✅ Market prediction correct! The market was ${confidence} (${rounded}%) that ${teamName} would win, and they did.`
        : `✅ Upset alert! Despite low odds (${rounded}%), ${teamName} won!`;
    } else {
      message = pct >= 60
        ? `❌ Market prediction wrong. The market was ${confidence} (${rounded}%) that ${teamName} would win, but they lost.`
        : `❌ Expected result. The market was ${confidence} (${rounded}%) that ${teamName} would win, and they lost as predicted.`;
    }

    return {
      status: 'complete',
      betWon,
      teamName,
      probability,
      percentage: `${pct.toFixed(1)}%`,
      confidenceLevel: confidence,
      actualWinner,
      finalScore: {
        home: result.homeTeam?.score ?? null,
        away: result.awayTeam?.score ?? null,
      },
      message,
    };
  }
}
