import { CanonicalTeam } from '../types/markets';
import { TeamDirectory } from '../teams/teamDirectory';

export interface ParsedEventTicker {
  series: string;
  date: string | null; // YYYY-MM-DD
  teamBlock: string;
}

const MONTHS: Record<string, string> = {
  JAN: '01', FEB: '02', MAR: '03', APR: '04', MAY: '05', JUN: '06',
  JUL: '07', AUG: '08', SEP: '09', OCT: '10', NOV: '11', DEC: '12',
};

// Two codes glued together: ATLIND = ATL + IND, LACAR = LA + CAR
const POSSIBLE_SPLITS: Array<[number, number]> = [
  [3, 3], [2, 3], [3, 2], [2, 2], [4, 3], [3, 4], [4, 4], [2, 4], [4, 2],
];

export function parseEventTicker(eventTicker: string): ParsedEventTicker | null {
  // Format: KXNFLGAME-25NOV09ATLIND or KXNBAGAME-25NOV28DALLAL
  const match = eventTicker.toUpperCase().match(/^([A-Z0-9]+)-(\d{2})([A-Z]{3})(\d{2})([A-Z]+)$/);
  if (!match) return null;

  const [, series, year, monthName, day, teamBlock] = match;
  const month = MONTHS[monthName];
  return {
    series,
    date: month ? `20${year}-${month}-${day}` : null,
    teamBlock,
  };
}

/**
 * Decode the away/home teams encoded in an event ticker.
 * The glued team block is split first; otherwise the last two recognised
 * 2-3 letter codes anywhere in the ticker are taken as away then home.
 */
export function decodeTeamsFromEventTicker(
  eventTicker: string,
  directory: TeamDirectory
): { away: CanonicalTeam; home: CanonicalTeam } | null {
  if (!eventTicker) return null;

  const parsed = parseEventTicker(eventTicker);
  if (parsed) {
    const block = parsed.teamBlock;
    for (const [len1, len2] of POSSIBLE_SPLITS) {
      if (block.length !== len1 + len2) continue;
      const away = directory.resolveCode(block.substring(0, len1));
      const home = directory.resolveCode(block.substring(len1));
      if (away && home) {
        return { away, home };
      }
    }
  }

  const codes = eventTicker.toUpperCase().match(/[A-Z]{2,3}/g) ?? [];
  const valid = codes
    .map((code) => directory.resolveCode(code))
    .filter((team): team is CanonicalTeam => team !== null);
  if (valid.length >= 2) {
    return { away: valid[valid.length - 2], home: valid[valid.length - 1] };
  }
  return null;
}

/**
 * Team code after the last dash of a contract ticker: KXNFLGAME-25NOV09ATLIND-IND -> IND
 */
export function subjectCodeFromTicker(ticker: string | null | undefined): string | null {
  if (!ticker) return null;
  const match = ticker.toUpperCase().match(/-([A-Z]{2,3})$/);
  return match ? match[1] : null;
}
