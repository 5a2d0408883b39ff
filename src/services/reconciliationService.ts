import {
  CanonicalTeam,
  EventRecord,
  KalshiContract,
  NormalizedContract,
  WinnerPrimary,
} from '../types/markets';
import { TeamDirectory } from '../teams/teamDirectory';
import { centsToProbability, complementProbability } from '../lib/odds';
import { decodeTeamsFromEventTicker, subjectCodeFromTicker } from '../lib/ticker';
import { tokenize } from '../lib/similarity';

export const UNKNOWN_EVENT = 'UNKNOWN_EVENT';
export const AWAY_PLACEHOLDER = 'Away';
export const HOME_PLACEHOLDER = 'Home';

export interface ReconciliationOptions {
  directory: TeamDirectory;
  /** Series ticker the contracts were fetched from, e.g. KXNFLGAME */
  seriesTicker?: string;
}

interface Matchup {
  awayTeam: string;
  homeTeam: string;
  awayCanonical: CanonicalTeam | null;
  homeCanonical: CanonicalTeam | null;
  prettyEvent: string;
}

/**
 * Turns the flat contract list of a game series into one record per event.
 *
 * Each event gets a single "Winner" row: the home team's YES contract when
 * present, otherwise the away team's. The NO side is never read from the
 * market; it is the complement of the other team's YES contract, or of the
 * primary contract itself when the other team has no contract.
 *
 * Nothing here throws on malformed data: unknown tickers, missing teams and
 * missing prices all degrade to placeholders and nulls.
 */
export class ReconciliationService {
  private readonly directory: TeamDirectory;
  private readonly seriesTicker: string | null;

  constructor(options: ReconciliationOptions) {
    this.directory = options.directory;
    this.seriesTicker = options.seriesTicker ?? null;
  }

  /**
   * Group, combine and sort by earliest close time (unknown close times last)
   */
  reconcile(contracts: KalshiContract[]): EventRecord[] {
    const records: EventRecord[] = [];
    for (const [eventTicker, eventContracts] of this.groupByEvent(contracts)) {
      records.push(this.combineEventContracts(eventTicker, eventContracts));
    }

    return records.sort((a, b) => {
      if (a.closeDt === null && b.closeDt === null) return 0;
      if (a.closeDt === null) return 1;
      if (b.closeDt === null) return -1;
      return a.closeDt.getTime() - b.closeDt.getTime();
    });
  }

  groupByEvent(contracts: KalshiContract[]): Map<string, KalshiContract[]> {
    const grouped = new Map<string, KalshiContract[]>();
    for (const contract of contracts) {
      const key = contract.event_ticker || UNKNOWN_EVENT;
      const bucket = grouped.get(key);
      if (bucket) {
        bucket.push(contract);
      } else {
        grouped.set(key, [contract]);
      }
    }
    return grouped;
  }

  normalizeContract(raw: KalshiContract): NormalizedContract {
    return {
      ticker: raw.ticker ?? null,
      eventTicker: raw.event_ticker ?? null,
      seriesTicker: raw.series_ticker ?? this.seriesTicker,
      title: raw.title ?? null,
      subtitle: raw.subtitle ?? null,
      marketType: raw.market_type ?? null,
      closeTime: raw.close_time ?? null,
      closeDt: parseCloseTime(raw.close_time),
      yesBid: centsToProbability(raw.yes_bid),
      yesAsk: centsToProbability(raw.yes_ask),
      openInterest: raw.open_interest ?? null,
      volume24h: raw.volume_24h ?? null,
    };
  }

  combineEventContracts(eventTicker: string, rawContracts: KalshiContract[]): EventRecord {
    const contracts = rawContracts.map((raw) => this.normalizeContract(raw));
    const matchup = this.resolveMatchup(eventTicker, contracts);

    let awayWin: NormalizedContract | null = null;
    let homeWin: NormalizedContract | null = null;
    for (const contract of contracts) {
      if (!(contract.title ?? '').toLowerCase().includes('winner')) continue;

      const subject = this.resolveSubject(contract, matchup);
      if (subject === 'away' && !awayWin) {
        awayWin = contract;
      } else if (subject === 'home' && !homeWin) {
        homeWin = contract;
      }
    }

    return {
      eventTicker,
      prettyEvent: matchup.prettyEvent,
      awayTeam: matchup.awayTeam,
      homeTeam: matchup.homeTeam,
      awayCanonical: matchup.awayCanonical,
      homeCanonical: matchup.homeCanonical,
      closeDt: earliest(contracts.map((contract) => contract.closeDt)),
      openInterestSum: contracts.reduce((sum, contract) => sum + (contract.openInterest ?? 0), 0),
      volume24hSum: contracts.reduce((sum, contract) => sum + (contract.volume24h ?? 0), 0),
      winnerPrimary: buildWinnerPrimary(matchup, awayWin, homeWin),
      allContracts: contracts,
    };
  }

  private resolveMatchup(eventTicker: string, contracts: NormalizedContract[]): Matchup {
    const decoded = decodeTeamsFromEventTicker(eventTicker === UNKNOWN_EVENT ? '' : eventTicker, this.directory);
    if (decoded) {
      return {
        awayTeam: decoded.away.name,
        homeTeam: decoded.home.name,
        awayCanonical: decoded.away,
        homeCanonical: decoded.home,
        prettyEvent: `${decoded.away.name} at ${decoded.home.name}`,
      };
    }

    const fromText = this.matchupFromText(contracts);
    if (fromText) return fromText;

    const firstTitle = contracts.length > 0 ? contracts[0].title : null;
    return {
      awayTeam: AWAY_PLACEHOLDER,
      homeTeam: HOME_PLACEHOLDER,
      awayCanonical: null,
      homeCanonical: null,
      prettyEvent: firstTitle || (eventTicker !== UNKNOWN_EVENT ? eventTicker : 'Unknown matchup'),
    };
  }

  /**
   * Look for "<away> at <home>" in the title (before any colon) and subtitle
   */
  private matchupFromText(contracts: NormalizedContract[]): Matchup | null {
    for (const contract of contracts) {
      const head = (contract.title ?? '').split(':', 1)[0];
      const text = [head, contract.subtitle ?? ''].join(' ');
      const match = text.match(/(.+?)\s+at\s+(.+)/i);
      if (!match) continue;

      const awayRaw = match[1].trim();
      const homeRaw = match[2].trim();
      const awayCanonical = this.directory.resolve(awayRaw);
      const homeCanonical = this.directory.resolve(homeRaw);
      const awayTeam = awayCanonical?.name ?? awayRaw;
      const homeTeam = homeCanonical?.name ?? homeRaw;
      return {
        awayTeam,
        homeTeam,
        awayCanonical,
        homeCanonical,
        prettyEvent: `${awayTeam} at ${homeTeam}`,
      };
    }
    return null;
  }

  /**
   * Which side a Winner contract's YES refers to: ticker suffix first, then
   * word overlap with the team names. Ties are left unresolved.
   */
  private resolveSubject(contract: NormalizedContract, matchup: Matchup): 'away' | 'home' | null {
    const code = subjectCodeFromTicker(contract.ticker);
    const byCode = code ? this.directory.resolveCode(code) : null;
    if (byCode) {
      if (byCode.name === matchup.awayTeam) return 'away';
      if (byCode.name === matchup.homeTeam) return 'home';
    }

    const words = new Set(tokenize([contract.title ?? '', contract.subtitle ?? ''].join(' ')));
    const score = (team: string) => tokenize(team).filter((token) => words.has(token)).length;
    const awayScore = score(matchup.awayTeam);
    const homeScore = score(matchup.homeTeam);

    if (awayScore === homeScore) return null;
    return awayScore > homeScore ? 'away' : 'home';
  }
}

function buildWinnerPrimary(
  matchup: Matchup,
  awayWin: NormalizedContract | null,
  homeWin: NormalizedContract | null
): WinnerPrimary {
  const primary = homeWin ?? awayWin;
  const secondary = primary === homeWin ? awayWin : homeWin;
  const subjectTeam = primary !== null && primary === awayWin ? matchup.awayTeam : matchup.homeTeam;

  const yesBid = primary?.yesBid ?? null;
  const yesAsk = primary?.yesAsk ?? null;
  const secondaryBid = secondary?.yesBid ?? null;
  const secondaryAsk = secondary?.yesAsk ?? null;

  return {
    label: `${subjectTeam} — Winner?`,
    subjectTeam,
    yesBid,
    yesAsk,
    noBid: complementProbability(secondaryAsk ?? yesAsk),
    noAsk: complementProbability(secondaryBid ?? yesBid),
    ticker: primary?.ticker ?? null,
  };
}

function parseCloseTime(value: string | null | undefined): Date | null {
  if (!value) return null;
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function earliest(dates: Array<Date | null>): Date | null {
  let min: Date | null = null;
  for (const date of dates) {
    if (date && (min === null || date.getTime() < min.getTime())) {
      min = date;
    }
  }
  return min;
}
