import { z } from 'zod';
import { GameResult, GameResultTeam } from '../types/markets';
import { TeamDirectory } from '../teams/teamDirectory';
import { HttpClient, createHttpClient, errorMessage, logHttpError } from '../lib/http';
import { colors } from '../lib/colors';

const nullableString = z.string().nullish();

const competitorSchema = z.object({
  id: nullableString,
  homeAway: nullableString,
  score: z.union([z.string(), z.number()]).nullish(),
  winner: z.boolean().nullish(),
  team: z
    .object({
      displayName: nullableString,
      name: nullableString,
      abbreviation: nullableString,
    })
    .nullish(),
});

const eventSchema = z.object({
  id: nullableString,
  name: nullableString,
  shortName: nullableString,
  date: nullableString,
  status: z
    .object({
      type: z
        .object({
          completed: z.boolean().nullish(),
          description: nullableString,
          state: nullableString,
        })
        .nullish(),
    })
    .nullish(),
  competitions: z.array(z.object({ competitors: z.array(competitorSchema).nullish() })).nullish(),
});

const scoreboardSchema = z.object({
  events: z.array(z.unknown()).nullish(),
});

const summarySchema = z.record(z.unknown());

export type EspnEvent = z.infer<typeof eventSchema>;
/** Box score, leaders, drives and the rest of one game's detail, as sent */
export type EspnGameSummary = z.infer<typeof summarySchema>;
type EspnCompetitor = z.infer<typeof competitorSchema>;

/** Days around the expected date to search, nearest first */
const DAY_OFFSETS = [0, -1, 1, -2, 2];
const DAY_MS = 24 * 60 * 60 * 1000;

export interface EspnClientOptions {
  baseUrl: string;
  http?: HttpClient;
}

export class ESPNClient {
  private readonly http: HttpClient;

  constructor(options: EspnClientOptions) {
    // Normalize base URL - remove /scoreboard if it's already there
    let baseURL = options.baseUrl.replace(/\/$/, '');
    if (baseURL.endsWith('/scoreboard')) {
      baseURL = baseURL.replace(/\/scoreboard$/, '');
    }

    this.http = options.http ?? createHttpClient(baseURL);
  }

  /**
   * Scoreboard events for a sport, optionally for one day
   * @param sportPath - e.g. "football/nfl/scoreboard"
   * @param date - YYYYMMDD
   */
  async getScoreboard(sportPath: string, date?: string): Promise<EspnEvent[]> {
    let data: unknown;
    try {
      const response = await this.http.get(sportPath, date ? { params: { dates: date } } : undefined);
      data = response.data;
    } catch (error: unknown) {
      logHttpError('ESPN', error);
      throw new Error(`Failed to fetch ESPN scoreboard: ${errorMessage(error)}`);
    }

    const envelope = scoreboardSchema.safeParse(data);
    if (!envelope.success) {
      return [];
    }

    const events: EspnEvent[] = [];
    for (const raw of envelope.data.events ?? []) {
      const parsed = eventSchema.safeParse(raw);
      if (parsed.success) {
        events.push(parsed.data);
      }
    }
    return events;
  }

  /**
   * Full detail for one game from the sport's summary endpoint
   * @param sportPath - scoreboard path of the sport; "scoreboard" becomes "summary"
   * @returns The summary object, or null when the body is not an object
   */
  async getGameSummary(sportPath: string, gameId: string): Promise<EspnGameSummary | null> {
    const summaryPath = sportPath.replace(/\/?scoreboard$/, '') + '/summary';

    let data: unknown;
    try {
      const response = await this.http.get(summaryPath, { params: { event: gameId } });
      data = response.data;
    } catch (error: unknown) {
      logHttpError('ESPN', error);
      throw new Error(`Failed to fetch ESPN game summary for ${gameId}: ${errorMessage(error)}`);
    }

    const parsed = summarySchema.safeParse(data);
    return parsed.success ? parsed.data : null;
  }

  /**
   * Look for the game on the expected day, then one and two days either side.
   * Team names are compared through `directory` when given.
   */
  async findGameByTeamsAndDate(
    sportPath: string,
    awayTeam: string,
    homeTeam: string,
    gameDate: Date,
    directory?: TeamDirectory
  ): Promise<GameResult | null> {
    for (const offset of DAY_OFFSETS) {
      const date = formatScoreboardDate(new Date(gameDate.getTime() + offset * DAY_MS));

      let events: EspnEvent[];
      try {
        events = await this.getScoreboard(sportPath, date);
      } catch (error: unknown) {
        console.warn(`  ${colors.yellow}Scoreboard for ${date} unavailable: ${errorMessage(error)}${colors.reset}`);
        continue;
      }

      const event = this.findEvent(events, awayTeam, homeTeam, directory);
      if (event) {
        return this.extractGameResult(event);
      }
    }

    console.warn(`  ${colors.yellow}No game found for ${awayTeam} @ ${homeTeam} near ${formatScoreboardDate(gameDate)}${colors.reset}`);
    return null;
  }

  /**
   * First two-team event whose away and home sides match the given names
   */
  findEvent(events: EspnEvent[], awayTeam: string, homeTeam: string, directory?: TeamDirectory): EspnEvent | null {
    for (const event of events) {
      const competitors = event.competitions?.[0]?.competitors ?? [];
      if (competitors.length !== 2) continue;

      const away = competitors.find((c) => c.homeAway === 'away');
      const home = competitors.find((c) => c.homeAway === 'home');
      if (!away || !home) continue;

      if (teamsMatch(displayName(away), awayTeam, directory) && teamsMatch(displayName(home), homeTeam, directory)) {
        return event;
      }
    }
    return null;
  }

  extractGameResult(event: EspnEvent): GameResult {
    const competitors = event.competitions?.[0]?.competitors ?? [];

    let homeTeam: GameResultTeam | null = null;
    let awayTeam: GameResultTeam | null = null;
    for (const competitor of competitors) {
      const team: GameResultTeam = {
        id: competitor.id ?? null,
        name: displayName(competitor),
        abbreviation: competitor.team?.abbreviation ?? '',
        score: parseScore(competitor.score),
        winner: competitor.winner ?? false,
      };
      if (competitor.homeAway === 'home') {
        homeTeam = team;
      } else {
        awayTeam = team;
      }
    }

    const statusType = event.status?.type;
    const completed = statusType?.completed ?? false;

    let winner: GameResult['winner'] = null;
    if (completed && homeTeam && awayTeam) {
      if (homeTeam.winner) {
        winner = 'home';
      } else if (awayTeam.winner) {
        winner = 'away';
      }
    }

    return {
      gameId: event.id ?? null,
      name: event.name ?? null,
      shortName: event.shortName ?? null,
      date: event.date ?? null,
      status: {
        completed,
        description: statusType?.description ?? '',
        state: statusType?.state ?? '',
      },
      homeTeam,
      awayTeam,
      winner,
    };
  }
}

/**
 * Same team when both names resolve to one canonical team; otherwise
 * case-insensitive equality, containment either way, or equal last words
 */
export function teamsMatch(espnName: string, name: string, directory?: TeamDirectory): boolean {
  if (directory) {
    const a = directory.resolve(espnName);
    const b = directory.resolve(name);
    if (a && b) {
      return a.name === b.name;
    }
  }

  const espnLower = espnName.toLowerCase().trim();
  const nameLower = name.toLowerCase().trim();
  if (!espnLower || !nameLower) return false;
  if (espnLower.includes(nameLower) || nameLower.includes(espnLower)) return true;

  const espnParts = espnLower.split(/\s+/);
  const nameParts = nameLower.split(/\s+/);
  return espnParts[espnParts.length - 1] === nameParts[nameParts.length - 1];
}

export function formatScoreboardDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, '');
}

function displayName(competitor: EspnCompetitor): string {
  return competitor.team?.displayName || competitor.team?.name || '';
}

function parseScore(score: string | number | null | undefined): number | null {
  if (typeof score === 'number') {
    return Number.isFinite(score) ? score : null;
  }
  if (!score) return null;
  const parsed = parseInt(score, 10);
  return isNaN(parsed) ? null : parsed;
}
