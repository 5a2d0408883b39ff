import teamData from '../data/teams.json';
import { CanonicalTeam, SportKey, TeamEntry } from '../types/markets';
import { containsPhrase, similarityRatio, tokenize } from '../lib/similarity';

const TEAM_TABLE: Record<SportKey, TeamEntry[]> = teamData;

export const DEFAULT_FUZZY_THRESHOLD = 0.6;

const CODE_PATTERN = /^[A-Z0-9]{2,4}$/;

interface TeamTokens {
  team: CanonicalTeam;
  full: string[];
  city: string[];
  nickname: string[];
  variations: string[][];
}

/**
 * Canonical team lookup for one sport.
 *
 * Resolution runs in a fixed order and stops at the first hit:
 *   1. abbreviation or alternate code (case-insensitive)
 *   2. canonical name or known variation, then word containment
 *      (full name, nickname, city, and the candidate inside a canonical name)
 *   3. fuzzy ratio against names and variations, accepted above the threshold
 *
 * Every pass walks the teams in table order, so ties go to the earlier team.
 */
export class TeamDirectory {
  private static readonly instances = new Map<SportKey, TeamDirectory>();

  private readonly entries: CanonicalTeam[];
  private readonly codeMap = new Map<string, CanonicalTeam>();
  private readonly exactMap = new Map<string, CanonicalTeam>();
  private readonly tokenIndex: TeamTokens[];

  constructor(
    public readonly sport: SportKey,
    entries: TeamEntry[],
    private readonly fuzzyThreshold: number = DEFAULT_FUZZY_THRESHOLD
  ) {
    this.entries = entries.map((entry) => ({
      name: entry.name,
      abbr: entry.abbr,
      variations: [...entry.variations],
      sport,
    }));

    for (const team of this.entries) {
      this.addOnce(this.codeMap, team.abbr.toUpperCase(), team);
    }
    for (const team of this.entries) {
      for (const variation of team.variations) {
        if (CODE_PATTERN.test(variation)) {
          this.addOnce(this.codeMap, variation, team);
        }
      }
    }

    for (const team of this.entries) {
      this.addOnce(this.exactMap, team.name.toLowerCase(), team);
    }
    for (const team of this.entries) {
      for (const variation of team.variations) {
        this.addOnce(this.exactMap, variation.toLowerCase(), team);
      }
    }

    this.tokenIndex = this.entries.map((team) => {
      const full = tokenize(team.name);
      return {
        team,
        full,
        city: full.length > 1 ? full.slice(0, -1) : [],
        nickname: full.slice(-1),
        variations: team.variations
          .filter((variation) => !CODE_PATTERN.test(variation))
          .map((variation) => tokenize(variation)),
      };
    });
  }

  /**
   * Shared directory for a sport, built from the bundled team table
   */
  static forSport(sport: SportKey): TeamDirectory {
    let directory = TeamDirectory.instances.get(sport);
    if (!directory) {
      directory = new TeamDirectory(sport, TEAM_TABLE[sport]);
      TeamDirectory.instances.set(sport, directory);
    }
    return directory;
  }

  teams(): CanonicalTeam[] {
    return [...this.entries];
  }

  /**
   * Exact abbreviation or alternate code lookup (e.g. "IND", "LA", "GNB")
   */
  resolveCode(code: string): CanonicalTeam | null {
    return this.codeMap.get(code.trim().toUpperCase()) ?? null;
  }

  resolve(candidate: string | null | undefined): CanonicalTeam | null {
    const raw = (candidate ?? '').trim();
    if (!raw) return null;

    const byCode = this.resolveCode(raw);
    if (byCode) return byCode;

    const exact = this.exactMap.get(raw.toLowerCase());
    if (exact) return exact;

    const byContainment = this.resolveByContainment(tokenize(raw));
    if (byContainment) return byContainment;

    return this.resolveFuzzy(raw);
  }

  /**
   * Map of every known variation, abbreviation and canonical name to the canonical name
   */
  variationsMap(): Record<string, string> {
    const map: Record<string, string> = {};
    for (const team of this.entries) {
      for (const key of [team.abbr, ...team.variations, team.name]) {
        if (!(key in map)) {
          map[key] = team.name;
        }
      }
    }
    return map;
  }

  private resolveByContainment(tokens: string[]): CanonicalTeam | null {
    if (tokens.length === 0) return null;

    const passes: Array<(entry: TeamTokens) => boolean> = [
      (entry) =>
        containsPhrase(tokens, entry.full) ||
        entry.variations.some((variation) => variation.length > 1 && containsPhrase(tokens, variation)),
      (entry) => containsPhrase(tokens, entry.nickname),
      (entry) => containsPhrase(tokens, entry.city),
      (entry) => containsPhrase(entry.full, tokens),
    ];

    for (const pass of passes) {
      const hit = this.tokenIndex.find(pass);
      if (hit) return hit.team;
    }
    return null;
  }

  private resolveFuzzy(raw: string): CanonicalTeam | null {
    let best: CanonicalTeam | null = null;
    let bestScore = 0;

    for (const team of this.entries) {
      const texts = [team.name, ...team.variations.filter((variation) => !CODE_PATTERN.test(variation))];
      for (const text of texts) {
        const score = similarityRatio(raw, text);
        if (score > bestScore) {
          best = team;
          bestScore = score;
        }
      }
    }

    return best && bestScore > this.fuzzyThreshold ? best : null;
  }

  private addOnce(map: Map<string, CanonicalTeam>, key: string, team: CanonicalTeam): void {
    if (!map.has(key)) {
      map.set(key, team);
    }
  }
}
