#!/usr/bin/env node
import cron from 'node-cron';
import { KalshiClient } from './clients/kalshiClient';
import { OddsApiClient } from './clients/oddsApiClient';
import { ESPNClient, EspnEvent } from './clients/espnClient';
import { ReconciliationService } from './services/reconciliationService';
import { CrossSourceMatcher } from './services/crossSourceMatcher';
import { ComparisonService } from './services/comparisonService';
import { OutcomeService } from './services/outcomeService';
import { TeamDirectory } from './teams/teamDirectory';
import { TtlCache, cachedFetch } from './lib/cache';
import { colors } from './lib/colors';
import { errorMessage } from './lib/http';
import { americanOddsFromProbability, formatAmericanOdds } from './lib/odds';
import {
  ComparisonRecord,
  ComparisonSide,
  EventRecord,
  GameSide,
  KalshiContract,
  Mispricing,
  OutcomeComparison,
  SportKey,
  SportsbookGame,
} from './types/markets';
import { Config, SportConfig, config } from './config';

export interface RefreshContext {
  kalshi: KalshiClient;
  odds: OddsApiClient;
  espn: ESPNClient;
  sports: Record<SportKey, SportConfig>;
  maxPages: number;
  thresholdPct: number;
  contractCache: TtlCache<KalshiContract[]>;
  gameCache: TtlCache<SportsbookGame[]>;
  scoreboardCache: TtlCache<EspnEvent[]>;
}

export interface SettledGame {
  record: ComparisonRecord;
  outcome: OutcomeComparison;
}

export interface SportSnapshot {
  sport: SportKey;
  events: EventRecord[];
  comparisons: ComparisonRecord[];
  mispricings: Mispricing[];
  settled: SettledGame[];
}

export function createContext(cfg: Config = config): RefreshContext {
  const ttlMs = cfg.cache.ttlSeconds * 1000;
  return {
    kalshi: new KalshiClient({ baseUrl: cfg.kalshi.apiBaseUrl }),
    odds: new OddsApiClient({ baseUrl: cfg.oddsApi.apiBaseUrl, apiKey: cfg.oddsApi.apiKey }),
    espn: new ESPNClient({ baseUrl: cfg.espn.apiBaseUrl }),
    sports: cfg.sports,
    maxPages: cfg.kalshi.maxPages,
    thresholdPct: cfg.run.mispricingThresholdPct,
    contractCache: new TtlCache<KalshiContract[]>(ttlMs),
    gameCache: new TtlCache<SportsbookGame[]>(ttlMs),
    scoreboardCache: new TtlCache<EspnEvent[]>(ttlMs),
  };
}

let defaultContext: RefreshContext | null = null;

function getDefaultContext(): RefreshContext {
  if (!defaultContext) {
    defaultContext = createContext();
  }
  return defaultContext;
}

/**
 * Fetch all three sources for a sport in parallel (each through its cache),
 * reconcile the contracts and compare them with the sportsbooks.
 */
export async function runRefresh(sport: SportKey, context: RefreshContext = getDefaultContext()): Promise<SportSnapshot> {
  const sportConfig = context.sports[sport];

  const [contracts, games, scoreboard] = await Promise.all([
    cachedFetch(
      context.contractCache,
      `${sport}:contracts`,
      () => context.kalshi.getAllOpenContracts(sportConfig.kalshiSeries, context.maxPages),
      []
    ),
    context.odds.isConfigured
      ? cachedFetch(context.gameCache, `${sport}:odds`, () => context.odds.getGames(sportConfig.oddsApiKey), [])
      : Promise.resolve<SportsbookGame[]>([]),
    cachedFetch(context.scoreboardCache, `${sport}:scoreboard`, () => context.espn.getScoreboard(sportConfig.espnPath), []),
  ]);

  const directory = TeamDirectory.forSport(sport);
  const reconciler = new ReconciliationService({ directory, seriesTicker: sportConfig.kalshiSeries });
  const comparisonService = new ComparisonService(new CrossSourceMatcher(directory), context.thresholdPct);
  const outcomeService = new OutcomeService();

  const events = reconciler.reconcile(contracts);
  const comparisons = comparisonService.compare(events, games);
  const mispricings = comparisonService.findMispricings(comparisons);

  const settled: SettledGame[] = [];
  for (const record of comparisons) {
    const primary = record.event.winnerPrimary;
    if (primary.ticker === null || primary.yesBid === null) continue;

    const espnEvent = context.espn.findEvent(scoreboard, record.event.awayTeam, record.event.homeTeam, directory);
    if (!espnEvent) continue;

    const result = context.espn.extractGameResult(espnEvent);
    if (!result.status.completed) continue;

    const side: GameSide = primary.subjectTeam === record.event.homeTeam ? 'home' : 'away';
    settled.push({ record, outcome: outcomeService.compareToMarket(result, primary.yesBid, side) });
  }

  return { sport, events, comparisons, mispricings, settled };
}

function formatProbability(probability: number | null): string {
  return probability === null ? `${colors.gray}--${colors.reset}` : `${(probability * 100).toFixed(1)}%`;
}

/** Fair American price for a probability, e.g. " (-186)"; empty at 0 and 1 */
function formatFairOdds(probability: number | null): string {
  if (probability === null || probability <= 0 || probability >= 1) return '';
  return ` (${formatAmericanOdds(americanOddsFromProbability(probability))})`;
}

function formatSide(side: ComparisonSide): string {
  const diffColor = side.isOverThreshold ? colors.red : colors.gray;
  const diff = side.diffPct === null ? '' : ` ${diffColor}(${side.diffPct.toFixed(1)} pts)${colors.reset}`;
  const bestOdds = side.best?.odds ?? null;
  const best = side.best && bestOdds !== null
    ? ` ${colors.gray}best ${formatAmericanOdds(bestOdds)} @ ${side.best.bookmaker}${colors.reset}`
    : '';
  return `${side.team}: market ${formatProbability(side.marketProbability)}${formatFairOdds(side.marketProbability)} | books ${formatProbability(side.consensusProbability)}${diff}${best}`;
}

export function printReport(snapshot: SportSnapshot, sportConfig: SportConfig): void {
  const label = `${sportConfig.icon} ${colors.bright}${colors.cyan}${sportConfig.name}${colors.reset}`;
  console.log(`\n${label}: ${colors.yellow}${snapshot.events.length}${colors.reset} games`);

  snapshot.comparisons.forEach((record, idx) => {
    const primary = record.event.winnerPrimary;
    const close = record.event.closeDt ? record.event.closeDt.toISOString() : 'unknown close';
    console.log(`  ${colors.bright}${idx + 1}.${colors.reset} ${colors.yellow}${record.event.prettyEvent}${colors.reset} ${colors.gray}${close}${colors.reset}`);
    if (primary.ticker === null) {
      console.log(`     ${colors.gray}No winner contract${colors.reset}`);
      return;
    }
    console.log(
      `     ${primary.label} YES ${formatProbability(primary.yesBid)}/${formatProbability(primary.yesAsk)} ` +
      `NO ${formatProbability(primary.noBid)}/${formatProbability(primary.noAsk)}`
    );
    if (record.game) {
      console.log(`     ${formatSide(record.away)}`);
      console.log(`     ${formatSide(record.home)}`);
    }
  });

  if (snapshot.mispricings.length > 0) {
    console.log(`\n${colors.bright}${colors.magenta}Mispricings (${snapshot.mispricings.length}):${colors.reset}`);
    snapshot.mispricings.forEach((m, idx) => {
      const direction = m.isMarketOvervaluing ? `${colors.red}market high${colors.reset}` : `${colors.green}market low${colors.reset}`;
      console.log(
        `  ${idx + 1}. ${m.prettyEvent} - ${m.team}: ${formatProbability(m.marketProbability)} vs ` +
        `${formatProbability(m.consensusProbability)} (${m.differencePct.toFixed(1)} pts, ${direction})`
      );
    });
  }

  for (const { record, outcome } of snapshot.settled) {
    console.log(`  ${record.event.prettyEvent}: ${outcome.message}`);
  }
}

export async function runAll(context: RefreshContext = getDefaultContext(), sports: SportKey[] = config.run.sports): Promise<void> {
  for (const sport of sports) {
    try {
      const snapshot = await runRefresh(sport, context);
      printReport(snapshot, context.sports[sport]);
    } catch (error: unknown) {
      console.error(`${colors.red}${sport.toUpperCase()} refresh failed: ${errorMessage(error)}${colors.reset}`);
    }
  }
}

// Main execution for CLI usage only
async function main(): Promise<void> {
  // Run once immediately
  await runAll();

  // Schedule recurring runs if cron expression is provided
  const schedule = config.run.runScheduleCron;
  if (schedule) {
    cron.schedule(schedule, async () => {
      await runAll();
    });
    console.log(`${colors.gray}Scheduled refresh: ${schedule}${colors.reset}`);
  } else {
    process.exit(0);
  }
}

// Only attach process handlers and start when this file
// is executed directly (e.g. "node dist/index.js"), not when imported.
if (require.main === module) {
  process.on('unhandledRejection', (error: unknown) => {
    console.error(`${colors.red}Unhandled rejection: ${errorMessage(error)}${colors.reset}`);
    process.exit(1);
  });

  process.on('SIGINT', () => {
    process.exit(0);
  });

  main().catch((error: unknown) => {
    console.error(`${colors.red}Fatal: ${errorMessage(error)}${colors.reset}`);
    process.exit(1);
  });
}
