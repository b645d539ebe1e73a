#!/usr/bin/env tsx
/**
 * Find the batting order that scores the most runs for a roster
 * Usage: npx tsx find-best-lineup.ts [--roster rosters/example.json] [--games 10] [--max-lineups 5000] [--seed 42]
 *
 * Every legal order is simulated for --games games (or a uniform sample of
 * --max-lineups of them), then the best few are printed. With --db the whole
 * run is added to a SQLite file; search-history.ts reads it back.
 */

import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import {
  createRoster,
  createSeededRandom,
  defaultRandom,
  exceedsEnumerationCeiling,
  findBestLineup,
  LineupSimulator,
  ENUMERATION_CEILING,
  type GameRules,
} from '@lineup/model';
import { parseSearchArgs } from './src/lib/cli/args.js';
import { loadRosterConfig } from './src/lib/roster/roster-config.js';
import {
  formatInningLine,
  formatLineup,
  formatProgress,
  formatRosterSummary,
  formatSampleShortfall,
  formatSearchReport,
} from './src/lib/report/console-report.js';
import { openResultsDatabase, saveResultsDatabase } from './src/lib/results/database.js';
import { saveSearchRun } from './src/lib/results/results-store.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const DEFAULT_ROSTER = join(__dirname, 'rosters/example.json');

async function main(): Promise<void> {
  const args = parseSearchArgs(process.argv.slice(2));
  const rosterPath = args.rosterPath ?? DEFAULT_ROSTER;

  const { config, warnings } = loadRosterConfig(rosterPath);
  for (const warning of warnings) {
    console.warn(`[LineupSearch] ⚠️  ${warning}`);
  }

  const roster = createRoster(config.roster);
  const random = args.seed === undefined ? defaultRandom : createSeededRandom(args.seed);
  const game: Partial<GameRules> = {
    innings: args.innings,
    runCap: args.runCap,
    continueBattingOrder: args.continueBattingOrder,
    unknownPlayer: args.strictPlayers ? 'throw' : 'out',
  };

  console.log(`= Lineup Search: ${config.name} =`);
  console.log(`Roster file: ${rosterPath}`);
  for (const line of formatRosterSummary(roster, config.rules)) {
    console.log(line);
  }
  console.log(`Games per lineup: ${args.gamesPerLineup}`);
  if (args.seed !== undefined) {
    console.log(`Seed: ${args.seed}`);
  }

  if (args.strategy === 'enumerate' && exceedsEnumerationCeiling(roster)) {
    console.warn(
      `[LineupSearch] ⚠️  ${roster.players.length} players is above the enumeration ceiling of ${ENUMERATION_CEILING}; ` +
        'consider --strategy rejection --max-lineups N'
    );
  }

  console.log('');
  console.log('🔍 Generating legal lineups...');

  const result = findBestLineup(roster, {
    gamesPerLineup: args.gamesPerLineup,
    maxLineups: args.maxLineups,
    strategy: args.strategy,
    rules: config.rules,
    game,
    random,
    onProgress: (progress) => console.log(formatProgress(progress)),
  });

  if (args.maxLineups !== undefined) {
    const shortfall = formatSampleShortfall(result, args.maxLineups);
    if (shortfall) {
      console.warn(`[LineupSearch] ⚠️  ${shortfall}`);
    }
  }

  console.log('');
  for (const line of formatSearchReport(result, roster, { top: args.top })) {
    console.log(line);
  }

  if (args.verbose && result.best) {
    console.log('');
    console.log(`🎲 Sample game: ${formatLineup(result.best.lineup)}`);
    const simulator = new LineupSimulator(roster, { rules: game, random });
    const total = simulator.simulateGame(result.best.lineup, (inning, runs) => {
      console.log(formatInningLine(inning, runs));
    });
    console.log(`Total: ${total} runs`);
  }

  if (args.dbPath) {
    const db = await openResultsDatabase(args.dbPath);
    try {
      const runId = saveSearchRun(db, {
        rosterName: config.name,
        gamesPerLineup: args.gamesPerLineup,
        seed: args.seed,
        result,
      });
      saveResultsDatabase(db, args.dbPath);
      console.log(`[ResultsDB] Saved run ${runId} with ${result.records.length} lineups to ${args.dbPath}`);
    } finally {
      db.close();
    }
  }
}

main().catch((err) => {
  console.error('[LineupSearch] ❌', err instanceof Error ? err.message : err);
  process.exit(1);
});
