#!/usr/bin/env tsx
/**
 * Count legal batting orders for a roster and show a few of each kind
 * Usage: npx tsx check-legal-lineups.ts [--roster rosters/example.json] [--examples 5]
 */

import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { censusLegalLineups, createRoster, exceedsEnumerationCeiling } from '@lineup/model';
import { parseCensusArgs } from './src/lib/cli/args.js';
import { loadRosterConfig } from './src/lib/roster/roster-config.js';
import { formatCensusReport, formatRosterSummary } from './src/lib/report/console-report.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function main(): void {
  const args = parseCensusArgs(process.argv.slice(2));
  const rosterPath = args.rosterPath ?? join(__dirname, 'rosters/example.json');

  const { config, warnings } = loadRosterConfig(rosterPath);
  for (const warning of warnings) {
    console.warn(`[LineupCensus] ⚠️  ${warning}`);
  }

  const roster = createRoster(config.roster);
  console.log(`= Legal Lineup Census: ${config.name} =`);
  for (const line of formatRosterSummary(roster, config.rules)) {
    console.log(line);
  }
  if (exceedsEnumerationCeiling(roster)) {
    console.warn(`[LineupCensus] ⚠️  ${roster.players.length} players: this walks every permutation and may take a while`);
  }
  console.log('');

  const census = censusLegalLineups(roster, { rules: config.rules, examples: args.examples });
  for (const line of formatCensusReport(census, roster, config.rules)) {
    console.log(line);
  }
}

try {
  main();
} catch (err) {
  console.error('[LineupCensus] ❌', err instanceof Error ? err.message : err);
  process.exit(1);
}
