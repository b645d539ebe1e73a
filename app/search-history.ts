#!/usr/bin/env tsx
/**
 * Browse search runs saved by find-best-lineup.ts --db
 * Usage: npx tsx search-history.ts --db results.sqlite [--run 3 [--top 10]] [--delete 3]
 *
 * Without --run or --delete, lists every saved run, newest first.
 */

import { existsSync } from 'fs';
import { parseHistoryArgs } from './src/lib/cli/args.js';
import { formatRunDetail, formatRunList } from './src/lib/report/console-report.js';
import { openResultsDatabase, saveResultsDatabase } from './src/lib/results/database.js';
import { deleteSearchRun, getSearchRun, getTopLineups, listSearchRuns } from './src/lib/results/results-store.js';

async function main(): Promise<void> {
  const args = parseHistoryArgs(process.argv.slice(2));
  if (!existsSync(args.dbPath)) {
    throw new Error(`No results database at ${args.dbPath}`);
  }

  const db = await openResultsDatabase(args.dbPath);
  try {
    if (args.deleteRunId !== undefined) {
      if (!deleteSearchRun(db, args.deleteRunId)) {
        throw new Error(`No saved run #${args.deleteRunId}`);
      }
      saveResultsDatabase(db, args.dbPath);
      console.log(`[ResultsDB] Deleted run ${args.deleteRunId} from ${args.dbPath}`);
      return;
    }

    if (args.runId !== undefined) {
      const run = getSearchRun(db, args.runId);
      if (!run) {
        throw new Error(`No saved run #${args.runId}`);
      }
      for (const line of formatRunDetail(run, getTopLineups(db, run.id, args.top))) {
        console.log(line);
      }
      return;
    }

    console.log(`= Saved searches in ${args.dbPath} =`);
    for (const line of formatRunList(listSearchRuns(db))) {
      console.log(line);
    }
  } finally {
    db.close();
  }
}

main().catch((err) => {
  console.error('[SearchHistory] ❌', err instanceof Error ? err.message : err);
  process.exit(1);
});
