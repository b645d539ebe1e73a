/**
 * SQL schema for the search results database
 */

import type { Database } from 'sql.js';

export const SEARCH_RESULTS_SCHEMA = `
  CREATE TABLE IF NOT EXISTS search_runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    roster_name TEXT NOT NULL,
    games_per_lineup INTEGER NOT NULL,
    candidate_count INTEGER NOT NULL,
    legal_lineup_count INTEGER,
    total_permutations INTEGER NOT NULL,
    best_average REAL,
    duration_ms INTEGER NOT NULL,
    seed INTEGER,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS lineup_results (
    run_id INTEGER NOT NULL,
    rank INTEGER NOT NULL,
    evaluation_order INTEGER NOT NULL,
    lineup_json TEXT NOT NULL,
    average_runs REAL NOT NULL,
    game_results_json TEXT NOT NULL,
    PRIMARY KEY (run_id, rank),
    FOREIGN KEY (run_id) REFERENCES search_runs(id)
  );

  CREATE INDEX IF NOT EXISTS idx_lineup_results_average ON lineup_results(run_id, average_runs DESC);
`;

/**
 * Create all tables for the results database
 */
export function createResultsSchema(db: Database): void {
  db.exec(SEARCH_RESULTS_SCHEMA);
}
