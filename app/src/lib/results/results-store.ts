/**
 * Search results persistence
 *
 * Saves each search run with every evaluated lineup ranked by average runs,
 * so runs with different seeds or game counts can be compared later.
 */

import type { Database } from 'sql.js';
import type { SearchResult } from '@lineup/model';

export interface SaveSearchRunInput {
  rosterName: string;
  gamesPerLineup: number;
  seed?: number;
  result: SearchResult;
  /** ISO timestamp, defaults to now */
  createdAt?: string;
}

export interface StoredSearchRun {
  id: number;
  rosterName: string;
  gamesPerLineup: number;
  candidateCount: number;
  /** null for sampled searches */
  legalLineupCount: number | null;
  totalPermutations: number;
  bestAverage: number | null;
  durationMs: number;
  seed: number | null;
  createdAt: string;
}

export interface StoredLineupResult {
  /** 1-based, best first */
  rank: number;
  /** 0-based position in the search */
  evaluationOrder: number;
  lineup: string[];
  averageRuns: number;
  gameResults: number[];
}

type Row = Record<string, unknown>;

const SEARCH_RUN_COLUMNS = `
  id, roster_name, games_per_lineup, candidate_count, legal_lineup_count,
  total_permutations, best_average, duration_ms, seed, created_at
`;

function readNumber(row: Row, column: string): number {
  const value = row[column];
  if (typeof value !== 'number') {
    throw new Error(`[ResultsDB] Column ${column} is not a number`);
  }
  return value;
}

function readOptionalNumber(row: Row, column: string): number | null {
  return row[column] === null ? null : readNumber(row, column);
}

function readString(row: Row, column: string): string {
  const value = row[column];
  if (typeof value !== 'string') {
    throw new Error(`[ResultsDB] Column ${column} is not text`);
  }
  return value;
}

function readJsonArray(row: Row, column: string): unknown[] {
  const parsed: unknown = JSON.parse(readString(row, column));
  if (!Array.isArray(parsed)) {
    throw new Error(`[ResultsDB] Column ${column} is not a JSON array`);
  }
  return parsed;
}

function toSearchRun(row: Row): StoredSearchRun {
  return {
    id: readNumber(row, 'id'),
    rosterName: readString(row, 'roster_name'),
    gamesPerLineup: readNumber(row, 'games_per_lineup'),
    candidateCount: readNumber(row, 'candidate_count'),
    legalLineupCount: readOptionalNumber(row, 'legal_lineup_count'),
    totalPermutations: readNumber(row, 'total_permutations'),
    bestAverage: readOptionalNumber(row, 'best_average'),
    durationMs: readNumber(row, 'duration_ms'),
    seed: readOptionalNumber(row, 'seed'),
    createdAt: readString(row, 'created_at'),
  };
}

function toLineupResult(row: Row): StoredLineupResult {
  return {
    rank: readNumber(row, 'rank'),
    evaluationOrder: readNumber(row, 'evaluation_order'),
    lineup: readJsonArray(row, 'lineup_json').filter((name): name is string => typeof name === 'string'),
    averageRuns: readNumber(row, 'average_runs'),
    gameResults: readJsonArray(row, 'game_results_json').filter((runs): runs is number => typeof runs === 'number'),
  };
}

function queryRows(db: Database, sql: string, params: (number | string)[]): Row[] {
  const stmt = db.prepare(sql);
  try {
    stmt.bind(params);
    const rows: Row[] = [];
    while (stmt.step()) {
      rows.push(stmt.getAsObject());
    }
    return rows;
  } finally {
    stmt.free();
  }
}

/**
 * Save a search run and all of its lineups in one transaction
 *
 * @returns The new run id
 */
export function saveSearchRun(db: Database, input: SaveSearchRunInput): number {
  const { result } = input;

  // Rank best first; equal averages keep evaluation order
  const ranked = result.records
    .map((record, evaluationOrder) => ({ record, evaluationOrder }))
    .sort((a, b) => b.record.averageRuns - a.record.averageRuns);

  db.run('BEGIN TRANSACTION');
  try {
    db.run(
      `INSERT INTO search_runs (
        roster_name, games_per_lineup, candidate_count, legal_lineup_count,
        total_permutations, best_average, duration_ms, seed, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        input.rosterName,
        input.gamesPerLineup,
        result.candidateCount,
        result.legalLineupCount,
        result.totalPermutations,
        result.best ? result.best.averageRuns : null,
        Math.round(result.durationMs),
        input.seed ?? null,
        input.createdAt ?? new Date().toISOString(),
      ]
    );

    const idRows = queryRows(db, 'SELECT last_insert_rowid() AS id', []);
    const runId = readNumber(idRows[0], 'id');

    const insertLineup = db.prepare(
      `INSERT INTO lineup_results (run_id, rank, evaluation_order, lineup_json, average_runs, game_results_json)
       VALUES (?, ?, ?, ?, ?, ?)`
    );
    try {
      ranked.forEach(({ record, evaluationOrder }, i) => {
        insertLineup.run([
          runId,
          i + 1,
          evaluationOrder,
          JSON.stringify(record.lineup),
          record.averageRuns,
          JSON.stringify(record.gameResults),
        ]);
      });
    } finally {
      insertLineup.free();
    }

    db.run('COMMIT');
    return runId;
  } catch (error) {
    db.run('ROLLBACK');
    throw error;
  }
}

export function getSearchRun(db: Database, runId: number): StoredSearchRun | null {
  const rows = queryRows(db, `SELECT ${SEARCH_RUN_COLUMNS} FROM search_runs WHERE id = ?`, [runId]);
  return rows.length > 0 ? toSearchRun(rows[0]) : null;
}

/**
 * All runs, newest first
 */
export function listSearchRuns(db: Database): StoredSearchRun[] {
  return queryRows(db, `SELECT ${SEARCH_RUN_COLUMNS} FROM search_runs ORDER BY id DESC`, []).map(toSearchRun);
}

/**
 * Best lineups of a run, in rank order
 */
export function getTopLineups(db: Database, runId: number, limit = 5): StoredLineupResult[] {
  return queryRows(
    db,
    `SELECT rank, evaluation_order, lineup_json, average_runs, game_results_json
     FROM lineup_results
     WHERE run_id = ?
     ORDER BY rank
     LIMIT ?`,
    [runId, limit]
  ).map(toLineupResult);
}

/**
 * Delete a run and its lineups
 *
 * @returns false when there was no such run
 */
export function deleteSearchRun(db: Database, runId: number): boolean {
  db.run('BEGIN TRANSACTION');
  try {
    db.run('DELETE FROM lineup_results WHERE run_id = ?', [runId]);
    db.run('DELETE FROM search_runs WHERE id = ?', [runId]);
    const deleted = db.getRowsModified() > 0;
    db.run('COMMIT');
    return deleted;
  } catch (error) {
    db.run('ROLLBACK');
    throw error;
  }
}
