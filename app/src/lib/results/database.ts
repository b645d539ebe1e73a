/**
 * Search results database lifecycle
 *
 * sql.js keeps the database in memory; it is read from and written back to a
 * single SQLite file.
 */

import initSqlJs, { type Database, type SqlJsStatic } from 'sql.js';
import { existsSync, readFileSync, writeFileSync } from 'fs';
import { createResultsSchema } from './schema.js';

// Global SQL.js instance
let SQL: SqlJsStatic | null = null;

async function initializeSQLJS(): Promise<SqlJsStatic> {
  if (!SQL) {
    // Node hands ESM the CommonJS module.exports; sql.js also exposes itself as .default
    SQL = await initSqlJs.default();
  }
  return SQL;
}

/**
 * New in-memory results database with the schema in place
 */
export async function createResultsDatabase(): Promise<Database> {
  const sql = await initializeSQLJS();
  const db = new sql.Database();
  createResultsSchema(db);
  return db;
}

/**
 * Load a results file, or start an empty database when it does not exist yet
 */
export async function openResultsDatabase(path: string): Promise<Database> {
  if (!existsSync(path)) {
    return createResultsDatabase();
  }

  const sql = await initializeSQLJS();
  let db: Database | null = null;
  try {
    db = new sql.Database(readFileSync(path));
    // sql.js only notices a file that is not SQLite on the first statement
    createResultsSchema(db);
    return db;
  } catch (error) {
    db?.close();
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`[ResultsDB] Failed to open ${path}: ${reason}`);
  }
}

/**
 * Write the whole database back to its file
 */
export function saveResultsDatabase(db: Database, path: string): void {
  writeFileSync(path, db.export());
}
