import Database from 'better-sqlite3';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { mkdirSync, existsSync } from 'fs';
import { SCHEMA } from './schema.js';

const DATA_DIR = join(homedir(), '.tagging');
const DB_PATH = process.env.TAGGING_DB_PATH || join(DATA_DIR, 'tagging.db');

let db: Database.Database | null = null;

/**
 * Opens a database at `path` (or `:memory:`) with the tagging schema applied.
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
  const database = new Database(path);
  database.pragma('journal_mode = WAL');
  database.pragma('foreign_keys = ON');
  database.exec(SCHEMA);
  return database;
}

export function getDb(): Database.Database {
  if (!db) {
    db = openDatabase(DB_PATH);
  }
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}
