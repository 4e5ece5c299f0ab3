import Database from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';

export interface DatabaseOptions {
  /** Path to the SQLite database file, or `:memory:`. */
  dbPath: string;
}

/**
 * Open a database connection with production pragmas.
 * The caller owns the handle and closes it; nothing is cached here.
 */
export function openDatabase(options: DatabaseOptions): Database.Database {
  const { dbPath } = options;

  if (dbPath !== ':memory:') {
    const dir = path.dirname(dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(dbPath);

  applyPragmas(db);
  return db;
}

/**
 * Create an in-memory database with production pragmas.
 * Each call returns a fresh isolated DB.
 */
export function createTestDatabase(): Database.Database {
  return openDatabase({ dbPath: ':memory:' });
}

function applyPragmas(db: Database.Database): void {
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  db.pragma('foreign_keys = ON');
  db.pragma('busy_timeout = 5000');       // 5 s
  db.pragma('temp_store = MEMORY');
}
