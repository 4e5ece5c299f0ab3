import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up(db: Database.Database): void;
}

function readVersion(db: Database.Database): number {
  const row = db
    .prepare<[], { v: number }>('SELECT COALESCE(MAX(version), 0) AS v FROM _migrations')
    .get();
  return row?.v ?? 0;
}

/**
 * Apply pending migrations in version order, each inside its own transaction.
 * Returns the versions that were applied by this call.
 */
export function runMigrations(db: Database.Database, migrations: Migration[]): number[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      version    INTEGER PRIMARY KEY,
      name       TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
    )
  `);

  const currentVersion = readVersion(db);
  const record = db.prepare<[number, string]>('INSERT INTO _migrations (version, name) VALUES (?, ?)');
  const applied: number[] = [];

  const pending = [...migrations]
    .sort((a, b) => a.version - b.version)
    .filter(m => m.version > currentVersion);

  for (const migration of pending) {
    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name);
    })();
    applied.push(migration.version);
  }

  return applied;
}

/** Highest applied migration version, or 0 on a database that has never been migrated. */
export function getCurrentVersion(db: Database.Database): number {
  const table = db
    .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' AND name = '_migrations'")
    .get();
  return table ? readVersion(db) : 0;
}
