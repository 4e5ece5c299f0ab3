import type { Migration } from '../migrations.js';

export const migration001: Migration = {
  version: 1,
  name: 'initial-schema',
  up(db) {
    // ── Users ────────────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        username      TEXT NOT NULL UNIQUE,
        password_hash TEXT NOT NULL,
        disabled      INTEGER NOT NULL DEFAULT 0,
        created_at    TEXT NOT NULL
      )
    `);

    // ── Categories ───────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS categories (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        description TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_categories_desc ON categories(description)');

    // ── Expenses ─────────────────────────────────────────────
    db.exec(`
      CREATE TABLE IF NOT EXISTS expenses (
        id           INTEGER PRIMARY KEY AUTOINCREMENT,
        owner_id     INTEGER NOT NULL REFERENCES users(id),
        amount       REAL NOT NULL CHECK (amount > 0),
        description  TEXT NOT NULL,
        category_id  INTEGER REFERENCES categories(id) ON DELETE SET NULL,
        date         TEXT NOT NULL,
        last_updated TEXT NOT NULL
      )
    `);
    db.exec('CREATE INDEX IF NOT EXISTS idx_expenses_owner_date ON expenses(owner_id, date)');
    db.exec('CREATE INDEX IF NOT EXISTS idx_expenses_category ON expenses(category_id)');
  },
};
