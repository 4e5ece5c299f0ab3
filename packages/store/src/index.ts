// ── Database & Migrations ────────────────────────────────────────
export { openDatabase, createTestDatabase } from './database.js';
export type { DatabaseOptions } from './database.js';
export { runMigrations, getCurrentVersion } from './migrations.js';
export type { Migration } from './migrations.js';
export { allMigrations } from './migrations/index.js';

// ── Repositories ─────────────────────────────────────────────────
export { UserRepository } from './repositories/user.repository.js';
export type { UserRow } from './repositories/user.repository.js';

export { ExpenseRepository } from './repositories/expense.repository.js';
export type {
  ExpenseRow, NewExpense, ExpenseChanges, ExpenseListOptions,
} from './repositories/expense.repository.js';

export { CategoryRepository } from './repositories/category.repository.js';
export type { CategoryRow, CategoryListOptions } from './repositories/category.repository.js';

// ── Store ────────────────────────────────────────────────────────

import type Database from 'better-sqlite3';
import { openDatabase } from './database.js';
import { runMigrations } from './migrations.js';
import { allMigrations } from './migrations/index.js';
import { UserRepository } from './repositories/user.repository.js';
import { ExpenseRepository } from './repositories/expense.repository.js';
import { CategoryRepository } from './repositories/category.repository.js';

export interface TallyStore {
  db: Database.Database;
  users: UserRepository;
  expenses: ExpenseRepository;
  categories: CategoryRepository;
  close(): void;
}

/**
 * Open the database at `dbPath`, run pending migrations and return the
 * repositories bound to that connection.
 *
 * @param dbPath - SQLite file path, or `:memory:` for an isolated in-process store.
 */
export function initializeStore(dbPath: string): TallyStore {
  const db = openDatabase({ dbPath });
  runMigrations(db, allMigrations);

  return {
    db,
    users: new UserRepository(db),
    expenses: new ExpenseRepository(db),
    categories: new CategoryRepository(db),
    close: () => db.close(),
  };
}
