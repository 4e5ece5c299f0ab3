import type Database from 'better-sqlite3';
import type { Category } from '@tally/shared';

export interface CategoryRow {
  id: number;
  description: string;
}

export interface CategoryListOptions {
  offset?: number;
  limit?: number;
}

export class CategoryRepository {
  private insertStmt: Database.Statement<[string], CategoryRow>;
  private getByIdStmt: Database.Statement<[number], CategoryRow>;
  private listStmt: Database.Statement<[number, number], CategoryRow>;

  constructor(db: Database.Database) {
    this.insertStmt = db.prepare<[string], CategoryRow>(
      'INSERT INTO categories (description) VALUES (?) RETURNING *',
    );
    this.getByIdStmt = db.prepare<[number], CategoryRow>('SELECT * FROM categories WHERE id = ?');
    this.listStmt = db.prepare<[number, number], CategoryRow>(
      'SELECT * FROM categories ORDER BY id ASC LIMIT ? OFFSET ?',
    );
  }

  create(description: string): Category {
    const row = this.insertStmt.get(description);
    if (!row) {
      throw new Error('Category insert returned no row');
    }
    return row;
  }

  getById(id: number): Category | null {
    return this.getByIdStmt.get(id) ?? null;
  }

  list(options?: CategoryListOptions): Category[] {
    return this.listStmt.all(options?.limit ?? -1, options?.offset ?? 0);
  }
}
