import type Database from 'better-sqlite3';
import type { Expense } from '@tally/shared';

// ── Row types ────────────────────────────────────────────────────

export interface ExpenseRow {
  id: number;
  owner_id: number;
  amount: number;
  description: string;
  category_id: number | null;
  date: string;
  last_updated: string;
}

interface ExpenseParams {
  amount: number;
  description: string;
  category_id: number | null;
  date: string;
  last_updated: string;
}

export interface NewExpense {
  ownerId: number;
  amount: number;
  description: string;
  categoryId: number | null;
  date: string;
  lastUpdated: string;
}

export type ExpenseChanges = Omit<NewExpense, 'ownerId'>;

/**
 * Owner-scoped selection. Bounds are ISO-8601 strings compared lexically
 * against the stored `date`, which is always written by `toISOString()`.
 */
export interface ExpenseListOptions {
  ownerId: number;
  /** Inclusive lower bound on `date`. */
  dateFrom?: string;
  /** Exclusive upper bound on `date`. */
  dateBefore?: string;
  categoryId?: number;
  /** Exact match on the referenced category's description. */
  categoryDescription?: string;
  offset?: number;
  /** Omit for no limit. */
  limit?: number;
}

// ── Repository ──────────────────────────────────────────────────

export class ExpenseRepository {
  private insertStmt: Database.Statement<[ExpenseParams & { owner_id: number }], ExpenseRow>;
  private getByIdStmt: Database.Statement<[number], ExpenseRow>;
  private updateStmt: Database.Statement<[ExpenseParams & { id: number }], ExpenseRow>;
  private deleteStmt: Database.Statement<[number]>;

  constructor(private db: Database.Database) {
    this.insertStmt = db.prepare<ExpenseParams & { owner_id: number }, ExpenseRow>(`
      INSERT INTO expenses (owner_id, amount, description, category_id, date, last_updated)
      VALUES (@owner_id, @amount, @description, @category_id, @date, @last_updated)
      RETURNING *
    `);

    this.getByIdStmt = db.prepare<[number], ExpenseRow>('SELECT * FROM expenses WHERE id = ?');

    // owner_id is deliberately absent from the SET list
    this.updateStmt = db.prepare<ExpenseParams & { id: number }, ExpenseRow>(`
      UPDATE expenses SET
        amount = @amount,
        description = @description,
        category_id = @category_id,
        date = @date,
        last_updated = @last_updated
      WHERE id = @id
      RETURNING *
    `);

    this.deleteStmt = db.prepare<[number]>('DELETE FROM expenses WHERE id = ?');
  }

  create(expense: NewExpense): Expense {
    const row = this.insertStmt.get({
      owner_id: expense.ownerId,
      ...toParams(expense),
    });
    if (!row) {
      throw new Error('Expense insert returned no row');
    }
    return toExpense(row);
  }

  getById(id: number): Expense | null {
    const row = this.getByIdStmt.get(id);
    return row ? toExpense(row) : null;
  }

  update(id: number, changes: ExpenseChanges): Expense | null {
    const row = this.updateStmt.get({ id, ...toParams(changes) });
    return row ? toExpense(row) : null;
  }

  delete(id: number): boolean {
    const result = this.deleteStmt.run(id);
    return result.changes > 0;
  }

  /** Matching expenses in insertion (id) order. */
  list(options: ExpenseListOptions): Expense[] {
    const where: string[] = ['e.owner_id = ?'];
    const params: (string | number)[] = [options.ownerId];

    if (options.dateFrom !== undefined) {
      where.push('e.date >= ?');
      params.push(options.dateFrom);
    }
    if (options.dateBefore !== undefined) {
      where.push('e.date < ?');
      params.push(options.dateBefore);
    }
    if (options.categoryId !== undefined) {
      where.push('e.category_id = ?');
      params.push(options.categoryId);
    }
    if (options.categoryDescription !== undefined) {
      where.push('e.category_id IN (SELECT c.id FROM categories c WHERE c.description = ?)');
      params.push(options.categoryDescription);
    }

    // SQLite treats a negative LIMIT as "no limit"
    const sql = `SELECT e.* FROM expenses e WHERE ${where.join(' AND ')} ORDER BY e.id ASC LIMIT ? OFFSET ?`;
    params.push(options.limit ?? -1, options.offset ?? 0);

    return this.db.prepare<(string | number)[], ExpenseRow>(sql).all(...params).map(toExpense);
  }
}

function toParams(expense: ExpenseChanges): ExpenseParams {
  return {
    amount: expense.amount,
    description: expense.description,
    category_id: expense.categoryId,
    date: expense.date,
    last_updated: expense.lastUpdated,
  };
}

function toExpense(row: ExpenseRow): Expense {
  return {
    id: row.id,
    ownerId: row.owner_id,
    amount: row.amount,
    description: row.description,
    categoryId: row.category_id,
    date: row.date,
    lastUpdated: row.last_updated,
  };
}
