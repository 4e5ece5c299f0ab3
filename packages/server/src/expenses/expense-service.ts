import {
  type CategoryTotals,
  type Expense,
  type ExpenseInputBody,
  type ExpenseQueryParams,
  type User,
  NotFoundError,
  ValidationError,
  isoNow,
} from '@tally/shared';
import type { TallyStore } from '@tally/store';
import { authorize } from '../auth/ownership.js';
import { buildExpenseQuery, dateWindow } from './query-builder.js';
import { summarizeByCategory } from './report.js';

export interface ReportParams {
  start_date?: string;
  end_date?: string;
}

/**
 * Expense operations on behalf of an already-resolved identity. Every
 * item-level operation goes through {@link authorize}; a denial is a 404.
 */
export class ExpenseService {
  constructor(
    private store: Pick<TallyStore, 'db' | 'expenses' | 'categories'>,
    private now: () => string = isoNow,
  ) {}

  create(identity: User, input: ExpenseInputBody): Expense {
    const categoryId = this.checkCategory(input.category_id);
    const timestamp = this.now();

    return this.store.expenses.create({
      ownerId: identity.id,
      amount: input.amount,
      description: input.description,
      categoryId,
      date: input.date ? normalizeTimestamp(input.date) : timestamp,
      lastUpdated: timestamp,
    });
  }

  get(identity: User, id: number): Expense {
    const access = authorize(identity, this.store.expenses.getById(id));
    if (!access.allowed) {
      throw new NotFoundError('Expense');
    }
    return access.expense;
  }

  /** Full replace of the editable fields; `date` is kept when omitted. */
  update(identity: User, id: number, input: ExpenseInputBody): Expense {
    return this.store.db.transaction(() => {
      const current = this.get(identity, id);
      const categoryId = this.checkCategory(input.category_id);

      const updated = this.store.expenses.update(current.id, {
        amount: input.amount,
        description: input.description,
        categoryId,
        date: input.date ? normalizeTimestamp(input.date) : current.date,
        lastUpdated: this.now(),
      });
      if (!updated) {
        throw new NotFoundError('Expense');
      }
      return updated;
    })();
  }

  remove(identity: User, id: number): void {
    this.store.db.transaction(() => {
      const current = this.get(identity, id);
      if (!this.store.expenses.delete(current.id)) {
        throw new NotFoundError('Expense');
      }
    })();
  }

  list(identity: User, params: ExpenseQueryParams): Expense[] {
    return this.store.expenses.list(buildExpenseQuery(identity, params));
  }

  report(identity: User, params: ReportParams): CategoryTotals {
    const expenses = this.store.expenses.list({
      ownerId: identity.id,
      ...dateWindow(params.start_date, params.end_date),
    });
    return summarizeByCategory(expenses);
  }

  private checkCategory(categoryId: number | null | undefined): number | null {
    if (categoryId == null) return null;
    if (!this.store.categories.getById(categoryId)) {
      throw new ValidationError([{
        loc: ['body', 'category_id'],
        msg: `Category ${categoryId} does not exist`,
        type: 'category_not_found',
      }]);
    }
    return categoryId;
  }
}

function normalizeTimestamp(value: string): string {
  return new Date(value).toISOString();
}
