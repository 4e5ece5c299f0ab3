import { type CategoryTotals, type Expense, UNCATEGORIZED_KEY } from '@tally/shared';

/** Sum amounts per category id in one pass. Totals are rounded to cents. */
export function summarizeByCategory(expenses: Iterable<Expense>): CategoryTotals {
  const totals = new Map<string, number>();

  for (const expense of expenses) {
    const key = expense.categoryId === null ? UNCATEGORIZED_KEY : String(expense.categoryId);
    totals.set(key, (totals.get(key) ?? 0) + expense.amount);
  }

  const result: CategoryTotals = {};
  for (const [key, total] of totals) {
    result[key] = Math.round(total * 100) / 100;
  }
  return result;
}
