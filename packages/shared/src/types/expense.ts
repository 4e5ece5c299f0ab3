export interface Expense {
  id: number;
  ownerId: number;
  amount: number;
  description: string;
  categoryId: number | null;
  /** ISO-8601 UTC timestamp */
  date: string;
  /** ISO-8601 UTC timestamp, refreshed by the server on every update */
  lastUpdated: string;
}

export type CategoryTotals = Record<string, number>;
