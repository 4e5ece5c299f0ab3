import type { Category, Expense, User } from '@tally/shared';

export interface UserResponse {
  id: number;
  username: string;
  disabled: boolean;
  created_at: string;
}

export interface ExpenseResponse {
  id: number;
  owner_id: number;
  amount: number;
  description: string;
  category_id: number | null;
  date: string;
  last_updated: string;
}

export function toUserResponse(user: User): UserResponse {
  return {
    id: user.id,
    username: user.username,
    disabled: user.disabled,
    created_at: user.createdAt,
  };
}

export function toExpenseResponse(expense: Expense): ExpenseResponse {
  return {
    id: expense.id,
    owner_id: expense.ownerId,
    amount: expense.amount,
    description: expense.description,
    category_id: expense.categoryId,
    date: expense.date,
    last_updated: expense.lastUpdated,
  };
}

export function toCategoryResponse(category: Category): Category {
  return { id: category.id, description: category.description };
}
