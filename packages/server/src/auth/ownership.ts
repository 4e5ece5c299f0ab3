import type { Expense, User } from '@tally/shared';

export type Authorization =
  | { allowed: true; expense: Expense }
  | { allowed: false };

/**
 * An absent expense and one owned by someone else are indistinguishable to
 * the caller: both are denied, and handlers answer both with 404.
 */
export function authorize(identity: Pick<User, 'id'>, expense: Expense | null): Authorization {
  if (!expense || expense.ownerId !== identity.id) {
    return { allowed: false };
  }
  return { allowed: true, expense };
}
