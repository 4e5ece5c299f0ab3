import {
  type ExpenseQueryParams,
  type User,
  InvalidFilterFormatError,
} from '@tally/shared';
import type { ExpenseListOptions } from '@tally/store';

const CALENDAR_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/** Parse a `YYYY-MM-DD` calendar date to UTC midnight; impossible dates are rejected. */
export function parseCalendarDate(field: string, value: string): Date {
  const match = CALENDAR_DATE.exec(value);
  if (!match) {
    throw new InvalidFilterFormatError(field, value);
  }

  const [, y, m, d] = match;
  const year = Number(y);
  const month = Number(m);
  const day = Number(d);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year
    || date.getUTCMonth() !== month - 1
    || date.getUTCDate() !== day
  ) {
    throw new InvalidFilterFormatError(field, value);
  }
  return date;
}

export interface DateWindow {
  dateFrom?: string;
  dateBefore?: string;
}

/**
 * Both ends are inclusive calendar days, so the upper bound becomes the
 * following midnight, exclusive.
 */
export function dateWindow(startDate?: string, endDate?: string): DateWindow {
  const window: DateWindow = {};
  if (startDate !== undefined) {
    window.dateFrom = parseCalendarDate('start_date', startDate).toISOString();
  }
  if (endDate !== undefined) {
    const end = parseCalendarDate('end_date', endDate);
    window.dateBefore = new Date(end.getTime() + DAY_MS).toISOString();
  }
  return window;
}

/**
 * Turn validated list parameters into an owner-scoped plan. Predicates are
 * ANDed; pagination applies last, over ascending id (insertion order).
 */
export function buildExpenseQuery(identity: Pick<User, 'id'>, params: ExpenseQueryParams): ExpenseListOptions {
  return {
    ownerId: identity.id,
    ...dateWindow(params.start_date, params.end_date),
    categoryId: params.category_id,
    categoryDescription: params.category,
    offset: params.skip,
    limit: params.limit,
  };
}
