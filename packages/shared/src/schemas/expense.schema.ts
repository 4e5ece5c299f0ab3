import { z } from 'zod';
import { DEFAULT_PAGE_LIMIT, MAX_PAGE_LIMIT } from '../constants.js';
import { boundedText } from './text.schema.js';

export const expenseInputSchema = z.object({
  amount: z.number().gt(0),
  description: boundedText(3, 255),
  category_id: z.number().int().gt(0).nullable().optional(),
  date: z.string().datetime({ offset: true }).optional(),
});

export type ExpenseInputBody = z.infer<typeof expenseInputSchema>;

export const paginationQuerySchema = z.object({
  // Offsets beyond the safe integer range could not bind; they all mean "past the end".
  skip: z.coerce
    .number()
    .int()
    .min(0)
    .default(0)
    .transform((n) => Math.min(n, Number.MAX_SAFE_INTEGER)),
  limit: z.coerce
    .number()
    .int()
    .min(0)
    .default(DEFAULT_PAGE_LIMIT)
    .transform((n) => Math.min(n, MAX_PAGE_LIMIT)),
});

export const expenseQuerySchema = paginationQuerySchema.extend({
  start_date: z.string().optional(),
  end_date: z.string().optional(),
  category: z.string().optional(),
  category_id: z.coerce.number().int().gt(0).optional(),
});

export type ExpenseQueryParams = z.infer<typeof expenseQuerySchema>;

export const reportQuerySchema = z.object({
  start_date: z.string().optional(),
  end_date: z.string().optional(),
});

export const idParamSchema = z.object({
  id: z.coerce.number().int().gt(0),
});
