import { Hono, type MiddlewareHandler } from 'hono';
import { parseOrThrow, reportQuerySchema } from '@tally/shared';
import type { ExpenseService } from '../expenses/expense-service.js';

export function reportsRoutes(service: ExpenseService, requireAuth: MiddlewareHandler) {
  const router = new Hono();

  router.use('*', requireAuth);

  // Totals per category id over the caller's expenses
  router.get('/expenses', (c) => {
    const query = parseOrThrow(reportQuerySchema, c.req.query(), 'query');
    return c.json(service.report(c.get('user'), query));
  });

  return router;
}
