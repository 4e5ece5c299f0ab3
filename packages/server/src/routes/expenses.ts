import { Hono, type MiddlewareHandler } from 'hono';
import {
  expenseInputSchema,
  expenseQuerySchema,
  idParamSchema,
  parseOrThrow,
} from '@tally/shared';
import type { ExpenseService } from '../expenses/expense-service.js';
import { readJsonBody } from '../http/request.js';
import { toExpenseResponse } from '../http/serialize.js';

export function expensesRoutes(service: ExpenseService, requireAuth: MiddlewareHandler) {
  const router = new Hono();

  router.use('*', requireAuth);

  // Create
  router.post('/', async (c) => {
    const body = parseOrThrow(expenseInputSchema, await readJsonBody(c), 'body');
    return c.json(toExpenseResponse(service.create(c.get('user'), body)));
  });

  // List with filters and pagination
  router.get('/', (c) => {
    const query = parseOrThrow(expenseQuerySchema, c.req.query(), 'query');
    return c.json(service.list(c.get('user'), query).map(toExpenseResponse));
  });

  // Get one
  router.get('/:id', (c) => {
    const { id } = parseOrThrow(idParamSchema, { id: c.req.param('id') }, 'path');
    return c.json(toExpenseResponse(service.get(c.get('user'), id)));
  });

  // Replace
  router.put('/:id', async (c) => {
    const { id } = parseOrThrow(idParamSchema, { id: c.req.param('id') }, 'path');
    const body = parseOrThrow(expenseInputSchema, await readJsonBody(c), 'body');
    return c.json(toExpenseResponse(service.update(c.get('user'), id, body)));
  });

  // Delete
  router.delete('/:id', (c) => {
    const { id } = parseOrThrow(idParamSchema, { id: c.req.param('id') }, 'path');
    service.remove(c.get('user'), id);
    return c.json({ message: 'Expense deleted successfully' });
  });

  return router;
}
