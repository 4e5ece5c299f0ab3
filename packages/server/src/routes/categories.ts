import { Hono, type MiddlewareHandler } from 'hono';
import {
  NotFoundError,
  categoryInputSchema,
  idParamSchema,
  paginationQuerySchema,
  parseOrThrow,
} from '@tally/shared';
import type { CategoryRepository } from '@tally/store';
import { readJsonBody } from '../http/request.js';
import { toCategoryResponse } from '../http/serialize.js';

/** Categories are global: reading is public, creating needs a signed-in user. */
export function categoriesRoutes(categories: CategoryRepository, requireAuth: MiddlewareHandler) {
  const router = new Hono();

  router.get('/', (c) => {
    const { skip, limit } = parseOrThrow(paginationQuerySchema, c.req.query(), 'query');
    return c.json(categories.list({ offset: skip, limit }).map(toCategoryResponse));
  });

  router.get('/:id', (c) => {
    const { id } = parseOrThrow(idParamSchema, { id: c.req.param('id') }, 'path');
    const category = categories.getById(id);
    if (!category) {
      throw new NotFoundError('Category');
    }
    return c.json(toCategoryResponse(category));
  });

  router.post('/', requireAuth, async (c) => {
    const body = parseOrThrow(categoryInputSchema, await readJsonBody(c), 'body');
    return c.json(toCategoryResponse(categories.create(body.description)));
  });

  return router;
}
