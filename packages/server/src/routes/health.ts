import { Hono } from 'hono';
import { VERSION } from '@tally/shared';

export function healthRoutes() {
  const router = new Hono();

  router.get('/', (c) => c.json({ status: 'ok', version: VERSION }));

  return router;
}
