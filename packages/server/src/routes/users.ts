import { Hono, type MiddlewareHandler } from 'hono';
import { loginRequestSchema, parseOrThrow, registerRequestSchema } from '@tally/shared';
import type { Authenticator } from '../auth/authenticator.js';
import { readFormFields, readJsonBody } from '../http/request.js';
import { toUserResponse } from '../http/serialize.js';

export function usersRoutes(authenticator: Authenticator, requireAuth: MiddlewareHandler) {
  const router = new Hono();

  // Register
  router.post('/register', async (c) => {
    const body = parseOrThrow(registerRequestSchema, await readJsonBody(c), 'body');
    const user = authenticator.register(body.username, body.password);
    return c.json(toUserResponse(user));
  });

  // Login: OAuth2 password grant, form-encoded
  router.post('/login', async (c) => {
    const form = parseOrThrow(loginRequestSchema, await readFormFields(c), 'body');
    return c.json(authenticator.login(form.username, form.password));
  });

  // Current user
  router.get('/me', requireAuth, (c) => {
    return c.json(toUserResponse(c.get('user')));
  });

  return router;
}
