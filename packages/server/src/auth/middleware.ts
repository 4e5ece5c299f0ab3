import type { Context, Next } from 'hono';
import { AuthenticationError, type User } from '@tally/shared';
import type { Authenticator } from './authenticator.js';

declare module 'hono' {
  interface ContextVariableMap {
    user: User;
  }
}

const BEARER_PREFIX = /^Bearer\s+/i;

/**
 * Resolve the caller once per request and expose it as `c.get('user')`.
 * Failures propagate to the app error handler.
 */
export function authMiddleware(authenticator: Authenticator) {
  return async (c: Context, next: Next) => {
    const authHeader = c.req.header('Authorization');

    if (!authHeader || !BEARER_PREFIX.test(authHeader)) {
      throw new AuthenticationError('Not authenticated');
    }

    const token = authHeader.replace(BEARER_PREFIX, '').trim();
    c.set('user', authenticator.resolveIdentity(token));
    await next();
  };
}
