import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  type Logger,
  AuthenticationError,
  TallyError,
  ValidationError,
} from '@tally/shared';

function statusOf(err: TallyError): ContentfulStatusCode {
  switch (err.status) {
    case 400: return 400;
    case 401: return 401;
    case 404: return 404;
    case 422: return 422;
    default: return 500;
  }
}

/**
 * Render domain errors as `{ detail }` bodies. Validation failures carry a
 * list of `{ loc, msg, type }`; everything else a message string.
 */
export function createErrorHandler(logger: Logger) {
  return (err: Error, c: Context) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    if (err instanceof ValidationError) {
      return c.json({ detail: err.issues }, 422);
    }

    if (err instanceof TallyError && err.status < 500) {
      if (err instanceof AuthenticationError) {
        c.header('WWW-Authenticate', 'Bearer');
      }
      return c.json({ detail: err.message }, statusOf(err));
    }

    logger.error(`${c.req.method} ${c.req.path} failed:`, err);
    return c.json({ detail: 'Internal server error' }, 500);
  };
}
