import type { Context } from 'hono';
import { ValidationError } from '@tally/shared';

export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch (err) {
    throw new ValidationError([{
      loc: ['body'],
      msg: `JSON decode error: ${err instanceof Error ? err.message : String(err)}`,
      type: 'json_invalid',
    }]);
  }
}

/** String fields of a urlencoded or multipart form; file parts are dropped. */
export async function readFormFields(c: Context): Promise<Record<string, string>> {
  let body: Record<string, unknown>;
  try {
    body = await c.req.parseBody();
  } catch (err) {
    throw new ValidationError([{
      loc: ['body'],
      msg: `Form decode error: ${err instanceof Error ? err.message : String(err)}`,
      type: 'form_invalid',
    }]);
  }

  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') fields[key] = value;
  }
  return fields;
}
