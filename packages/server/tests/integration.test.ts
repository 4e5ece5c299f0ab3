import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  bearer,
  createTestApp,
  jsonRequest,
  login,
  register,
  signIn,
  type TestContext,
} from './helpers.js';

let ctx: TestContext;

beforeEach(() => {
  ctx = createTestApp();
});

afterEach(() => {
  ctx.store.close();
});

async function createExpense(token: string, body: Record<string, unknown>): Promise<Response> {
  return ctx.app.request('/expenses', jsonRequest('POST', body, token));
}

describe('Server Integration: Users', () => {
  it('registers a user without exposing the hash', async () => {
    const res = await register(ctx, 'alice', 'secret123');
    expect(res.status).toBe(200);

    const body = await res.json();
    expect(body.id).toBe(1);
    expect(body.username).toBe('alice');
    expect(body.disabled).toBe(false);
    expect(Object.keys(body).sort()).toEqual(['created_at', 'disabled', 'id', 'username']);
  });

  it('rejects a duplicate username with 400', async () => {
    await register(ctx, 'alice', 'secret123');
    const res = await register(ctx, 'alice', 'other-password');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: 'Username already registered' });
  });

  it('validates registration bodies with 422', async () => {
    const res = await ctx.app.request('/users/register', jsonRequest('POST', { username: 'al' }));
    expect(res.status).toBe(422);

    const body = await res.json();
    expect(body.detail).toEqual([
      { loc: ['body', 'username'], msg: 'String must contain at least 3 character(s)', type: 'string_too_short' },
      { loc: ['body', 'password'], msg: 'Required', type: 'missing' },
    ]);
  });

  it('rejects malformed JSON with 422', async () => {
    const res = await ctx.app.request('/users/register', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"username":',
    });
    expect(res.status).toBe(422);
    expect((await res.json()).detail[0].type).toBe('json_invalid');
  });

  it('logs in with form fields and returns a bearer token', async () => {
    await register(ctx, 'alice', 'secret123');
    const res = await login(ctx, 'alice', 'secret123');

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.token_type).toBe('bearer');
    expect(body.access_token.split('.')).toHaveLength(3);
  });

  it('answers wrong password and unknown user identically', async () => {
    await register(ctx, 'alice', 'secret123');
    const wrong = await login(ctx, 'alice', 'wrong');
    const unknown = await login(ctx, 'nobody', 'secret123');

    expect(wrong.status).toBe(401);
    expect(unknown.status).toBe(401);
    expect(await wrong.json()).toEqual({ detail: 'Incorrect username or password' });
    expect(await unknown.json()).toEqual({ detail: 'Incorrect username or password' });
    expect(wrong.headers.get('WWW-Authenticate')).toBe('Bearer');
  });

  it('requires both form fields to log in', async () => {
    const res = await ctx.app.request('/users/login', {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: 'username=alice',
    });
    expect(res.status).toBe(422);
    expect((await res.json()).detail[0].loc).toEqual(['body', 'password']);
  });

  it('returns the current user for a valid token', async () => {
    const token = await signIn(ctx, 'me_user');
    const res = await ctx.app.request('/users/me', bearer(token));

    expect(res.status).toBe(200);
    expect((await res.json()).username).toBe('me_user');
  });

  it('rejects /users/me without a token or with a bad one', async () => {
    const none = await ctx.app.request('/users/me');
    expect(none.status).toBe(401);
    expect(none.headers.get('WWW-Authenticate')).toBe('Bearer');

    const bad = await ctx.app.request('/users/me', bearer('invalid.token.value'));
    expect(bad.status).toBe(401);
    expect(await bad.json()).toEqual({ detail: 'Could not validate credentials' });
  });

  it('rejects a disabled user with 400', async () => {
    const token = await signIn(ctx, 'sleeper');
    ctx.store.users.setDisabled(1, true);

    const res = await ctx.app.request('/users/me', bearer(token));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ detail: 'Inactive user' });
  });
});

describe('Server Integration: Expenses', () => {
  it('runs the full create, list, delete lifecycle', async () => {
    const registered = await register(ctx, 'alice', 'secret123');
    const aliceId = (await registered.json()).id;
    const token = (await (await login(ctx, 'alice', 'secret123')).json()).access_token;

    const created = await createExpense(token, { amount: 50.75, description: 'Lunch', category: 'Food' });
    expect(created.status).toBe(200);
    const expense = await created.json();
    expect(expense.amount).toBe(50.75);
    expect(expense.owner_id).toBe(aliceId);
    expect(expense.id).toBe(1);
    expect(expense.category_id).toBeNull();

    const list = await ctx.app.request('/expenses', bearer(token));
    expect(await list.json()).toHaveLength(1);

    const deleted = await ctx.app.request(`/expenses/${expense.id}`, bearer(token, 'DELETE'));
    expect(deleted.status).toBe(200);
    expect(await deleted.json()).toEqual({ message: 'Expense deleted successfully' });

    const gone = await ctx.app.request(`/expenses/${expense.id}`, bearer(token));
    expect(gone.status).toBe(404);
    expect(await gone.json()).toEqual({ detail: 'Expense not found' });
  });

  it('returns 404 on a second delete', async () => {
    const token = await signIn(ctx, 'alice');
    await createExpense(token, { amount: 15, description: 'To be deleted' });

    expect((await ctx.app.request('/expenses/1', bearer(token, 'DELETE'))).status).toBe(200);
    expect((await ctx.app.request('/expenses/1', bearer(token, 'DELETE'))).status).toBe(404);
  });

  it('sets the owner from the token, ignoring owner fields in the body', async () => {
    await signIn(ctx, 'victim');
    const token = await signIn(ctx, 'alice');

    const res = await createExpense(token, {
      amount: 10,
      description: 'Sneaky',
      owner_id: 1,
      owner: 1,
      id: 500,
    });
    const body = await res.json();
    expect(body.owner_id).toBe(2);
    expect(body.id).toBe(1);
  });

  it('defaults date and last_updated to the server clock', async () => {
    ctx.store.close();
    ctx = createTestApp({ now: () => '2025-06-01T08:00:00.000Z' });
    const token = await signIn(ctx, 'alice');

    const body = await (await createExpense(token, { amount: 1, description: 'Gum' })).json();
    expect(body.date).toBe('2025-06-01T08:00:00.000Z');
    expect(body.last_updated).toBe('2025-06-01T08:00:00.000Z');
  });

  it('normalizes a client-supplied date to UTC', async () => {
    const token = await signIn(ctx, 'alice');
    const body = await (await createExpense(token, {
      amount: 1,
      description: 'Gum',
      date: '2025-01-01T10:00:00+02:00',
    })).json();
    expect(body.date).toBe('2025-01-01T08:00:00.000Z');
  });

  it('rejects a non-positive amount with a greater_than error on amount', async () => {
    const token = await signIn(ctx, 'alice');
    const res = await createExpense(token, { amount: -10, description: 'Invalid amount test' });

    expect(res.status).toBe(422);
    const { detail } = await res.json();
    expect(detail[0].loc).toContain('amount');
    expect(detail[0].type).toBe('greater_than');
  });

  it('rejects descriptions outside 3..255 characters', async () => {
    const token = await signIn(ctx, 'alice');

    const short = await createExpense(token, { amount: 20, description: '0' });
    expect(short.status).toBe(422);
    expect((await short.json()).detail[0]).toMatchObject({ loc: ['body', 'description'], type: 'string_too_short' });

    const long = await createExpense(token, { amount: 20, description: 'a'.repeat(300) });
    expect(long.status).toBe(422);
    expect((await long.json()).detail[0]).toMatchObject({ loc: ['body', 'description'], type: 'string_too_long' });
  });

  it('bounds descriptions by characters, not UTF-16 units', async () => {
    const token = await signIn(ctx, 'alice');

    const tooShort = await createExpense(token, { amount: 5, description: '😀😀' });
    expect(tooShort.status).toBe(422);
    expect((await tooShort.json()).detail[0]).toMatchObject({ loc: ['body', 'description'], type: 'string_too_short' });

    const wide = await createExpense(token, { amount: 5, description: '😀'.repeat(200) });
    expect(wide.status).toBe(200);
    expect((await wide.json()).description).toBe('😀'.repeat(200));
  });

  it('rejects a category id that does not exist', async () => {
    const token = await signIn(ctx, 'alice');
    const res = await createExpense(token, { amount: 20, description: 'Valid description', category_id: 9 });

    expect(res.status).toBe(422);
    expect((await res.json()).detail[0]).toMatchObject({ loc: ['body', 'category_id'], type: 'category_not_found' });
  });

  it('requires a token for every expense route', async () => {
    const attempts = [
      ctx.app.request('/expenses', jsonRequest('POST', { amount: 25, description: 'No Token Expense' })),
      ctx.app.request('/expenses'),
      ctx.app.request('/expenses/1'),
      ctx.app.request('/expenses/1', jsonRequest('PUT', { amount: 30, description: 'No Token Update' })),
      ctx.app.request('/expenses/1', { method: 'DELETE' }),
    ];
    for (const res of await Promise.all(attempts)) {
      expect(res.status).toBe(401);
    }
  });

  it('replaces an expense and refreshes last_updated', async () => {
    let clock = '2025-01-01T00:00:00.000Z';
    ctx.store.close();
    ctx = createTestApp({ now: () => clock });
    const token = await signIn(ctx, 'alice');
    const cat = await ctx.app.request('/categories', jsonRequest('POST', { description: 'Food' }, token));
    const categoryId = (await cat.json()).id;

    const created = await (await createExpense(token, {
      amount: 25,
      description: 'Initial Description',
      date: '2024-12-24T12:00:00Z',
    })).json();

    clock = '2025-01-02T00:00:00.000Z';
    const res = await ctx.app.request(`/expenses/${created.id}`, jsonRequest('PUT', {
      amount: 30,
      description: 'Updated Description',
      category_id: categoryId,
      owner_id: 99,
    }, token));

    expect(res.status).toBe(200);
    const updated = await res.json();
    expect(updated).toEqual({
      id: created.id,
      owner_id: created.owner_id,
      amount: 30,
      description: 'Updated Description',
      category_id: categoryId,
      date: '2024-12-24T12:00:00.000Z',
      last_updated: '2025-01-02T00:00:00.000Z',
    });

    const fetched = await ctx.app.request(`/expenses/${created.id}`, bearer(token));
    expect(await fetched.json()).toEqual(updated);
  });

  it('validates update bodies like create', async () => {
    const token = await signIn(ctx, 'alice');
    await createExpense(token, { amount: 25, description: 'Initial' });

    const res = await ctx.app.request('/expenses/1', jsonRequest('PUT', { amount: 0, description: 'Zero' }, token));
    expect(res.status).toBe(422);
    expect((await res.json()).detail[0].type).toBe('greater_than');
  });

  it('returns 404 for updates and deletes of a missing id', async () => {
    const token = await signIn(ctx, 'alice');
    const put = await ctx.app.request('/expenses/9999', jsonRequest('PUT', { amount: 30, description: 'Updated' }, token));
    const del = await ctx.app.request('/expenses/9999', bearer(token, 'DELETE'));
    expect(put.status).toBe(404);
    expect(del.status).toBe(404);
  });

  it('rejects a non-numeric id with 422', async () => {
    const token = await signIn(ctx, 'alice');
    const res = await ctx.app.request('/expenses/abc', bearer(token));
    expect(res.status).toBe(422);
    expect((await res.json()).detail[0].loc).toEqual(['path', 'id']);
  });

  it('hides another user\'s expense behind 404 for GET, PUT and DELETE', async () => {
    const token1 = await signIn(ctx, 'user1', 'pass1');
    const token2 = await signIn(ctx, 'user2', 'pass2');
    await createExpense(token1, { amount: 100, description: 'Test' });

    const get = await ctx.app.request('/expenses/1', bearer(token2));
    const put = await ctx.app.request('/expenses/1', jsonRequest('PUT', { amount: 1, description: 'Hijack' }, token2));
    const del = await ctx.app.request('/expenses/1', bearer(token2, 'DELETE'));

    expect([get.status, put.status, del.status]).toEqual([404, 404, 404]);

    const stillThere = await (await ctx.app.request('/expenses/1', bearer(token1))).json();
    expect(stillThere.amount).toBe(100);
    expect(stillThere.description).toBe('Test');
  });

  it('lists only the caller\'s expenses', async () => {
    const token1 = await signIn(ctx, 'user1');
    const token2 = await signIn(ctx, 'user2');
    await createExpense(token1, { amount: 1, description: 'Mine' });
    await createExpense(token2, { amount: 2, description: 'Theirs' });

    const list = await (await ctx.app.request('/expenses', bearer(token1))).json();
    expect(list.map((e: { description: string }) => e.description)).toEqual(['Mine']);
  });
});

describe('Server Integration: Filtering and pagination', () => {
  let token: string;
  let food: number;
  let transport: number;

  beforeEach(async () => {
    token = await signIn(ctx, 'filters');
    food = (await (await ctx.app.request('/categories', jsonRequest('POST', { description: 'Food' }, token))).json()).id;
    transport = (await (await ctx.app.request('/categories', jsonRequest('POST', { description: 'Transport' }, token))).json()).id;

    const seed = [
      { amount: 10, description: 'Adsaefsaedfsaf', category_id: food, date: '2025-01-01T17:17:20.044Z' },
      { amount: 20, description: 'Badadadada', category_id: food, date: '2025-01-30T17:17:20.044Z' },
      { amount: 30, description: 'Cadadadadad', category_id: transport, date: '2025-02-13T17:17:20.044Z' },
      { amount: 40, description: 'Dinner in Feb', category_id: food, date: '2025-02-20T10:00:00.000Z' },
    ];
    for (const body of seed) {
      expect((await createExpense(token, body)).status).toBe(200);
    }
  });

  async function amounts(query: string): Promise<number[]> {
    const res = await ctx.app.request(`/expenses${query}`, bearer(token));
    expect(res.status).toBe(200);
    return (await res.json()).map((e: { amount: number }) => e.amount);
  }

  it('filters by an inclusive date range', async () => {
    expect(await amounts('?start_date=2025-01-01&end_date=2025-01-31')).toEqual([10, 20]);
    expect(await amounts('?start_date=2025-02-13&end_date=2025-02-13')).toEqual([30]);
  });

  it('filters by category name and by category id', async () => {
    expect(await amounts('?category=Transport')).toEqual([30]);
    expect(await amounts(`?category_id=${food}`)).toEqual([10, 20, 40]);
    expect(await amounts('?category=NonExistentCategory')).toEqual([]);
  });

  it('ANDs category and date filters', async () => {
    expect(await amounts('?category=Food&start_date=2025-01-01&end_date=2025-01-31')).toEqual([10, 20]);
  });

  it('paginates in insertion order', async () => {
    expect(await amounts('?skip=1&limit=2')).toEqual([20, 30]);
  });

  it('returns [] for limit=0 and for skip past the end', async () => {
    expect(await amounts('?limit=0')).toEqual([]);
    expect(await amounts('?skip=4')).toEqual([]);
    expect(await amounts('?skip=50&limit=2')).toEqual([]);
  });

  it('returns [] for offsets beyond the 64-bit range', async () => {
    expect(await amounts('?skip=100000000000000000000')).toEqual([]);
    expect(await amounts('?skip=9223372036854775807')).toEqual([]);
  });

  it('returns [] when no expense falls in the range', async () => {
    expect(await amounts('?start_date=2024-01-01&end_date=2024-01-31')).toEqual([]);
  });

  it('rejects malformed dates with 422', async () => {
    const res = await ctx.app.request('/expenses?start_date=01-01-2025', bearer(token));
    expect(res.status).toBe(422);
    expect((await res.json()).detail[0]).toMatchObject({ loc: ['query', 'start_date'], type: 'date_parsing' });
  });

  it('rejects a negative skip with 422', async () => {
    const res = await ctx.app.request('/expenses?skip=-1', bearer(token));
    expect(res.status).toBe(422);
    expect((await res.json()).detail[0]).toMatchObject({ loc: ['query', 'skip'], type: 'greater_than_equal' });
  });
});

describe('Server Integration: Categories', () => {
  it('lists and reads categories without authentication', async () => {
    const token = await signIn(ctx, 'alice');
    await ctx.app.request('/categories', jsonRequest('POST', { description: 'Food' }, token));
    await ctx.app.request('/categories', jsonRequest('POST', { description: 'Travel' }, token));

    const list = await ctx.app.request('/categories');
    expect(list.status).toBe(200);
    expect(await list.json()).toEqual([
      { id: 1, description: 'Food' },
      { id: 2, description: 'Travel' },
    ]);

    const one = await ctx.app.request('/categories/2');
    expect(await one.json()).toEqual({ id: 2, description: 'Travel' });

    const page = await ctx.app.request('/categories?skip=1&limit=1');
    expect(await page.json()).toEqual([{ id: 2, description: 'Travel' }]);
  });

  it('requires authentication to create', async () => {
    const res = await ctx.app.request('/categories', jsonRequest('POST', { description: 'Food' }));
    expect(res.status).toBe(401);
  });

  it('validates the description length', async () => {
    const token = await signIn(ctx, 'alice');
    const res = await ctx.app.request('/categories', jsonRequest('POST', { description: 'ab' }, token));
    expect(res.status).toBe(422);
    expect((await res.json()).detail[0].type).toBe('string_too_short');
  });

  it('counts category description length in characters', async () => {
    const token = await signIn(ctx, 'alice');
    const ok = await ctx.app.request('/categories', jsonRequest('POST', { description: '🍕🍕🍕' }, token));
    expect(ok.status).toBe(200);
    expect(await ok.json()).toEqual({ id: 1, description: '🍕🍕🍕' });

    const short = await ctx.app.request('/categories', jsonRequest('POST', { description: '🍕🍕' }, token));
    expect(short.status).toBe(422);
  });

  it('returns 404 for a missing category', async () => {
    const res = await ctx.app.request('/categories/42');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ detail: 'Category not found' });
  });
});

describe('Server Integration: Reports', () => {
  it('sums the caller\'s expenses per category within the date range', async () => {
    const token = await signIn(ctx, 'alice');
    const other = await signIn(ctx, 'bob');
    await ctx.app.request('/categories', jsonRequest('POST', { description: 'Food' }, token));
    await ctx.app.request('/categories', jsonRequest('POST', { description: 'Transport' }, token));

    await createExpense(token, { amount: 10.5, description: 'Lunch', category_id: 1, date: '2025-01-05T12:00:00Z' });
    await createExpense(token, { amount: 4.5, description: 'Snack', category_id: 1, date: '2025-01-20T12:00:00Z' });
    await createExpense(token, { amount: 3, description: 'Bus fare', category_id: 2, date: '2025-01-21T12:00:00Z' });
    await createExpense(token, { amount: 8, description: 'Misc', date: '2025-01-22T12:00:00Z' });
    await createExpense(token, { amount: 100, description: 'Later', category_id: 1, date: '2025-03-01T12:00:00Z' });
    await createExpense(other, { amount: 999, description: 'Not mine', category_id: 1, date: '2025-01-10T12:00:00Z' });

    const res = await ctx.app.request('/reports/expenses?start_date=2025-01-01&end_date=2025-01-31', bearer(token));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ '1': 15, '2': 3, uncategorized: 8 });
  });

  it('requires authentication', async () => {
    expect((await ctx.app.request('/reports/expenses')).status).toBe(401);
  });
});

describe('Server Integration: Health', () => {
  it('reports ok without authentication', async () => {
    const res = await ctx.app.request('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok', version: '0.1.0' });
  });
});
