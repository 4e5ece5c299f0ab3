import { createLogger, type AuthConfig, type LogSink } from '@tally/shared';
import { initializeStore, type TallyStore } from '@tally/store';
import { createApp } from '../src/app.js';

export const authConfig: AuthConfig = {
  jwtSecret: 'test-secret-key-for-signing',
  accessTokenExpireMinutes: 30,
};

const quiet: LogSink = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export interface TestContext {
  app: ReturnType<typeof createApp>;
  store: TallyStore;
}

export function createTestApp(options: { now?: () => string } = {}): TestContext {
  const store = initializeStore(':memory:');
  const app = createApp({
    store,
    config: { auth: authConfig },
    logger: createLogger('error', quiet),
    now: options.now,
  });
  return { app, store };
}

export function jsonRequest(method: string, body: unknown, token?: string): RequestInit {
  const headers: Record<string, string> = { 'Content-Type': 'application/json' };
  if (token) headers.Authorization = `Bearer ${token}`;
  return { method, headers, body: JSON.stringify(body) };
}

export function bearer(token: string, method = 'GET'): RequestInit {
  return { method, headers: { Authorization: `Bearer ${token}` } };
}

export async function register(ctx: TestContext, username: string, password: string): Promise<Response> {
  return ctx.app.request('/users/register', jsonRequest('POST', { username, password }));
}

export async function login(ctx: TestContext, username: string, password: string): Promise<Response> {
  return ctx.app.request('/users/login', {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({ username, password }).toString(),
  });
}

/** Register then log in, returning the access token. */
export async function signIn(ctx: TestContext, username: string, password = 'secret123'): Promise<string> {
  await register(ctx, username, password);
  const res = await login(ctx, username, password);
  const body: { access_token: string } = await res.json();
  return body.access_token;
}
