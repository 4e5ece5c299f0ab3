import type { AuthConfig } from './types/auth.js';
import type { TallyConfig } from './types/config.js';

export const VERSION = '0.1.0';

export const ACCESS_TOKEN_EXPIRE_MINUTES = 30;
/** Lifetime used when a caller issues a token without naming one. */
export const FALLBACK_TOKEN_EXPIRE_MINUTES = 15;

export const DEFAULT_PAGE_LIMIT = 100;
export const MAX_PAGE_LIMIT = 1000;

export const UNCATEGORIZED_KEY = 'uncategorized';

export type ConfigDefaults = Omit<TallyConfig, 'auth'> & {
  auth: Omit<AuthConfig, 'jwtSecret'>;
};

export const DEFAULT_CONFIG: ConfigDefaults = {
  server: {
    port: 8000,
    host: '127.0.0.1',
  },
  auth: {
    accessTokenExpireMinutes: ACCESS_TOKEN_EXPIRE_MINUTES,
  },
  database: {
    path: '.tally/tally.db',
  },
  logging: {
    level: 'info',
  },
};
